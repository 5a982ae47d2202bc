/**
 * Retry bounding for the feedback cycle.
 *
 * Routers stay pure; the engine passes every decision taken on a
 * retry-policy edge through `boundRetry`, which owns the counter and
 * overrides the router once the budget is spent.
 *
 * Dependency direction: retry.ts → graph (types only)
 * Used by: engine
 */

import type { RetryPolicy } from './graph.js';

export interface RetryDecision {
    /** Where the run actually goes. */
    readonly destination: string;
    /** Counter value after this traversal. */
    readonly retryCount: number;
    /** True when the router asked for a retry but the budget was already spent. */
    readonly exhausted: boolean;
}

/**
 * Apply the retry budget to a router decision.
 *
 * Taking `policy.retryTo` costs one retry. With `retryCount` already at
 * `maxRetries`, the decision is forced to `policy.exhaustedTo`.
 */
export function boundRetry(
    policy: RetryPolicy,
    destination: string,
    retryCount: number,
    maxRetries: number,
): RetryDecision {
    if (destination !== policy.retryTo) {
        return { destination, retryCount, exhausted: false };
    }
    if (retryCount >= maxRetries) {
        return { destination: policy.exhaustedTo, retryCount, exhausted: true };
    }
    return { destination, retryCount: retryCount + 1, exhausted: false };
}
