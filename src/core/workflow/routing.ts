/**
 * Routers and the classification boundary.
 *
 * `normalizeDecision` is the only place free text from the model becomes a
 * RoutingDecision. Routers here are pure functions of state.
 *
 * Dependency direction: routing.ts → workflow/state
 * Used by: flow, orchestrator agent
 */

import { RoutingDecision, type WorkflowState } from './state.js';

/** Case-insensitive substrings in review feedback that send the code back for another pass. */
export const TROUBLE_INDICATORS: readonly string[] = ['error', 'fix'];

/**
 * Map raw classifier output onto the closed decision set.
 * Surrounding whitespace and punctuation are ignored; anything else is UNKNOWN.
 */
export function normalizeDecision(raw: string | undefined | null): RoutingDecision {
    if (!raw) return RoutingDecision.Unknown;

    const candidate = raw.trim().toUpperCase().replace(/^[^A-Z]+|[^A-Z]+$/g, '');
    switch (candidate) {
        case RoutingDecision.Generate:
            return RoutingDecision.Generate;
        case RoutingDecision.Review:
            return RoutingDecision.Review;
        case RoutingDecision.Document:
            return RoutingDecision.Document;
        default:
            return RoutingDecision.Unknown;
    }
}

/** True when the feedback mentions any trouble indicator. */
export function containsTroubleIndicator(feedback: string | undefined): boolean {
    if (!feedback) return false;
    const lower = feedback.toLowerCase();
    return TROUBLE_INDICATORS.some((word) => lower.includes(word));
}

/** Whether the latest review asks for another generation pass. */
export function needsRetry(state: Readonly<WorkflowState>): boolean {
    return containsTroubleIndicator(state.reviewFeedback);
}

/** Destinations a decision router picks between. */
export interface DecisionRoutes {
    readonly generate: string;
    readonly review: string;
    readonly document: string;
    readonly fallback: string;
}

/** Router over `routingDecision`; unset and UNKNOWN go to the fallback step. */
export function routeByDecision(routes: DecisionRoutes): (state: Readonly<WorkflowState>) => string {
    return (state) => {
        switch (state.routingDecision) {
            case RoutingDecision.Generate:
                return routes.generate;
            case RoutingDecision.Review:
                return routes.review;
            case RoutingDecision.Document:
                return routes.document;
            default:
                return routes.fallback;
        }
    };
}

/** Router after review: retry generation on trouble, otherwise proceed. */
export function routeAfterReview(retry: string, proceed: string): (state: Readonly<WorkflowState>) => string {
    return (state) => (needsRetry(state) ? retry : proceed);
}
