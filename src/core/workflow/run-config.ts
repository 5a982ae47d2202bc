/**
 * Per-run settings and their resolution from config plus caller overrides.
 *
 * Dependency direction: run-config.ts → config/types, engine (types only), errors, utils
 * Used by: runner, agents, approval gate
 */

import { z } from 'zod';
import type { WorkflowConfig } from '../config/types.js';
import type { EngineRunConfig } from './engine.js';
import { ValidationError } from '../errors.js';
import { modelName } from '../../utils/validation.js';
import { MAX_TIMER_SECONDS } from '../../utils/timer.js';

/** Settings every step of one run sees through its StepContext. */
export interface RunConfig extends EngineRunConfig {
    readonly interactive: boolean;
    /** Replaces every agent's configured model for this run. */
    readonly model?: string;
    readonly approvalTimeoutSeconds: number;
    readonly classificationFailure: 'fallback' | 'abort';
}

export const runOverridesSchema = z.object({
    interactive: z.boolean().optional(),
    maxRetries: z.number().int().min(0).max(20).optional(),
    model: modelName.optional(),
    timeoutSeconds: z.number().positive().max(MAX_TIMER_SECONDS).optional(),
});

/** Caller-supplied overrides for a single run. */
export type RunOverrides = z.infer<typeof runOverridesSchema>;

/**
 * Merge a run's overrides over the workflow config.
 * @throws {ValidationError} if an override is out of range.
 */
export function resolveRunConfig(workflow: WorkflowConfig, overrides: RunOverrides = {}): RunConfig {
    const result = runOverridesSchema.safeParse(overrides);
    if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ValidationError(`Invalid run options: ${issues}`, { issues: result.error.issues });
    }
    const o = result.data;

    return {
        interactive: o.interactive ?? workflow.interactive,
        maxRetries: o.maxRetries ?? workflow.maxRetries,
        model: o.model,
        timeoutSeconds: o.timeoutSeconds ?? workflow.timeoutSeconds,
        maxSteps: workflow.maxSteps,
        approvalTimeoutSeconds: workflow.approvalTimeoutSeconds,
        classificationFailure: workflow.classificationFailure,
    };
}
