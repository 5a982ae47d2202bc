/**
 * Workflow state — the record threaded through every step of a run.
 *
 * The zod schema doubles as the checkpoint format: snapshots are parsed
 * back through it on resume, so field names here are the persisted names.
 *
 * Dependency direction: state.ts → zod, utils/validation, core/errors
 * Used by: graph, engine, agents, checkpoint store, runner
 */

import { z } from 'zod';
import { nonEmptyString } from '../../utils/validation.js';
import { ValidationError } from '../errors.js';

/** The closed set of classifier outcomes. */
export const RoutingDecision = {
    Generate: 'GENERATE',
    Review: 'REVIEW',
    Document: 'DOCUMENT',
    Unknown: 'UNKNOWN',
} as const;

export type RoutingDecision = (typeof RoutingDecision)[keyof typeof RoutingDecision];

export const routingDecisionSchema = z.enum(['GENERATE', 'REVIEW', 'DOCUMENT', 'UNKNOWN']);

export const approvalStatusSchema = z.enum(['approved', 'rejected']);

export type ApprovalStatus = z.infer<typeof approvalStatusSchema>;

export const workflowStateSchema = z.object({
    taskDescription: nonEmptyString,
    routingDecision: routingDecisionSchema.optional(),
    generatedArtifact: z.string().optional(),
    reviewFeedback: z.string().optional(),
    documentedArtifact: z.string().optional(),
    approvalStatus: approvalStatusSchema.optional(),
    retryCount: z.number().int().min(0).default(0),
});

/** State of a single run. Only the engine writes `retryCount`. */
export interface WorkflowState {
    readonly taskDescription: string;
    routingDecision?: RoutingDecision;
    generatedArtifact?: string;
    reviewFeedback?: string;
    documentedArtifact?: string;
    approvalStatus?: ApprovalStatus;
    retryCount: number;
}

/**
 * Create the initial state of a run from its task text.
 * @throws {ValidationError} if the task is empty or whitespace.
 */
export function createWorkflowState(taskDescription: string): WorkflowState {
    const result = nonEmptyString.safeParse(taskDescription);
    if (!result.success) {
        throw new ValidationError('Task description cannot be empty');
    }
    return { taskDescription: result.data, retryCount: 0 };
}

/** Independent copy of a state; runs never share one. */
export function cloneState(state: WorkflowState): WorkflowState {
    return { ...state };
}

/**
 * Validate an untrusted record (e.g. a checkpoint read from disk) as a state.
 * @throws {ValidationError} listing each failing field.
 */
export function parseWorkflowState(raw: unknown): WorkflowState {
    const result = workflowStateSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ValidationError(`Invalid workflow state: ${issues}`, { issues: result.error.issues });
    }
    return stripUndefined(result.data);
}

function stripUndefined(state: WorkflowState): WorkflowState {
    const copy: WorkflowState = { taskDescription: state.taskDescription, retryCount: state.retryCount };
    if (state.routingDecision !== undefined) copy.routingDecision = state.routingDecision;
    if (state.generatedArtifact !== undefined) copy.generatedArtifact = state.generatedArtifact;
    if (state.reviewFeedback !== undefined) copy.reviewFeedback = state.reviewFeedback;
    if (state.documentedArtifact !== undefined) copy.documentedArtifact = state.documentedArtifact;
    if (state.approvalStatus !== undefined) copy.approvalStatus = state.approvalStatus;
    return copy;
}
