/**
 * The assistant workflow topology.
 *
 *   orchestrator ─┬─ GENERATE → generator → reviewer ─┬─ trouble → generator (bounded)
 *                 │                                    └─ otherwise → documenter
 *                 ├─ REVIEW → reviewer
 *                 ├─ DOCUMENT → documenter → approval_gate → end
 *                 └─ UNKNOWN → fallback → end
 *
 * Dependency direction: flow.ts → graph, routing, approval, state
 * Used by: runner
 */

import { GraphBuilder, TERMINAL, type Graph, type Step } from './graph.js';
import { routeAfterReview, routeByDecision } from './routing.js';
import { APPROVAL_STEP } from './approval.js';
import type { RunConfig } from './run-config.js';
import type { WorkflowState } from './state.js';
import { GraphError } from '../errors.js';

/** Step names of the assistant graph. */
export const STEP = {
    orchestrator: 'orchestrator',
    generator: 'generator',
    reviewer: 'reviewer',
    documenter: 'documenter',
    fallback: 'fallback',
    approvalGate: APPROVAL_STEP,
} as const;

export type AssistantStep = Step<WorkflowState, RunConfig>;

/** The steps the graph is assembled from, keyed by their slot. */
export type AssistantSteps = Readonly<Record<keyof typeof STEP, AssistantStep>>;

export type AssistantGraph = Graph<WorkflowState, RunConfig>;

/**
 * Assemble and validate the assistant graph. Build it once and share it.
 * @throws {GraphError} if a step's name does not match its slot.
 */
export function buildAssistantGraph(steps: AssistantSteps): AssistantGraph {
    for (const key of Object.keys(STEP)) {
        if (!isStepKey(key)) continue;
        if (steps[key].name !== STEP[key]) {
            throw new GraphError(`Step in slot "${key}" is named "${steps[key].name}", expected "${STEP[key]}"`, {
                slot: key,
            });
        }
    }

    return new GraphBuilder<WorkflowState, RunConfig>()
        .addStep(steps.orchestrator)
        .addStep(steps.generator)
        .addStep(steps.reviewer)
        .addStep(steps.documenter)
        .addStep(steps.fallback)
        .addStep(steps.approvalGate)
        .setEntryPoint(STEP.orchestrator)
        .addConditionalEdges(
            STEP.orchestrator,
            routeByDecision({
                generate: STEP.generator,
                review: STEP.reviewer,
                document: STEP.documenter,
                fallback: STEP.fallback,
            }),
            [STEP.generator, STEP.reviewer, STEP.documenter, STEP.fallback],
        )
        .addEdge(STEP.generator, STEP.reviewer)
        .addConditionalEdges(
            STEP.reviewer,
            routeAfterReview(STEP.generator, STEP.documenter),
            [STEP.generator, STEP.documenter],
            { retry: { retryTo: STEP.generator, exhaustedTo: STEP.documenter } },
        )
        .addEdge(STEP.documenter, STEP.approvalGate)
        .addEdge(STEP.approvalGate, TERMINAL)
        .addEdge(STEP.fallback, TERMINAL)
        .compile();
}

function isStepKey(key: string): key is keyof typeof STEP {
    return Object.prototype.hasOwnProperty.call(STEP, key);
}
