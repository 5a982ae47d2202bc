/**
 * Orchestrator agent — classifies the task into a routing decision.
 *
 * Dependency direction: orchestrator.ts → agents/base, workflow/routing
 * Used by: agent factory
 */

import { BaseAgent, type AgentDeps } from '../base.js';
import type { StepContext } from '../../core/workflow/graph.js';
import type { RunConfig } from '../../core/workflow/run-config.js';
import type { WorkflowState } from '../../core/workflow/state.js';
import type { PromptVars } from '../../prompts/library.js';
import { normalizeDecision } from '../../core/workflow/routing.js';
import { ServiceError, StepError } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

export class OrchestratorAgent extends BaseAgent {
    constructor(deps: AgentDeps) {
        super('orchestrator', deps);
    }

    /**
     * Anything other than a clean GENERATE, REVIEW or DOCUMENT answer becomes
     * UNKNOWN. A failed service call does too, unless the run is configured
     * with `classificationFailure: 'abort'`.
     */
    override async apply(state: WorkflowState, ctx: StepContext<RunConfig>): Promise<WorkflowState> {
        let text: string;
        try {
            text = await this.generate(state, ctx);
        } catch (err) {
            if (!(err instanceof StepError) || !(err.cause instanceof ServiceError)) throw err;
            if (ctx.config.classificationFailure === 'abort') throw err;
            logger.warn(`Classification failed, taking the fallback path: ${err.cause.message}`);
            text = '';
        }
        return this.applyResponse(state, text);
    }

    protected promptVars(state: Readonly<WorkflowState>): PromptVars {
        return { task: state.taskDescription };
    }

    protected applyResponse(state: WorkflowState, text: string): WorkflowState {
        const decision = normalizeDecision(text);
        logger.debug(`Routing decision: ${decision}${text && decision === 'UNKNOWN' ? ` (from "${text}")` : ''}`);
        return { ...state, routingDecision: decision };
    }
}
