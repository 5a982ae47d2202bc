/**
 * Fallback agent — general assistant for tasks the orchestrator could not classify.
 *
 * Dependency direction: fallback.ts → agents/base
 * Used by: agent factory
 */

import { BaseAgent, type AgentDeps } from '../base.js';
import type { WorkflowState } from '../../core/workflow/state.js';
import type { PromptVars } from '../../prompts/library.js';

export class FallbackAgent extends BaseAgent {
    constructor(deps: AgentDeps) {
        super('fallback', deps);
    }

    protected promptVars(state: Readonly<WorkflowState>): PromptVars {
        return { task: state.taskDescription };
    }

    protected applyResponse(state: WorkflowState, text: string): WorkflowState {
        return { ...state, documentedArtifact: text };
    }
}
