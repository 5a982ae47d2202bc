/**
 * Generator agent — writes code for the task.
 *
 * On a retry the latest review feedback is passed along with the task.
 *
 * Dependency direction: generator.ts → agents/base, prompts/library
 * Used by: agent factory
 */

import { BaseAgent, type AgentDeps } from '../base.js';
import type { WorkflowState } from '../../core/workflow/state.js';
import { REVISION_TEMPLATE, type PromptVars } from '../../prompts/library.js';

export class GeneratorAgent extends BaseAgent {
    constructor(deps: AgentDeps) {
        super('generator', deps);
    }

    protected promptVars(state: Readonly<WorkflowState>): PromptVars {
        return { task: state.taskDescription, feedback: state.reviewFeedback };
    }

    protected applyResponse(state: WorkflowState, text: string): WorkflowState {
        return { ...state, generatedArtifact: text };
    }

    protected override userTemplate(state: Readonly<WorkflowState>): string {
        return state.retryCount > 0 && state.reviewFeedback ? REVISION_TEMPLATE : this.prompt.user;
    }
}
