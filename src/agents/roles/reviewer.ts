/**
 * Reviewer agent — reviews the generated code and writes feedback.
 *
 * Without generated code (a task routed straight to review) it reviews the
 * task text itself, which then carries the code.
 *
 * Dependency direction: reviewer.ts → agents/base
 * Used by: agent factory
 */

import { BaseAgent, type AgentDeps } from '../base.js';
import type { WorkflowState } from '../../core/workflow/state.js';
import type { PromptVars } from '../../prompts/library.js';

export class ReviewerAgent extends BaseAgent {
    constructor(deps: AgentDeps) {
        super('reviewer', deps);
    }

    protected promptVars(state: Readonly<WorkflowState>): PromptVars {
        return { task: state.taskDescription, code: state.generatedArtifact ?? state.taskDescription };
    }

    protected applyResponse(state: WorkflowState, text: string): WorkflowState {
        return { ...state, reviewFeedback: text };
    }
}
