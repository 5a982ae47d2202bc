/**
 * Documenter agent — returns the code with comments and a doc block added.
 *
 * Dependency direction: documenter.ts → agents/base
 * Used by: agent factory
 */

import { BaseAgent, type AgentDeps } from '../base.js';
import type { WorkflowState } from '../../core/workflow/state.js';
import type { PromptVars } from '../../prompts/library.js';

export class DocumenterAgent extends BaseAgent {
    constructor(deps: AgentDeps) {
        super('documenter', deps);
    }

    protected promptVars(state: Readonly<WorkflowState>): PromptVars {
        return { task: state.taskDescription, code: state.generatedArtifact ?? state.taskDescription };
    }

    protected applyResponse(state: WorkflowState, text: string): WorkflowState {
        return { ...state, documentedArtifact: text };
    }
}
