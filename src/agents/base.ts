/**
 * Agent base class — the shared behavior of every LLM-backed workflow step.
 *
 * Each agent is a Step: it renders its prompt from the run state, makes one
 * GenerationService call and writes the trimmed answer back into a field of
 * the state.
 *
 * Dependency direction: agents/base.ts → providers/generation-service, prompts/library, core/errors, utils
 * Used by: all agent implementations
 */

import type { GenerationService } from '../providers/generation-service.js';
import type { Step, StepContext } from '../core/workflow/graph.js';
import type { RunConfig } from '../core/workflow/run-config.js';
import type { WorkflowState } from '../core/workflow/state.js';
import type { PromptTemplate, PromptVars } from '../prompts/library.js';
import { renderPrompt } from '../prompts/library.js';
import type { AgentRole } from './types.js';
import { AGENT_ROLE_LABELS } from './types.js';
import { CancellationError, StepError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

/** Model settings of one agent. */
export interface AgentModelOptions {
    readonly model: string;
    readonly temperature: number;
    readonly maxTokens?: number;
}

export interface AgentDeps {
    readonly service: GenerationService;
    readonly prompt: PromptTemplate;
    readonly options: AgentModelOptions;
}

/**
 * Base class for all agents.
 *
 * To create a new agent:
 * 1. Extend this class
 * 2. Implement `promptVars(state)` — the values its template needs
 * 3. Implement `applyResponse(state, text)` — where the answer goes
 * 4. Optionally override `apply()` to change failure handling
 */
export abstract class BaseAgent implements Step<WorkflowState, RunConfig> {
    public readonly role: AgentRole;
    public readonly name: string;
    protected readonly service: GenerationService;
    protected readonly prompt: PromptTemplate;
    protected readonly options: AgentModelOptions;

    constructor(role: AgentRole, deps: AgentDeps) {
        this.role = role;
        this.name = role;
        this.service = deps.service;
        this.prompt = deps.prompt;
        this.options = deps.options;
    }

    /**
     * Run this agent against the state.
     * @throws {StepError} if the generation call fails or returns nothing.
     * @throws {CancellationError} if the run is cancelled mid-call.
     */
    async apply(state: WorkflowState, ctx: StepContext<RunConfig>): Promise<WorkflowState> {
        const text = await this.generate(state, ctx);
        if (!text) {
            throw new StepError(`${AGENT_ROLE_LABELS[this.role]} returned an empty response`, this.name);
        }
        return this.applyResponse(state, text);
    }

    /**
     * Render the prompt, call the service and return the trimmed answer.
     * Service failures are wrapped in StepError; cancellation passes through.
     */
    protected async generate(state: Readonly<WorkflowState>, ctx: StepContext<RunConfig>): Promise<string> {
        const label = AGENT_ROLE_LABELS[this.role];
        const vars = this.promptVars(state);
        const model = ctx.config.model ?? this.options.model;

        logger.debug(`${label} calling ${model} (run ${ctx.runId})`);

        try {
            const text = await this.service.complete(
                renderPrompt(this.prompt.system, vars),
                renderPrompt(this.userTemplate(state), vars),
                {
                    model,
                    temperature: this.options.temperature,
                    maxTokens: this.options.maxTokens,
                    signal: ctx.signal,
                },
            );
            return text.trim();
        } catch (err) {
            if (err instanceof CancellationError) throw err;
            throw new StepError(`${label} failed: ${err instanceof Error ? err.message : String(err)}`, this.name, {
                cause: err,
            });
        }
    }

    /** User-message template for this call. */
    protected userTemplate(_state: Readonly<WorkflowState>): string {
        return this.prompt.user;
    }

    /** Template values for this agent's prompt. */
    protected abstract promptVars(state: Readonly<WorkflowState>): PromptVars;

    /** Write the (non-empty, trimmed) answer into the state. */
    protected abstract applyResponse(state: WorkflowState, text: string): WorkflowState;
}
