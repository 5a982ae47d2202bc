/**
 * Workflow runner — wires config, agents, graph and checkpoint store into a
 * runtime, and runs tasks through it.
 *
 * One runtime (and one graph) serves any number of concurrent runs; each
 * run gets its own state, run ID and checkpoint.
 *
 * Dependency direction: runner.ts → engine, flow, agents/factory, approval, checkpoint, config
 * Used by: cli commands, task-queue
 */

import { randomBytes } from 'node:crypto';
import ora, { type Ora } from 'ora';
import { WorkflowEngine, type RunHooks } from './engine.js';
import { buildAssistantGraph, STEP, type AssistantGraph } from './flow.js';
import { ApprovalGateStep, PromptsApprovalSource, type ApprovalSource } from './approval.js';
import { FileCheckpointStore, MemoryCheckpointStore, type CheckpointStore } from './checkpoint.js';
import { resolveRunConfig, type RunConfig, type RunOverrides } from './run-config.js';
import {
    cloneState,
    createWorkflowState,
    parseWorkflowState,
    workflowStateSchema,
    type ApprovalStatus,
    type RoutingDecision,
    type WorkflowState,
} from './state.js';
import { createAgents } from '../../agents/factory.js';
import { AGENT_ROLE_LABELS, ALL_AGENT_ROLES } from '../../agents/types.js';
import type { GenerationService } from '../../providers/generation-service.js';
import { loadPrompts, type PromptSet } from '../../prompts/library.js';
import { getCheckpointDir } from '../config/manager.js';
import type { AppConfig } from '../config/types.js';
import { RunError, ValidationError } from '../errors.js';
import { Semaphore } from '../../utils/semaphore.js';
import { logger } from '../../utils/logger.js';

/** Replaceable collaborators; tests pass in-process fakes. */
export interface RuntimeDeps {
    service?: GenerationService;
    store?: CheckpointStore<WorkflowState>;
    approvalSource?: ApprovalSource;
    prompts?: PromptSet;
}

export interface WorkflowRuntime {
    readonly config: AppConfig;
    readonly graph: AssistantGraph;
    readonly engine: WorkflowEngine<WorkflowState, RunConfig>;
    readonly store: CheckpointStore<WorkflowState>;
}

/** What a finished run hands back to its caller. */
export interface RunResult {
    readonly runId: string;
    readonly decision?: RoutingDecision;
    readonly generatedArtifact?: string;
    readonly reviewFeedback?: string;
    readonly documentedArtifact?: string;
    readonly approvalStatus?: ApprovalStatus;
    readonly retryCount: number;
}

export interface RunOptions {
    /** Cancels the run. */
    signal?: AbortSignal;
    hooks?: RunHooks<WorkflowState>;
    overrides?: RunOverrides;
}

export interface RunRequest extends RunOptions {
    task: string;
    /** Generated from the task when omitted. */
    runId?: string;
}

/**
 * Build the runtime for a project. The graph is compiled once here.
 *
 * @throws {ServiceError} if an agent's provider is not configured and no service is injected
 */
export function createRuntime(config: AppConfig, projectRoot: string, deps: RuntimeDeps = {}): WorkflowRuntime {
    const agents = createAgents(config, {
        slots: new Semaphore(config.workflow.maxConcurrency),
        service: deps.service,
        prompts: deps.prompts ?? loadPrompts(projectRoot),
    });

    const graph = buildAssistantGraph({
        ...agents,
        approvalGate: new ApprovalGateStep(deps.approvalSource ?? new PromptsApprovalSource()),
    });

    const store =
        deps.store ??
        (config.workflow.checkpoints === 'memory'
            ? new MemoryCheckpointStore<WorkflowState>()
            : new FileCheckpointStore(getCheckpointDir(projectRoot), parseWorkflowState));

    return {
        config,
        graph,
        engine: new WorkflowEngine(graph, { store, clone: cloneState }),
        store,
    };
}

/**
 * Run one task from the start.
 *
 * @throws {ValidationError} if the task is empty, an override is invalid or `runId` is taken (before any step runs)
 * @throws {RunError} carrying the partial state if the run fails
 */
export async function runWorkflow(runtime: WorkflowRuntime, request: RunRequest): Promise<RunResult> {
    const state = createWorkflowState(request.task);
    const runConfig = resolveRunConfig(runtime.config.workflow, request.overrides);
    const runId = request.runId ?? generateRunId(state.taskDescription);
    if (request.runId !== undefined && (await runtime.store.load(runId))) {
        throw new ValidationError(`Run "${runId}" already exists; resume it or pick another run ID`, { runId });
    }

    logger.debug(`Starting run ${runId} (maxRetries=${runConfig.maxRetries}, interactive=${runConfig.interactive})`);
    const final = await runtime.engine.run(runId, state, runConfig, {
        signal: request.signal,
        hooks: request.hooks,
    });
    return toRunResult(runId, final);
}

/**
 * Continue a run from its last checkpoint. A completed run returns its
 * stored result without calling any step.
 *
 * @throws {ValidationError} if the run has no checkpoint
 * @throws {RunError} if the continued run fails
 */
export async function resumeWorkflow(
    runtime: WorkflowRuntime,
    runId: string,
    options: RunOptions = {},
): Promise<RunResult> {
    const runConfig = resolveRunConfig(runtime.config.workflow, options.overrides);
    const final = await runtime.engine.resume(runId, runConfig, {
        signal: options.signal,
        hooks: options.hooks,
    });
    return toRunResult(runId, final);
}

export function toRunResult(runId: string, state: Readonly<WorkflowState>): RunResult {
    return {
        runId,
        decision: state.routingDecision,
        generatedArtifact: state.generatedArtifact,
        reviewFeedback: state.reviewFeedback,
        documentedArtifact: state.documentedArtifact,
        approvalStatus: state.approvalStatus,
        retryCount: state.retryCount,
    };
}

/** A RunError raised by the assistant workflow, with its state intact. */
export function isWorkflowRunError(err: unknown): err is RunError<WorkflowState> {
    return err instanceof RunError && workflowStateSchema.safeParse(err.state).success;
}

/**
 * Short, file-name-safe run ID derived from the task.
 */
export function generateRunId(task: string): string {
    const slug = task
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, 30)
        .replace(/-+$/, '');
    return `${slug || 'run'}-${Date.now().toString(36)}-${randomBytes(3).toString('hex')}`;
}

const STEP_LABELS: Record<string, string> = {
    ...Object.fromEntries(ALL_AGENT_ROLES.map((role) => [role, AGENT_ROLE_LABELS[role]])),
    [STEP.approvalGate]: '✋ Approval',
};

/** Human-readable label of a step name. */
export function stepLabel(step: string): string {
    return STEP_LABELS[step] ?? step;
}

/**
 * Hooks that show an ora spinner per step. The spinner stays off while the
 * approval gate waits on the terminal.
 */
export function createSpinnerHooks(options: { interactive: boolean }): RunHooks<WorkflowState> {
    let spinner: Ora | undefined;

    return {
        onStepStart(event) {
            if (options.interactive && event.step === STEP.approvalGate) {
                spinner = undefined;
                return;
            }
            spinner = ora(`${stepLabel(event.step)} running...`).start();
        },
        onStepComplete(event, state) {
            const detail = event.step === STEP.orchestrator ? ` → ${state.routingDecision ?? 'UNKNOWN'}` : '';
            spinner?.succeed(`${stepLabel(event.step)} done${detail}`);
            spinner = undefined;
        },
        onStepError(event) {
            spinner?.fail(`${stepLabel(event.step)} failed`);
            spinner = undefined;
        },
    };
}
