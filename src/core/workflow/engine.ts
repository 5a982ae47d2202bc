/**
 * Workflow engine — drives one run through a compiled graph.
 *
 * Each iteration resolves the next step (router + retry bound), hands a
 * working copy of the state to that step, commits the result and
 * checkpoints it. The loop ends at TERMINAL, on the first error, or when
 * the step or time budget runs out.
 *
 * The engine is generic over the state type; the only thing it needs from
 * the state is the retry counter it owns.
 *
 * Dependency direction: engine.ts → graph, retry, checkpoint, core/errors, utils/logger, utils/timer
 * Used by: workflow runner
 */

import { TERMINAL, type Graph, type StepContext } from './graph.js';
import { boundRetry } from './retry.js';
import type { Checkpoint, CheckpointStore, RunStatus } from './checkpoint.js';
import {
    AppError,
    CancellationError,
    RunError,
    ValidationError,
    WorkflowError,
} from '../errors.js';
import { logger } from '../../utils/logger.js';
import { timerDelayMs } from '../../utils/timer.js';

/** State the engine can drive: it must carry the engine-owned retry counter. */
export interface RetryTracked {
    retryCount: number;
}

/** Run settings the engine itself reads. */
export interface EngineRunConfig {
    /** Retries allowed on a retry-policy edge before it is forced onward. */
    readonly maxRetries: number;
    /** Whole-run time budget. */
    readonly timeoutSeconds?: number;
    /** Step budget; defaults to `2 × steps + 2 × maxRetries`. */
    readonly maxSteps?: number;
}

export interface StepEvent {
    readonly runId: string;
    readonly step: string;
    readonly stepNumber: number;
    readonly maxSteps: number;
}

/** Observers of a run. Exceptions thrown by hooks fail the run. */
export interface RunHooks<S> {
    onStepStart?(event: StepEvent): void;
    onStepComplete?(event: StepEvent, state: Readonly<S>): void;
    onStepError?(event: StepEvent, error: unknown): void;
    onRetry?(event: { runId: string; retryCount: number; maxRetries: number; exhausted: boolean }): void;
}

export interface ExecuteOptions<S> {
    /** Cancels the run between steps and aborts the in-flight step. */
    signal?: AbortSignal;
    hooks?: RunHooks<S>;
}

export interface EngineOptions<S> {
    store: CheckpointStore<S>;
    /** Copies a state before a step owns it. Defaults to structuredClone. */
    clone?: (state: S) => S;
}

export class WorkflowEngine<S extends RetryTracked, C extends EngineRunConfig> {
    private readonly graph: Graph<S, C>;
    private readonly store: CheckpointStore<S>;
    private readonly clone: (state: S) => S;

    constructor(graph: Graph<S, C>, options: EngineOptions<S>) {
        this.graph = graph;
        this.store = options.store;
        this.clone = options.clone ?? ((state) => structuredClone(state));
    }

    /** Step budget for a run under `config`. */
    maxStepsFor(config: C): number {
        return config.maxSteps ?? this.graph.size * 2 + config.maxRetries * 2;
    }

    /**
     * Start a new run from the graph's entry step.
     * @throws {RunError} carrying the last committed state.
     */
    async run(runId: string, initialState: S, config: C, options: ExecuteOptions<S> = {}): Promise<S> {
        const now = Date.now();
        const checkpoint: Checkpoint<S> = {
            runId,
            step: null,
            stepCount: 0,
            status: 'running',
            state: this.clone(initialState),
            createdAt: now,
            updatedAt: now,
        };
        await this.store.save(checkpoint);
        logger.debug(`Run ${runId} started`);
        return this.execute(checkpoint, config, options);
    }

    /**
     * Continue a run from its last checkpoint. A completed run returns its final state.
     * @throws {ValidationError} when the run has no checkpoint.
     * @throws {RunError} if the continued run fails.
     */
    async resume(runId: string, config: C, options: ExecuteOptions<S> = {}): Promise<S> {
        const checkpoint = await this.store.load(runId);
        if (!checkpoint) {
            throw new ValidationError(`No checkpoint found for run "${runId}"`, { runId });
        }
        if (checkpoint.status === 'completed') {
            logger.debug(`Run ${runId} already completed`);
            return checkpoint.state;
        }
        if (checkpoint.step !== null && !this.graph.hasStep(checkpoint.step)) {
            throw new ValidationError(`Checkpoint of run "${runId}" names unknown step "${checkpoint.step}"`, {
                runId,
                step: checkpoint.step,
            });
        }

        logger.debug(`Resuming run ${runId} after ${checkpoint.step ?? 'start'} (${checkpoint.stepCount} steps done)`);
        return this.execute({ ...checkpoint, status: 'running', error: undefined }, config, options);
    }

    private async execute(start: Checkpoint<S>, config: C, options: ExecuteOptions<S>): Promise<S> {
        const { runId } = start;
        const hooks = options.hooks ?? {};
        const maxSteps = this.maxStepsFor(config);
        const run = createRunSignal(options.signal, config.timeoutSeconds);

        let state = start.state;
        let lastStep = start.step;
        let stepCount = start.stepCount;

        const persist = (status: RunStatus, error?: { kind: string; message: string }): Promise<void> =>
            this.store.save({
                runId,
                step: lastStep,
                stepCount,
                status,
                state,
                error,
                createdAt: start.createdAt,
                updatedAt: Date.now(),
            });

        try {
            while (true) {
                throwIfAborted(run.signal);

                // The retry counter resolved here commits only with the step that follows.
                const next = this.resolveNext(runId, lastStep, state, config, hooks);
                if (next.step === TERMINAL) {
                    state = next.state;
                    break;
                }

                if (stepCount >= maxSteps) {
                    throw new WorkflowError(`Run exceeded its budget of ${maxSteps} steps`, 'stepLimit', {
                        runId,
                        maxSteps,
                    });
                }

                const event: StepEvent = { runId, step: next.step, stepNumber: stepCount + 1, maxSteps };
                const step = this.graph.getStep(next.step);
                const ctx: StepContext<C> = { runId, signal: run.signal, config };

                hooks.onStepStart?.(event);
                logger.debug(`Run ${runId}: step ${event.stepNumber}/${maxSteps} → ${next.step}`);

                let result: S;
                try {
                    result = await raceAbort(step.apply(this.clone(next.state), ctx), run.signal);
                } catch (err) {
                    hooks.onStepError?.(event, err);
                    throw err;
                }

                state = result;
                lastStep = next.step;
                stepCount++;
                await persist('running');
                hooks.onStepComplete?.(event, state);
            }

            await persist('completed');
            logger.debug(`Run ${runId} completed after ${stepCount} steps`);
            return state;
        } catch (err) {
            const cause = run.signal.aborted && run.signal.reason instanceof AppError ? run.signal.reason : err;
            const failure = new RunError<S>(runId, state, cause);

            try {
                await persist(failure.kind === 'cancelled' ? 'cancelled' : 'failed', {
                    kind: failure.kind,
                    message: cause instanceof Error ? cause.message : String(cause),
                });
            } catch (saveErr) {
                logger.error(
                    `Could not checkpoint failure of run ${runId}: ${saveErr instanceof Error ? saveErr.message : String(saveErr)}`,
                );
            }

            throw failure;
        } finally {
            run.dispose();
        }
    }

    /** Pick the step after `lastStep`, applying the retry bound on retry-policy edges. */
    private resolveNext(
        runId: string,
        lastStep: string | null,
        state: S,
        config: C,
        hooks: RunHooks<S>,
    ): { step: string; state: S } {
        if (lastStep === null) return { step: this.graph.entry, state };

        const destination = this.graph.next(lastStep, state);
        const policy = this.graph.retryPolicyOf(lastStep);
        if (!policy) return { step: destination, state };

        const decision = boundRetry(policy, destination, state.retryCount, config.maxRetries);
        if (decision.exhausted) {
            logger.warn(
                `Run ${runId}: retry budget of ${config.maxRetries} spent, continuing to ${decision.destination}`,
            );
        } else if (decision.retryCount !== state.retryCount) {
            logger.info(`Run ${runId}: retry ${decision.retryCount}/${config.maxRetries} → ${decision.destination}`);
        }
        if (decision.exhausted || decision.retryCount !== state.retryCount) {
            hooks.onRetry?.({
                runId,
                retryCount: decision.retryCount,
                maxRetries: config.maxRetries,
                exhausted: decision.exhausted,
            });
        }

        return { step: decision.destination, state: { ...state, retryCount: decision.retryCount } };
    }
}

interface RunSignal {
    readonly signal: AbortSignal;
    dispose(): void;
}

/** Combine the caller's signal with the run's time budget. */
function createRunSignal(parent: AbortSignal | undefined, timeoutSeconds: number | undefined): RunSignal {
    const controller = new AbortController();

    const onParentAbort = (): void => {
        controller.abort(new CancellationError('Run was cancelled'));
    };
    if (parent?.aborted) {
        onParentAbort();
    } else {
        parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    const timer =
        timeoutSeconds !== undefined
            ? setTimeout(() => {
                  controller.abort(new WorkflowError(`Run timed out after ${timeoutSeconds}s`, 'timeout', { timeoutSeconds }));
              }, timerDelayMs(timeoutSeconds))
            : undefined;

    return {
        signal: controller.signal,
        dispose: () => {
            if (timer !== undefined) clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
        },
    };
}

function throwIfAborted(signal: AbortSignal): void {
    if (!signal.aborted) return;
    throw signal.reason instanceof Error ? signal.reason : new CancellationError();
}

/** Settle with `work`, or reject as soon as `signal` aborts. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        void work.catch((err: unknown) => logger.debug(`Step settled after abort: ${String(err)}`));
        return Promise.reject(signal.reason instanceof Error ? signal.reason : new CancellationError());
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => {
            reject(signal.reason instanceof Error ? signal.reason : new CancellationError());
        };
        signal.addEventListener('abort', onAbort, { once: true });
        work.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            },
        );
    });
}
