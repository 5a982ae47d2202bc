/**
 * Human approval — the gate between documentation and the end of a run.
 *
 * Non-interactive runs are approved on the spot. Interactive runs ask an
 * ApprovalSource and wait for one yes/no answer; no answer in time, or a
 * source that fails, means rejected. Only this run waits; others keep going.
 *
 * Dependency direction: approval.ts → prompts, chalk, graph, state, run-config, utils
 * Used by: workflow flow, runner
 */

import { PassThrough, type Readable, type Writable } from 'node:stream';
import { ReadStream } from 'node:tty';
import prompts from 'prompts';
import chalk from 'chalk';
import { logger } from '../../utils/logger.js';
import { timerDelayMs } from '../../utils/timer.js';
import { CancellationError } from '../errors.js';
import type { Step, StepContext } from './graph.js';
import type { RunConfig } from './run-config.js';
import type { ApprovalStatus, WorkflowState } from './state.js';

export const APPROVAL_STEP = 'approval_gate';

/** What the approver gets to see. */
export interface ApprovalRequest {
  readonly runId: string;
  readonly taskDescription: string;
  readonly artifact: string | undefined;
}

/** Out-of-band yes/no decision for one run. */
export interface ApprovalSource {
  /**
   * Resolve to `true` to approve. `signal` aborts when the gate stops
   * waiting (timeout or cancellation).
   */
  requestApproval(request: ApprovalRequest, signal: AbortSignal): Promise<boolean>;
}

const PREVIEW_LENGTH = 500;

export interface PromptsApprovalSourceOptions {
  /** Where keystrokes come from. Defaults to process.stdin. */
  input?: Readable;
  /** Where the preview and prompt are written. Defaults to process.stdout. */
  output?: Writable;
}

/** Ctrl+C, which makes an open prompt abort. */
const ABORT_KEY = '\x03';

/**
 * Asks on the terminal with a `prompts` confirm. The prompt reads from its
 * own stream, so it closes when the gate stops waiting.
 */
export class PromptsApprovalSource implements ApprovalSource {
  private readonly input: Readable;
  private readonly output: Writable;

  constructor(options: PromptsApprovalSourceOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async requestApproval(request: ApprovalRequest, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return false;
    this.printPreview(request);

    const stdin = new PassThrough();
    const restoreMode = this.enterRawMode();
    this.input.pipe(stdin);

    const onAbort = (): void => {
      stdin.write(ABORT_KEY);
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const { approved } = await prompts({
        type: 'confirm',
        name: 'approved',
        message: 'Approve this output?',
        initial: false,
        stdin,
        stdout: this.output,
      });
      return approved === true && !signal.aborted;
    } finally {
      signal.removeEventListener('abort', onAbort);
      this.input.unpipe(stdin);
      stdin.end();
      restoreMode();
    }
  }

  private printPreview(request: ApprovalRequest): void {
    const artifact = request.artifact ?? '';
    const preview =
      artifact.length > PREVIEW_LENGTH
        ? artifact.slice(0, PREVIEW_LENGTH) + chalk.gray('\n... (truncated)')
        : artifact;

    this.output.write(
      [
        '',
        chalk.bold.cyan(`── Approval: run ${request.runId} ──`),
        chalk.gray(request.taskDescription),
        '',
        preview,
        '',
        '',
      ].join('\n'),
    );
  }

  /** Keystrokes reach the prompt one at a time on a terminal. */
  private enterRawMode(): () => void {
    const input = this.input;
    if (!(input instanceof ReadStream) || !input.isTTY || input.isRaw) return () => undefined;
    input.setRawMode(true);
    return () => {
      input.setRawMode(false);
    };
  }
}

/** The approval gate step. */
export class ApprovalGateStep implements Step<WorkflowState, RunConfig> {
  public readonly name = APPROVAL_STEP;
  private readonly source: ApprovalSource;

  constructor(source: ApprovalSource) {
    this.source = source;
  }

  async apply(state: WorkflowState, ctx: StepContext<RunConfig>): Promise<WorkflowState> {
    if (!ctx.config.interactive) {
      return { ...state, approvalStatus: 'approved' };
    }

    const approvalStatus = await this.awaitDecision(
      { runId: ctx.runId, taskDescription: state.taskDescription, artifact: state.documentedArtifact },
      ctx.signal,
      ctx.config.approvalTimeoutSeconds,
    );
    logger.debug(`Run ${ctx.runId}: approval ${approvalStatus}`);
    return { ...state, approvalStatus };
  }

  /**
   * @throws {CancellationError} if the run is cancelled while waiting.
   */
  private awaitDecision(request: ApprovalRequest, runSignal: AbortSignal, timeoutSeconds: number): Promise<ApprovalStatus> {
    return new Promise<ApprovalStatus>((resolve, reject) => {
      if (runSignal.aborted) {
        reject(new CancellationError('Run cancelled while awaiting approval', { runId: request.runId }));
        return;
      }

      const wait = new AbortController();
      let settled = false;

      const finish = (settle: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        runSignal.removeEventListener('abort', onAbort);
        wait.abort();
        settle();
      };

      const onAbort = (): void => {
        finish(() => reject(new CancellationError('Run cancelled while awaiting approval', { runId: request.runId })));
      };

      const timer = setTimeout(() => {
        finish(() => {
          logger.warn(`Run ${request.runId}: no approval decision after ${timeoutSeconds}s, rejecting`);
          resolve('rejected');
        });
      }, timerDelayMs(timeoutSeconds));

      runSignal.addEventListener('abort', onAbort, { once: true });

      void Promise.resolve()
        .then(() => this.source.requestApproval(request, wait.signal))
        .then(
          (approved) => finish(() => resolve(approved === true ? 'approved' : 'rejected')),
          (err: unknown) =>
            finish(() => {
              logger.warn(
                `Run ${request.runId}: approval failed (${err instanceof Error ? err.message : String(err)}), rejecting`,
              );
              resolve('rejected');
            }),
        );
    });
  }
}
