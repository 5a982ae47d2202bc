/**
 * Task queue — runs many tasks through one shared runtime.
 *
 * Tasks run concurrently up to `concurrency`; each is an independent run
 * with its own state and checkpoint. A failed task does not stop the
 * others unless `stopOnFailure` is set, in which case tasks that have not
 * started yet are skipped.
 *
 * Dependency direction: task-queue.ts → workflow/runner, utils/parallel
 * Used by: cli/commands/generate.ts (batch mode)
 */

import chalk from 'chalk';
import { runWorkflow, type RunResult, type WorkflowRuntime } from './runner.js';
import type { RunOverrides } from './run-config.js';
import { RunError } from '../errors.js';
import { parallelMap } from '../../utils/parallel.js';
import { logger } from '../../utils/logger.js';

/** A task in the queue with its result. */
export interface QueuedTask {
    /** Task description. */
    task: string;
    status: 'completed' | 'failed' | 'skipped';
    runId?: string;
    result?: RunResult;
    /** Error message if failed. */
    error?: string;
    /** Duration in milliseconds. */
    duration?: number;
}

/** Options for running a task queue. */
export interface QueueOptions {
    /** List of task descriptions. */
    tasks: readonly string[];
    overrides?: RunOverrides;
    /** Runs in flight at once. Defaults to `workflow.maxConcurrency`. */
    concurrency?: number;
    /** Skip tasks that have not started once one fails. */
    stopOnFailure?: boolean;
    signal?: AbortSignal;
}

/**
 * Run multiple tasks concurrently. Returns one entry per task, in input order.
 */
export async function runTaskQueue(runtime: WorkflowRuntime, options: QueueOptions): Promise<QueuedTask[]> {
    const { tasks, overrides, stopOnFailure = false, signal } = options;
    const concurrency = options.concurrency ?? runtime.config.workflow.maxConcurrency;
    let stopped = false;

    logger.info(`${tasks.length} task(s) queued, up to ${concurrency} at a time`);

    const settled = await parallelMap(
        tasks,
        async (task): Promise<QueuedTask> => {
            if (stopped || signal?.aborted) return { task, status: 'skipped' };

            const startTime = Date.now();
            try {
                const result = await runWorkflow(runtime, { task, overrides, signal });
                return { task, status: 'completed', runId: result.runId, result, duration: Date.now() - startTime };
            } catch (err) {
                if (stopOnFailure) stopped = true;
                logger.debug(`Task failed: ${task}`);
                return {
                    task,
                    status: 'failed',
                    runId: err instanceof RunError ? err.runId : undefined,
                    error: err instanceof Error ? err.message : String(err),
                    duration: Date.now() - startTime,
                };
            }
        },
        { concurrency },
    );

    return settled.map((entry, index): QueuedTask =>
        entry.success
            ? entry.value
            : { task: tasks[index] ?? '', status: 'failed', error: entry.error.message },
    );
}

/**
 * Parse a task list from a file or string.
 * Each line is a separate task. Empty lines and comments (#) are skipped.
 */
export function parseTasks(input: string): string[] {
    return input
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0 && !line.startsWith('#'));
}

/** Print a colored summary of the queue results. */
export function printQueueSummary(queue: readonly QueuedTask[]): void {
    console.log();
    logger.header('Queue Summary');

    const completed = queue.filter(t => t.status === 'completed').length;
    const failed = queue.filter(t => t.status === 'failed').length;
    const skipped = queue.filter(t => t.status === 'skipped').length;

    for (const item of queue) {
        const icon = item.status === 'completed' ? chalk.green('✔')
            : item.status === 'failed' ? chalk.red('✘')
                : chalk.gray('○');

        const duration = item.duration ? chalk.gray(` (${(item.duration / 1000).toFixed(1)}s)`) : '';
        const runId = item.runId ? chalk.gray(` [${item.runId}]`) : '';
        console.log(`  ${icon} ${item.task}${duration}${runId}`);

        if (item.error) {
            console.log(chalk.red(`    Error: ${item.error}`));
        }
    }

    console.log();
    console.log(chalk.bold(`  ${completed} completed, ${failed} failed, ${skipped} skipped`));
}
