/**
 * `codeloom generate` — Run the workflow for a task, or for every task in a file.
 *
 * Dependency direction: generate.ts → commander, cli/utils, workflow/runner, task-queue
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { createRuntime } from '../../core/workflow/runner.js';
import { parseTasks, printQueueSummary, runTaskQueue } from '../../core/workflow/task-queue.js';
import { fileExists, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { cancelOnInterrupt, executeTask, loadProjectConfig } from '../utils/execute.js';
import { parseInteger, toOverrides, withRunOptions, type RunFlags } from '../utils/options.js';

interface GenerateFlags extends RunFlags {
    batch?: string;
    stopOnFailure?: boolean;
    concurrency?: number;
}

export const generateCommand = withRunOptions(
    new Command('generate')
        .description('Generate code for a task with the multi-agent workflow')
        .argument('[task]', 'Task description'),
)
    .option('-b, --batch <file>', 'Run every task in a file (one per line, # for comments)')
    .option('--stop-on-failure', 'Skip remaining tasks after a failure (batch mode)')
    .option('--concurrency <n>', 'Tasks run at once (batch mode)', parseInteger)
    .action(async (task: string | undefined, flags: GenerateFlags) => {
        if (flags.batch) {
            process.exitCode = await runBatch(flags.batch, flags);
            return;
        }
        if (!task) {
            logger.error('Give a task, or a task file with --batch.');
            process.exitCode = 1;
            return;
        }

        // The approval prompt can leave stdin open.
        process.exit(await executeTask(task, { flags }));
    });

async function runBatch(file: string, flags: GenerateFlags): Promise<number> {
    if (!fileExists(file)) {
        logger.error(`Task list file not found: ${file}`);
        return 1;
    }

    const tasks = parseTasks(readTextFile(file));
    if (tasks.length === 0) {
        logger.error('No tasks found in file. Each line should be a task description.');
        return 1;
    }

    const projectRoot = process.cwd();
    const config = loadProjectConfig(projectRoot);
    if (!config) return 1;

    if (flags.interactive) {
        logger.warn('Approval prompts are not available in batch mode; runs are approved automatically.');
    }

    const controller = new AbortController();
    const removeHandler = cancelOnInterrupt(controller);
    try {
        const runtime = createRuntime(config, projectRoot);
        const results = await runTaskQueue(runtime, {
            tasks,
            overrides: { ...toOverrides(flags), interactive: false },
            concurrency: flags.concurrency || undefined,
            stopOnFailure: flags.stopOnFailure,
            signal: controller.signal,
        });

        if ((flags.format ?? config.output.format) === 'json') {
            process.stdout.write(`${JSON.stringify(results, null, 2)}\n`);
        } else {
            printQueueSummary(results);
        }
        return results.every((t) => t.status === 'completed') ? 0 : 1;
    } catch (err) {
        logger.error(err instanceof Error ? err.message : String(err));
        return 1;
    } finally {
        removeHandler();
    }
}
