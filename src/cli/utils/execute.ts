/**
 * Runs one workflow task for a CLI command and reports the outcome.
 *
 * Ctrl+C cancels the run; a failed run still prints whatever it produced,
 * together with the error kind.
 *
 * Dependency direction: execute.ts → workflow/runner, config, output, utils
 * Used by: generate, review, document and resume commands
 */

import chalk from 'chalk';
import { loadConfig } from '../../core/config/manager.js';
import type { AppConfig, OutputFormat } from '../../core/config/types.js';
import {
    createRuntime,
    createSpinnerHooks,
    isWorkflowRunError,
    resumeWorkflow,
    runWorkflow,
    toRunResult,
    type RunOptions,
    type RunResult,
    type WorkflowRuntime,
} from '../../core/workflow/runner.js';
import { writeTextFile } from '../../utils/fs.js';
import { LogLevel, logger } from '../../utils/logger.js';
import { formatResult, type RunFailure } from './output.js';
import { toOverrides, type RunFlags } from './options.js';

/** Which part of the result `--output` saves. `rendered` means the formatted report. */
export type OutputContent = 'rendered' | 'documentedArtifact';

export interface ExecuteOptions {
    flags: RunFlags;
    outputContent?: OutputContent;
}

type Launch = (runtime: WorkflowRuntime, options: RunOptions) => Promise<RunResult>;

/** Run `task` from the start. Returns the process exit code. */
export function executeTask(task: string, options: ExecuteOptions): Promise<number> {
    return execute((runtime, runOptions) => runWorkflow(runtime, { task, ...runOptions }), options);
}

/** Continue `runId` from its checkpoint. Returns the process exit code. */
export function executeResume(runId: string, options: ExecuteOptions): Promise<number> {
    return execute((runtime, runOptions) => resumeWorkflow(runtime, runId, runOptions), options);
}

/** Load the project config, reporting failures. */
export function loadProjectConfig(projectRoot: string): AppConfig | undefined {
    try {
        return loadConfig(projectRoot);
    } catch (err) {
        logger.error(err instanceof Error ? err.message : String(err));
        return undefined;
    }
}

/**
 * Cancel `controller` on the first Ctrl+C. Returns a function that removes the handler.
 */
export function cancelOnInterrupt(controller: AbortController): () => void {
    const onInterrupt = (): void => {
        logger.warn('Interrupted, cancelling run...');
        controller.abort();
    };
    process.once('SIGINT', onInterrupt);
    return () => {
        process.removeListener('SIGINT', onInterrupt);
    };
}

async function execute(launch: Launch, options: ExecuteOptions): Promise<number> {
    const { flags, outputContent = 'rendered' } = options;
    const projectRoot = process.cwd();

    const config = loadProjectConfig(projectRoot);
    if (!config) return 1;

    const format = flags.format ?? config.output.format;
    // Info lines share stdout with machine-readable output.
    if (format !== 'pretty' && logger.getLogLevel() === LogLevel.Info) {
        logger.setLogLevel(LogLevel.Warn);
    }
    const interactive = flags.interactive ?? config.workflow.interactive;
    const showProgress = format === 'pretty' && logger.getLogLevel() <= LogLevel.Info;

    let runtime: WorkflowRuntime;
    try {
        runtime = createRuntime(config, projectRoot);
    } catch (err) {
        logger.error(err instanceof Error ? err.message : String(err));
        return 1;
    }

    const controller = new AbortController();
    const removeHandler = cancelOnInterrupt(controller);
    const runOptions: RunOptions = {
        overrides: toOverrides(flags),
        signal: controller.signal,
        hooks: showProgress ? createSpinnerHooks({ interactive }) : undefined,
    };

    try {
        const result = await launch(runtime, runOptions);
        report(result, format, flags.output, outputContent);
        return 0;
    } catch (err) {
        if (isWorkflowRunError(err)) {
            report(toRunResult(err.runId, err.state), format, undefined, outputContent, {
                kind: err.kind,
                message: err.cause instanceof Error ? err.cause.message : err.message,
            });
        }
        logger.error(err instanceof Error ? err.message : String(err));
        return 1;
    } finally {
        removeHandler();
    }
}

function report(
    result: RunResult,
    format: OutputFormat,
    outputPath: string | undefined,
    content: OutputContent,
    failure?: RunFailure,
): void {
    process.stdout.write(formatResult(result, format, failure));

    if (!outputPath) return;
    const saved =
        content === 'documentedArtifact'
            ? `${result.documentedArtifact ?? ''}\n`
            : formatResult(result, format === 'pretty' ? 'text' : format, failure);
    writeTextFile(outputPath, saved);
    logger.success(`Output saved to ${chalk.bold(outputPath)}`);
}
