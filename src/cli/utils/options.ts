/**
 * Option parsers and the flags shared by every command that runs the workflow.
 *
 * Dependency direction: options.ts → commander, config schema, utils/timer
 * Used by: generate, review, document and resume commands
 */

import { InvalidArgumentError, type Command } from 'commander';
import { outputFormatSchema } from '../../core/config/schema.js';
import type { OutputFormat } from '../../core/config/types.js';
import type { RunOverrides } from '../../core/workflow/run-config.js';
import { MAX_TIMER_SECONDS } from '../../utils/timer.js';

/** Flags common to the run commands, as commander hands them over. */
export interface RunFlags {
    model?: string;
    output?: string;
    format?: OutputFormat;
    interactive?: boolean;
    maxRetries?: number;
    timeout?: number;
}

export function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Must be a non-negative integer.');
    }
    return parsed;
}

export function parsePositiveNumber(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive number.');
    }
    return parsed;
}

/** A positive number of seconds no longer than a timer can wait. */
export function parseTimeout(value: string): number {
    const parsed = parsePositiveNumber(value);
    if (parsed > MAX_TIMER_SECONDS) {
        throw new InvalidArgumentError(`Must be at most ${MAX_TIMER_SECONDS} seconds.`);
    }
    return parsed;
}

export function parseFormat(value: string): OutputFormat {
    const result = outputFormatSchema.safeParse(value);
    if (!result.success) {
        throw new InvalidArgumentError(`Must be one of: ${outputFormatSchema.options.join(', ')}.`);
    }
    return result.data;
}

/** Register the shared run flags on a command. */
export function withRunOptions(command: Command): Command {
    return command
        .option('-m, --model <model>', 'Override the model of every agent')
        .option('-o, --output <file>', 'Save the result to a file')
        .option('-f, --format <format>', 'Output format: json, text or pretty', parseFormat)
        .option('-i, --interactive', 'Ask for approval before finishing')
        .option('--max-retries <n>', 'Review → generation retries allowed', parseInteger)
        .option('--timeout <seconds>', 'Abort the run after this many seconds', parseTimeout);
}

export function toOverrides(flags: RunFlags): RunOverrides {
    return {
        model: flags.model,
        interactive: flags.interactive,
        maxRetries: flags.maxRetries,
        timeoutSeconds: flags.timeout,
    };
}
