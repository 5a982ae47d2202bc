/**
 * Renderers for a run result: `json`, `text` and `pretty`.
 *
 * `json` and `text` are plain strings suitable for files; `pretty` adds
 * chalk colors for the terminal.
 *
 * Dependency direction: output.ts → chalk, workflow/runner (types only)
 * Used by: generate, review, document and resume commands
 */

import chalk from 'chalk';
import type { OutputFormat } from '../../core/config/types.js';
import type { RunResult } from '../../core/workflow/runner.js';
import type { RunErrorKind } from '../../core/errors.js';

const MISSING = 'N/A';

/** A failure reported next to whatever the run produced before it stopped. */
export interface RunFailure {
    readonly kind: RunErrorKind;
    readonly message: string;
}

/** Stable JSON shape: every field present, `null` when unset. */
export function formatJson(result: RunResult, failure?: RunFailure): string {
    const body = {
        runId: result.runId,
        decision: result.decision ?? null,
        generatedArtifact: result.generatedArtifact ?? null,
        reviewFeedback: result.reviewFeedback ?? null,
        documentedArtifact: result.documentedArtifact ?? null,
        approvalStatus: result.approvalStatus ?? null,
        retryCount: result.retryCount,
        ...(failure ? { error: { kind: failure.kind, message: failure.message } } : {}),
    };
    return `${JSON.stringify(body, null, 2)}\n`;
}

/** Labelled plain-text sections; unset fields print as N/A. */
export function formatText(result: RunResult, failure?: RunFailure): string {
    const lines = [
        `Decision: ${result.decision ?? MISSING}`,
        `Generated Code:\n${result.generatedArtifact ?? MISSING}`,
        `Review Feedback:\n${result.reviewFeedback ?? MISSING}`,
        `Documented Code:\n${result.documentedArtifact ?? MISSING}`,
        `Approval Status: ${result.approvalStatus ?? MISSING}`,
    ];
    if (failure) {
        lines.push(`Error (${failure.kind}): ${failure.message}`);
    }
    return `${lines.join('\n')}\n`;
}

/** Colored terminal rendering. Sections without content are left out. */
export function formatPretty(result: RunResult, failure?: RunFailure): string {
    const out: string[] = [];
    const section = (title: string, body: string): void => {
        out.push('', title, chalk.gray('─'.repeat(Math.min(title.length + 4, 60))), body);
    };

    out.push(`${chalk.bold.yellow('Decision:')} ${result.decision ?? MISSING}`);
    if (result.generatedArtifact) {
        section(chalk.bold.green('Generated Code'), result.generatedArtifact);
    }
    if (result.reviewFeedback) {
        const retries = result.retryCount > 0 ? chalk.gray(` (after ${result.retryCount} retr${result.retryCount === 1 ? 'y' : 'ies'})`) : '';
        section(chalk.bold.hex('#ff8700')('Review Feedback') + retries, result.reviewFeedback);
    }
    if (result.documentedArtifact && result.documentedArtifact !== result.generatedArtifact) {
        section(chalk.bold.blue('Documented Code'), result.documentedArtifact);
    }

    const approval = result.approvalStatus ?? MISSING;
    const color = approval === 'approved' ? chalk.green : chalk.red;
    out.push('', `${color.bold('Approval Status:')} ${approval}`);
    if (failure) {
        out.push(chalk.red(`Run failed (${failure.kind}): ${failure.message}`));
    }
    out.push(chalk.gray(`Run ID: ${result.runId}`));

    return `${out.join('\n')}\n`;
}

export function formatResult(result: RunResult, format: OutputFormat, failure?: RunFailure): string {
    switch (format) {
        case 'json':
            return formatJson(result, failure);
        case 'text':
            return formatText(result, failure);
        case 'pretty':
            return formatPretty(result, failure);
    }
}
