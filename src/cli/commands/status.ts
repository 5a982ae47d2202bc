/**
 * `codeloom status` — Check the environment, provider health and recent runs.
 *
 * Dependency direction: status.ts → commander, ora, chalk, config module, registry, checkpoint
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, getCheckpointDir, getConfigPath } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import { FileCheckpointStore } from '../../core/workflow/checkpoint.js';
import { parseWorkflowState } from '../../core/workflow/state.js';
import { PROVIDER_LABELS, PROVIDER_REQUIRES_KEY } from '../../providers/metadata.js';
import { isProviderConfigured, validateAllProviders } from '../../providers/registry.js';
import type { LLMProviderName } from '../../providers/types.js';
import { logger } from '../../utils/logger.js';
import { loadProjectConfig } from '../utils/execute.js';

const MIN_NODE_MAJOR = 20;
const RECENT_RUNS = 5;

export const statusCommand = new Command('status')
    .description('Check environment, provider connectivity and recent runs')
    .option('--offline', 'Skip provider connectivity checks')
    .action(async (options: { offline?: boolean }) => {
        const projectRoot = process.cwd();
        let healthy = true;

        logger.header('codeloom — Status');

        const nodeMajor = Number(process.versions.node.split('.')[0]);
        if (nodeMajor >= MIN_NODE_MAJOR) {
            console.log(chalk.green(`  ✔ Node.js ${process.versions.node}`));
        } else {
            console.log(chalk.red(`  ✘ Node.js ${process.versions.node} — ${MIN_NODE_MAJOR} or newer is required`));
            healthy = false;
        }

        console.log(
            configExists(projectRoot)
                ? chalk.green(`  ✔ Configuration file: ${getConfigPath(projectRoot)}`)
                : chalk.gray('  - No configuration file (defaults and environment in use)'),
        );

        const config = loadProjectConfig(projectRoot);
        if (!config) {
            process.exit(1);
        }
        console.log(chalk.green('  ✔ Configuration is valid'));

        const used = providersInUse(config);
        for (const name of used) {
            if (!PROVIDER_REQUIRES_KEY[name]) continue;
            if (isProviderConfigured(name, config.providers)) {
                console.log(chalk.green(`  ✔ ${PROVIDER_LABELS[name]} API key set`));
            } else {
                console.log(chalk.red(`  ✘ ${PROVIDER_LABELS[name]} API key missing — set OPENAI_API_KEY`));
                healthy = false;
            }
        }

        if (!options.offline) {
            console.log();
            const spinner = ora('Testing providers...').start();
            const results = await validateAllProviders(config.providers, used);
            spinner.stop();

            for (const name of used) {
                if (!isProviderConfigured(name, config.providers)) {
                    console.log(chalk.gray(`  - ${PROVIDER_LABELS[name]} — not configured (skipped)`));
                } else if (results[name]) {
                    console.log(chalk.green(`  ✔ ${PROVIDER_LABELS[name]} — connected`));
                } else {
                    console.log(chalk.red(`  ✘ ${PROVIDER_LABELS[name]} — connection failed`));
                    healthy = false;
                }
            }
        }

        await printRecentRuns(projectRoot);

        console.log();
        if (healthy) {
            logger.success('All checks passed.');
        } else {
            logger.warn('Some checks failed. Review the output above.');
            process.exitCode = 1;
        }
    });

/** Providers some agent role is assigned to. */
function providersInUse(config: AppConfig): LLMProviderName[] {
    return [...new Set(Object.values(config.agents).map((agent) => agent.provider))];
}

async function printRecentRuns(projectRoot: string): Promise<void> {
    const store = new FileCheckpointStore(getCheckpointDir(projectRoot), parseWorkflowState);
    const runs = (await store.list()).slice(0, RECENT_RUNS);

    console.log();
    console.log(chalk.bold('  Recent runs:'));
    if (runs.length === 0) {
        console.log(chalk.gray('    (none)'));
        return;
    }

    for (const run of runs) {
        const color =
            run.status === 'completed' ? chalk.green : run.status === 'running' ? chalk.yellow : chalk.red;
        const when = new Date(run.updatedAt).toISOString();
        const error = run.error ? chalk.gray(` — ${run.error.kind}: ${run.error.message}`) : '';
        console.log(`    ${color(run.status.padEnd(9))} ${run.runId} ${chalk.gray(when)}${error}`);
    }
}
