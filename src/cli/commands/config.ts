/**
 * `codeloom config` — View the resolved configuration or write a starter one.
 *
 * Dependency direction: config.ts → commander, config module, prompt library, provider metadata
 * Used by: cli/index.ts
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
    configExists,
    getConfigPath,
    getDefaultConfig,
    redactConfig,
    saveConfig,
} from '../../core/config/manager.js';
import { providerNameSchema } from '../../core/config/schema.js';
import { ALL_AGENT_ROLES } from '../../agents/types.js';
import { generateDefaultPrompts } from '../../prompts/library.js';
import { PROVIDER_DEFAULT_MODELS } from '../../providers/metadata.js';
import type { LLMProviderName } from '../../providers/types.js';
import { logger } from '../../utils/logger.js';
import { loadProjectConfig } from '../utils/execute.js';

function parseProvider(value: string): LLMProviderName {
    const result = providerNameSchema.safeParse(value);
    if (!result.success) {
        throw new InvalidArgumentError(`Must be one of: ${providerNameSchema.options.join(', ')}.`);
    }
    return result.data;
}

export const configCommand = new Command('config')
    .description('View or create configuration')
    .option('-p, --path', 'Show config file path only')
    .option('--init', 'Write a default config file and prompt templates')
    .option('--provider <name>', 'Provider for every agent when used with --init', parseProvider)
    .option('--force', 'Overwrite an existing config file (with --init)')
    .action((options: { path?: boolean; init?: boolean; provider?: LLMProviderName; force?: boolean }) => {
        const projectRoot = process.cwd();

        if (options.path) {
            console.log(getConfigPath(projectRoot));
            return;
        }

        if (options.init) {
            process.exitCode = initConfig(projectRoot, options.provider ?? 'openai', options.force ?? false);
            return;
        }

        const config = loadProjectConfig(projectRoot);
        if (!config) {
            process.exitCode = 1;
            return;
        }

        logger.header('Current Configuration');
        console.log(
            chalk.gray(configExists(projectRoot) ? `File: ${getConfigPath(projectRoot)}` : 'No config file; defaults and environment'),
        );
        console.log();
        console.log(JSON.stringify(redactConfig(config), null, 2));
    });

function initConfig(projectRoot: string, provider: LLMProviderName, force: boolean): number {
    if (configExists(projectRoot) && !force) {
        logger.error(`Config already exists at ${getConfigPath(projectRoot)}. Use --force to overwrite.`);
        return 1;
    }

    const agents: Record<string, { provider: LLMProviderName; model: string }> = {};
    if (provider !== 'openai') {
        for (const role of ALL_AGENT_ROLES) {
            agents[role] = { provider, model: PROVIDER_DEFAULT_MODELS[provider] };
        }
    }

    try {
        const config = getDefaultConfig({
            agents,
            providers: provider === 'ollama' ? { ollama: {} } : {},
        });
        saveConfig(projectRoot, config);
        const prompts = generateDefaultPrompts(projectRoot);

        logger.success(`Config written to ${getConfigPath(projectRoot)}`);
        if (prompts.length > 0) {
            logger.info(`Prompt templates written to ${prompts.length} file(s); edit them to customize agents.`);
        }
        if (provider === 'openai') {
            logger.info('Set OPENAI_API_KEY in your environment before running tasks.');
        }
        return 0;
    } catch (err) {
        logger.error(err instanceof Error ? err.message : String(err));
        return 1;
    }
}
