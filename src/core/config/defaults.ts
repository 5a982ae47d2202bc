/**
 * Default configuration values.
 *
 * OpenAI serves every role out of the box; the API key comes from
 * OPENAI_API_KEY or the config file.
 *
 * Dependency direction: defaults.ts → types.ts
 * Used by: manager.ts, config command
 */

import type { AgentRoleConfig, AppConfig } from './types.js';

const DEFAULT_AGENT_ROLE: AgentRoleConfig = {
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0.1,
    maxTokens: 2000,
};

/** Full default configuration. */
export const DEFAULT_CONFIG: AppConfig = {
    version: 1,

    providers: {},

    agents: {
        orchestrator: { ...DEFAULT_AGENT_ROLE, temperature: 0, maxTokens: 16 },
        generator: { ...DEFAULT_AGENT_ROLE },
        reviewer: { ...DEFAULT_AGENT_ROLE },
        documenter: { ...DEFAULT_AGENT_ROLE },
        fallback: { ...DEFAULT_AGENT_ROLE, temperature: 0.3 },
    },

    workflow: {
        maxRetries: 3,
        interactive: false,
        approvalTimeoutSeconds: 300,
        maxConcurrency: 4,
        classificationFailure: 'fallback',
        checkpoints: 'file',
    },

    output: {
        format: 'pretty',
    },
};

/** The directory name where config and checkpoints live inside a project. */
export const CONFIG_DIR_NAME = '.codeloom';

/** The config file name. */
export const CONFIG_FILE_NAME = 'config.json';

/** Checkpoint directory, relative to the config directory. */
export const CHECKPOINTS_DIR_NAME = 'checkpoints';
