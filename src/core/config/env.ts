/**
 * Environment-derived configuration overlay.
 *
 * Only read while building the config; nothing downstream looks at
 * process.env.
 *
 * Dependency direction: env.ts → agents/types.ts
 * Used by: manager.ts
 */

import { ALL_AGENT_ROLES } from '../../agents/types.js';

/** Environment variables the config loader recognises. */
export const ENV_VARS = {
    apiKey: 'OPENAI_API_KEY',
    baseUrl: 'OPENAI_BASE_URL',
    model: 'OPENAI_MODEL',
    ollamaUrl: 'OLLAMA_BASE_URL',
    interactive: 'ALLOW_HUMAN_INPUT',
    maxRetries: 'CODELOOM_MAX_RETRIES',
} as const;

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Build a partial config from environment variables. Values are left
 * unvalidated; the loader validates the merged result.
 */
export function configFromEnv(env: Env): Record<string, unknown> {
    const overlay: Record<string, Record<string, unknown>> = {};
    const section = (name: string): Record<string, unknown> => (overlay[name] ??= {});

    const apiKey = env[ENV_VARS.apiKey];
    const baseUrl = env[ENV_VARS.baseUrl];
    if (apiKey || baseUrl) {
        section('providers').openai = {
            ...(apiKey ? { apiKey } : {}),
            ...(baseUrl ? { baseUrl } : {}),
        };
    }

    const ollamaUrl = env[ENV_VARS.ollamaUrl];
    if (ollamaUrl) {
        section('providers').ollama = { baseUrl: ollamaUrl };
    }

    const model = env[ENV_VARS.model];
    if (model) {
        const agents = section('agents');
        for (const role of ALL_AGENT_ROLES) {
            agents[role] = { model };
        }
    }

    if (env[ENV_VARS.interactive] === '1') {
        section('workflow').interactive = true;
    }

    const maxRetries = env[ENV_VARS.maxRetries];
    if (maxRetries !== undefined && maxRetries.trim() !== '') {
        section('workflow').maxRetries = Number(maxRetries);
    }

    return overlay;
}
