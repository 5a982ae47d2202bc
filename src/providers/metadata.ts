/**
 * Centralized provider display metadata.
 *
 * Dependency direction: metadata.ts → providers/types.ts (leaf-ish module)
 * Used by: cli/commands/status.ts, cli/commands/config.ts
 */

import type { LLMProviderName } from './types.js';

/** Human-friendly labels for each provider. */
export const PROVIDER_LABELS: Record<LLMProviderName, string> = {
    ollama: 'Ollama (Local)',
    openai: 'OpenAI (GPT)',
};

/** Model suggested when switching a role to this provider. */
export const PROVIDER_DEFAULT_MODELS: Record<LLMProviderName, string> = {
    ollama: 'llama3.2:latest',
    openai: 'gpt-4o',
};

/** Whether the provider needs an API key before it can be used. */
export const PROVIDER_REQUIRES_KEY: Record<LLMProviderName, boolean> = {
    ollama: false,
    openai: true,
};
