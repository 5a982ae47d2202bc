/**
 * Provider registry — factory that creates the correct provider from config.
 *
 * New providers are added by:
 * 1. Create the adapter file in src/providers/
 * 2. Register it in the PROVIDER_FACTORIES map below
 * 3. Add the name to LLMProviderName type in types.ts
 *
 * Dependency direction: registry.ts → types.ts, openai.ts, ollama.ts, errors.ts
 * Used by: agent factory, CLI status command
 */

import type { LLMProvider, LLMProviderName } from './types.js';
import { OpenAIProvider } from './openai.js';
import { OllamaProvider } from './ollama.js';
import type { ProviderConfig } from '../core/config/types.js';
import { ServiceError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Factory functions for each provider.
 * Add new providers here — this is the ONLY place that needs to change.
 */
const PROVIDER_FACTORIES: Record<LLMProviderName, (config: ProviderConfig) => LLMProvider> = {
  openai: (config: ProviderConfig) => {
    const openaiConfig = config.openai;
    if (!openaiConfig) {
      throw new ServiceError(
        'OpenAI provider is not configured. Set OPENAI_API_KEY or run "codeloom config --init".',
        'auth',
        { provider: 'openai' },
      );
    }
    return new OpenAIProvider(openaiConfig);
  },

  ollama: (config: ProviderConfig) => new OllamaProvider(config.ollama),
};

/** Every registered provider name, in display order. */
const SUPPORTED_PROVIDERS: readonly LLMProviderName[] = ['openai', 'ollama'];

/** Cache of created provider instances, keyed by name and settings. */
const providerCache = new Map<string, LLMProvider>();

/**
 * Create (or return cached) a provider instance by name.
 *
 * @param name - The provider name ('openai' | 'ollama')
 * @param config - The providers section of the app config
 * @throws {ServiceError} if the provider's config is missing
 */
export function createProvider(name: LLMProviderName, config: ProviderConfig): LLMProvider {
  const key = `${name}:${JSON.stringify(config[name] ?? {})}`;
  const cached = providerCache.get(key);
  if (cached) return cached;

  logger.debug(`Creating provider: ${name}`);
  const provider = PROVIDER_FACTORIES[name](config);
  providerCache.set(key, provider);
  return provider;
}

/**
 * Clear the provider cache (useful for testing or config changes).
 */
export function clearProviderCache(): void {
  providerCache.clear();
}

/**
 * Get all supported provider names.
 */
export function getSupportedProviders(): LLMProviderName[] {
  return [...SUPPORTED_PROVIDERS];
}

/** Whether a provider has the settings it needs to be created. */
export function isProviderConfigured(name: LLMProviderName, config: ProviderConfig): boolean {
  return name === 'ollama' || config[name] !== undefined;
}

/**
 * Validate the configured providers can connect.
 * Returns a map of provider name → connection status; unconfigured providers report false.
 */
export async function validateAllProviders(
  config: ProviderConfig,
  names: readonly LLMProviderName[] = SUPPORTED_PROVIDERS,
): Promise<Record<LLMProviderName, boolean>> {
  const results: Record<LLMProviderName, boolean> = { openai: false, ollama: false };

  for (const name of names) {
    if (!isProviderConfigured(name, config)) continue;
    try {
      results[name] = await createProvider(name, config).validateConnection();
    } catch (err) {
      logger.debug(`Provider ${name} failed validation: ${err instanceof Error ? err.message : String(err)}`);
      results[name] = false;
    }
  }

  return results;
}
