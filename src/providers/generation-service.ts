/**
 * GenerationService — the single text-generation call workflow steps make.
 *
 * Steps never talk to an LLMProvider directly: they hand a system
 * instruction and user text to a GenerationService, which tests replace
 * with an in-process fake.
 *
 * Dependency direction: generation-service.ts → providers/types, utils/semaphore, core/errors
 * Used by: agents/base.ts, agents/factory.ts
 */

import type { LLMProvider } from './types.js';
import type { Semaphore } from '../utils/semaphore.js';
import { AppError, ServiceError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

export interface GenerationOptions {
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens?: number;
  /** Aborts the call and any wait for a generation slot. */
  readonly signal?: AbortSignal;
}

export interface GenerationService {
  /**
   * Generate text for one system instruction and one user message.
   * @throws {ServiceError} when the call fails.
   * @throws {CancellationError} when `options.signal` aborts.
   */
  complete(systemInstruction: string, userText: string, options: GenerationOptions): Promise<string>;
}

/** GenerationService backed by an LLMProvider; calls are bounded by a shared semaphore. */
export class ProviderGenerationService implements GenerationService {
  private readonly provider: LLMProvider;
  private readonly slots: Semaphore;

  constructor(provider: LLMProvider, slots: Semaphore) {
    this.provider = provider;
    this.slots = slots;
  }

  async complete(systemInstruction: string, userText: string, options: GenerationOptions): Promise<string> {
    return this.slots.run(async () => {
      try {
        const response = await this.provider.chat([{ role: 'user', content: userText }], {
          model: options.model,
          temperature: options.temperature,
          maxTokens: options.maxTokens,
          systemPrompt: systemInstruction,
          signal: options.signal,
        });
        logger.debug(
          `${this.provider.name}/${response.model}: ${response.usage.totalTokens} tokens (${response.finishReason})`,
        );
        return response.content;
      } catch (err) {
        if (err instanceof AppError) throw err;
        throw new ServiceError(
          `${this.provider.name} call failed: ${err instanceof Error ? err.message : String(err)}`,
          'other',
          { provider: this.provider.name, model: options.model },
        );
      }
    }, options.signal);
  }
}
