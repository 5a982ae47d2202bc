/**
 * Ollama local model provider adapter.
 *
 * Connects to the Ollama HTTP API (default: http://localhost:11434).
 *
 * Dependency direction: ollama.ts → providers/http, providers/types
 * Used by: providers/registry.ts
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { requestJson } from './http.js';
import type { LLMProvider, ChatMessage, ChatOptions, ChatResponse, ModelInfo } from './types.js';

/** Configuration required to create an Ollama provider. */
export interface OllamaProviderConfig {
  readonly baseUrl?: string;
}

/** Default Ollama settings. */
const DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  model: 'llama3.2:latest',
} as const;

const chatSchema = z.object({
  model: z.string().optional(),
  message: z.object({ content: z.string() }).optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().default(0),
  eval_count: z.number().default(0),
});

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export class OllamaProvider implements LLMProvider {
  public readonly name = 'ollama' as const;
  private readonly baseUrl: string;

  constructor(config?: OllamaProviderConfig) {
    this.baseUrl = config?.baseUrl ?? DEFAULTS.baseUrl;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? DEFAULTS.model;
    const ollamaMessages = [
      ...(options?.systemPrompt ? [{ role: 'system', content: options.systemPrompt }] : []),
      ...messages.map((m) => ({ role: m.role, content: m.content })),
    ];

    const body: Record<string, unknown> = {
      model,
      messages: ollamaMessages,
      stream: false,
    };

    const modelOptions: Record<string, number> = {};
    if (options?.temperature !== undefined) modelOptions.temperature = options.temperature;
    if (options?.maxTokens !== undefined) modelOptions.num_predict = options.maxTokens;
    if (Object.keys(modelOptions).length > 0) body.options = modelOptions;

    logger.debug(`Ollama chat request: model=${model}, messages=${ollamaMessages.length}`);

    const response = await requestJson({
      provider: this.name,
      url: `${this.baseUrl}/api/chat`,
      body,
      schema: chatSchema,
      signal: options?.signal,
    });

    return {
      content: response.message?.content ?? '',
      model: response.model ?? model,
      usage: {
        promptTokens: response.prompt_eval_count,
        completionTokens: response.eval_count,
        totalTokens: response.prompt_eval_count + response.eval_count,
      },
      finishReason: response.done_reason ?? 'stop',
    };
  }

  async listModels(): Promise<ModelInfo[]> {
    const response = await requestJson({
      provider: this.name,
      url: `${this.baseUrl}/api/tags`,
      method: 'GET',
      schema: tagsSchema,
    });

    return response.models.map((m) => ({ id: m.name, name: m.name, provider: 'ollama' as const }));
  }

  async validateConnection(): Promise<boolean> {
    try {
      await this.listModels();
      return true;
    } catch (err) {
      logger.debug(`Ollama connection check failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }
}
