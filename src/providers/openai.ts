/**
 * OpenAI provider adapter.
 *
 * Uses the Chat Completions API directly via fetch() — no SDK dependency.
 *
 * Dependency direction: openai.ts → providers/http, providers/types, core/errors
 * Used by: providers/registry.ts
 */

import { z } from 'zod';
import { ServiceError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { requestJson } from './http.js';
import type { LLMProvider, ChatMessage, ChatOptions, ChatResponse, ModelInfo } from './types.js';

/** Configuration required to create an OpenAI provider. */
export interface OpenAIProviderConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly organization?: string;
}

/** Default OpenAI API settings. */
const DEFAULTS = {
  baseUrl: 'https://api.openai.com',
  model: 'gpt-4o',
  maxTokens: 2000,
} as const;

const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
    })
    .optional(),
});

const modelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })).default([]),
});

export class OpenAIProvider implements LLMProvider {
  public readonly name = 'openai' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly organization?: string;

  constructor(config: OpenAIProviderConfig) {
    if (!config.apiKey) {
      throw new ServiceError('OpenAI API key is required', 'auth', { provider: 'openai' });
    }
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
    this.organization = config.organization;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? DEFAULTS.model;
    const apiMessages = [
      ...(options?.systemPrompt ? [{ role: 'system', content: options.systemPrompt }] : []),
      ...messages.map((m) => ({ role: m.role, content: m.content })),
    ];

    const body: Record<string, unknown> = {
      model,
      messages: apiMessages,
      max_tokens: options?.maxTokens ?? DEFAULTS.maxTokens,
    };
    if (options?.temperature !== undefined) {
      body.temperature = options.temperature;
    }

    logger.debug(`OpenAI chat request: model=${model}, messages=${apiMessages.length}`);

    const response = await requestJson({
      provider: this.name,
      url: `${this.baseUrl}/v1/chat/completions`,
      headers: this.getHeaders(),
      body,
      schema: completionSchema,
      signal: options?.signal,
    });

    const choice = response.choices[0];
    const promptTokens = response.usage?.prompt_tokens ?? 0;
    const completionTokens = response.usage?.completion_tokens ?? 0;

    return {
      content: choice?.message?.content ?? '',
      model: response.model ?? model,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      finishReason: choice?.finish_reason ?? 'unknown',
    };
  }

  async listModels(): Promise<ModelInfo[]> {
    const response = await requestJson({
      provider: this.name,
      url: `${this.baseUrl}/v1/models`,
      method: 'GET',
      headers: this.getHeaders(),
      schema: modelListSchema,
    });

    return response.data
      .filter((m) => m.id.startsWith('gpt-'))
      .map((m) => ({ id: m.id, name: m.id, provider: 'openai' as const }));
  }

  async validateConnection(): Promise<boolean> {
    try {
      await this.listModels();
      return true;
    } catch (err) {
      logger.debug(`OpenAI connection check failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
    };
    if (this.organization) {
      headers['OpenAI-Organization'] = this.organization;
    }
    return headers;
  }
}
