import { describe, it, expect } from 'vitest';
import { ProviderGenerationService } from '../../src/providers/generation-service.js';
import type { ChatMessage, ChatOptions, ChatResponse, LLMProvider, ModelInfo } from '../../src/providers/types.js';
import { Semaphore } from '../../src/utils/semaphore.js';
import { CancellationError, ServiceError } from '../../src/core/errors.js';

class RecordingProvider implements LLMProvider {
  readonly name = 'ollama' as const;
  readonly requests: Array<{ messages: ChatMessage[]; options: ChatOptions | undefined }> = [];
  inFlight = 0;
  maxInFlight = 0;
  private readonly reply: () => Promise<string>;

  constructor(reply: () => Promise<string>) {
    this.reply = reply;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    this.requests.push({ messages, options });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const content = await this.reply();
      return {
        content,
        model: options?.model ?? 'm',
        usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
        finishReason: 'stop',
      };
    } finally {
      this.inFlight--;
    }
  }

  async listModels(): Promise<ModelInfo[]> {
    return [];
  }

  async validateConnection(): Promise<boolean> {
    return true;
  }
}

const options = { model: 'llama3.2:latest', temperature: 0.2, maxTokens: 100 };

describe('ProviderGenerationService', () => {
  it('sends the system instruction and user text as one chat', async () => {
    const provider = new RecordingProvider(async () => 'done');
    const service = new ProviderGenerationService(provider, new Semaphore(2));

    expect(await service.complete('Be brief', 'Say hi', options)).toBe('done');
    expect(provider.requests[0]).toEqual({
      messages: [{ role: 'user', content: 'Say hi' }],
      options: { ...options, systemPrompt: 'Be brief', signal: undefined },
    });
  });

  it('never exceeds the shared slot count', async () => {
    const provider = new RecordingProvider(() => new Promise((resolve) => setTimeout(() => resolve('ok'), 5)));
    const service = new ProviderGenerationService(provider, new Semaphore(2));

    await Promise.all(Array.from({ length: 6 }, () => service.complete('s', 'u', options)));

    expect(provider.requests).toHaveLength(6);
    expect(provider.maxInFlight).toBe(2);
  });

  it('passes service errors through', async () => {
    const failure = new ServiceError('rate limited', 'rateLimit');
    const service = new ProviderGenerationService(
      new RecordingProvider(async () => {
        throw failure;
      }),
      new Semaphore(1),
    );

    await expect(service.complete('s', 'u', options)).rejects.toBe(failure);
  });

  it('wraps unexpected errors as service errors', async () => {
    const service = new ProviderGenerationService(
      new RecordingProvider(async () => {
        throw new RangeError('bad state');
      }),
      new Semaphore(1),
    );

    await expect(service.complete('s', 'u', options)).rejects.toThrow(
      new ServiceError('ollama call failed: bad state', 'other'),
    );
  });

  it('does not call the provider once cancelled', async () => {
    const provider = new RecordingProvider(async () => 'late');
    const controller = new AbortController();
    controller.abort();

    await expect(
      new ProviderGenerationService(provider, new Semaphore(1)).complete('s', 'u', { ...options, signal: controller.signal }),
    ).rejects.toThrow(CancellationError);
    expect(provider.requests).toHaveLength(0);
  });
});
