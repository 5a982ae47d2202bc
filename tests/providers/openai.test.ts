import { afterEach, describe, it, expect, vi } from 'vitest';
import { OpenAIProvider } from '../../src/providers/openai.js';
import { ServiceError } from '../../src/core/errors.js';

interface CapturedRequest {
  url: string;
  init: RequestInit | undefined;
}

function stubFetch(payload: unknown, status = 200): CapturedRequest[] {
  const captured: CapturedRequest[] = [];
  vi.stubGlobal(
    'fetch',
    vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      captured.push({ url: String(input), init });
      return new Response(JSON.stringify(payload), { status });
    }),
  );
  return captured;
}

function sentBody(request: CapturedRequest | undefined): unknown {
  return typeof request?.init?.body === 'string' ? JSON.parse(request.init.body) : undefined;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAIProvider', () => {
  it('requires an API key', () => {
    expect(() => new OpenAIProvider({ apiKey: '' })).toThrow(ServiceError);
  });

  it('sends the system prompt first and maps the completion', async () => {
    const captured = stubFetch({
      model: 'gpt-4o-2024-08-06',
      choices: [{ message: { content: 'GENERATE' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 12, completion_tokens: 1 },
    });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', baseUrl: 'http://localhost:8080' });

    const response = await provider.chat([{ role: 'user', content: 'Write a sort' }], {
      model: 'gpt-4o',
      temperature: 0,
      maxTokens: 16,
      systemPrompt: 'Classify',
    });

    expect(response).toEqual({
      content: 'GENERATE',
      model: 'gpt-4o-2024-08-06',
      usage: { promptTokens: 12, completionTokens: 1, totalTokens: 13 },
      finishReason: 'stop',
    });
    expect(captured[0]?.url).toBe('http://localhost:8080/v1/chat/completions');
    expect(captured[0]?.init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(sentBody(captured[0])).toEqual({
      model: 'gpt-4o',
      messages: [
        { role: 'system', content: 'Classify' },
        { role: 'user', content: 'Write a sort' },
      ],
      max_tokens: 16,
      temperature: 0,
    });
  });

  it('sends the organization header when set', async () => {
    const captured = stubFetch({ choices: [] });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', organization: 'org-test' });

    await provider.chat([{ role: 'user', content: 'hi' }]);

    expect(captured[0]?.init?.headers).toMatchObject({ 'OpenAI-Organization': 'org-test' });
  });

  it('returns empty content when there is no choice', async () => {
    stubFetch({ choices: [] });
    const provider = new OpenAIProvider({ apiKey: 'test-secret' });

    const response = await provider.chat([{ role: 'user', content: 'hi' }]);

    expect(response.content).toBe('');
    expect(response.model).toBe('gpt-4o');
    expect(response.finishReason).toBe('unknown');
  });

  it('lists only chat models', async () => {
    stubFetch({ data: [{ id: 'gpt-4o' }, { id: 'text-embedding-3-small' }, { id: 'gpt-4o-mini' }] });
    const provider = new OpenAIProvider({ apiKey: 'test-secret' });

    expect(await provider.listModels()).toEqual([
      { id: 'gpt-4o', name: 'gpt-4o', provider: 'openai' },
      { id: 'gpt-4o-mini', name: 'gpt-4o-mini', provider: 'openai' },
    ]);
  });

  it('reports a rejected key as an unreachable connection', async () => {
    stubFetch({ error: 'invalid key' }, 401);
    const provider = new OpenAIProvider({ apiKey: 'test-secret' });

    expect(await provider.validateConnection()).toBe(false);
  });
});
