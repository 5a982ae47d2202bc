import { afterEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { requestJson } from '../../src/providers/http.js';
import { CancellationError, ServiceError } from '../../src/core/errors.js';

const schema = z.object({ value: z.number() });

function stubFetch(impl: (input: string | URL | Request, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

async function serviceFailure(promise: Promise<unknown>): Promise<ServiceError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ServiceError) return err;
    throw err;
  }
  throw new Error('Expected a ServiceError');
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('requestJson', () => {
  it('posts JSON and returns the parsed body', async () => {
    const fetchMock = stubFetch(async () => new Response(JSON.stringify({ value: 42 }), { status: 200 }));

    const result = await requestJson({
      provider: 'ollama',
      url: 'http://localhost:11434/api/chat',
      headers: { 'X-Test': 'yes' },
      body: { hello: 'world' },
      schema,
    });

    expect(result).toEqual({ value: 42 });
    expect(fetchMock).toHaveBeenCalledWith('http://localhost:11434/api/chat', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Test': 'yes' },
      body: '{"hello":"world"}',
      signal: undefined,
    });
  });

  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [429, 'rateLimit'],
    [500, 'other'],
  ])('maps status %i to %s', async (status, kind) => {
    stubFetch(async () => new Response('nope', { status, statusText: 'Failed' }));

    const err = await serviceFailure(requestJson({ provider: 'openai', url: 'https://example.test', schema }));

    expect(err.kind).toBe(kind);
    expect(err.message).toBe(`openai API error: ${status} Failed`);
  });

  it('reports connection failures as network errors', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    const err = await serviceFailure(requestJson({ provider: 'ollama', url: 'http://localhost:1', schema }));

    expect(err.kind).toBe('network');
    expect(err.message).toBe('Failed to connect to ollama at http://localhost:1: fetch failed');
  });

  it('rejects a body of the wrong shape', async () => {
    stubFetch(async () => new Response(JSON.stringify({ value: 'forty-two' }), { status: 200 }));

    const err = await serviceFailure(requestJson({ provider: 'openai', url: 'https://example.test', schema }));

    expect(err.kind).toBe('other');
    expect(err.message).toBe('openai returned an unexpected response shape');
  });

  it('rejects a body that is not JSON', async () => {
    stubFetch(async () => new Response('<html>', { status: 200 }));

    const err = await serviceFailure(requestJson({ provider: 'openai', url: 'https://example.test', schema }));

    expect(err.message).toBe('openai returned a non-JSON response');
  });

  it('throws CancellationError when the signal aborts the request', async () => {
    const controller = new AbortController();
    controller.abort();
    stubFetch(async () => {
      throw new DOMException('This operation was aborted', 'AbortError');
    });

    await expect(
      requestJson({ provider: 'openai', url: 'https://example.test', schema, signal: controller.signal }),
    ).rejects.toThrow(CancellationError);
  });
});
