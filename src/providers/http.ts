/**
 * Shared HTTP plumbing for provider adapters.
 *
 * Maps transport and status failures onto ServiceError kinds and validates
 * response bodies with zod before any adapter reads them.
 *
 * Dependency direction: http.ts → zod, core/errors, utils/logger
 * Used by: openai.ts, ollama.ts
 */

import type { z } from 'zod';
import { CancellationError, ServiceError, serviceErrorKindFromStatus } from '../core/errors.js';
import type { LLMProviderName } from './types.js';

export interface JsonRequest<T extends z.ZodTypeAny> {
  readonly provider: LLMProviderName;
  readonly url: string;
  readonly method?: 'GET' | 'POST';
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly schema: T;
  readonly signal?: AbortSignal;
}

/**
 * Send a JSON request and parse the response with `schema`.
 * @throws {ServiceError} on network failure (`network`), non-2xx status (`auth`, `rateLimit`, `other`) or an unexpected body (`other`).
 * @throws {CancellationError} if `signal` aborts the request.
 */
export async function requestJson<T extends z.ZodTypeAny>(request: JsonRequest<T>): Promise<z.infer<T>> {
  const { provider, url, method = 'POST', headers = {}, body, schema, signal } = request;

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers: { 'Content-Type': 'application/json', ...headers },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal,
    });
  } catch (err) {
    if (signal?.aborted) {
      throw new CancellationError(`${provider} request aborted`, { provider });
    }
    throw new ServiceError(
      `Failed to connect to ${provider} at ${url}: ${err instanceof Error ? err.message : String(err)}`,
      'network',
      { provider, url },
    );
  }

  if (!response.ok) {
    const errorBody = await response.text();
    throw new ServiceError(
      `${provider} API error: ${response.status} ${response.statusText}`,
      serviceErrorKindFromStatus(response.status),
      { provider, status: response.status, body: errorBody.slice(0, 500) },
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (err) {
    throw new ServiceError(`${provider} returned a non-JSON response`, 'other', {
      provider,
      originalError: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ServiceError(`${provider} returned an unexpected response shape`, 'other', {
      provider,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
