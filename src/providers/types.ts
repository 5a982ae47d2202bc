/**
 * LLM Provider interface contract.
 *
 * Every provider adapter MUST implement the LLMProvider interface. Steps
 * never see a provider directly; they go through GenerationService.
 *
 * Dependency direction: providers/types.ts → nothing (leaf module)
 * Used by: provider implementations, registry, generation service
 */

/** Supported LLM provider names. Add new providers here. */
export type LLMProviderName = 'openai' | 'ollama';

/** Role in a chat conversation. */
export type ChatRole = 'system' | 'user' | 'assistant';

/** A single message in a chat conversation. */
export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

/** Options for a chat completion request. */
export interface ChatOptions {
  /** Model to use (overrides the provider default). */
  readonly model?: string;
  /** Sampling temperature (0.0 - 2.0). */
  readonly temperature?: number;
  /** Maximum tokens in the response. */
  readonly maxTokens?: number;
  /** System prompt (sent as the leading system message). */
  readonly systemPrompt?: string;
  /** Aborts the HTTP request. */
  readonly signal?: AbortSignal;
}

/** Token usage statistics for a request. */
export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

/** Response from a chat completion. */
export interface ChatResponse {
  /** The generated text content. */
  readonly content: string;
  /** The model that was used. */
  readonly model: string;
  readonly usage: TokenUsage;
  /** Provider-specific finish reason. */
  readonly finishReason: string;
}

/** Information about an available model. */
export interface ModelInfo {
  readonly id: string;
  readonly name: string;
  readonly provider: LLMProviderName;
}

/**
 * The contract that every LLM provider adapter MUST implement.
 *
 * Adding a new provider means:
 * 1. Create `src/providers/<name>.ts` implementing this interface
 * 2. Register it in `src/providers/registry.ts`
 * 3. Add the name to LLMProviderName above and to the config schema
 */
export interface LLMProvider {
  readonly name: LLMProviderName;

  /**
   * Send a chat completion request and get the full response.
   * @throws {ServiceError} on API failure, network error, or invalid response.
   */
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;

  /**
   * List all models available from this provider.
   * @throws {ServiceError} if the provider cannot be reached.
   */
  listModels(): Promise<ModelInfo[]>;

  /**
   * Check that the provider is reachable and the credentials work.
   * Returns false instead of throwing.
   */
  validateConnection(): Promise<boolean>;
}
