/**
 * Contract between the workflow's agent and the model backends.
 *
 * The agent only ever sees an LLMProvider; request shapes, auth headers and
 * streaming formats stay inside each adapter.
 *
 * Dependency direction: providers/types.ts → nothing (leaf module)
 * Used by: provider adapters, provider registry, agents, workflow types
 */

/** Backends a workflow agent can run on. */
export type LLMProviderName = 'anthropic' | 'ollama';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

/** Per-request settings; unset fields fall back to the adapter defaults. */
export interface ChatOptions {
  readonly model?: string;
  /** 0.0 – 2.0 */
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly stopSequences?: readonly string[];
  /** Sent ahead of the messages; Anthropic takes it as a top-level field. */
  readonly systemPrompt?: string;
}

export interface ChatResponse {
  readonly content: string;
  /** Model that actually answered, as reported by the backend. */
  readonly model: string;
  readonly usage: TokenUsage;
  readonly finishReason: string;
}

/** One piece of a streamed reply. The last chunk has `done: true` and may be empty. */
export interface ChatChunk {
  readonly content: string;
  readonly done: boolean;
}

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

/** Build a usage record from its two counts. */
export function toUsage(promptTokens: number, completionTokens: number): TokenUsage {
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

/** A model offered by a backend, for the init wizard's picker. */
export interface ModelInfo {
  readonly id: string;
  readonly name: string;
  readonly provider: LLMProviderName;
  readonly contextWindow?: number;
}

/**
 * A chat model backend.
 *
 * To add one: implement this interface in `src/providers/<name>.ts`, add the
 * name to LLMProviderName, and register a factory in `registry.ts`.
 */
export interface LLMProvider {
  readonly name: LLMProviderName;

  /** @throws {ProviderError} on transport, HTTP or response-shape failures. */
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;

  /** @throws {ProviderError} on transport, HTTP or response-shape failures. */
  stream(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<ChatChunk>;

  /** @throws {ProviderError} if the backend cannot be reached. */
  listModels(): Promise<ModelInfo[]>;

  /** Health check for `stepwise doctor`; resolves false instead of throwing. */
  validateConnection(): Promise<boolean>;
}
