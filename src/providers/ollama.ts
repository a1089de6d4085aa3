/**
 * Ollama local model provider adapter.
 *
 * Connects to the Ollama HTTP API (default: http://localhost:11434).
 * Supports chat completion, streaming, model listing, and health checks.
 *
 * Dependency direction: ollama.ts → providers/types.ts, core/errors.ts
 * Used by: providers/registry.ts
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import {
  toUsage,
  type LLMProvider,
  type ChatMessage,
  type ChatOptions,
  type ChatResponse,
  type ChatChunk,
  type ModelInfo,
} from './types.js';
import { logger } from '../utils/logger.js';
import { readLines } from './stream.js';

/** Configuration required to create an Ollama provider. */
export interface OllamaProviderConfig {
  readonly baseUrl?: string;
  /** Retries after a connection failure (not after an HTTP error). */
  readonly retries?: number;
  readonly timeoutMs?: number;
}

/** Default Ollama settings. */
export const OLLAMA_DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  model: 'llama3.2:latest',
  retries: 2,
  retryDelayMs: 2000,
  timeoutMs: 300_000,
} as const;

const chatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({ content: z.string() }).optional(),
  done: z.boolean().optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
  error: z.string().optional(),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string().optional(), model: z.string().optional() })).default([]),
});

/**
 * Ollama local model provider implementation.
 */
export class OllamaProvider implements LLMProvider {
  public readonly name = 'ollama' as const;
  private readonly baseUrl: string;
  private readonly retries: number;
  private readonly timeoutMs: number;

  constructor(config?: OllamaProviderConfig) {
    this.baseUrl = config?.baseUrl ?? OLLAMA_DEFAULTS.baseUrl;
    this.retries = config?.retries ?? OLLAMA_DEFAULTS.retries;
    this.timeoutMs = config?.timeoutMs ?? OLLAMA_DEFAULTS.timeoutMs;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const body = this.buildBody(messages, options, false);
    logger.debug(`Ollama chat request: model=${body.model}, messages=${body.messages.length}`);

    const response = await this.post('/api/chat', body);
    const parsed = chatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError('Ollama returned an unexpected response', {
        provider: 'ollama',
        issues: parsed.error.issues.map((i) => i.message),
      });
    }

    const data = parsed.data;
    return {
      content: data.message?.content ?? '',
      model: data.model ?? body.model,
      usage: toUsage(data.prompt_eval_count ?? 0, data.eval_count ?? 0),
      finishReason: data.done_reason ?? 'stop',
    };
  }

  async *stream(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<ChatChunk> {
    const response = await this.post('/api/chat', this.buildBody(messages, options, true));

    for await (const line of readLines(response, 'ollama')) {
      if (!line.trim()) continue;

      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        logger.debug(`Skipping malformed Ollama stream line: ${line.slice(0, 80)}`);
        continue;
      }

      const chunk = chatResponseSchema.safeParse(json);
      if (!chunk.success) continue;

      if (chunk.data.error !== undefined) {
        throw new ProviderError(`Ollama stream error: ${chunk.data.error}`, { provider: 'ollama' });
      }

      const content = chunk.data.message?.content ?? '';
      if (chunk.data.done === true) {
        yield { content, done: true };
        return;
      }
      if (content) {
        yield { content, done: false };
      }
    }

    yield { content: '', done: true };
  }

  async listModels(): Promise<ModelInfo[]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/tags`);
    } catch (err) {
      throw new ProviderError(
        `Failed to connect to Ollama at ${this.baseUrl}: ${err instanceof Error ? err.message : String(err)}`,
        { provider: 'ollama', baseUrl: this.baseUrl },
      );
    }

    if (!response.ok) {
      throw new ProviderError(`Failed to list Ollama models: ${response.status}`, {
        provider: 'ollama',
        status: response.status,
      });
    }

    const parsed = tagsResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError('Ollama returned an unexpected model list', { provider: 'ollama' });
    }

    return parsed.data.models.map((m) => {
      const id = m.name ?? m.model ?? '';
      return { id, name: id || 'Unknown', provider: 'ollama' as const };
    });
  }

  /** Returns true if Ollama is running and reachable. */
  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (err) {
      logger.debug(`Ollama health check failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  // ── Private helpers ──

  private buildBody(messages: ChatMessage[], options: ChatOptions | undefined, stream: boolean) {
    const ollamaMessages: Array<{ role: string; content: string }> = [];

    if (options?.systemPrompt) {
      ollamaMessages.push({ role: 'system', content: options.systemPrompt });
    }
    for (const msg of messages) {
      ollamaMessages.push({ role: msg.role, content: msg.content });
    }

    const modelOptions: Record<string, number | readonly string[]> = {};
    if (options?.temperature !== undefined) modelOptions.temperature = options.temperature;
    if (options?.maxTokens !== undefined) modelOptions.num_predict = options.maxTokens;
    if (options?.stopSequences?.length) modelOptions.stop = options.stopSequences;

    return {
      model: options?.model ?? OLLAMA_DEFAULTS.model,
      messages: ollamaMessages,
      stream,
      ...(Object.keys(modelOptions).length > 0 ? { options: modelOptions } : {}),
    };
  }

  private async post(path: string, body: object): Promise<Response> {
    let attempt = 0;

    while (true) {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}${path}`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        if (attempt < this.retries) {
          attempt++;
          logger.debug(`Ollama request failed (attempt ${attempt}/${this.retries + 1}), retrying...`);
          await new Promise((r) => setTimeout(r, OLLAMA_DEFAULTS.retryDelayMs));
          continue;
        }
        throw new ProviderError(
          `Failed to connect to Ollama at ${this.baseUrl}: ${err instanceof Error ? err.message : String(err)}`,
          { provider: 'ollama', baseUrl: this.baseUrl },
        );
      }

      if (!response.ok) {
        const errorBody = await response.text();
        throw new ProviderError(`Ollama API error: ${response.status} ${response.statusText}`, {
          status: response.status,
          body: errorBody,
          provider: 'ollama',
        });
      }

      return response;
    }
  }
}
