/**
 * Anthropic Claude provider adapter.
 *
 * Uses the Anthropic Messages API directly via fetch() — no SDK dependency.
 * Response bodies are checked with zod before anything reads them.
 *
 * Dependency direction: anthropic.ts → providers/types.ts, core/errors.ts
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

/** Configuration required to create an Anthropic provider. */
export interface AnthropicProviderConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly apiVersion?: string;
}

/** Default Anthropic API settings. */
export const ANTHROPIC_DEFAULTS = {
  baseUrl: 'https://api.anthropic.com',
  apiVersion: '2023-06-01',
  model: 'claude-sonnet-4-20250514',
  maxTokens: 4096,
} as const;

const messageResponseSchema = z.object({
  model: z.string().optional(),
  stop_reason: z.string().nullish(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
  usage: z
    .object({
      input_tokens: z.number().default(0),
      output_tokens: z.number().default(0),
    })
    .optional(),
});

const streamEventSchema = z.object({
  type: z.string(),
  delta: z.object({ text: z.string().optional() }).optional(),
  error: z.object({ type: z.string().optional(), message: z.string().optional() }).optional(),
});

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Anthropic Claude provider implementation.
 *
 * Anthropic takes the system prompt as a top-level `system` field, so system
 * messages are folded into it rather than sent in the message list.
 */
export class AnthropicProvider implements LLMProvider {
  public readonly name = 'anthropic' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly apiVersion: string;

  constructor(config: AnthropicProviderConfig) {
    if (!config.apiKey) {
      throw new ProviderError('Anthropic API key is required', { provider: 'anthropic' });
    }
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? ANTHROPIC_DEFAULTS.baseUrl;
    this.apiVersion = config.apiVersion ?? ANTHROPIC_DEFAULTS.apiVersion;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const body = this.buildBody(messages, options, false);
    logger.debug(`Anthropic chat request: model=${body.model}, messages=${body.messages.length}`);

    const response = await this.post(body);
    const parsed = messageResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError('Anthropic returned an unexpected response', {
        provider: 'anthropic',
        issues: parsed.error.issues.map((i) => i.message),
      });
    }

    const data = parsed.data;
    return {
      content: data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join(''),
      model: data.model ?? body.model,
      usage: toUsage(data.usage?.input_tokens ?? 0, data.usage?.output_tokens ?? 0),
      finishReason: data.stop_reason ?? 'unknown',
    };
  }

  async *stream(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<ChatChunk> {
    const response = await this.post(this.buildBody(messages, options, true));

    for await (const line of readLines(response, 'anthropic')) {
      if (!line.startsWith('data: ')) continue;
      const data = line.slice(6).trim();
      if (data === '[DONE]') break;

      let json: unknown;
      try {
        json = JSON.parse(data);
      } catch {
        logger.debug(`Skipping malformed Anthropic stream line: ${data.slice(0, 80)}`);
        continue;
      }

      const event = streamEventSchema.safeParse(json);
      if (!event.success) continue;

      if (event.data.type === 'error') {
        const kind = event.data.error?.type ?? 'error';
        throw new ProviderError(`Anthropic stream error (${kind}): ${event.data.error?.message ?? 'no details'}`, {
          provider: 'anthropic',
          errorType: kind,
        });
      }

      if (event.data.type === 'content_block_delta' && event.data.delta?.text) {
        yield { content: event.data.delta.text, done: false };
      } else if (event.data.type === 'message_stop') {
        break;
      }
    }

    yield { content: '', done: true };
  }

  /**
   * Anthropic has no public model listing for every key, so this returns
   * the models known to work with the default API version.
   */
  async listModels(): Promise<ModelInfo[]> {
    return [
      { id: 'claude-sonnet-4-20250514', name: 'Claude Sonnet 4', provider: 'anthropic', contextWindow: 200000 },
      { id: 'claude-3-5-sonnet-20241022', name: 'Claude 3.5 Sonnet', provider: 'anthropic', contextWindow: 200000 },
      { id: 'claude-3-5-haiku-20241022', name: 'Claude 3.5 Haiku', provider: 'anthropic', contextWindow: 200000 },
    ];
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify({
          model: ANTHROPIC_DEFAULTS.model,
          max_tokens: 1,
          messages: [{ role: 'user', content: 'ping' }],
        }),
      });

      // 400 still means the key was accepted
      return response.status === 200 || response.status === 400;
    } catch (err) {
      logger.debug(`Anthropic health check failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  // ── Private helpers ──

  private getHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'x-api-key': this.apiKey,
      'anthropic-version': this.apiVersion,
    };
  }

  private buildBody(messages: ChatMessage[], options: ChatOptions | undefined, stream: boolean) {
    let system = options?.systemPrompt;
    const apiMessages: AnthropicMessage[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        system = system ? `${system}\n\n${msg.content}` : msg.content;
      } else {
        apiMessages.push({ role: msg.role, content: msg.content });
      }
    }

    return {
      model: options?.model ?? ANTHROPIC_DEFAULTS.model,
      max_tokens: options?.maxTokens ?? ANTHROPIC_DEFAULTS.maxTokens,
      messages: apiMessages,
      ...(system ? { system } : {}),
      ...(options?.temperature !== undefined ? { temperature: options.temperature } : {}),
      ...(options?.stopSequences?.length ? { stop_sequences: options.stopSequences } : {}),
      ...(stream ? { stream: true } : {}),
    };
  }

  private async post(body: object): Promise<Response> {
    let response: Response;

    try {
      response = await fetch(`${this.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new ProviderError(
        `Failed to connect to Anthropic API: ${err instanceof Error ? err.message : String(err)}`,
        { provider: 'anthropic', baseUrl: this.baseUrl },
      );
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderError(`Anthropic API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: errorBody,
        provider: 'anthropic',
      });
    }

    return response;
  }
}
