/**
 * Line reader for streaming HTTP responses (SSE and NDJSON).
 *
 * Dependency direction: stream.ts → core/errors.ts, utils/logger
 * Used by: anthropic.ts, ollama.ts
 */

import { ProviderError } from '../core/errors.js';
import type { LLMProviderName } from './types.js';
import { logger } from '../utils/logger.js';

/**
 * Yield each complete line of a response body as it arrives. Stopping early
 * (a consumer `break`, or an error) cancels the body so the connection is freed.
 */
export async function* readLines(response: Response, provider: LLMProviderName): AsyncGenerator<string> {
  if (!response.body) {
    throw new ProviderError(`${provider} response has no body`, { provider });
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        yield line;
      }
    }

    buffer += decoder.decode();
    if (buffer) yield buffer;
  } finally {
    if (!finished) {
      await reader.cancel().catch((err: unknown) => {
        logger.debug(`Cancelling ${provider} response body failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }
    reader.releaseLock();
  }
}
