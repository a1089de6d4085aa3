import { describe, it, expect, vi } from 'vitest';
import { readLines } from '../../src/providers/stream.js';
import { ProviderError } from '../../src/core/errors.js';

function responseOf(chunks: string[], onCancel: () => void = () => undefined): Response {
    const encoder = new TextEncoder();
    let index = 0;
    const body = new ReadableStream<Uint8Array>({
        pull(controller) {
            const next = chunks[index++];
            if (next === undefined) {
                controller.close();
            } else {
                controller.enqueue(encoder.encode(next));
            }
        },
        cancel: onCancel,
    });
    return new Response(body);
}

describe('readLines', () => {
    it('joins lines split across chunks and flushes the last one', async () => {
        const lines: string[] = [];
        for await (const line of readLines(responseOf(['data: a', 'b\ndata: c\n', 'tail']), 'anthropic')) {
            lines.push(line);
        }
        expect(lines).toEqual(['data: ab', 'data: c', 'tail']);
    });

    it('cancels the body when the consumer stops early', async () => {
        const cancel = vi.fn();
        const response = responseOf(['first\n', 'second\n', 'third\n'], cancel);

        for await (const line of readLines(response, 'ollama')) {
            if (line === 'first') break;
        }

        expect(cancel).toHaveBeenCalledTimes(1);
    });

    it('leaves a fully read body alone', async () => {
        const cancel = vi.fn();
        for await (const _line of readLines(responseOf(['only\n'], cancel), 'ollama')) {
            // drain
        }
        expect(cancel).not.toHaveBeenCalled();
    });

    it('rejects a response without a body', async () => {
        const iterate = async () => {
            for await (const _line of readLines(new Response(null), 'ollama')) {
                // nothing to read
            }
        };
        await expect(iterate()).rejects.toBeInstanceOf(ProviderError);
    });
});
