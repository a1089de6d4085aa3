import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { createStreamRenderer } from '../../src/cli/utils/stream-renderer.js';

beforeAll(() => {
    chalk.level = 0;
});

function capture() {
    const out: string[] = [];
    return { out, write: (text: string) => void out.push(text) };
}

describe('createStreamRenderer', () => {
    it('prints the label once, then the tokens without line breaks', () => {
        const { out, write } = capture();
        const renderer = createStreamRenderer('Planning', write);

        renderer.onToken('a\nb');
        renderer.onToken('c');
        renderer.finish();

        expect(out.join('')).toBe('  Planning: abc\n');
    });

    it('truncates the preview line', () => {
        const { out, write } = capture();
        const renderer = createStreamRenderer('Chat', write);

        renderer.onToken('x'.repeat(100));
        renderer.finish();

        expect(out.join('')).toBe(`  Chat: ${'x'.repeat(80)}…\n`);
    });

    it('writes nothing when no token arrived', () => {
        const { out, write } = capture();
        createStreamRenderer('Chat', write).finish();
        expect(out).toEqual([]);
    });
});
