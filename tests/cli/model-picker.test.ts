import { describe, it, expect } from 'vitest';
import { buildModelChoices, formatContextWindow } from '../../src/cli/utils/model-picker.js';
import type { ModelInfo } from '../../src/providers/types.js';

const MODELS: ModelInfo[] = [
    { id: 'qwen2.5:7b', name: 'qwen2.5:7b', provider: 'ollama' },
    { id: 'claude-sonnet-4-20250514', name: 'Claude Sonnet 4', provider: 'anthropic', contextWindow: 200_000 },
    { id: 'llama3.2:latest', name: 'llama3.2:latest', provider: 'ollama' },
];

describe('buildModelChoices', () => {
    it('sorts by id and labels context windows', () => {
        const { choices } = buildModelChoices(MODELS, 'llama3.2:latest');

        expect(choices).toEqual([
            { title: 'claude-sonnet-4-20250514 (200K ctx)', value: 'claude-sonnet-4-20250514' },
            { title: 'llama3.2:latest', value: 'llama3.2:latest' },
            { title: 'qwen2.5:7b', value: 'qwen2.5:7b' },
        ]);
    });

    it('preselects the preferred model, or the first one', () => {
        expect(buildModelChoices(MODELS, 'llama3.2:latest').initial).toBe(1);
        expect(buildModelChoices(MODELS, 'mistral').initial).toBe(0);
    });

    it('leaves the input order alone', () => {
        buildModelChoices(MODELS, 'x');
        expect(MODELS[0]?.id).toBe('qwen2.5:7b');
    });
});

describe('formatContextWindow', () => {
    it('picks a unit by size', () => {
        expect(formatContextWindow(512)).toBe('512 ctx');
        expect(formatContextWindow(128_000)).toBe('128K ctx');
        expect(formatContextWindow(1_048_576)).toBe('1.0M ctx');
    });
});
