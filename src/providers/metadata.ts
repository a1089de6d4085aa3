/**
 * Provider display metadata for the CLI: labels, wizard text and the model
 * each provider starts with.
 *
 * Dependency direction: metadata.ts → providers/types.ts, anthropic.ts, ollama.ts
 * Used by: cli/commands/init.ts, cli/commands/doctor.ts, cli/utils/model-picker.ts
 */

import { ANTHROPIC_DEFAULTS } from './anthropic.js';
import { OLLAMA_DEFAULTS } from './ollama.js';
import type { LLMProviderName } from './types.js';

export const PROVIDER_LABELS: Record<LLMProviderName, string> = {
    anthropic: 'Anthropic (Claude)',
    ollama: 'Ollama (Local)',
};

/** Model used when the user does not pick one. */
export const PROVIDER_DEFAULT_MODELS: Record<LLMProviderName, string> = {
    anthropic: ANTHROPIC_DEFAULTS.model,
    ollama: OLLAMA_DEFAULTS.model,
};

/** Choice text in the init wizard's provider selector. */
export const PROVIDER_DESCRIPTIONS: Record<LLMProviderName, string> = {
    anthropic: 'Anthropic (Claude) — requires API key',
    ollama: 'Ollama (Local Models) — free, no API key needed',
};
