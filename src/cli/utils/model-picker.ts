/**
 * Model picker for the init wizard.
 *
 * Lists the models the chosen backend reports and lets the user select the
 * one the workflow agent will use. Long lists switch to a filtered
 * autocomplete; an unreachable backend falls back to free-text input.
 *
 * Dependency direction: model-picker.ts → providers/registry, providers/metadata, prompts, ora
 * Used by: cli/commands/init.ts
 */

import prompts from 'prompts';
import ora from 'ora';
import type { LLMProviderName, ModelInfo } from '../../providers/types.js';
import type { ProviderConfig } from '../../core/config/types.js';
import { createProvider, clearProviderCache } from '../../providers/registry.js';
import { PROVIDER_DEFAULT_MODELS } from '../../providers/metadata.js';
import { logger } from '../../utils/logger.js';

/** Lists longer than this use autocomplete instead of a select. */
export const SELECT_THRESHOLD = 20;

export interface ModelChoices {
    choices: prompts.Choice[];
    /** Index of the preferred model in `choices`, 0 when it is not offered. */
    initial: number;
}

/** Sort models by id and label them with their context window when known. */
export function buildModelChoices(models: readonly ModelInfo[], preferred: string): ModelChoices {
    const choices = [...models]
        .sort((a, b) => a.id.localeCompare(b.id))
        .map((m) => ({
            title: m.contextWindow ? `${m.id} (${formatContextWindow(m.contextWindow)})` : m.id,
            value: m.id,
        }));

    const index = choices.findIndex((c) => c.value === preferred);
    return { choices, initial: Math.max(index, 0) };
}

export function formatContextWindow(tokens: number): string {
    if (tokens >= 1_000_000) return `${(tokens / 1_000_000).toFixed(1)}M ctx`;
    if (tokens >= 1_000) return `${Math.round(tokens / 1_000)}K ctx`;
    return `${tokens} ctx`;
}

async function fetchModels(providerName: LLMProviderName, providerConfig: ProviderConfig): Promise<ModelInfo[]> {
    // the wizard may have just changed the connection settings
    clearProviderCache();

    const spinner = ora(`Fetching models from ${providerName}...`).start();
    try {
        return await createProvider(providerName, providerConfig).listModels();
    } finally {
        spinner.stop();
    }
}

/**
 * Ask which model the agent should use.
 * @returns the model id, or null if the user cancelled
 */
export async function pickModel(
    providerName: LLMProviderName,
    providerConfig: ProviderConfig,
    message: string,
): Promise<string | null> {
    const preferred = PROVIDER_DEFAULT_MODELS[providerName];

    let models: ModelInfo[];
    try {
        models = await fetchModels(providerName, providerConfig);
    } catch (err) {
        logger.debug(`Model list unavailable: ${err instanceof Error ? err.message : String(err)}`);
        return askForModelId(`${message} (could not fetch model list)`, preferred);
    }

    if (models.length === 0) {
        return askForModelId(`${message} (no models reported)`, preferred);
    }

    const { choices, initial } = buildModelChoices(models, preferred);

    const { model } =
        choices.length <= SELECT_THRESHOLD
            ? await prompts({ type: 'select', name: 'model', message, choices, initial })
            : await prompts({
                  type: 'autocomplete',
                  name: 'model',
                  message,
                  choices,
                  initial: preferred,
                  suggest: (input: string, options: prompts.Choice[]) => {
                      const needle = input.toLowerCase();
                      return Promise.resolve(options.filter((c) => c.title.toLowerCase().includes(needle)));
                  },
              });

    return typeof model === 'string' ? model : null;
}

async function askForModelId(message: string, preferred: string): Promise<string | null> {
    const { model } = await prompts({ type: 'text', name: 'model', message, initial: preferred });
    return typeof model === 'string' && model.trim() ? model.trim() : null;
}
