/**
 * Default configuration values.
 *
 * The init wizard starts from these and overrides them with the user's
 * choices.
 *
 * Dependency direction: defaults.ts → types.ts
 * Used by: manager.ts, init.ts, prompts/library.ts
 */

import type { AppConfig } from './types.js';

/**
 * Full default configuration.
 *
 * Defaults to Ollama so a new project works without any API keys.
 * Anthropic is opt-in via the init wizard.
 */
export const DEFAULT_CONFIG: AppConfig = {
    version: 1,

    providers: {
        ollama: {
            baseUrl: 'http://localhost:11434',
        },
    },

    agent: {
        provider: 'ollama',
        model: 'llama3.2:latest',
        temperature: 0.5,
        maxTokens: 4096,
    },

    workflow: {
        name: 'agent',
        streaming: true,
        feedbackWindow: 20,
        resultPreviewLength: 500,
    },
};

/** The directory name where config is stored inside a project. */
export const CONFIG_DIR_NAME = '.stepwise';

/** The config file name. */
export const CONFIG_FILE_NAME = 'config.json';
