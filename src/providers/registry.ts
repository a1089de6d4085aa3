/**
 * Provider registry — factory that creates the correct provider from config.
 *
 * New providers are added by:
 * 1. Create the adapter file in src/providers/
 * 2. Register it in the PROVIDER_FACTORIES map below
 * 3. Add the name to LLMProviderName type in types.ts
 *
 * Dependency direction: registry.ts → types.ts, anthropic.ts, ollama.ts, errors.ts
 * Used by: agents/factory.ts, CLI doctor command
 */

import type { LLMProvider, LLMProviderName } from './types.js';
import { AnthropicProvider } from './anthropic.js';
import { OllamaProvider } from './ollama.js';
import type { ProviderConfig } from '../core/config/types.js';
import { ProviderError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

const PROVIDER_FACTORIES: Record<LLMProviderName, (config: ProviderConfig) => LLMProvider> = {
  anthropic: (config) => {
    if (!config.anthropic) {
      throw new ProviderError(
        'Anthropic provider is not configured. Run "stepwise init" to set up.',
        { provider: 'anthropic' },
      );
    }
    return new AnthropicProvider(config.anthropic);
  },

  ollama: (config) => new OllamaProvider(config.ollama),
};

const SUPPORTED_PROVIDERS: readonly LLMProviderName[] = ['anthropic', 'ollama'];

/** Cache of created provider instances (one per provider name). */
const providerCache = new Map<LLMProviderName, LLMProvider>();

/** Type guard for user-supplied provider names. */
export function isSupportedProvider(name: string): name is LLMProviderName {
  return SUPPORTED_PROVIDERS.some((p) => p === name);
}

/**
 * Create (or return cached) a provider instance by name.
 *
 * @param config - The providers section of the app config
 * @throws {ProviderError} if the provider name is unknown or its config is missing
 */
export function createProvider(name: string, config: ProviderConfig): LLMProvider {
  if (!isSupportedProvider(name)) {
    throw new ProviderError(
      `Unknown provider: "${name}". Available: ${SUPPORTED_PROVIDERS.join(', ')}`,
      { provider: name, available: [...SUPPORTED_PROVIDERS] },
    );
  }

  const cached = providerCache.get(name);
  if (cached) return cached;

  logger.debug(`Creating provider: ${name}`);
  const provider = PROVIDER_FACTORIES[name](config);
  providerCache.set(name, provider);
  return provider;
}

/**
 * Clear the provider cache (for tests and after config changes).
 */
export function clearProviderCache(): void {
  providerCache.clear();
}

/**
 * Get all supported provider names.
 */
export function getSupportedProviders(): LLMProviderName[] {
  return [...SUPPORTED_PROVIDERS];
}

/**
 * Check every configured provider's connection.
 * Unconfigured providers are reported as `false` without a network call.
 */
export async function validateAllProviders(
  config: ProviderConfig,
): Promise<Record<LLMProviderName, boolean>> {
  const results: Record<LLMProviderName, boolean> = { anthropic: false, ollama: false };

  for (const name of SUPPORTED_PROVIDERS) {
    if (!config[name]) continue;

    try {
      results[name] = await createProvider(name, config).validateConnection();
    } catch (err) {
      logger.debug(`Provider ${name} check failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return results;
}
