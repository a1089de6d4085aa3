/**
 * Agent factory — creates the workflow agent from config.
 *
 * Wires together the provider registry and the agent section of the config
 * to produce a ready-to-use agent.
 *
 * Dependency direction: factory.ts → agents/provider-agent, providers/registry
 * Used by: chat command
 */

import type { AppConfig } from '../core/config/types.js';
import { createProvider } from '../providers/registry.js';
import { ProviderAgent } from './provider-agent.js';

/**
 * Create the agent described by `config.agent`.
 * @throws {ProviderError} if the selected provider is not configured.
 */
export function createWorkflowAgent(config: AppConfig): ProviderAgent {
    const { provider, model, temperature, maxTokens } = config.agent;
    return new ProviderAgent(createProvider(provider, config.providers), { model, temperature, maxTokens });
}
