/**
 * Zod schemas defining the complete configuration shape.
 *
 * This is the authoritative definition of what a valid config looks like.
 * All TypeScript types are inferred from these schemas via z.infer<>.
 *
 * Dependency direction: schema.ts → zod
 * Used by: manager.ts, init.ts, types.ts
 */

import { z } from 'zod';

/**
 * Schema for the model the workflow agent talks to.
 */
export const agentConfigSchema = z.object({
    /** Which provider serves the agent. */
    provider: z.enum(['anthropic', 'ollama']),
    /** The model identifier to use. */
    model: z.string().min(1),
    /** Sampling temperature (0.0 = deterministic, higher = more creative). */
    temperature: z.number().min(0).max(2).default(0.7),
    /** Maximum tokens the model can generate in a response. */
    maxTokens: z.number().int().min(1).max(200000).default(4096),
});

/**
 * Schema for Anthropic provider settings.
 */
export const anthropicProviderSchema = z.object({
    apiKey: z.string().min(1, 'Anthropic API key is required'),
    baseUrl: z.string().url().default('https://api.anthropic.com'),
    apiVersion: z.string().default('2023-06-01'),
});

/**
 * Schema for Ollama provider settings.
 */
export const ollamaProviderSchema = z.object({
    baseUrl: z.string().url().default('http://localhost:11434'),
});

/**
 * Schema for provider configuration (all providers).
 */
export const providerConfigSchema = z.object({
    anthropic: anthropicProviderSchema.optional(),
    ollama: ollamaProviderSchema.optional(),
});

/**
 * Schema for workflow settings.
 */
export const workflowConfigSchema = z.object({
    /** Registered workflow to run in `chat`. */
    name: z.enum(['agent', 'basic']).default('agent'),
    /** Print model output token by token instead of behind a spinner. */
    streaming: z.boolean().default(true),
    /** Feedback entries (agent) or conversation messages (basic) kept as context. */
    feedbackWindow: z.number().int().min(1).max(200).default(20),
    /** Max characters of execution output echoed in a reply. */
    resultPreviewLength: z.number().int().min(50).max(20000).default(500),
});

/**
 * The complete application configuration schema.
 */
export const appConfigSchema = z.object({
    /** Schema version for future migrations. */
    version: z.literal(1).default(1),
    /** LLM provider connection settings. */
    providers: providerConfigSchema,
    /** Model and sampling settings for the workflow agent. */
    agent: agentConfigSchema,
    workflow: workflowConfigSchema.default({}),
});
