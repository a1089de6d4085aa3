/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually — they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import { z } from 'zod';
import {
    agentConfigSchema,
    appConfigSchema,
    providerConfigSchema,
    workflowConfigSchema,
} from './schema.js';

/** Complete application configuration. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** LLM provider connection settings. */
export type ProviderConfig = z.infer<typeof providerConfigSchema>;

/** Workflow selection and tuning. */
export type WorkflowConfig = z.infer<typeof workflowConfigSchema>;

/** Model and sampling settings for the workflow agent. */
export type AgentConfig = z.infer<typeof agentConfigSchema>;
