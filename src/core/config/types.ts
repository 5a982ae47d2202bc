/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually — they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import type { z } from 'zod';
import type {
    agentConfigSchema,
    agentRoleConfigSchema,
    appConfigSchema,
    outputConfigSchema,
    outputFormatSchema,
    providerConfigSchema,
    workflowConfigSchema,
} from './schema.js';

/** Complete application configuration. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** LLM provider connection settings. */
export type ProviderConfig = z.infer<typeof providerConfigSchema>;

/** Workflow execution settings. */
export type WorkflowConfig = z.infer<typeof workflowConfigSchema>;

/** Per-agent model assignments. */
export type AgentConfig = z.infer<typeof agentConfigSchema>;

/** Model assignment for a single agent role. */
export type AgentRoleConfig = z.infer<typeof agentRoleConfigSchema>;

export type OutputConfig = z.infer<typeof outputConfigSchema>;

export type OutputFormat = z.infer<typeof outputFormatSchema>;
