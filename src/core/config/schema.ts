/**
 * Zod schemas defining the complete configuration shape.
 *
 * This is the authoritative definition of what a valid config looks like.
 * All TypeScript types are inferred from these schemas via z.infer<>.
 *
 * Dependency direction: schema.ts → zod, utils/validation, utils/timer
 * Used by: manager.ts, env.ts, types.ts
 */

import { z } from 'zod';
import { modelName, urlString } from '../../utils/validation.js';
import { MAX_TIMER_SECONDS } from '../../utils/timer.js';

export const providerNameSchema = z.enum(['openai', 'ollama']);

/**
 * Schema for a single agent role's model assignment.
 */
export const agentRoleConfigSchema = z.object({
    /** Which provider serves this role. */
    provider: providerNameSchema,
    /** The model identifier to use. */
    model: modelName,
    /** Sampling temperature (0.0 = deterministic, higher = more creative). */
    temperature: z.number().min(0).max(2).default(0.1),
    /** Maximum tokens the model can generate in a response. */
    maxTokens: z.number().int().min(1).max(200000).default(2000),
});

/**
 * Schema for all agent model assignments, keyed by role.
 */
export const agentConfigSchema = z.object({
    orchestrator: agentRoleConfigSchema,
    generator: agentRoleConfigSchema,
    reviewer: agentRoleConfigSchema,
    documenter: agentRoleConfigSchema,
    fallback: agentRoleConfigSchema,
});

export const openaiProviderSchema = z.object({
    apiKey: z.string().min(1, 'OpenAI API key is required'),
    baseUrl: urlString.default('https://api.openai.com'),
    organization: z.string().optional(),
});

export const ollamaProviderSchema = z.object({
    baseUrl: urlString.default('http://localhost:11434'),
});

export const providerConfigSchema = z.object({
    openai: openaiProviderSchema.optional(),
    ollama: ollamaProviderSchema.optional(),
});

/**
 * Schema for workflow execution settings.
 */
export const workflowConfigSchema = z.object({
    /** Review → generation passes allowed before documentation is forced. */
    maxRetries: z.number().int().min(0).max(20).default(3),
    /** Ask a human at the approval gate instead of approving automatically. */
    interactive: z.boolean().default(false),
    /** Whole-run time budget in seconds. Unset means no limit. */
    timeoutSeconds: z.number().int().min(1).max(MAX_TIMER_SECONDS).optional(),
    /** How long the approval gate waits before rejecting. */
    approvalTimeoutSeconds: z.number().int().min(1).max(MAX_TIMER_SECONDS).default(300),
    /** Generation calls allowed in flight at once, across all runs. */
    maxConcurrency: z.number().int().min(1).max(64).default(4),
    /** Step budget per run. Unset derives it from the graph size and maxRetries. */
    maxSteps: z.number().int().min(1).optional(),
    /** What a generation failure during classification does: take the fallback path, or fail the run. */
    classificationFailure: z.enum(['fallback', 'abort']).default('fallback'),
    /** Where checkpoints live. */
    checkpoints: z.enum(['file', 'memory']).default('file'),
});

export const outputFormatSchema = z.enum(['json', 'text', 'pretty']);

export const outputConfigSchema = z.object({
    format: outputFormatSchema.default('pretty'),
});

/**
 * The complete application configuration schema.
 */
export const appConfigSchema = z.object({
    /** Schema version for future migrations. */
    version: z.literal(1).default(1),
    providers: providerConfigSchema,
    agents: agentConfigSchema,
    workflow: workflowConfigSchema,
    output: outputConfigSchema.default({}),
});
