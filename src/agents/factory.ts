/**
 * Agent factory — creates agent instances from config.
 *
 * Wires together the provider registry + agent config + prompt library
 * to produce ready-to-use agent steps.
 *
 * Dependency direction: factory.ts → agents/roles/*, providers/registry, providers/generation-service
 * Used by: workflow runner
 */

import type { AgentRole } from './types.js';
import type { AgentDeps, BaseAgent } from './base.js';
import type { AppConfig } from '../core/config/types.js';
import type { GenerationService } from '../providers/generation-service.js';
import { ProviderGenerationService } from '../providers/generation-service.js';
import { createProvider } from '../providers/registry.js';
import { DEFAULT_PROMPTS, type PromptSet } from '../prompts/library.js';
import type { Semaphore } from '../utils/semaphore.js';
import { OrchestratorAgent } from './roles/orchestrator.js';
import { GeneratorAgent } from './roles/generator.js';
import { ReviewerAgent } from './roles/reviewer.js';
import { DocumenterAgent } from './roles/documenter.js';
import { FallbackAgent } from './roles/fallback.js';

export interface AgentFactoryDeps {
    /** Bounds in-flight provider calls across all agents and runs. */
    readonly slots: Semaphore;
    /** Used for every role instead of the configured providers. */
    readonly service?: GenerationService;
    readonly prompts?: PromptSet;
}

/** One agent per role. */
export type AgentSet = Readonly<Record<AgentRole, BaseAgent>>;

/**
 * Create an agent instance for the specified role using the app config.
 *
 * @throws {ServiceError} if the role's provider is not configured
 */
export function createAgent(role: AgentRole, config: AppConfig, deps: AgentFactoryDeps): BaseAgent {
    const agentConfig = config.agents[role];
    const service =
        deps.service ?? new ProviderGenerationService(createProvider(agentConfig.provider, config.providers), deps.slots);

    const agentDeps: AgentDeps = {
        service,
        prompt: (deps.prompts ?? DEFAULT_PROMPTS)[role],
        options: {
            model: agentConfig.model,
            temperature: agentConfig.temperature,
            maxTokens: agentConfig.maxTokens,
        },
    };

    switch (role) {
        case 'orchestrator':
            return new OrchestratorAgent(agentDeps);
        case 'generator':
            return new GeneratorAgent(agentDeps);
        case 'reviewer':
            return new ReviewerAgent(agentDeps);
        case 'documenter':
            return new DocumenterAgent(agentDeps);
        case 'fallback':
            return new FallbackAgent(agentDeps);
    }
}

/** Create every agent the workflow needs. */
export function createAgents(config: AppConfig, deps: AgentFactoryDeps): AgentSet {
    return {
        orchestrator: createAgent('orchestrator', config, deps),
        generator: createAgent('generator', config, deps),
        reviewer: createAgent('reviewer', config, deps),
        documenter: createAgent('documenter', config, deps),
        fallback: createAgent('fallback', config, deps),
    };
}
