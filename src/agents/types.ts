/**
 * Agent role type definitions.
 *
 * Every role is also the name of the workflow step it runs as.
 *
 * Dependency direction: agents/types.ts → nothing (leaf module)
 * Used by: config schemas, workflow flow, agent factory
 */

/** All agent roles in the workflow. */
export type AgentRole = 'orchestrator' | 'generator' | 'reviewer' | 'documenter' | 'fallback';

/** Display-friendly labels for each agent role. */
export const AGENT_ROLE_LABELS: Record<AgentRole, string> = {
    orchestrator: '🧭 Orchestrator',
    generator: '💻 Generator',
    reviewer: '🔍 Reviewer',
    documenter: '📝 Documenter',
    fallback: '💬 Fallback',
};

/** All valid agent roles as an array (for iteration and validation). */
export const ALL_AGENT_ROLES: readonly AgentRole[] = [
    'orchestrator',
    'generator',
    'reviewer',
    'documenter',
    'fallback',
] as const;
