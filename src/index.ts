/**
 * Library entry point — the workflow engine and the assistant workflow built on it.
 *
 * Dependency direction: index.ts → core, providers, agents
 * Used by: package.json main/types
 */

// Errors
export {
    AppError,
    ConfigError,
    ValidationError,
    ServiceError,
    StepError,
    GraphError,
    WorkflowError,
    CancellationError,
    RunError,
    classifyRunFailure,
    type ServiceErrorKind,
    type RunErrorKind,
} from './core/errors.js';

// Config
export { loadConfig, saveConfig, mergeConfig, getDefaultConfig } from './core/config/manager.js';
export type { AppConfig, WorkflowConfig, ProviderConfig, AgentConfig } from './core/config/types.js';

// Generic engine
export {
    GraphBuilder,
    Graph,
    TERMINAL,
    type Step,
    type StepContext,
    type Router,
    type RetryPolicy,
} from './core/workflow/graph.js';
export { WorkflowEngine, type RunHooks, type StepEvent, type EngineRunConfig } from './core/workflow/engine.js';
export { boundRetry, type RetryDecision } from './core/workflow/retry.js';
export {
    MemoryCheckpointStore,
    FileCheckpointStore,
    type Checkpoint,
    type CheckpointStore,
    type RunStatus,
} from './core/workflow/checkpoint.js';

// Assistant workflow
export { RoutingDecision, createWorkflowState, type WorkflowState, type ApprovalStatus } from './core/workflow/state.js';
export { normalizeDecision, needsRetry, containsTroubleIndicator } from './core/workflow/routing.js';
export { buildAssistantGraph, STEP } from './core/workflow/flow.js';
export { ApprovalGateStep, PromptsApprovalSource, type ApprovalSource, type ApprovalRequest } from './core/workflow/approval.js';
export { resolveRunConfig, type RunConfig, type RunOverrides } from './core/workflow/run-config.js';
export {
    createRuntime,
    runWorkflow,
    resumeWorkflow,
    isWorkflowRunError,
    type RunResult,
    type RunRequest,
    type WorkflowRuntime,
    type RuntimeDeps,
} from './core/workflow/runner.js';
export { runTaskQueue, parseTasks, type QueuedTask } from './core/workflow/task-queue.js';

// Providers
export type { GenerationService, GenerationOptions } from './providers/generation-service.js';
export { ProviderGenerationService } from './providers/generation-service.js';
export type { LLMProvider, LLMProviderName, ChatMessage, ChatOptions, ChatResponse } from './providers/types.js';
export { createProvider } from './providers/registry.js';
