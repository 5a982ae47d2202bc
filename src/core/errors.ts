/**
 * Core error hierarchy for the codeloom workflow engine.
 *
 * All errors extend AppError and carry a machine-readable code
 * plus optional structured context for debugging.
 *
 * Dependency direction: errors.ts → nothing (leaf module)
 * Used by: every layer in the application
 */

/** Base application error with structured metadata. */
export class AppError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        code: string,
        context?: Record<string, unknown>,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'AppError';
        this.code = code;
        this.context = context;

        // Maintains proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/** Raised when configuration is missing, invalid, or cannot be loaded/saved. */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}

/** Raised when user input fails validation. */
export class ValidationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', context);
        this.name = 'ValidationError';
    }
}

/** Failure categories of a generation call. */
export type ServiceErrorKind = 'auth' | 'network' | 'rateLimit' | 'other';

/** Raised when a generation call to an LLM provider fails. */
export class ServiceError extends AppError {
    public readonly kind: ServiceErrorKind;

    constructor(message: string, kind: ServiceErrorKind, context?: Record<string, unknown>) {
        super(message, 'SERVICE_ERROR', { ...context, kind });
        this.name = 'ServiceError';
        this.kind = kind;
    }
}

/** Map an HTTP status code from a provider API to a service error kind. */
export function serviceErrorKindFromStatus(status: number): ServiceErrorKind {
    if (status === 401 || status === 403) return 'auth';
    if (status === 429) return 'rateLimit';
    return 'other';
}

/** Raised when a workflow step fails, either in its service call or its post-processing. */
export class StepError extends AppError {
    public readonly step: string;

    constructor(message: string, step: string, options?: { cause?: unknown }) {
        super(message, 'STEP_ERROR', { step }, options);
        this.name = 'StepError';
        this.step = step;
    }
}

/** Raised for an invalid graph topology or a router decision outside its declared set. */
export class GraphError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'GRAPH_ERROR', context);
        this.name = 'GraphError';
    }
}

/** Raised when a run exceeds its step budget or its time budget. */
export class WorkflowError extends AppError {
    public readonly reason: 'stepLimit' | 'timeout';

    constructor(message: string, reason: 'stepLimit' | 'timeout', context?: Record<string, unknown>) {
        super(message, 'WORKFLOW_ERROR', { ...context, reason });
        this.name = 'WorkflowError';
        this.reason = reason;
    }
}

/** Raised when a run is cancelled by its caller. */
export class CancellationError extends AppError {
    constructor(message = 'Operation was cancelled', context?: Record<string, unknown>) {
        super(message, 'CANCELLED', context);
        this.name = 'CancellationError';
    }
}

/** What ultimately stopped a failed run. */
export type RunErrorKind = 'service' | 'step' | 'graph' | 'workflow' | 'timeout' | 'cancelled';

/**
 * Wraps whatever aborted a run, together with the last committed state.
 *
 * `state` holds every field set before the failure; callers may inspect it.
 */
export class RunError<S = unknown> extends AppError {
    public readonly runId: string;
    public readonly kind: RunErrorKind;
    public readonly state: S;

    constructor(runId: string, state: S, cause: unknown) {
        const kind = classifyRunFailure(cause);
        super(
            `Run ${runId} failed (${kind}): ${cause instanceof Error ? cause.message : String(cause)}`,
            'RUN_ERROR',
            { runId, kind },
            { cause },
        );
        this.name = 'RunError';
        this.runId = runId;
        this.kind = kind;
        this.state = state;
    }
}

/** Derive the run failure kind from the root cause of an error chain. */
export function classifyRunFailure(err: unknown): RunErrorKind {
    if (err instanceof StepError) {
        return err.cause instanceof AppError ? classifyRunFailure(err.cause) : 'step';
    }
    if (err instanceof ServiceError) return 'service';
    if (err instanceof GraphError) return 'graph';
    if (err instanceof CancellationError) return 'cancelled';
    if (err instanceof WorkflowError) return err.reason === 'timeout' ? 'timeout' : 'workflow';
    return 'step';
}
