/**
 * Core error hierarchy for the stepwise workflow engine.
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

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.context = context;

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

/** Raised when an LLM provider call fails or cannot be reached. */
export class ProviderError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'PROVIDER_ERROR', context);
        this.name = 'ProviderError';
    }
}

/** Raised on an illegal stage transition or an unknown workflow name. */
export class WorkflowError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'WORKFLOW_ERROR', context);
        this.name = 'WorkflowError';
    }
}

/**
 * Raised for anything that goes wrong while a stage handler runs.
 *
 * The engine converts it to a reply and keeps the workflow state as it was
 * before the failing turn, so the same stage can be retried.
 */
export class StageExecutionError extends AppError {
    public readonly stage: string;
    public override readonly cause?: unknown;

    constructor(stage: string, message: string, cause?: unknown) {
        super(message, 'STAGE_EXECUTION_ERROR', { stage });
        this.name = 'StageExecutionError';
        this.stage = stage;
        this.cause = cause;
    }

    /** Wrap an arbitrary thrown value, keeping an existing StageExecutionError as is. */
    static from(stage: string, err: unknown): StageExecutionError {
        if (err instanceof StageExecutionError) return err;
        const message = err instanceof Error ? err.message : String(err);
        return new StageExecutionError(stage, message, err);
    }
}

/** Raised when user input or loaded data fails validation. */
export class ValidationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', context);
        this.name = 'ValidationError';
    }
}
