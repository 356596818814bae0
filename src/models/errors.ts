// src/models/errors.ts

/**
 * Extra detail attached to an error so an admin can find what to fix
 */
export type ErrorContext = Record<string, string | number | undefined>;

/**
 * Base class for every error the service reports to a caller
 *
 * status is the HTTP status the routes answer with.
 */
export class AppError extends Error {
    readonly status: number;
    readonly code: string;
    readonly context: ErrorContext;

    constructor(message: string, status: number, code: string, context: ErrorContext = {}) {
        super(message);
        this.name = new.target.name;
        this.status = status;
        this.code = code;
        this.context = context;
    }
}

/**
 * Quota configuration that cannot be turned into seat counts
 */
export class ConfigurationError extends AppError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, 400, 'CONFIGURATION_ERROR', context);
    }

    /**
     * Copy of this error with more context merged in
     */
    withContext(context: ErrorContext): ConfigurationError {
        return new ConfigurationError(this.message, { ...this.context, ...context });
    }
}

export class InsufficientDataError extends AppError {
    readonly required: number;
    readonly available: number;

    constructor(required: number, available: number) {
        super(
            `Not enough training data. Need at least ${required} samples, got ${available}.`,
            422,
            'INSUFFICIENT_DATA',
            { required, available }
        );
        this.required = required;
        this.available = available;
    }
}

export class NotFoundError extends AppError {
    constructor(resource: string, id: string) {
        super(`${resource} not found`, 404, 'NOT_FOUND', { resource, id });
    }
}

export class ValidationError extends AppError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, 400, 'VALIDATION_ERROR', context);
    }
}
