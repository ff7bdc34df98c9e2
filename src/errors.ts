// src/errors.ts

/**
 * Base class for errors that map onto an HTTP response
 */
export class AppError extends Error {
    readonly status: number;
    readonly code: string;

    constructor(message: string, status: number, code: string) {
        super(message);
        this.name = new.target.name;
        this.status = status;
        this.code = code;
    }
}

/**
 * Required input absent or malformed. Raised before any work is done.
 */
export class MissingParameterError extends AppError {
    readonly parameters: string[];

    constructor(parameters: string[], message?: string) {
        super(message ?? `${parameters.join(', ')} required`, 400, 'MISSING_PARAMETER');
        this.parameters = parameters;
    }
}

/**
 * Destructive bulk operation invoked without the exact confirmation token.
 * Raised before any mutation.
 */
export class ConfirmationMismatchError extends AppError {
    constructor(operation: string) {
        super(`Confirmation failed for ${operation}: type CONFIRM`, 400, 'CONFIRMATION_MISMATCH');
    }
}

/**
 * Storage collaborator failure. Fatal for the run, never retried here.
 */
export class PersistenceError extends AppError {
    readonly operation: string;

    constructor(operation: string, detail: string) {
        super(`Storage failure during ${operation}: ${detail}`, 500, 'PERSISTENCE_FAILED');
        this.operation = operation;
    }
}

export class ConfigError extends Error {
    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}
