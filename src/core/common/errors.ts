// src/core/common/errors.ts

/**
 * Base class for custom application errors.
 * Allows for operational errors (expected, like validation) vs programmer errors.
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(
        name: string,
        message: string,
        statusCode: number = 500, // Default to Internal Server Error
        isOperational: boolean = true // Assume operational unless specified
        ) {
        super(message);
        this.name = name;
        this.statusCode = statusCode;
        this.isOperational = isOperational;

        // Maintain proper stack trace (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }

        // Set the prototype explicitly for extending built-in classes
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Failure kinds a report run can end with, as reported to the caller. */
export type ReportFailureKind = 'MissingColumn' | 'EmptyDataset' | 'DateRangeInvalid' | 'Aborted';

/**
 * Fatal error of a report run. Carries the structured failure kind
 * the serving layer hands back to the client.
 */
export abstract class ReportRunError extends AppError {
    public abstract readonly kind: ReportFailureKind;
}

/**
 * Error for issues during configuration loading or validation.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        // Configuration errors are typically not operational; they prevent startup.
        super('ConfigurationError', message, 500, false);
    }
}

/**
 * Error for request shape failures (missing upload fields and the like).
 */
export class ValidationError extends AppError {
    constructor(message: string = 'Data validation failed') {
        super('ValidationError', message, 400, true); // 400 Bad Request
    }
}

/**
 * A required column is absent from an extract's header row.
 */
export class MissingColumnError extends ReportRunError {
    public readonly kind = 'MissingColumn';

    constructor(
        public readonly extract: string,
        public readonly column: string
    ) {
        super('MissingColumnError', `${extract} extract is missing required column "${column}"`, 400, true);
    }
}

/**
 * An extract yielded no usable rows, or too many of its rows were rejected.
 */
export class EmptyDatasetError extends ReportRunError {
    public readonly kind = 'EmptyDataset';

    constructor(
        public readonly extract: string,
        message: string
    ) {
        super('EmptyDatasetError', message, 422, true);
    }
}

/**
 * Start/end dates are malformed, or the end precedes the start.
 */
export class DateRangeInvalidError extends ReportRunError {
    public readonly kind = 'DateRangeInvalid';

    constructor(message: string) {
        super('DateRangeInvalidError', message, 400, true);
    }
}

/**
 * Raised by the serving layer when a run is cut short by a client
 * disconnect or the run deadline. Never raised by the core itself.
 */
export class RunAbortedError extends ReportRunError {
    public readonly kind = 'Aborted';

    constructor(message: string) {
        super('RunAbortedError', message, 503, true);
    }
}
