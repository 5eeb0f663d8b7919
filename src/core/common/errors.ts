// src/core/common/errors.ts

/**
 * Base class for custom application errors.
 * Operational errors (bad upload, unknown id) carry their message to the client;
 * anything else is reported as a generic 500.
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(
        name: string,
        message: string,
        statusCode: number = 500,
        isOperational: boolean = true
        ) {
        super(message);
        this.name = name;
        this.statusCode = statusCode;
        this.isOperational = isOperational;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }

        // Set the prototype explicitly for extending built-in classes
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Error for issues during configuration loading or validation.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        // Prevents startup; never operational.
        super('ConfigurationError', message, 500, false);
    }
}

/**
 * Error for request data validation failures.
 */
export class ValidationError extends AppError {
    constructor(message: string = 'Data validation failed') {
        super('ValidationError', message, 400, true);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super('NotFoundError', message, 404, true);
    }
}

/**
 * Error specifically for failures while loading an uploaded table.
 */
export class FileParsingError extends AppError {
    constructor(message: string, originalError?: Error) {
        const fullMessage = originalError
            ? `${message}: ${originalError.message}`
            : message;
        super('FileParsingError', fullMessage, 400, true);
        if (originalError) {
            this.stack = originalError.stack;
        }
    }
}

/**
 * Raised when an invoice workbook cannot be laid out or serialized.
 * Aborts the whole processing request.
 */
export class DocumentRenderError extends AppError {
    constructor(message: string) {
        super('DocumentRenderError', message, 500, false);
    }
}

/** Narrows an unknown thrown value to a message string. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
