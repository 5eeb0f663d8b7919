// src/infrastructure/webserver/middleware/error.middleware.ts
import { ErrorRequestHandler } from 'express';
import { container } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../../config';
import { AppError } from '../../../core/common/errors';
import { LOGGER_TOKEN } from '../../logger';

export interface ErrorResponseBody {
    message: string;
    error?: string;
    stack?: string;
}

/**
 * Maps any error to `{message, error?, stack?}`.
 * Must be registered AFTER all other routes and middleware.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    const error = err instanceof Error ? err : new Error(String(err));

    let statusCode = 500;
    let message = 'An unexpected internal server error occurred.';

    if (error instanceof AppError && error.isOperational) {
        statusCode = error.statusCode;
        message = error.message;
    } else if (error.name === 'MulterError') {
        statusCode = 400;
        message = `File upload error: ${error.message}`;
    } else if (error.name === 'SyntaxError' && 'body' in error) {
        // express.json() rejects a malformed body this way
        statusCode = 400;
        message = 'Malformed JSON body.';
    }

    logger.log(statusCode >= 500 ? 'error' : 'warn', `[ErrorHandler] ${error.name}: ${error.message}`, {
        error: {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...(error instanceof AppError && {
                statusCode: error.statusCode,
                isOperational: error.isOperational,
            }),
        },
        request: {
            method: req.method,
            url: req.originalUrl,
            ip: req.ip,
        },
    });

    if (res.headersSent) {
        logger.warn('[ErrorHandler] Headers already sent, delegating to Express.');
        next(error);
        return;
    }

    const body: ErrorResponseBody = { message };
    // Details only outside production
    if (config.nodeEnv !== 'production') {
        body.error = error.message;
        body.stack = error.stack;
    }

    res.status(statusCode).json(body);
};
