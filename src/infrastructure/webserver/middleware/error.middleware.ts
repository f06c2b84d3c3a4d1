// src/infrastructure/webserver/middleware/error.middleware.ts
import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import 'reflect-metadata';
import { container } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../../config';
import { AppError, ReportRunError } from '../../../core/common/errors';
import { LOGGER_TOKEN } from '../../logger';

export interface ErrorResponseBody {
    kind: string;
    message: string;
    stack?: string;
}

/**
 * Express error handling middleware function.
 * Must be registered AFTER all other routes and middleware.
 */
export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction // Express recognises error handlers by arity
): void => {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    const { statusCode, body } = toErrorResponse(err);

    logger.log(statusCode >= 500 && !(err instanceof ReportRunError) ? 'error' : 'warn',
        `[ErrorHandler] ${err.name}: ${err.message}`, {
            error: {
                name: err.name,
                message: err.message,
                stack: err.stack,
                ...(err instanceof AppError && {
                    statusCode: err.statusCode,
                    isOperational: err.isOperational,
                }),
            },
            request: {
                method: req.method,
                url: req.originalUrl,
                ip: req.ip,
            },
        });

    if (res.headersSent) {
        logger.warn('[ErrorHandler] Headers already sent, cannot send error response.');
        return;
    }

    res.status(statusCode).json(body);
};

/** Maps any thrown value reaching the handler to a status and a `{kind, message}` body. */
export function toErrorResponse(err: Error): { statusCode: number; body: ErrorResponseBody } {
    if (err instanceof ReportRunError) {
        return { statusCode: err.statusCode, body: { kind: err.kind, message: err.message } };
    }
    if (err instanceof AppError && err.isOperational) {
        return { statusCode: err.statusCode, body: { kind: err.name, message: err.message } };
    }
    if (err instanceof multer.MulterError) {
        return { statusCode: 400, body: { kind: 'UploadError', message: `File upload error: ${err.message}` } };
    }

    const body: ErrorResponseBody = {
        kind: 'InternalError',
        message: 'An unexpected internal server error occurred.',
    };
    if (config.nodeEnv !== 'production') {
        body.stack = err.stack;
    }
    return { statusCode: 500, body };
}
