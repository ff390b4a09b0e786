import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { NotFoundError, isAppError, toAppError, type ErrorResponse } from '../types/errors.js';

/**
 * Turn any thrown value into the standard error body
 */
export function transformErrorToResponse(error: unknown, req: Request, includeStack = false): ErrorResponse {
    const appError = toAppError(error);
    return {
        error: appError.name,
        code: appError.code,
        // internal failures keep their message out of responses
        message: appError.isOperational ? appError.message : 'An unexpected error occurred',
        statusCode: appError.statusCode,
        timestamp: new Date().toISOString(),
        path: req.path,
        ...(appError.isOperational && appError.context ? { context: appError.context } : {}),
        ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
    };
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof NotFoundError) {
        logger.info({ message: err.message, path: req.path, method: req.method }, 'Resource not found');
    } else if (isAppError(err) && err.isOperational) {
        logger.warn({ code: err.code, message: err.message, path: req.path, method: req.method }, 'Request failed');
    } else {
        logger.error(
            {
                error: err,
                message: err instanceof Error ? err.message : String(err),
                stack: err instanceof Error ? err.stack : undefined,
                path: req.path,
                method: req.method,
            },
            'Unhandled error'
        );
    }

    if (res.headersSent) {
        return;
    }

    const errorResponse = transformErrorToResponse(err, req, process.env.NODE_ENV === 'development');
    res.status(errorResponse.statusCode).json(errorResponse);
}

/**
 * 404 for routes nothing else matched
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
