import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Validation middleware factory
 * Validates request body, query, or params against a Zod schema and replaces
 * them with the parsed values (defaults applied). Failures become a
 * BadRequestError so they go through centralized error handling.
 */
export interface ValidationSchema {
    body?: ZodSchema;
    query?: ZodSchema;
    params?: ZodSchema;
}

export function validate(schema: ValidationSchema) {
    return (req: Request, _res: Response, next: NextFunction) => {
        try {
            if (schema.body) {
                req.body = schema.body.parse(req.body);
            }
            if (schema.query) {
                req.query = schema.query.parse(req.query);
            }
            if (schema.params) {
                req.params = schema.params.parse(req.params);
            }
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                const details = error.issues.map((e) => ({
                    path: e.path.join('.'),
                    message: e.message,
                }));
                logger.warn({ path: req.path, method: req.method, issues: details }, 'Request validation failed');
                next(new BadRequestError('Validation failed', { details }));
            } else {
                next(error);
            }
        }
    };
}
