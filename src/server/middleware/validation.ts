import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema } from 'zod';
import { ValidationError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

export function formatZodIssues(error: ZodError): ValidationIssue[] {
    return error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
    }));
}

/**
 * Validation middleware factory
 * Validates the request body against a Zod schema and replaces it with the parsed value.
 * Failures become a ValidationError (422) handled by the centralized error handler.
 */
export function validateBody(schema: ZodSchema) {
    return (req: Request, _res: Response, next: NextFunction) => {
        try {
            req.body = schema.parse(req.body ?? {});
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                const details = formatZodIssues(error);
                logger.warn(
                    {
                        path: req.path,
                        method: req.method,
                        issues: details,
                    },
                    'Request validation failed'
                );
                next(new ValidationError('Validation failed', { details }));
            } else {
                next(error);
            }
        }
    };
}
