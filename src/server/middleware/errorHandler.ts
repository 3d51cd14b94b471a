import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { normalizeError, transformErrorToResponse } from '../utils/errorTransformation.js';
import { AuthenticationError, NotFoundError, RateLimitError } from '../types/errors.js';

/**
 * Fallback for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 *
 * This middleware:
 * - Transforms all errors to standardized ErrorResponse format
 * - Sets Retry-After / WWW-Authenticate where the error calls for it
 * - Logs operational errors at warn level and unexpected ones at error level
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const appError = normalizeError(err);

    if (appError.isOperational) {
        logger.warn({
            code: appError.code,
            statusCode: appError.statusCode,
            message: appError.message,
            path: req.path,
            method: req.method,
        }, 'Request failed');
    } else {
        logger.error({
            error: err,
            message: appError.message,
            stack: err instanceof Error ? err.stack : undefined,
            path: req.path,
            method: req.method,
        }, 'Unhandled error');
    }

    if (res.headersSent) {
        return;
    }

    if (appError instanceof RateLimitError) {
        res.setHeader('Retry-After', appError.retryAfter.toString());
    }
    if (appError instanceof AuthenticationError) {
        res.setHeader('WWW-Authenticate', 'Bearer');
    }

    const includeStack = process.env.NODE_ENV === 'development';
    const errorResponse = transformErrorToResponse(appError, req, includeStack);
    res.status(errorResponse.statusCode).json(errorResponse);
}
