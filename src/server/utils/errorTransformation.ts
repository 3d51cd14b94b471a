/**
 * Error transformation utilities
 * Converts thrown errors to the standardized ErrorResponse format
 */
import type { Request } from 'express';
import {
  ErrorResponse,
  PayloadTooLargeError,
  ValidationError,
  AppError,
  toAppError,
} from '../types/errors.js';

/**
 * Shape of errors raised by express.json() (body-parser)
 */
interface BodyParserError extends Error {
  type: string;
  status?: number;
  limit?: number;
}

export function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    error.type.startsWith('entity.')
  );
}

/**
 * Normalize body-parser failures into application errors:
 * malformed JSON is a validation failure, an oversized body is 413.
 */
export function normalizeError(error: unknown): AppError {
  if (isBodyParserError(error)) {
    if (error.type === 'entity.parse.failed') {
      return new ValidationError('Invalid JSON body', {
        details: [{ path: 'body', message: error.message }],
      });
    }
    if (error.type === 'entity.too.large') {
      return new PayloadTooLargeError(error.limit ?? 0, { unit: 'bytes' });
    }
  }
  return toAppError(error);
}

/**
 * Transform error to standardized error response
 */
export function transformErrorToResponse(
  error: unknown,
  req: Pick<Request, 'path'>,
  includeStack = false
): ErrorResponse {
  const appError = normalizeError(error);
  const message = appError.message || 'An unexpected error occurred';

  return {
    error: appError.isOperational ? message : 'Internal Server Error',
    code: appError.code,
    message,
    statusCode: appError.statusCode,
    timestamp: new Date().toISOString(),
    path: req.path,
    ...(appError.context && { context: appError.context }),
    ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
  };
}
