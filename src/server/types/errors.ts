/**
 * Centralized error type definitions for the extraction service
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Authentication & Authorization
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  AUTHORIZATION_ERROR = 'AUTHORIZATION_ERROR',

  // Client errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',

  // Server errors
  EXTRACTION_ERROR = 'EXTRACTION_ERROR',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

/**
 * Request body failed schema validation (422)
 */
export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed', context?: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION_ERROR, 422, true, context);
  }
}

/**
 * Text handed to the sanitizer was empty or not a string
 */
export class InvalidInputError extends AppError {
  constructor(message: string = 'Text input is required and must be a string', context?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_INPUT, 422, true, context);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(maxLength: number, context?: Record<string, unknown>) {
    super(
      `Text input too large. Maximum ${maxLength} characters allowed.`,
      ErrorCode.PAYLOAD_TOO_LARGE,
      413,
      true,
      { maxLength, ...context }
    );
  }
}

/**
 * Credential presented but rejected (401)
 */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Invalid authentication token', context?: Record<string, unknown>) {
    super(message, ErrorCode.AUTHENTICATION_ERROR, 401, true, context);
  }
}

/**
 * No usable credential presented (403)
 */
export class AuthorizationError extends AppError {
  constructor(message: string = 'Not authenticated', context?: Record<string, unknown>) {
    super(message, ErrorCode.AUTHORIZATION_ERROR, 403, true, context);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(
      identifier ? `${resource} '${identifier}' not found` : `${resource} not found`,
      ErrorCode.NOT_FOUND,
      404,
      true,
      { resource, identifier }
    );
  }
}

export class RateLimitError extends AppError {
  public readonly retryAfter: number;

  constructor(retryAfter: number, message: string = 'Rate limit exceeded. Please try again later.') {
    super(message, ErrorCode.RATE_LIMIT_EXCEEDED, 429, true, { retryAfter });
    this.retryAfter = retryAfter;
  }
}

/**
 * Unexpected failure while running extraction rules
 */
export class ExtractionError extends AppError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Extraction failed: ${reason}`, ErrorCode.EXTRACTION_ERROR, 500, false, context);
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
  stack?: string; // Only in development
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}
