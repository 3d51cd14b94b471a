import { describe, it, expect } from 'vitest';
import { isBodyParserError, normalizeError, transformErrorToResponse } from './errorTransformation.js';
import {
  AppError,
  ErrorCode,
  ExtractionError,
  PayloadTooLargeError,
  RateLimitError,
  ValidationError,
} from '../types/errors.js';

function bodyParserError(type: string, extra: Record<string, unknown> = {}): Error {
  return Object.assign(new Error('body-parser failure'), { type, ...extra });
}

describe('normalizeError', () => {
  it('maps malformed JSON to a validation error', () => {
    const error = normalizeError(bodyParserError('entity.parse.failed', { status: 400 }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.statusCode).toBe(422);
    expect(error.message).toBe('Invalid JSON body');
  });

  it('maps an oversized body to 413', () => {
    const error = normalizeError(bodyParserError('entity.too.large', { limit: 1024 }));
    expect(error).toBeInstanceOf(PayloadTooLargeError);
    expect(error.statusCode).toBe(413);
    expect(error.context).toEqual({ maxLength: 1024, unit: 'bytes' });
  });

  it('passes application errors through and wraps everything else', () => {
    const rateLimited = new RateLimitError(30);
    expect(normalizeError(rateLimited)).toBe(rateLimited);

    const wrapped = normalizeError(new Error('boom'));
    expect(wrapped).toBeInstanceOf(AppError);
    expect(wrapped.code).toBe(ErrorCode.INTERNAL_SERVER_ERROR);
    expect(wrapped.isOperational).toBe(false);
  });

  it('only treats entity.* errors as body-parser errors', () => {
    expect(isBodyParserError(bodyParserError('entity.verify.failed'))).toBe(true);
    expect(isBodyParserError(bodyParserError('other'))).toBe(false);
    expect(isBodyParserError('entity.parse.failed')).toBe(false);
  });
});

describe('transformErrorToResponse', () => {
  it('builds the standard error body for operational errors', () => {
    const response = transformErrorToResponse(new RateLimitError(12), { path: '/extract' });
    expect(response).toMatchObject({
      error: 'Rate limit exceeded. Please try again later.',
      code: 'RATE_LIMIT_EXCEEDED',
      message: 'Rate limit exceeded. Please try again later.',
      statusCode: 429,
      path: '/extract',
      context: { retryAfter: 12 },
    });
    expect(Number.isNaN(Date.parse(response.timestamp))).toBe(false);
    expect(response.stack).toBeUndefined();
  });

  it('hides the error label of unexpected failures', () => {
    const response = transformErrorToResponse(new ExtractionError('regex failure'), { path: '/extract' });
    expect(response.error).toBe('Internal Server Error');
    expect(response.message).toBe('Extraction failed: regex failure');
    expect(response.statusCode).toBe(500);
  });

  it('includes the stack only when asked', () => {
    const response = transformErrorToResponse(new Error('boom'), { path: '/' }, true);
    expect(typeof response.stack).toBe('string');
  });
});
