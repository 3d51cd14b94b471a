/**
 * Request Governor
 *
 * Single admission decision per request: the rate limit is checked first,
 * then the bearer credential. Rate-limited clients never reach token
 * comparison. Also owns the sanitizer settings applied to textual fields
 * once a request has been admitted.
 */

import { timingSafeEqual } from 'crypto';
import { SlidingWindowRateLimiter } from './SlidingWindowRateLimiter.js';
import { sanitizeInputText, DEFAULT_MAX_TEXT_LENGTH } from './inputSanitizer.js';

export type RejectionReason =
  | 'rate_limited'
  | 'missing_credentials'
  | 'invalid_scheme'
  | 'invalid_token';

export type AdmissionDecision =
  | { outcome: 'admitted'; clientId: string }
  | { outcome: 'rejected'; reason: 'rate_limited'; clientId: string; retryAfterSeconds: number }
  | { outcome: 'rejected'; reason: Exclude<RejectionReason, 'rate_limited'>; clientId: string };

export interface AdmissionRequest {
  clientId: string;
  /** Raw Authorization header value, if any */
  authorization?: string;
}

export interface RequestGovernorOptions {
  apiToken: string;
  rateLimiter: SlidingWindowRateLimiter;
  maxTextLength?: number;
}

export interface AuthorizationParts {
  scheme: string;
  credential: string;
}

/**
 * Split an Authorization header at the first space into scheme and
 * credential. Either part is empty when the header does not supply it.
 */
export function parseAuthorization(authorization: string): AuthorizationParts {
  const trimmed = authorization.trim();
  const separator = trimmed.indexOf(' ');
  if (separator === -1) {
    return { scheme: trimmed, credential: '' };
  }
  return {
    scheme: trimmed.slice(0, separator),
    credential: trimmed.slice(separator + 1).trim(),
  };
}

function tokensMatch(provided: string, expected: string): boolean {
  const providedBuffer = Buffer.from(provided, 'utf8');
  const expectedBuffer = Buffer.from(expected, 'utf8');
  if (providedBuffer.length !== expectedBuffer.length) {
    return false;
  }
  return timingSafeEqual(providedBuffer, expectedBuffer);
}

export class RequestGovernor {
  private readonly apiToken: string;
  private readonly maxTextLength: number;
  readonly rateLimiter: SlidingWindowRateLimiter;

  constructor(options: RequestGovernorOptions) {
    if (!options.apiToken) {
      throw new Error('RequestGovernor requires a non-empty apiToken');
    }
    this.apiToken = options.apiToken;
    this.rateLimiter = options.rateLimiter;
    this.maxTextLength = options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH;
  }

  admit(request: AdmissionRequest): AdmissionDecision {
    const { clientId, authorization } = request;

    if (!this.rateLimiter.isAllowed(clientId)) {
      return {
        outcome: 'rejected',
        reason: 'rate_limited',
        clientId,
        retryAfterSeconds: this.rateLimiter.retryAfterSeconds(clientId),
      };
    }

    // A header without a credential counts as no credentials at all
    const { scheme, credential } = parseAuthorization(authorization ?? '');
    if (scheme === '' || credential === '') {
      return { outcome: 'rejected', reason: 'missing_credentials', clientId };
    }

    if (scheme.toLowerCase() !== 'bearer') {
      return { outcome: 'rejected', reason: 'invalid_scheme', clientId };
    }

    if (!tokensMatch(credential, this.apiToken)) {
      return { outcome: 'rejected', reason: 'invalid_token', clientId };
    }

    return { outcome: 'admitted', clientId };
  }

  sanitize(value: unknown): string {
    return sanitizeInputText(value, { maxLength: this.maxTextLength });
  }
}
