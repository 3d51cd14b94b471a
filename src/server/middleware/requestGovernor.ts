import { Request, Response, NextFunction } from 'express';
import type { RequestGovernor, AdmissionDecision } from '../security/RequestGovernor.js';
import { getClientIp } from '../security/clientIdentifier.js';
import {
  AppError,
  AuthenticationError,
  AuthorizationError,
  RateLimitError,
} from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Map a rejected admission decision to the error sent to the client
 */
export function rejectionToError(decision: Exclude<AdmissionDecision, { outcome: 'admitted' }>): AppError {
  switch (decision.reason) {
    case 'rate_limited':
      return new RateLimitError(decision.retryAfterSeconds);
    case 'missing_credentials':
      return new AuthorizationError('Not authenticated');
    case 'invalid_scheme':
      return new AuthorizationError('Invalid authentication credentials');
    case 'invalid_token':
      return new AuthenticationError('Invalid authentication token');
  }
}

/**
 * Admission gate for protected routes: rate limit first, then bearer token.
 * Rejections are forwarded to the error handler.
 */
export function requestGovernorMiddleware(governor: RequestGovernor) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const decision = governor.admit({
      clientId: getClientIp(req),
      authorization: req.headers.authorization,
    });

    if (decision.outcome === 'admitted') {
      next();
      return;
    }

    logger.warn({
      path: req.path,
      clientId: decision.clientId,
      reason: decision.reason,
    }, 'Request rejected by governor');

    next(rejectionToError(decision));
  };
}
