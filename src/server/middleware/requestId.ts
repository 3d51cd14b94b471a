import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger } from '../utils/logger.js';
import { getClientIp } from '../security/clientIdentifier.js';

/**
 * Middleware to generate and attach request ID to each request
 * Also sets up async context for logging
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const headerId = req.headers['x-request-id'];
  const requestId = typeof headerId === 'string' && headerId.length > 0 ? headerId : randomUUID();

  res.setHeader('X-Request-ID', requestId);

  const context: Record<string, unknown> = {
    requestId,
    method: req.method,
    path: req.path,
    ip: getClientIp(req),
  };

  const startTime = Date.now();
  res.on('finish', () => {
    logger.info({
      ...context,
      status: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
    }, 'Request completed');
  });

  requestContext.run(context, () => {
    logger.debug(context, 'Incoming request');
    next();
  });
}
