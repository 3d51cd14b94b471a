/**
 * CORS Configuration
 *
 * Origins come from CORS_ORIGINS (comma-separated); `*` allows any origin.
 */
import type { CorsOptions } from 'cors';
import { logger } from '../utils/logger.js';

/**
 * Check if an origin is allowed
 */
export function isOriginAllowed(origin: string | undefined, allowedOrigins: string[]): boolean {
  // Allow requests with no origin (curl, server-to-server, etc.)
  if (!origin) {
    return true;
  }

  return allowedOrigins.includes('*') || allowedOrigins.includes(origin);
}

/**
 * Get CORS configuration options
 */
export function getCorsOptions(allowedOrigins: string[]): CorsOptions {
  logger.debug({ allowedOrigins }, 'CORS: Configured allowed origins');

  return {
    origin: (origin, callback) => {
      if (isOriginAllowed(origin, allowedOrigins)) {
        callback(null, true);
        return;
      }
      logger.warn({ origin, allowedOrigins }, 'CORS: Origin not allowed');
      callback(null, false);
    },
    credentials: true,
    optionsSuccessStatus: 200,
    methods: ['GET', 'POST', 'OPTIONS'],
  };
}
