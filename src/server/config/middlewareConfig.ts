/**
 * Middleware Configuration
 *
 * Configures the Express middleware shared by both extraction services.
 */

import type { Express } from 'express';
import express from 'express';
import cors from 'cors';
import { requestIdMiddleware } from '../middleware/requestId.js';
import { securityHeadersMiddleware } from '../middleware/securityHeaders.js';
import { getCorsOptions } from './corsConfig.js';

export interface MiddlewareOptions {
  corsOrigins: string[];
  maxBodySize: string;
}

/**
 * Setup all application middleware
 */
export function setupMiddleware(app: Express, options: MiddlewareOptions): void {
  // Middleware order matters:

  // 1. Request ID and logging context - must be first
  app.use(requestIdMiddleware);

  // 2. Security headers - before CORS so preflight replies carry them too
  app.use(securityHeadersMiddleware);

  // 3. CORS
  app.use(cors(getCorsOptions(options.corsOrigins)));

  // 4. JSON body parsing - limit payload size
  app.use(express.json({ limit: options.maxBodySize }));
}
