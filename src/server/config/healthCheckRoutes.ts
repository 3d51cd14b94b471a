/**
 * Health Check Routes
 *
 * Unauthenticated liveness endpoints, served at `/` and `/health`.
 */

import type { Express, Request, Response } from 'express';

export const API_VERSION = '1.0.0';

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  version: string;
}

function healthHandler(_req: Request, res: Response): void {
  const body: HealthResponse = {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    version: API_VERSION,
  };
  res.json(body);
}

/**
 * Setup health check routes
 */
export function setupHealthCheckRoutes(app: Express): void {
  app.get('/', healthHandler);
  app.get('/health', healthHandler);
}
