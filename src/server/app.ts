import express, { type Express } from 'express';
import { getEnv, type Env, type ServiceMode } from './config/env.js';
import { setupMiddleware } from './config/middlewareConfig.js';
import { setupHealthCheckRoutes } from './config/healthCheckRoutes.js';
import { setupOpenApiConfig } from './config/openApiConfig.js';
import { createTextExtractionRouter } from './routes/textExtractionRoutes.js';
import { createSheetsExtractionRouter } from './routes/sheetsExtractionRoutes.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { RequestGovernor } from './security/RequestGovernor.js';
import { SlidingWindowRateLimiter } from './security/SlidingWindowRateLimiter.js';

export interface CreateAppOptions {
  /** Defaults to SERVICE_MODE */
  mode?: ServiceMode;
  env?: Env;
  /** Injected so tests can drive the clock or share state */
  rateLimiter?: SlidingWindowRateLimiter;
}

export interface ExtractionApp {
  app: Express;
  mode: ServiceMode;
  governor: RequestGovernor;
}

/**
 * Build the Express application for one service variant. Each call owns
 * its own rate limiter unless one is passed in.
 */
export function createApp(options: CreateAppOptions = {}): ExtractionApp {
  const env = options.env ?? getEnv();
  const mode = options.mode ?? env.SERVICE_MODE;

  const rateLimiter = options.rateLimiter ?? new SlidingWindowRateLimiter({
    maxRequests: env.RATE_LIMIT_REQUESTS,
    windowSeconds: env.RATE_LIMIT_WINDOW,
  });
  const governor = new RequestGovernor({
    apiToken: env.API_TOKEN,
    rateLimiter,
    maxTextLength: env.MAX_REQUEST_SIZE,
  });

  const app = express();
  app.disable('x-powered-by');

  setupMiddleware(app, {
    corsOrigins: env.CORS_ORIGINS,
    maxBodySize: env.MAX_BODY_SIZE,
  });

  setupHealthCheckRoutes(app);
  setupOpenApiConfig(app, mode);

  app.use(mode === 'sheets'
    ? createSheetsExtractionRouter(governor)
    : createTextExtractionRouter(governor));

  // 404 then error handler - must be last
  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, mode, governor };
}
