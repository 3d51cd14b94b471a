/**
 * Server Startup Configuration
 *
 * HTTP server creation, event handlers, shutdown registration and listening.
 */

import type { Express } from 'express';
import type { Server } from 'http';
import { createServer as createHttpServer } from 'http';
import { logger } from '../utils/logger.js';
import type { ShutdownCoordinator } from '../utils/shutdownCoordinator.js';
import type { ServiceMode } from './env.js';

/**
 * Create and configure HTTP server
 */
export function createHttpServerInstance(app: Express): Server {
  const httpServer = createHttpServer(app);

  // keepAliveTimeout must exceed requestTimeout so connections are not closed mid-request
  httpServer.headersTimeout = 60000;
  httpServer.requestTimeout = 120000;
  httpServer.keepAliveTimeout = 125000;
  httpServer.maxRequestsPerSocket = 100;

  logger.debug({
    headersTimeout: httpServer.headersTimeout,
    requestTimeout: httpServer.requestTimeout,
    keepAliveTimeout: httpServer.keepAliveTimeout,
    maxRequestsPerSocket: httpServer.maxRequestsPerSocket,
  }, 'HTTP server timeout settings configured');

  return httpServer;
}

/**
 * Register cleanup operations for the HTTP server
 */
export function registerShutdownHandlers(httpServer: Server, coordinator: ShutdownCoordinator): void {
  // Stop accepting new requests first
  coordinator.register('HTTP Server', () => new Promise<void>((resolve, reject) => {
    httpServer.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      logger.info('HTTP server closed');
      resolve();
    });
    httpServer.closeIdleConnections();
  }), 5000);
}

/**
 * Setup HTTP server event handlers
 */
export function setupServerEventHandlers(
  httpServer: Server,
  port: number,
  mode: ServiceMode,
  startupStartTime: number
): void {
  httpServer.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.fatal({ port, error: error.message }, 'Port already in use');
      process.exit(1);
    } else {
      logger.error({ error }, 'HTTP server error');
    }
  });

  httpServer.on('connection', (socket) => {
    const socketId = `${socket.remoteAddress}:${socket.remotePort}`;

    socket.on('error', (error: NodeJS.ErrnoException) => {
      // Client disconnections are normal
      if (error.code !== 'ECONNRESET' && error.code !== 'EPIPE' && error.code !== 'ETIMEDOUT') {
        logger.warn({ error: error.message, code: error.code, socketId }, 'Socket error on connection');
      } else {
        logger.debug({ error: error.message, code: error.code, socketId }, 'Client disconnected (normal)');
      }
    });
  });

  httpServer.on('listening', () => {
    const address = httpServer.address();
    logger.info({
      mode,
      port,
      address: typeof address === 'string' ? address : `${address?.address}:${address?.port}`,
      startupDurationMs: Date.now() - startupStartTime,
      docs: `http://localhost:${port}/docs`,
    }, 'Server started successfully and listening');
  });
}

/**
 * Start HTTP server listening
 */
export function startServerListening(httpServer: Server, port: number, host: string): void {
  logger.info({ port, host }, 'Starting Express server');
  httpServer.listen(port, host);
}
