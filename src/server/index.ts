import { getEnv, type Env } from './config/env.js';
import { createApp } from './app.js';
import {
  createHttpServerInstance,
  registerShutdownHandlers,
  setupServerEventHandlers,
  startServerListening,
} from './config/serverStartup.js';
import { getShutdownCoordinator } from './utils/shutdownCoordinator.js';
import { logger } from './utils/logger.js';

const startupStartTime = Date.now();

function loadEnv(): Env {
  try {
    return getEnv();
  } catch (error) {
    logger.fatal({ error }, 'Invalid environment configuration');
    process.exit(1);
  }
}

const env = loadEnv();

const { app, mode } = createApp({ env });
const httpServer = createHttpServerInstance(app);
const shutdownCoordinator = getShutdownCoordinator();

registerShutdownHandlers(httpServer, shutdownCoordinator);
setupServerEventHandlers(httpServer, env.PORT, mode, startupStartTime);

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdownCoordinator.shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error, signal }, 'Shutdown failed');
        process.exit(1);
      });
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

startServerListening(httpServer, env.PORT, env.HOST);
