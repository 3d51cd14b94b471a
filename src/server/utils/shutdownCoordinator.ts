import { logger } from './logger.js';

type ShutdownHandler = () => Promise<void> | void;

interface CleanupOperation {
  name: string;
  handler: ShutdownHandler;
  timeout?: number;
}

export interface ShutdownCoordinatorOptions {
  /** Overall deadline before the process is forced to exit */
  shutdownTimeoutMs?: number;
  /** Invoked when the overall deadline passes; defaults to `process.exit(1)` */
  onTimeout?: () => void;
}

/**
 * Runs registered cleanup operations in registration order when the
 * process is asked to stop. A failing or slow operation is logged and
 * the remaining operations still run.
 */
export class ShutdownCoordinator {
  private readonly cleanupOperations: CleanupOperation[] = [];
  private shuttingDown = false;
  private readonly shutdownTimeoutMs: number;
  private readonly onTimeout: () => void;

  constructor(options: ShutdownCoordinatorOptions = {}) {
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 30000;
    this.onTimeout = options.onTimeout ?? (() => process.exit(1));
  }

  register(name: string, handler: ShutdownHandler, timeout?: number): void {
    this.cleanupOperations.push({ name, handler, timeout });
  }

  /**
   * Execute all registered cleanup operations in order.
   * A second call while a shutdown is running returns immediately.
   */
  async shutdown(signal?: string): Promise<void> {
    if (this.shuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return;
    }

    this.shuttingDown = true;
    logger.info({ signal, operationsCount: this.cleanupOperations.length }, 'Starting graceful shutdown');

    const deadline = setTimeout(() => {
      logger.error({ reason: 'timeout' }, 'Graceful shutdown timeout, forcing exit');
      this.onTimeout();
    }, this.shutdownTimeoutMs);

    try {
      for (const operation of this.cleanupOperations) {
        await this.executeOperation(operation);
      }
      logger.info('Graceful shutdown completed successfully');
    } finally {
      clearTimeout(deadline);
    }
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  private async executeOperation(operation: CleanupOperation): Promise<void> {
    const { name, handler, timeout } = operation;
    let timer: NodeJS.Timeout | undefined;

    try {
      if (timeout) {
        await Promise.race([
          Promise.resolve(handler()),
          new Promise<void>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Operation ${name} timed out after ${timeout}ms`)), timeout);
          }),
        ]);
      } else {
        await Promise.resolve(handler());
      }
      logger.debug({ operation: name }, 'Cleanup operation completed');
    } catch (error) {
      logger.error({ error, operation: name }, 'Error during cleanup operation (continuing with shutdown)');
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }
}

let shutdownCoordinatorInstance: ShutdownCoordinator | null = null;

/**
 * Get or create the shutdown coordinator singleton
 */
export function getShutdownCoordinator(): ShutdownCoordinator {
  if (!shutdownCoordinatorInstance) {
    shutdownCoordinatorInstance = new ShutdownCoordinator();
  }
  return shutdownCoordinatorInstance;
}
