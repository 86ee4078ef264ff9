// Process-level error handlers and graceful shutdown

import type { Server } from 'http';
import { logger } from '../services/logger';

let serverInstance: Server | null = null;

const SHUTDOWN_TIMEOUT_MS = 15000;

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/**
 * Unhandled rejections are logged; outside production the process exits so they get noticed.
 */
export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    if (nodeEnv !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { message: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      gracefulShutdown(signal, 0);
    });
  });
}

/**
 * Stop accepting connections, let in-flight runs finish, exit once closed or after the timeout.
 */
function gracefulShutdown(reason: string, exitCode: number): void {
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:shutdown_forced', { timeoutMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forced.unref();

  if (!serverInstance) {
    process.exit(exitCode);
    return;
  }

  serverInstance.close((err) => {
    if (err) {
      logger.error('process:shutdown_error', { message: err.message });
      process.exit(1);
    }
    logger.info('process:http_closed');
    process.exit(exitCode);
  });
}
