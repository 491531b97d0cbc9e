// Process-level error handlers and graceful shutdown

import type { Server } from 'node:http';
import { logger } from '@/services/logger';
import { shutdownPipelineDeps } from '@/services/pipeline-deps';
import { errorMessage } from '@/utils/errors';

const SHUTDOWN_TIMEOUT_MS = 15_000;

let serverInstance: Server | null = null;
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // Production keeps serving; development exits for faster debugging.
    if (nodeEnv !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown_started', { reason });

  const forceExit = setTimeout(() => {
    logger.error('process:shutdown_timeout', { timeoutMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    if (serverInstance) {
      await closeServer(serverInstance);
      logger.info('process:http_closed');
    }
    await shutdownPipelineDeps();
    clearTimeout(forceExit);
    process.exit(exitCode);
  } catch (error: unknown) {
    logger.error('process:shutdown_failed', { error: errorMessage(error) });
    clearTimeout(forceExit);
    process.exit(1);
  }
}
