import { startServer, stopServer } from './server-control';
import { logger } from './core/logger';
import { config } from './core/config';
import { describeError } from './core/errors';
import { createSyncWorker } from './workers/sync.worker';

const isApiOnly = process.argv.includes('--api-only');

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutdown signal received');

  try {
    await stopServer();
    process.exit(0);
  } catch (error) {
    logger.error({ error: describeError(error) }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

startServer(createSyncWorker(), { port: config.PORT, apiOnly: isApiOnly }).catch((error: unknown) => {
  logger.error({ error: describeError(error) }, 'Failed to start server');
  process.exit(1);
});

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception, shutting down');
  void gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error({ reason: describeError(reason) }, 'Unhandled promise rejection, shutting down');
  void gracefulShutdown('unhandledRejection');
});
