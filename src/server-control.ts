import type { Server } from 'http';
import { createApp } from './app';
import { logger } from './core/logger';
import { config, getConfigSummary } from './core/config';
import { fileSystemBulkhead } from './utils/bulkhead';
import type { SyncWorker } from './workers/sync.worker.core';

export interface ServerOptions {
  port?: number;
  // Serve the API without the recurring loop or the shutdown cycle
  apiOnly?: boolean;
  intervalMs?: number;
}

interface RunningServer {
  server: Server;
  worker: SyncWorker;
  apiOnly: boolean;
}

let running: RunningServer | null = null;
let isShuttingDown = false;

/**
 * Load the persisted catalog, start listening and, unless API-only, start
 * the sync loop
 */
export async function startServer(worker: SyncWorker, options: ServerOptions = {}): Promise<Server> {
  if (running) {
    throw new Error('Server is already started');
  }

  const port = options.port ?? config.PORT;
  const apiOnly = options.apiOnly ?? false;

  logger.info({ config: getConfigSummary() }, 'Configuration loaded');
  await worker.init();

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = createApp(worker).listen(port, () => resolve(listening));
    listening.once('error', reject);
  });

  running = { server, worker, apiOnly };
  logger.info({ port, apiOnly }, 'Server listening');

  if (!apiOnly) {
    worker.start(options.intervalMs ?? config.SYNC_INTERVAL_MS);
  }

  return server;
}

async function drainFileSystem(maxWaitMs = 10000, checkIntervalMs = 100): Promise<void> {
  const startTime = Date.now();

  while (!fileSystemBulkhead.isIdle()) {
    if (Date.now() - startTime >= maxWaitMs) {
      logger.warn({ bulkhead: fileSystemBulkhead.getStats() }, 'Filesystem drain timeout reached');
      return;
    }
    await new Promise(resolve => setTimeout(resolve, checkIntervalMs));
  }
}

/**
 * Stop accepting requests, let the running cycle finish, then run one last
 * cycle so the durable catalog reflects the latest platform state
 */
export async function stopServer(): Promise<void> {
  const current = running;
  if (!current || isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  logger.info('Starting graceful shutdown');

  try {
    await new Promise<void>((resolve, reject) => {
      current.server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('Server stopped accepting new connections');

    await current.worker.stop();

    if (!current.apiOnly) {
      const outcome = await current.worker.runOnce('shutdown');
      logger.info({ status: outcome.status }, 'Final sync cycle finished');
    }

    await drainFileSystem();
    logger.info('Graceful shutdown completed');
  } finally {
    running = null;
    isShuttingDown = false;
  }
}

export function isServerRunning(): boolean {
  return running !== null && !isShuttingDown;
}

export function isServerShuttingDown(): boolean {
  return isShuttingDown;
}
