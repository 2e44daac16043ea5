import { logger } from './core/logger';
import { config } from './core/config';
import { describeError } from './core/errors';
import { createSyncWorker } from './workers/sync.worker';
import type { SyncWorker } from './workers/sync.worker.core';

export interface CliOptions {
  once: boolean;
  intervalMs: number;
}

/**
 * `--once` runs a single cycle; otherwise `--interval=<ms>` (or
 * SYNC_INTERVAL_MS) drives the loop. A bad interval falls back to config.
 */
export function parseCliArgs(args: readonly string[], defaultIntervalMs: number = config.SYNC_INTERVAL_MS): CliOptions {
  const once = args.includes('--once');
  const intervalArg = args.find(arg => arg.startsWith('--interval='));
  if (intervalArg === undefined) {
    return { once, intervalMs: defaultIntervalMs };
  }

  const raw = intervalArg.slice('--interval='.length);
  const parsed = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    logger.warn({ value: raw, fallback: defaultIntervalMs }, 'Invalid --interval value, using default');
    return { once, intervalMs: defaultIntervalMs };
  }

  return { once, intervalMs: parsed };
}

/**
 * Exit code for a one-shot run: 0 when the cycle completed, even with
 * per-item errors in the result
 */
export async function runSingleCycle(worker: SyncWorker): Promise<number> {
  const outcome = await worker.runOnce('manual');

  if (outcome.status === 'completed') {
    const { result } = outcome;
    logger.info({
      cycleId: result.cycleId,
      itemCount: result.itemCount,
      conflicts: result.conflicts.length,
      pushErrors: Object.keys(result.pushErrors).length,
      storageError: result.storageError,
    }, 'Sync completed');
    return result.storageError === undefined ? 0 : 1;
  }

  logger.error({ outcome }, 'Sync did not complete');
  return 1;
}

function runLoop(worker: SyncWorker, intervalMs: number): void {
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Stopping sync loop');
    await worker.stop();
    logger.info('Sync worker shutdown completed');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  worker.start(intervalMs);
  logger.info({ intervalMs }, 'Sync worker is running. Press Ctrl+C to stop.');
}

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  logger.info({ ...options, processId: process.pid }, 'Starting sync worker bootstrap');

  const worker = createSyncWorker();
  await worker.init();

  if (options.once) {
    process.exit(await runSingleCycle(worker));
  }

  runLoop(worker, options.intervalMs);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ error: describeError(error) }, 'Failed to start sync worker');
    process.exit(1);
  });
}
