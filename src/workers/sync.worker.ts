import { config } from '../core/config';
import { JsonFilePlatformAdapter } from '../adapters/file.adapter';
import { CatalogRepository } from '../repositories/catalog.repo';
import { SyncWorker } from './sync.worker.core';

/**
 * Worker wired from the environment: file-backed platform stand-ins and the
 * catalog file under DATA_DIR
 */
export function createSyncWorker(): SyncWorker {
  return new SyncWorker({
    adapters: {
      A: new JsonFilePlatformAdapter('A', config.PLATFORM_A_FILE),
      B: new JsonFilePlatformAdapter('B', config.PLATFORM_B_FILE),
    },
    store: new CatalogRepository(config.CATALOG_FILE),
    pushConcurrency: config.PUSH_CONCURRENCY,
    platformTimeoutMs: config.PLATFORM_TIMEOUT_MS,
    lowStockThreshold: config.LOW_STOCK_THRESHOLD,
  });
}
