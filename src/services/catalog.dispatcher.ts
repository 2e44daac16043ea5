import { logger } from '../core/logger';
import { PushError } from '../core/errors';
import {
  PLATFORM_IDS,
  comparePlatforms,
  type CatalogItem,
  type CatalogMap,
  type PlatformId,
  type PushFailure,
  type SKU,
} from '../core/types';
import type { PushReceipt } from '../adapters/platform.adapter';
import { mapLimitSettled } from '../utils/mapLimit';
import { cloneCatalogItem } from './catalog.reconciler';

export interface PlatformPushStats {
  created: number;
  updated: number;
  errored: number;
  deferred: number;
}

export interface DispatchOptions {
  concurrency: number;
  // Platforms whose fetch succeeded this cycle; pushes to the others wait
  reachable: ReadonlySet<PlatformId>;
  // Keys left untouched this cycle, such as stale items nobody reported
  exclude?: ReadonlySet<SKU>;
  push: (platform: PlatformId, item: CatalogItem) => Promise<PushReceipt>;
}

export interface DispatchOutcome {
  platforms: Record<PlatformId, PlatformPushStats>;
  failures: Record<SKU, PushFailure[]>;
  attempted: number;
}

interface PushTask {
  key: SKU;
  platform: PlatformId;
  item: CatalogItem;
}

function emptyStats(): Record<PlatformId, PlatformPushStats> {
  return {
    A: { created: 0, updated: 0, errored: 0, deferred: 0 },
    B: { created: 0, updated: 0, errored: 0, deferred: 0 },
  };
}

function missingPlatforms(item: CatalogItem): PlatformId[] {
  return PLATFORM_IDS.filter((platform) => !item.sourcePlatforms.includes(platform));
}

/**
 * Push every Pending item to the platforms that lack it. Each item and
 * platform is attempted independently and exactly once; failures mark the
 * item Error and wait for the next cycle. Mutates the items of the given
 * map, which must be the one the current cycle is building.
 */
export async function dispatchPending(items: CatalogMap, options: DispatchOptions): Promise<DispatchOutcome> {
  const platforms = emptyStats();
  const failures: Record<SKU, PushFailure[]> = {};
  const tasks: PushTask[] = [];

  for (const [key, item] of items) {
    if (item.syncState !== 'Pending' || options.exclude?.has(key)) {
      continue;
    }

    for (const platform of missingPlatforms(item)) {
      if (!options.reachable.has(platform)) {
        platforms[platform].deferred++;
        continue;
      }
      // The adapter gets its own copy; results are applied after all settle
      tasks.push({ key, platform, item: cloneCatalogItem(item) });
    }
  }

  if (tasks.length === 0) {
    return { platforms, failures, attempted: 0 };
  }

  logger.info({ pushes: tasks.length, concurrency: options.concurrency }, 'Dispatching pending catalog items');

  const settled = await mapLimitSettled(tasks, options.concurrency, (task) =>
    options.push(task.platform, task.item)
  );

  const touched = new Set<SKU>();

  settled.forEach((result, index) => {
    const task = tasks[index];
    const item = task ? items.get(task.key) : undefined;
    if (!task || !item) {
      return;
    }
    touched.add(task.key);

    if (result.status === 'fulfilled') {
      platforms[task.platform][result.value.operation]++;
      if (!item.sourcePlatforms.includes(task.platform)) {
        item.sourcePlatforms = [...item.sourcePlatforms, task.platform].sort(comparePlatforms);
      }
      logger.debug({
        key: task.key,
        platform: task.platform,
        recordId: result.value.recordId,
        operation: result.value.operation,
      }, 'Catalog item pushed');
      return;
    }

    const error = PushError.fromCause(task.platform, task.key, result.reason);
    platforms[task.platform].errored++;
    (failures[task.key] ??= []).push({ platform: task.platform, reason: error.message });
    logger.warn({ key: task.key, platform: task.platform, error: error.message }, 'Catalog item push failed');
  });

  for (const key of touched) {
    const item = items.get(key);
    if (!item) {
      continue;
    }
    if (failures[key]) {
      item.syncState = 'Error';
    } else if (missingPlatforms(item).length === 0) {
      item.syncState = 'Synced';
    }
  }

  return { platforms, failures, attempted: tasks.length };
}
