import { v4 as uuidv4 } from 'uuid';
import { logger } from '../core/logger';
import { config } from '../core/config';
import { FetchError, StorageError, describeError } from '../core/errors';
import {
  PLATFORM_IDS,
  type CatalogCandidate,
  type CatalogItem,
  type CatalogMap,
  type CatalogSnapshot,
  type CycleTrigger,
  type InventoryAlert,
  type NormalizationIssue,
  type PlatformCycleStats,
  type PlatformId,
  type PushFailure,
  type SKU,
  type SyncCycleResult,
} from '../core/types';
import type { PlatformAdapters, PushReceipt } from '../adapters/platform.adapter';
import type { CatalogStore } from '../repositories/catalog.repo';
import { normalizeSnapshot } from '../services/catalog.normalizer';
import { cloneCatalogItem, reconcile } from '../services/catalog.reconciler';
import { dispatchPending } from '../services/catalog.dispatcher';
import { lowStockAlerts } from '../services/catalog.analytics';
import { CircuitBreaker } from '../utils/circuitBreaker';
import { metrics, incrementCyclesSkipped } from '../utils/metrics';
import { SyncWorkerState } from './sync.worker.state';
import type { PublishedState, RunOutcome, SyncWorkerStatus } from './sync.worker.types';

export interface SyncWorkerOptions {
  adapters: PlatformAdapters;
  store: CatalogStore;
  pushConcurrency?: number;
  platformTimeoutMs?: number;
  breakerThreshold?: number;
  breakerCooldownMs?: number;
  lowStockThreshold?: number;
  clock?: () => Date;
}

interface PlatformBreakers {
  fetch: CircuitBreaker;
  push: CircuitBreaker;
}

interface FetchOutcome {
  platform: PlatformId;
  records: readonly unknown[];
  error?: string;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function freezeCatalog(items: CatalogMap): CatalogSnapshot {
  const frozen = new Map<SKU, Readonly<CatalogItem>>();
  for (const [key, item] of items) {
    frozen.set(key, deepFreeze(cloneCatalogItem(item)));
  }
  return frozen;
}

function emptyPlatformStats(): PlatformCycleStats {
  return {
    fetched: 0,
    normalized: 0,
    normalizationErrors: 0,
    duplicates: 0,
    created: 0,
    updated: 0,
    errored: 0,
    deferred: 0,
  };
}

/**
 * Owns the reconciliation cycle: the run guard, the recurring loop and the
 * single published snapshot that readers see.
 */
export class SyncWorker {
  private readonly adapters: PlatformAdapters;
  private readonly store: CatalogStore;
  private readonly pushConcurrency: number;
  private readonly lowStockThreshold: number;
  private readonly clock: () => Date;
  private readonly breakers: Record<PlatformId, PlatformBreakers>;
  private readonly state = new SyncWorkerState();
  private published: PublishedState = { snapshot: new Map(), lastResult: null };
  private initialized: Promise<void> | null = null;
  private inFlight: Promise<RunOutcome> | null = null;

  constructor(options: SyncWorkerOptions) {
    this.adapters = options.adapters;
    this.store = options.store;
    this.pushConcurrency = options.pushConcurrency ?? config.PUSH_CONCURRENCY;
    this.lowStockThreshold = options.lowStockThreshold ?? config.LOW_STOCK_THRESHOLD;
    this.clock = options.clock ?? (() => new Date());

    const breakerFor = (name: string): CircuitBreaker =>
      new CircuitBreaker({
        name,
        failureThreshold: options.breakerThreshold ?? config.BREAKER_THRESHOLD,
        cooldownMs: options.breakerCooldownMs ?? config.BREAKER_COOLDOWN_MS,
        timeoutMs: options.platformTimeoutMs ?? config.PLATFORM_TIMEOUT_MS,
      });

    this.breakers = {
      A: { fetch: breakerFor('platform-A-fetch'), push: breakerFor('platform-A-push') },
      B: { fetch: breakerFor('platform-B-fetch'), push: breakerFor('platform-B-push') },
    };
  }

  /**
   * Publish the persisted catalog as the starting snapshot. Safe to call
   * more than once; the first cycle calls it if nobody has.
   */
  init(): Promise<void> {
    this.initialized ??= this.loadPersisted().catch((error: unknown) => {
      this.initialized = null;
      throw error;
    });
    return this.initialized;
  }

  private async loadPersisted(): Promise<void> {
    const items = await this.store.load();
    if (this.published.lastResult === null && this.published.snapshot.size === 0) {
      this.published = { snapshot: freezeCatalog(items), lastResult: null };
    }
    logger.info({ itemCount: items.size }, 'Sync worker initialized');
  }

  /**
   * Run one cycle now. Resolves with `skipped` when a cycle is already
   * running; per-platform and per-item failures land in the result.
   */
  runOnce(trigger: CycleTrigger = 'manual'): Promise<RunOutcome> {
    const startedAt = this.clock();
    if (!this.state.tryBeginCycle(startedAt)) {
      incrementCyclesSkipped();
      logger.info({ trigger }, 'Sync cycle skipped, another cycle is running');
      return Promise.resolve({ status: 'skipped', reason: 'already-running' });
    }

    const run = this.runGuarded(trigger, startedAt);
    this.inFlight = run;
    void run.finally(() => {
      if (this.inFlight === run) {
        this.inFlight = null;
      }
    });
    return run;
  }

  private async runGuarded(trigger: CycleTrigger, startedAt: Date): Promise<RunOutcome> {
    try {
      const result = await this.executeCycle(trigger, startedAt);
      this.state.endCycle(this.clock());
      if (result.storageError) {
        this.state.noteError(result.storageError);
      }
      metrics.increment('cyclesCompleted');
      return { status: 'completed', result };
    } catch (error) {
      const message = describeError(error);
      this.state.endCycle(this.clock(), message);
      metrics.increment('cyclesFailed');
      logger.error({ trigger, error: message }, 'Sync cycle failed unexpectedly');
      return { status: 'failed', error: message };
    }
  }

  /**
   * Start the recurring loop. Returns false if it is already running.
   */
  start(intervalMs: number = config.SYNC_INTERVAL_MS): boolean {
    return this.state.startLoop(intervalMs, async () => {
      await this.runOnce('scheduled');
    });
  }

  /**
   * Stop the loop and wait for a cycle already in progress
   */
  async stop(): Promise<void> {
    this.state.stopLoop();
    const running = this.inFlight;
    if (running) {
      logger.info('Waiting for in-flight sync cycle to finish');
      await running;
    }
  }

  isLooping(): boolean {
    return this.state.isLooping();
  }

  getSnapshot(): CatalogSnapshot {
    return this.published.snapshot;
  }

  getLastResult(): SyncCycleResult | null {
    return this.published.lastResult;
  }

  getLowStockThreshold(): number {
    return this.lowStockThreshold;
  }

  lowStockAlerts(
    threshold: number = this.lowStockThreshold,
    overrides?: Readonly<Record<SKU, number>>
  ): InventoryAlert[] {
    return lowStockAlerts(this.published.snapshot, threshold, overrides);
  }

  getStatus(): SyncWorkerStatus {
    return {
      ...this.state.snapshot(),
      itemCount: this.published.snapshot.size,
      breakers: PLATFORM_IDS.flatMap((platform) => [
        this.breakers[platform].fetch.getStats(),
        this.breakers[platform].push.getStats(),
      ]),
    };
  }

  private async fetchPlatform(platform: PlatformId): Promise<FetchOutcome> {
    try {
      const records = await this.breakers[platform].fetch.execute(() => this.adapters[platform].fetchAll());
      if (!Array.isArray(records)) {
        throw FetchError.invalidPayload(platform);
      }
      return { platform, records };
    } catch (error) {
      const fetchError = error instanceof FetchError ? error : FetchError.fromCause(platform, error);
      metrics.increment('fetchFailures');
      logger.warn({ platform, error: fetchError.message }, 'Platform fetch failed, no candidates this cycle');
      return { platform, records: [], error: fetchError.message };
    }
  }

  private push(platform: PlatformId, item: CatalogItem): Promise<PushReceipt> {
    return this.breakers[platform].push.execute(() => this.adapters[platform].createOrUpdate(item));
  }

  /**
   * Error items carried over without a fresh report keep their earlier
   * reasons so every Error item has one in the result.
   */
  private carriedPushErrors(items: CatalogMap, staleKeys: readonly SKU[]): Record<SKU, PushFailure[]> {
    const carried: Record<SKU, PushFailure[]> = {};
    const earlier = this.published.lastResult?.pushErrors ?? {};

    for (const key of staleKeys) {
      const item = items.get(key);
      if (!item || item.syncState !== 'Error') {
        continue;
      }

      const previous = earlier[key];
      if (previous && previous.length > 0) {
        carried[key] = previous.map((failure) => ({ ...failure }));
        continue;
      }

      const missing = PLATFORM_IDS.filter((platform) => !item.sourcePlatforms.includes(platform));
      carried[key] = (missing.length > 0 ? missing : [...PLATFORM_IDS]).map((platform) => ({
        platform,
        reason: `Push of ${key} to platform ${platform} failed in an earlier cycle`,
      }));
    }

    return carried;
  }

  private async executeCycle(trigger: CycleTrigger, startedAt: Date): Promise<SyncCycleResult> {
    await this.init();

    const cycleId = uuidv4();
    const previous = this.published.snapshot;
    logger.info({ cycleId, trigger, previousItems: previous.size }, 'Sync cycle started');

    const fetched = await Promise.all(PLATFORM_IDS.map((platform) => this.fetchPlatform(platform)));

    const platforms: Record<PlatformId, PlatformCycleStats> = {
      A: emptyPlatformStats(),
      B: emptyPlatformStats(),
    };
    const reachable = new Set<PlatformId>();
    const candidates: CatalogCandidate[] = [];
    const normalizationErrors: NormalizationIssue[] = [];

    for (const outcome of fetched) {
      const stats = platforms[outcome.platform];
      if (outcome.error !== undefined) {
        stats.fetchError = outcome.error;
        continue;
      }

      reachable.add(outcome.platform);
      const normalized = normalizeSnapshot(outcome.platform, outcome.records);
      stats.fetched = outcome.records.length;
      stats.normalized = normalized.candidates.length;
      stats.normalizationErrors = normalized.errors.length;
      candidates.push(...normalized.candidates);
      normalizationErrors.push(...normalized.errors);
    }

    const reconciled = reconcile({ candidates, previous, now: startedAt, reachable });
    for (const duplicate of reconciled.duplicates) {
      platforms[duplicate.platform].duplicates++;
    }

    const dispatched = await dispatchPending(reconciled.items, {
      concurrency: this.pushConcurrency,
      reachable,
      exclude: new Set(reconciled.staleKeys),
      push: (platform, item) => this.push(platform, item),
    });

    for (const platform of PLATFORM_IDS) {
      const pushStats = dispatched.platforms[platform];
      platforms[platform].created = pushStats.created;
      platforms[platform].updated = pushStats.updated;
      platforms[platform].errored = pushStats.errored;
      platforms[platform].deferred = pushStats.deferred;
    }

    const pushErrors = {
      ...this.carriedPushErrors(reconciled.items, reconciled.staleKeys),
      ...dispatched.failures,
    };

    const snapshot = freezeCatalog(reconciled.items);

    let storageError: string | undefined;
    try {
      await this.store.save(snapshot, startedAt);
    } catch (error) {
      storageError = error instanceof StorageError ? error.message : describeError(error);
      metrics.increment('storageFailures');
      logger.error({ cycleId, error: storageError }, 'Catalog save failed, durable copy is stale');
    }

    let pending = 0;
    let synced = 0;
    let errored = 0;
    for (const item of snapshot.values()) {
      if (item.syncState === 'Pending') pending++;
      else if (item.syncState === 'Synced') synced++;
      else errored++;
    }

    const finishedAt = this.clock();
    const result: SyncCycleResult = deepFreeze({
      cycleId,
      trigger,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      platforms,
      canonical: {
        total: snapshot.size,
        created: reconciled.changes.created.length,
        updated: reconciled.changes.updated.length,
        unchanged: reconciled.changes.unchanged.length,
        stale: reconciled.staleKeys.length,
        pending,
        synced,
        errored,
      },
      conflicts: reconciled.conflicts,
      normalizationErrors,
      duplicates: reconciled.duplicates,
      staleKeys: reconciled.staleKeys,
      pushErrors,
      ...(storageError !== undefined ? { storageError } : {}),
      itemCount: snapshot.size,
    });

    // Snapshot and result swap together
    this.published = { snapshot, lastResult: result };

    metrics.increment('normalizationErrors', normalizationErrors.length);
    metrics.increment('conflicts', reconciled.conflicts.length);
    metrics.increment('pushSuccesses', dispatched.attempted - Object.values(dispatched.failures).flat().length);
    metrics.increment('pushFailures', Object.values(dispatched.failures).flat().length);

    logger.info({
      cycleId,
      trigger,
      durationMs: result.durationMs,
      itemCount: result.itemCount,
      conflicts: result.conflicts.length,
      pushErrors: Object.keys(pushErrors).length,
      stale: result.staleKeys.length,
      storageError,
    }, 'Sync cycle completed');

    return result;
  }
}
