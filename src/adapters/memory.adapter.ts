import type { CatalogItem, PlatformId, SKU } from '../core/types';
import type { PlatformAdapter, PushReceipt } from './platform.adapter';
import { upsertRawRecord } from './record-store';

export interface InMemoryAdapterOptions {
  fetchDelayMs?: number;
  pushDelayMs?: number;
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Platform stand-in holding raw records in process. Failures can be
 * scripted per call so cycles can be exercised without a network.
 */
export class InMemoryPlatformAdapter implements PlatformAdapter {
  private records: unknown[];
  private nextId = 1;
  private fetchFailure: Error | null = null;
  private readonly pushFailures = new Map<SKU, Error>();
  readonly pushed: CatalogItem[] = [];
  fetchCalls = 0;

  constructor(
    readonly platform: PlatformId,
    records: readonly unknown[] = [],
    private readonly options: InMemoryAdapterOptions = {}
  ) {
    this.records = [...records];
  }

  async fetchAll(): Promise<readonly unknown[]> {
    this.fetchCalls++;
    if (this.options.fetchDelayMs) {
      await delay(this.options.fetchDelayMs);
    }
    if (this.fetchFailure) {
      throw this.fetchFailure;
    }
    return structuredClone(this.records);
  }

  async createOrUpdate(item: CatalogItem): Promise<PushReceipt> {
    if (this.options.pushDelayMs) {
      await delay(this.options.pushDelayMs);
    }
    const failure = this.pushFailures.get(item.key);
    if (failure) {
      throw failure;
    }

    const { records, receipt } = upsertRawRecord(
      this.platform,
      this.records,
      item,
      () => `${this.platform.toLowerCase()}-${this.nextId++}`
    );
    this.records = records;
    this.pushed.push(item);
    return receipt;
  }

  setRecords(records: readonly unknown[]): void {
    this.records = [...records];
  }

  getRecords(): readonly unknown[] {
    return this.records;
  }

  failFetch(error: Error | null): void {
    this.fetchFailure = error;
  }

  failPush(sku: SKU, error: Error | null): void {
    if (error) {
      this.pushFailures.set(sku, error);
    } else {
      this.pushFailures.delete(sku);
    }
  }
}
