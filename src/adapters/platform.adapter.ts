import type { CatalogItem, PlatformId } from '../core/types';

export type PushOperation = 'created' | 'updated';

export interface PushReceipt {
  recordId: string;
  operation: PushOperation;
}

/**
 * Contract for one external platform's product API. Implementations own
 * their transport, auth and per-call timeouts.
 */
export interface PlatformAdapter {
  readonly platform: PlatformId;

  /**
   * Full product/inventory snapshot. Resolves with the complete list or
   * rejects; never a partial list.
   */
  fetchAll(): Promise<readonly unknown[]>;

  /**
   * Create the item, or update it when the platform already has the SKU.
   * Calling it twice for one item must not create a duplicate.
   */
  createOrUpdate(item: CatalogItem): Promise<PushReceipt>;
}

export type PlatformAdapters = Record<PlatformId, PlatformAdapter>;
