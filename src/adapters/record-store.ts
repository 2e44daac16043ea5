import type { CatalogItem, PlatformId } from '../core/types';
import { toPlatformRecord, type RawRecord } from '../services/catalog.normalizer';
import type { PushReceipt } from './platform.adapter';

function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function skuOf(record: unknown): string | undefined {
  if (!isRawRecord(record)) {
    return undefined;
  }
  const { sku } = record;
  return typeof sku === 'string' || typeof sku === 'number' ? String(sku).trim() : undefined;
}

function idOf(record: RawRecord): string | undefined {
  const { id } = record;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined;
}

/**
 * Upsert a canonical item into a platform's raw record list by SKU. Fields
 * the platform owns (id, stock) are kept on update.
 */
export function upsertRawRecord(
  platform: PlatformId,
  records: readonly unknown[],
  item: CatalogItem,
  newId: () => string
): { records: unknown[]; receipt: PushReceipt } {
  const next = [...records];
  const index = next.findIndex((record) => skuOf(record) === item.key);
  const fields = toPlatformRecord(platform, item);
  const existing = index === -1 ? undefined : next[index];

  if (existing !== undefined && isRawRecord(existing)) {
    const recordId = idOf(existing) ?? newId();
    next[index] = { ...existing, ...fields, id: recordId };
    return { records: next, receipt: { recordId, operation: 'updated' } };
  }

  const recordId = newId();
  next.push({ id: recordId, ...fields });
  return { records: next, receipt: { recordId, operation: 'created' } };
}
