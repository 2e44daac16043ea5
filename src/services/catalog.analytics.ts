import {
  totalQuantity,
  type CatalogItem,
  type CatalogSnapshot,
  type InventoryAlert,
  type PlatformId,
  type SKU,
  type SyncState,
} from '../core/types';
import { compareKeys } from './catalog.reconciler';

// Read-only views over a published snapshot. Nothing here mutates its input.

export interface CategoryBreakdownEntry {
  category: string;
  itemCount: number;
  totalQuantity: number;
  totalValueMinor: number;
}

export interface ItemValue {
  key: SKU;
  displayName: string;
  priceMinor: number;
  quantity: number;
  totalValueMinor: number;
}

export interface CatalogSummary {
  totalItems: number;
  totalQuantity: number;
  totalValueMinor: number;
  averagePriceMinor: number;
  lowStockCount: number;
  byPlatform: Record<PlatformId, number>;
  bySyncState: Record<SyncState, number>;
}

function itemValue(item: Readonly<CatalogItem>): number {
  return item.priceMinor * totalQuantity(item);
}

/**
 * Items whose total stock is at or below the threshold, lowest stock first.
 * `overrides` replaces the threshold for individual SKUs.
 */
export function lowStockAlerts(
  snapshot: CatalogSnapshot,
  threshold: number,
  overrides: Readonly<Record<SKU, number>> = {}
): InventoryAlert[] {
  const alerts: InventoryAlert[] = [];

  for (const item of snapshot.values()) {
    const limit = overrides[item.key] ?? threshold;
    const quantity = totalQuantity(item);
    if (quantity > limit) {
      continue;
    }

    alerts.push({
      key: item.key,
      displayName: item.displayName,
      totalQuantity: quantity,
      perLocationBreakdown: { ...item.inventoryByLocation },
      threshold: limit,
      severity: quantity === 0 ? 'critical' : 'warning',
    });
  }

  return alerts.sort((a, b) => a.totalQuantity - b.totalQuantity || compareKeys(a.key, b.key));
}

export function categoryBreakdown(snapshot: CatalogSnapshot): CategoryBreakdownEntry[] {
  const byCategory = new Map<string, CategoryBreakdownEntry>();

  for (const item of snapshot.values()) {
    const category = item.category || 'Uncategorized';
    const entry = byCategory.get(category) ?? { category, itemCount: 0, totalQuantity: 0, totalValueMinor: 0 };
    entry.itemCount++;
    entry.totalQuantity += totalQuantity(item);
    entry.totalValueMinor += itemValue(item);
    byCategory.set(category, entry);
  }

  return [...byCategory.values()].sort((a, b) => compareKeys(a.category, b.category));
}

export function topItemsByValue(snapshot: CatalogSnapshot, limit: number): ItemValue[] {
  if (limit <= 0) {
    return [];
  }

  const values: ItemValue[] = [...snapshot.values()].map((item) => ({
    key: item.key,
    displayName: item.displayName,
    priceMinor: item.priceMinor,
    quantity: totalQuantity(item),
    totalValueMinor: itemValue(item),
  }));

  return values
    .sort((a, b) => b.totalValueMinor - a.totalValueMinor || compareKeys(a.key, b.key))
    .slice(0, limit);
}

/**
 * Sum of price × stock across the catalog, in minor units
 */
export function totalInventoryValue(snapshot: CatalogSnapshot): number {
  let total = 0;
  for (const item of snapshot.values()) {
    total += itemValue(item);
  }
  return total;
}

export function catalogSummary(snapshot: CatalogSnapshot, lowStockThreshold: number): CatalogSummary {
  const byPlatform: Record<PlatformId, number> = { A: 0, B: 0 };
  const bySyncState: Record<SyncState, number> = { Synced: 0, Pending: 0, Error: 0 };
  let quantity = 0;
  let priceSum = 0;

  for (const item of snapshot.values()) {
    quantity += totalQuantity(item);
    priceSum += item.priceMinor;
    bySyncState[item.syncState]++;
    for (const platform of item.sourcePlatforms) {
      byPlatform[platform]++;
    }
  }

  return {
    totalItems: snapshot.size,
    totalQuantity: quantity,
    totalValueMinor: totalInventoryValue(snapshot),
    averagePriceMinor: snapshot.size === 0 ? 0 : Math.round(priceSum / snapshot.size),
    lowStockCount: lowStockAlerts(snapshot, lowStockThreshold).length,
    byPlatform,
    bySyncState,
  };
}
