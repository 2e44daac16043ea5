import { logger } from '../core/logger';
import { NormalizationError } from '../core/errors';
import type {
  CatalogCandidate,
  CatalogItem,
  Dimensions,
  NormalizationIssue,
  PlatformId,
  QuantityByLocation,
} from '../core/types';
import {
  PlatformARecordSchema,
  PlatformBRecordSchema,
  type LengthUnit,
  type PlatformARecord,
  type PlatformBRecord,
  type WeightUnit,
} from './catalog.normalizer.schemas';

export const DEFAULT_CATEGORY = 'Uncategorized';
export const DEFAULT_BRAND = '';
export const DEFAULT_DISPLAY_NAME = 'Unknown Product';
export const UNKNOWN_LOCATION = 'unknown';

const KG_PER_UNIT: Record<WeightUnit, number> = {
  g: 0.001,
  kg: 1,
  lb: 0.45359237,
  oz: 0.028349523125,
};

const CM_PER_UNIT: Record<LengthUnit, number> = {
  mm: 0.1,
  cm: 1,
  in: 2.54,
};

export interface NormalizationResult {
  platform: PlatformId;
  candidates: CatalogCandidate[];
  errors: NormalizationIssue[];
}

export type RawRecord = Record<string, unknown>;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function nonNegative(value: number): number {
  return value > 0 ? value : 0;
}

// Conversions of huge inputs can overflow; those fall back to 0 like any bad number
function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

function safeIntegerOrZero(value: number): number {
  return Number.isSafeInteger(value) ? value : 0;
}

export function toKilograms(value: number, unit: WeightUnit): number {
  return finiteOrZero(round3(nonNegative(value) * KG_PER_UNIT[unit]));
}

export function toCentimetres(value: number, unit: LengthUnit): number {
  return finiteOrZero(round3(nonNegative(value) * CM_PER_UNIT[unit]));
}

export function majorToMinor(price: number): number {
  return safeIntegerOrZero(Math.round(nonNegative(price) * 100));
}

export function toMinor(priceMinor: number): number {
  return safeIntegerOrZero(Math.round(nonNegative(priceMinor)));
}

export function toQuantity(value: number): number {
  return safeIntegerOrZero(nonNegative(Math.trunc(value)));
}

/**
 * Location ids are only unique within one platform, so every key carries
 * the reporting platform as a prefix.
 */
export function scopeLocation(platform: PlatformId, nativeLocationId: string): string {
  return `${platform}:${nativeLocationId || UNKNOWN_LOCATION}`;
}

function addStock(target: QuantityByLocation, location: string, quantity: number): void {
  target[location] = toQuantity((target[location] ?? 0) + toQuantity(quantity));
}

type CandidateItem = CatalogCandidate['item'];

function fromPlatformA(record: PlatformARecord): CandidateItem {
  const { unit } = record.dimensions;
  const inventoryByLocation: QuantityByLocation = {};

  for (const sellable of record.sellables) {
    for (const entry of sellable?.stock_entries ?? []) {
      if (entry) {
        addStock(inventoryByLocation, scopeLocation('A', entry.warehouse_id), entry.available);
      }
    }
  }

  return {
    key: record.sku,
    displayName: record.title || DEFAULT_DISPLAY_NAME,
    description: record.description,
    category: record.product_category || DEFAULT_CATEGORY,
    brand: record.brand || DEFAULT_BRAND,
    priceMinor: majorToMinor(record.selling_price),
    weight: toKilograms(record.weight, record.weight_unit),
    dimensions: {
      length: toCentimetres(record.dimensions.length, unit),
      width: toCentimetres(record.dimensions.width, unit),
      height: toCentimetres(record.dimensions.height, unit),
    },
    inventoryByLocation,
  };
}

function fromPlatformB(record: PlatformBRecord): CandidateItem {
  const inventoryByLocation: QuantityByLocation = {};

  for (const level of record.stock) {
    if (level) {
      addStock(inventoryByLocation, scopeLocation('B', level.location_id), level.quantity);
    }
  }

  return {
    key: record.sku,
    displayName: record.name || DEFAULT_DISPLAY_NAME,
    description: record.description,
    category: record.category || DEFAULT_CATEGORY,
    brand: record.brand || DEFAULT_BRAND,
    priceMinor: toMinor(record.price_cents),
    weight: toKilograms(record.weight_kg, 'kg'),
    dimensions: {
      length: toCentimetres(record.dimensions_cm.length, 'cm'),
      width: toCentimetres(record.dimensions_cm.width, 'cm'),
      height: toCentimetres(record.dimensions_cm.height, 'cm'),
    },
    inventoryByLocation,
  };
}

function parseRecord(
  platform: PlatformId,
  raw: unknown
): { nativeId: string; item: CandidateItem } | null {
  if (platform === 'A') {
    const parsed = PlatformARecordSchema.safeParse(raw);
    if (!parsed.success) {
      return null;
    }
    return { nativeId: parsed.data.id, item: fromPlatformA(parsed.data) };
  }

  const parsed = PlatformBRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  return { nativeId: parsed.data.id, item: fromPlatformB(parsed.data) };
}

/**
 * Convert one platform's raw snapshot into catalog candidates. Bad records
 * are dropped one at a time and reported; the batch itself never fails.
 */
export function normalizeSnapshot(platform: PlatformId, records: readonly unknown[]): NormalizationResult {
  const candidates: CatalogCandidate[] = [];
  const errors: NormalizationIssue[] = [];

  records.forEach((raw, index) => {
    const parsed = parseRecord(platform, raw);

    if (!parsed) {
      const error = NormalizationError.notAnObject(platform, index);
      logger.warn({ platform, index }, error.message);
      errors.push({ platform, nativeId: error.nativeId, reason: error.message });
      return;
    }

    const nativeId = parsed.nativeId || `#${index}`;

    if (!parsed.item.key) {
      const error = NormalizationError.missingKey(platform, nativeId);
      logger.warn({ platform, nativeId }, error.message);
      errors.push({ platform, nativeId, reason: error.message });
      return;
    }

    candidates.push({ platform, nativeId, item: parsed.item });
  });

  logger.debug({
    platform,
    received: records.length,
    normalized: candidates.length,
    errors: errors.length,
  }, 'Snapshot normalized');

  return { platform, candidates, errors };
}

function dimensionsOf(item: Pick<CatalogItem, 'dimensions'>): Dimensions {
  const { length, width, height } = item.dimensions;
  return { length, width, height };
}

/**
 * Canonical item in a platform's own raw shape, for pushing. Stock is left
 * out: each platform stays the owner of its own locations.
 */
export function toPlatformRecord(platform: PlatformId, item: CatalogItem): RawRecord {
  if (platform === 'A') {
    return {
      sku: item.key,
      title: item.displayName,
      description: item.description,
      product_category: item.category,
      brand: item.brand,
      selling_price: item.priceMinor / 100,
      weight: item.weight,
      weight_unit: 'kg',
      dimensions: { ...dimensionsOf(item), unit: 'cm' },
    };
  }

  return {
    sku: item.key,
    name: item.displayName,
    description: item.description,
    category: item.category,
    brand: item.brand,
    price_cents: item.priceMinor,
    weight_kg: item.weight,
    dimensions_cm: dimensionsOf(item),
  };
}
