import { z } from 'zod';

// Base types
export type SKU = string;
export type LocationId = string;
export type QuantityByLocation = Record<LocationId, number>;

/**
 * Platform identifiers. Fetch order is A then B, and B wins every field
 * conflict when both report the same SKU in one cycle.
 */
export const PLATFORM_IDS = ['A', 'B'] as const;
export type PlatformId = (typeof PLATFORM_IDS)[number];

export const SYNC_STATES = ['Synced', 'Pending', 'Error'] as const;
export type SyncState = (typeof SYNC_STATES)[number];

// Zod schemas for validation
export const SKUSchema = z.string().trim().min(1);
export const PlatformIdSchema = z.enum(PLATFORM_IDS);
export const SyncStateSchema = z.enum(SYNC_STATES);
export const QuantitySchema = z.number().int().min(0);

export interface Dimensions {
  length: number;
  width: number;
  height: number;
}

export const DimensionsSchema = z.object({
  length: z.number().finite().min(0),
  width: z.number().finite().min(0),
  height: z.number().finite().min(0),
});

/**
 * Canonical representation of one product. Weight is in kilograms and
 * dimensions in centimetres; every platform is converted on the way in.
 */
export interface CatalogItem {
  key: SKU;
  displayName: string;
  description: string;
  category: string;
  brand: string;
  priceMinor: number;
  weight: number;
  dimensions: Dimensions;
  inventoryByLocation: QuantityByLocation;
  sourcePlatforms: PlatformId[];
  syncState: SyncState;
  lastSyncedAt: string;
}

export const CatalogItemSchema = z.object({
  key: SKUSchema,
  displayName: z.string(),
  description: z.string(),
  category: z.string(),
  brand: z.string(),
  priceMinor: z.number().int().min(0),
  weight: z.number().finite().min(0),
  dimensions: DimensionsSchema,
  inventoryByLocation: z.record(QuantitySchema),
  sourcePlatforms: z.array(PlatformIdSchema),
  syncState: SyncStateSchema,
  lastSyncedAt: z.string().datetime(),
});

/**
 * Normalized item tagged with the single platform that reported it
 */
export interface CatalogCandidate {
  platform: PlatformId;
  nativeId: string;
  item: Omit<CatalogItem, 'sourcePlatforms' | 'syncState' | 'lastSyncedAt'>;
}

export type CatalogMap = Map<SKU, CatalogItem>;
export type CatalogSnapshot = ReadonlyMap<SKU, Readonly<CatalogItem>>;

// Issues collected during a cycle
export interface NormalizationIssue {
  platform: PlatformId;
  nativeId: string;
  reason: string;
}

export interface DuplicateIssue {
  platform: PlatformId;
  key: SKU;
  occurrences: number;
}

export interface ConflictReport {
  key: SKU;
  fields: string[];
  resolvedBy: PlatformId;
}

export interface PushFailure {
  platform: PlatformId;
  reason: string;
}

export interface PlatformCycleStats {
  fetched: number;
  fetchError?: string;
  normalized: number;
  normalizationErrors: number;
  duplicates: number;
  created: number;
  updated: number;
  errored: number;
  deferred: number;
}

export interface CanonicalCycleStats {
  total: number;
  created: number;
  updated: number;
  unchanged: number;
  stale: number;
  pending: number;
  synced: number;
  errored: number;
}

/**
 * Outcome of one reconciliation cycle. Frozen once produced.
 */
export interface SyncCycleResult {
  cycleId: string;
  trigger: CycleTrigger;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  platforms: Record<PlatformId, PlatformCycleStats>;
  canonical: CanonicalCycleStats;
  conflicts: ConflictReport[];
  normalizationErrors: NormalizationIssue[];
  duplicates: DuplicateIssue[];
  staleKeys: SKU[];
  pushErrors: Record<SKU, PushFailure[]>;
  storageError?: string;
  itemCount: number;
}

export type CycleTrigger = 'manual' | 'scheduled' | 'shutdown';

export type AlertSeverity = 'critical' | 'warning';

export interface InventoryAlert {
  key: SKU;
  displayName: string;
  totalQuantity: number;
  perLocationBreakdown: QuantityByLocation;
  threshold: number;
  severity: AlertSeverity;
}

// API request schemas
export const StartSyncRequestSchema = z.object({
  intervalMs: z.number().int().min(1000).optional(),
});

export const AlertsQuerySchema = z.object({
  threshold: z.coerce.number().int().min(0).optional(),
});

export const TopItemsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(10),
});

export const ItemsQuerySchema = z.object({
  syncState: SyncStateSchema.optional(),
  platform: PlatformIdSchema.optional(),
  category: z.string().trim().min(1).optional(),
});

export const ItemKeyParamsSchema = z.object({
  key: SKUSchema,
});

// Utility types
export interface ErrorResponse {
  success: false;
  error: {
    name: string;
    message: string;
    code: string;
    statusCode: number;
    timestamp: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Compare platform ids by fetch order
 */
export function comparePlatforms(a: PlatformId, b: PlatformId): number {
  return PLATFORM_IDS.indexOf(a) - PLATFORM_IDS.indexOf(b);
}

/**
 * Sum of every location quantity for an item
 */
export function totalQuantity(item: Pick<CatalogItem, 'inventoryByLocation'>): number {
  return Object.values(item.inventoryByLocation).reduce((sum, qty) => sum + qty, 0);
}
