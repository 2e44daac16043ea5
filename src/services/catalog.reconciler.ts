import { logger } from '../core/logger';
import {
  PLATFORM_IDS,
  comparePlatforms,
  type CatalogCandidate,
  type CatalogItem,
  type CatalogMap,
  type CatalogSnapshot,
  type ConflictReport,
  type DuplicateIssue,
  type PlatformId,
  type QuantityByLocation,
  type SKU,
} from '../core/types';

export interface ReconcileInput {
  candidates: readonly CatalogCandidate[];
  previous: CatalogSnapshot;
  now: Date;
  // Platforms fetched this cycle; defaults to all of them
  reachable?: ReadonlySet<PlatformId>;
}

export interface ReconcileChanges {
  created: SKU[];
  updated: SKU[];
  unchanged: SKU[];
}

export interface ReconcileOutput {
  items: CatalogMap;
  staleKeys: SKU[];
  duplicates: DuplicateIssue[];
  conflicts: ConflictReport[];
  changes: ReconcileChanges;
}

// Fields that follow last-writer-wins when both platforms report a key
const MERGED_FIELDS = [
  'displayName',
  'description',
  'category',
  'brand',
  'priceMinor',
  'weight',
  'dimensions',
] as const;

type MergedField = (typeof MERGED_FIELDS)[number];
type CandidateItem = CatalogCandidate['item'];

interface KeyGroup {
  byPlatform: Map<PlatformId, CatalogCandidate>;
  occurrences: Map<PlatformId, number>;
  // Platforms standing in with last known data; never a source of conflicts
  carried: Set<PlatformId>;
}

export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sameField(a: CandidateItem, b: CandidateItem, field: MergedField): boolean {
  if (field === 'dimensions') {
    return a.dimensions.length === b.dimensions.length
      && a.dimensions.width === b.dimensions.width
      && a.dimensions.height === b.dimensions.height;
  }
  return a[field] === b[field];
}

function sameInventory(a: QuantityByLocation, b: QuantityByLocation): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) {
    return false;
  }
  return aKeys.every((location) => b[location] === a[location]);
}

/**
 * Content equality ignoring lastSyncedAt
 */
export function sameCatalogItem(a: CatalogItem, b: CatalogItem): boolean {
  return a.key === b.key
    && MERGED_FIELDS.every((field) => sameField(a, b, field))
    && sameInventory(a.inventoryByLocation, b.inventoryByLocation)
    && a.syncState === b.syncState
    && a.sourcePlatforms.length === b.sourcePlatforms.length
    && a.sourcePlatforms.every((platform, index) => b.sourcePlatforms[index] === platform);
}

export function cloneCatalogItem(item: Readonly<CatalogItem>): CatalogItem {
  return {
    ...item,
    dimensions: { ...item.dimensions },
    inventoryByLocation: { ...item.inventoryByLocation },
    sourcePlatforms: [...item.sourcePlatforms],
  };
}

function copyCandidate(item: CandidateItem): CandidateItem {
  return {
    ...item,
    dimensions: { ...item.dimensions },
    inventoryByLocation: { ...item.inventoryByLocation },
  };
}

/**
 * Stand-in candidate for a platform that could not be fetched: the last
 * known fields of the item and that platform's own stock locations.
 */
function carriedCandidate(platform: PlatformId, before: Readonly<CatalogItem>): CatalogCandidate {
  const prefix = `${platform}:`;
  const inventoryByLocation: QuantityByLocation = {};
  for (const [location, quantity] of Object.entries(before.inventoryByLocation)) {
    if (location.startsWith(prefix)) {
      inventoryByLocation[location] = quantity;
    }
  }

  return {
    platform,
    nativeId: '',
    item: {
      key: before.key,
      displayName: before.displayName,
      description: before.description,
      category: before.category,
      brand: before.brand,
      priceMinor: before.priceMinor,
      weight: before.weight,
      dimensions: { ...before.dimensions },
      inventoryByLocation,
    },
  };
}

function groupByKey(candidates: readonly CatalogCandidate[]): Map<SKU, KeyGroup> {
  const groups = new Map<SKU, KeyGroup>();

  for (const candidate of candidates) {
    const { key } = candidate.item;
    let group = groups.get(key);
    if (!group) {
      group = { byPlatform: new Map(), occurrences: new Map(), carried: new Set() };
      groups.set(key, group);
    }

    // Same key twice from one platform: the later record wins
    group.byPlatform.set(candidate.platform, candidate);
    group.occurrences.set(candidate.platform, (group.occurrences.get(candidate.platform) ?? 0) + 1);
  }

  return groups;
}

/**
 * Fold the reporting platforms' candidates in fetch order. Every later
 * platform overwrites the descriptive and numeric fields of the earlier
 * ones; stock locations are platform-scoped, so their union never sums two
 * platforms' quantities for one key.
 */
function mergeGroup(
  key: SKU,
  group: KeyGroup,
  now: Date
): { item: CatalogItem; conflict?: ConflictReport } {
  const platforms = [...group.byPlatform.keys()].sort(comparePlatforms);
  const ordered = platforms
    .map((platform) => group.byPlatform.get(platform))
    .filter((candidate): candidate is CatalogCandidate => candidate !== undefined);

  const [first, ...rest] = ordered;
  if (!first) {
    throw new Error(`No candidates for key ${key}`);
  }

  let merged = copyCandidate(first.item);
  const conflictingFields = new Set<MergedField>();
  let comparable = !group.carried.has(first.platform);

  for (const next of rest) {
    comparable = comparable && !group.carried.has(next.platform);
    if (comparable) {
      for (const field of MERGED_FIELDS) {
        if (!sameField(merged, next.item, field)) {
          conflictingFields.add(field);
        }
      }
    }
    merged = {
      ...copyCandidate(next.item),
      inventoryByLocation: { ...merged.inventoryByLocation, ...next.item.inventoryByLocation },
    };
  }

  const onAll = platforms.length === PLATFORM_IDS.length;
  const item: CatalogItem = {
    ...merged,
    key,
    sourcePlatforms: platforms,
    syncState: onAll ? 'Synced' : 'Pending',
    lastSyncedAt: now.toISOString(),
  };

  const last = ordered[ordered.length - 1];
  if (conflictingFields.size > 0 && last) {
    return {
      item,
      conflict: {
        key,
        fields: MERGED_FIELDS.filter((field) => conflictingFields.has(field)),
        resolvedBy: last.platform,
      },
    };
  }

  return { item };
}

/**
 * Merge every platform's candidates for one cycle into a new canonical map.
 * The previous snapshot is only read; keys nobody reported are carried over
 * unchanged and listed as stale.
 */
export function reconcile({ candidates, previous, now, reachable }: ReconcileInput): ReconcileOutput {
  const groups = groupByKey(candidates);
  const unreachable = PLATFORM_IDS.filter((platform) => reachable !== undefined && !reachable.has(platform));
  const keys = new Set<SKU>([...groups.keys(), ...previous.keys()]);
  const sortedKeys = [...keys].sort(compareKeys);

  const items: CatalogMap = new Map();
  const staleKeys: SKU[] = [];
  const duplicates: DuplicateIssue[] = [];
  const conflicts: ConflictReport[] = [];
  const changes: ReconcileChanges = { created: [], updated: [], unchanged: [] };

  for (const key of sortedKeys) {
    const group = groups.get(key);
    const before = previous.get(key);

    if (!group) {
      if (before) {
        items.set(key, cloneCatalogItem(before));
        staleKeys.push(key);
      }
      continue;
    }

    for (const [platform, occurrences] of group.occurrences) {
      if (occurrences > 1) {
        duplicates.push({ platform, key, occurrences });
        logger.warn({ platform, key, occurrences }, 'Duplicate SKU within one platform snapshot, keeping the last record');
      }
    }

    // An outage is not a removal: keep what the unreachable platform last reported
    if (before) {
      for (const platform of unreachable) {
        if (before.sourcePlatforms.includes(platform) && !group.byPlatform.has(platform)) {
          group.byPlatform.set(platform, carriedCandidate(platform, before));
          group.carried.add(platform);
        }
      }
    }

    const { item, conflict } = mergeGroup(key, group, now);
    items.set(key, item);

    if (conflict) {
      conflicts.push(conflict);
    }

    if (!before) {
      changes.created.push(key);
    } else if (sameCatalogItem(before, item)) {
      changes.unchanged.push(key);
    } else {
      changes.updated.push(key);
    }
  }

  duplicates.sort((a, b) => compareKeys(a.key, b.key) || comparePlatforms(a.platform, b.platform));

  logger.debug({
    total: items.size,
    stale: staleKeys.length,
    conflicts: conflicts.length,
    created: changes.created.length,
    updated: changes.updated.length,
  }, 'Catalog reconciled');

  return { items, staleKeys, duplicates, conflicts, changes };
}
