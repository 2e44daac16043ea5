import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../core/logger';
import { config } from '../core/config';
import { StorageError, describeError } from '../core/errors';
import { CatalogItemSchema, type CatalogItem, type CatalogMap, type CatalogSnapshot } from '../core/types';
import { readJsonFile, writeJsonAtomic, ensureDir, fileExists, removeStaleTempFiles } from '../utils/fsSafe';
import { compareKeys } from '../services/catalog.reconciler';

export const CATALOG_FORMAT_VERSION = 1;

// Items are checked one at a time so a bad entry only costs itself
const CatalogFileSchema = z.object({
  version: z.literal(CATALOG_FORMAT_VERSION),
  savedAt: z.string(),
  items: z.array(z.unknown()),
});

export interface CatalogFile {
  version: typeof CATALOG_FORMAT_VERSION;
  savedAt: string;
  items: CatalogItem[];
}

export interface CatalogStore {
  load(): Promise<CatalogMap>;
  save(items: CatalogSnapshot, savedAt?: Date): Promise<void>;
}

/**
 * Durable copy of the canonical catalog, one JSON document replaced
 * atomically on every save.
 */
export class CatalogRepository implements CatalogStore {
  constructor(private readonly filePath: string = config.CATALOG_FILE) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Load the catalog. A missing, unreadable or invalid file yields an empty
   * map: a cold start is a normal path, not a failure.
   */
  async load(): Promise<CatalogMap> {
    try {
      await removeStaleTempFiles(this.filePath);

      if (!(await fileExists(this.filePath))) {
        logger.info({ filePath: this.filePath }, 'No persisted catalog found, starting empty');
        return new Map();
      }

      const parsed = CatalogFileSchema.safeParse(await readJsonFile(this.filePath));
      if (!parsed.success) {
        logger.error({
          filePath: this.filePath,
          issues: parsed.error.issues.slice(0, 5),
        }, 'Persisted catalog failed validation, starting empty');
        return new Map();
      }

      const items: CatalogMap = new Map();
      let skipped = 0;
      parsed.data.items.forEach((raw, index) => {
        const item = CatalogItemSchema.safeParse(raw);
        if (!item.success) {
          skipped++;
          logger.warn({
            filePath: this.filePath,
            index,
            issues: item.error.issues.slice(0, 3),
          }, 'Persisted catalog item failed validation, skipping it');
          return;
        }
        items.set(item.data.key, item.data);
      });

      logger.info({
        filePath: this.filePath,
        itemCount: items.size,
        skipped,
        savedAt: parsed.data.savedAt,
      }, 'Catalog loaded');
      return items;
    } catch (error) {
      const storageError = StorageError.loadFailed(this.filePath, error);
      logger.error({ filePath: this.filePath, error: describeError(error) }, storageError.message);
      return new Map();
    }
  }

  /**
   * Replace the stored catalog. Readers see either the old or the new file,
   * never a partial one.
   */
  async save(items: CatalogSnapshot, savedAt: Date = new Date()): Promise<void> {
    const document: CatalogFile = {
      version: CATALOG_FORMAT_VERSION,
      savedAt: savedAt.toISOString(),
      items: [...items.values()]
        .map((item) => ({
          ...item,
          dimensions: { ...item.dimensions },
          inventoryByLocation: { ...item.inventoryByLocation },
          sourcePlatforms: [...item.sourcePlatforms],
        }))
        .sort((a, b) => compareKeys(a.key, b.key)),
    };

    try {
      await ensureDir(dirname(this.filePath));
      await writeJsonAtomic(this.filePath, document);
      logger.debug({ filePath: this.filePath, itemCount: document.items.length }, 'Catalog saved');
    } catch (error) {
      throw StorageError.saveFailed(this.filePath, error);
    }
  }
}
