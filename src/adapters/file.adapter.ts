import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../core/logger';
import type { CatalogItem, PlatformId } from '../core/types';
import { ensureDir, fileExists, readJsonFile, writeJsonAtomic } from '../utils/fsSafe';
import { PerKeyMutex } from '../utils/perKeyMutex';
import type { PlatformAdapter, PushReceipt } from './platform.adapter';
import { upsertRawRecord } from './record-store';

const fileMutex = new PerKeyMutex();

/**
 * Platform stand-in backed by a JSON array of raw records on disk, for
 * local runs without platform credentials. Writes to one file are
 * serialized.
 */
export class JsonFilePlatformAdapter implements PlatformAdapter {
  constructor(
    readonly platform: PlatformId,
    private readonly filePath: string
  ) {}

  async fetchAll(): Promise<readonly unknown[]> {
    return fileMutex.run(this.filePath, () => this.readRecords());
  }

  async createOrUpdate(item: CatalogItem): Promise<PushReceipt> {
    return fileMutex.run(this.filePath, async () => {
      const current = await this.readRecords();
      const { records, receipt } = upsertRawRecord(
        this.platform,
        current,
        item,
        () => `${this.platform.toLowerCase()}-${uuidv4()}`
      );

      await ensureDir(dirname(this.filePath));
      await writeJsonAtomic(this.filePath, records);
      logger.debug({ platform: this.platform, key: item.key, ...receipt }, 'Platform file record written');
      return receipt;
    });
  }

  private async readRecords(): Promise<unknown[]> {
    if (!(await fileExists(this.filePath))) {
      logger.debug({ platform: this.platform, filePath: this.filePath }, 'Platform file missing, treating as empty');
      return [];
    }

    const data = await readJsonFile(this.filePath);
    if (!Array.isArray(data)) {
      throw new Error(`Platform file ${this.filePath} does not contain a JSON array`);
    }
    return data;
  }
}
