import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import {
  ensureDir,
  errorCode,
  fileExists,
  isTempFileFor,
  isTransientFsError,
  readJsonFile,
  removeStaleTempFiles,
  tempPathFor,
  withFsRetry,
  writeJsonAtomic,
} from '../../src/utils/fsSafe';
import { metrics } from '../../src/utils/metrics';
import { setDeterministicRng } from '../../src/testing/rng';
import { TestIsolation } from '../helpers/test-isolation';

function fsError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

describe('fsSafe', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await TestIsolation.createDataDir('fs-safe');
  });

  describe('atomic JSON files', () => {
    it('should write and read back a document', async () => {
      const filePath = join(dir, 'catalog.json');
      await writeJsonAtomic(filePath, { version: 1, items: ['a', 'b'] });

      await expect(readJsonFile(filePath)).resolves.toEqual({ version: 1, items: ['a', 'b'] });
    });

    it('should leave no temp file behind', async () => {
      const filePath = join(dir, 'catalog.json');
      await writeJsonAtomic(filePath, { first: true });
      await writeJsonAtomic(filePath, { second: true });

      expect(await fs.readdir(dir)).toEqual(['catalog.json']);
      await expect(readJsonFile(filePath)).resolves.toEqual({ second: true });
    });

    it('should reject malformed JSON without retrying', async () => {
      const filePath = join(dir, 'broken.json');
      await fs.writeFile(filePath, '{not json', 'utf8');

      await expect(readJsonFile(filePath)).rejects.toBeInstanceOf(SyntaxError);
      expect(metrics.getMetrics().fileSystemRetries).toBe(0);
    });
  });

  describe('temp files', () => {
    it('should name temp files after their target', () => {
      const filePath = join(dir, 'catalog.json');
      const temp = tempPathFor(filePath);

      expect(temp.startsWith(join(dir, '.catalog.json.'))).toBe(true);
      expect(temp.endsWith('.tmp')).toBe(true);
      expect(isTempFileFor(filePath, '.catalog.json.1234.tmp')).toBe(true);
      expect(isTempFileFor(filePath, '.other.json.1234.tmp')).toBe(false);
    });

    it('should remove leftovers from an interrupted write', async () => {
      const filePath = join(dir, 'catalog.json');
      await fs.writeFile(join(dir, '.catalog.json.deadbeef.tmp'), '{', 'utf8');
      await fs.writeFile(join(dir, 'keep.json'), '{}', 'utf8');

      await expect(removeStaleTempFiles(filePath)).resolves.toEqual(['.catalog.json.deadbeef.tmp']);
      expect(await fs.readdir(dir)).toEqual(['keep.json']);
    });

    it('should treat a missing directory as clean', async () => {
      await expect(removeStaleTempFiles(join(dir, 'missing', 'catalog.json'))).resolves.toEqual([]);
    });
  });

  describe('directories and existence', () => {
    it('should create nested directories', async () => {
      const nested = join(dir, 'platforms', 'a');
      await ensureDir(nested);

      await expect(fileExists(nested)).resolves.toBe(true);
      await expect(fileExists(join(dir, 'nope.json'))).resolves.toBe(false);
    });
  });

  describe('withFsRetry', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      setDeterministicRng(() => 0);
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should retry transient errors', async () => {
      const operation = vi.fn<() => Promise<string>>()
        .mockRejectedValueOnce(fsError('EBUSY'))
        .mockResolvedValueOnce('ok');

      const result = withFsRetry(operation, 'Read');
      await vi.advanceTimersByTimeAsync(200);

      await expect(result).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(2);
      expect(metrics.getMetrics().fileSystemRetries).toBe(1);
    });

    it('should rethrow non-transient errors immediately', async () => {
      const missing = fsError('ENOENT');
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(missing);

      await expect(withFsRetry(operation, 'Read')).rejects.toBe(missing);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should give up after the configured attempts', async () => {
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(fsError('EBUSY', 'busy'));

      const result = withFsRetry(operation, 'Write');
      const assertion = expect(result).rejects.toThrow('Write failed after 4 attempts: busy');
      // 200 + 400 + 800 with zero jitter
      await vi.advanceTimersByTimeAsync(1400);

      await assertion;
      expect(operation).toHaveBeenCalledTimes(4);
    });
  });

  describe('error classification', () => {
    it('should read codes and classify errors', () => {
      expect(errorCode(fsError('EACCES'))).toBe('EACCES');
      expect(errorCode('nope')).toBeUndefined();
      expect(isTransientFsError(fsError('EBUSY'))).toBe(true);
      expect(isTransientFsError(fsError('EISDIR'))).toBe(false);
      expect(isTransientFsError(new SyntaxError('bad json'))).toBe(false);
    });
  });
});
