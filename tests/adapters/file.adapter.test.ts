import { describe, it, expect, beforeEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { JsonFilePlatformAdapter } from '../../src/adapters/file.adapter';
import { makeItem } from '../helpers/catalog.fixtures';
import { TestIsolation } from '../helpers/test-isolation';

describe('JsonFilePlatformAdapter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await TestIsolation.createDataDir('file-adapter');
  });

  it('should read a missing file as an empty platform', async () => {
    const adapter = new JsonFilePlatformAdapter('A', join(dir, 'platform-a.json'));

    await expect(adapter.fetchAll()).resolves.toEqual([]);
  });

  it('should return the raw records from disk', async () => {
    const filePath = join(dir, 'platform-b.json');
    await fs.writeFile(filePath, JSON.stringify([{ id: 'B1', sku: 'SKU-1', price_cents: 500 }]), 'utf8');

    const adapter = new JsonFilePlatformAdapter('B', filePath);

    await expect(adapter.fetchAll()).resolves.toEqual([{ id: 'B1', sku: 'SKU-1', price_cents: 500 }]);
  });

  it('should reject a file that is not an array', async () => {
    const filePath = join(dir, 'platform-a.json');
    await fs.writeFile(filePath, JSON.stringify({ products: [] }), 'utf8');

    const adapter = new JsonFilePlatformAdapter('A', filePath);

    await expect(adapter.fetchAll()).rejects.toThrow(`Platform file ${filePath} does not contain a JSON array`);
  });

  it('should create then update records on disk', async () => {
    const filePath = join(dir, 'nested', 'platform-a.json');
    const adapter = new JsonFilePlatformAdapter('A', filePath);

    const created = await adapter.createOrUpdate(makeItem('SKU-1'));
    const updated = await adapter.createOrUpdate(makeItem('SKU-1', { displayName: 'Renamed' }));

    expect(created.operation).toBe('created');
    expect(created.recordId).toMatch(/^a-[0-9a-f-]{36}$/);
    expect(updated).toEqual({ recordId: created.recordId, operation: 'updated' });

    const records = JSON.parse(await fs.readFile(filePath, 'utf8'));
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ id: created.recordId, sku: 'SKU-1', title: 'Renamed' });
  });

  it('should serialize concurrent pushes to one file', async () => {
    const filePath = join(dir, 'platform-b.json');
    const adapter = new JsonFilePlatformAdapter('B', filePath);

    await Promise.all(['SKU-1', 'SKU-2', 'SKU-3'].map((key) => adapter.createOrUpdate(makeItem(key))));

    const records = await adapter.fetchAll();
    expect(records).toHaveLength(3);
  });
});
