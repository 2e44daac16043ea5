import { describe, it, expect, vi } from 'vitest';
import { dispatchPending } from '../../src/services/catalog.dispatcher';
import type { CatalogItem, PlatformId } from '../../src/core/types';
import type { PushReceipt } from '../../src/adapters/platform.adapter';
import { catalogOf, makeItem } from '../helpers/catalog.fixtures';

const BOTH = new Set<PlatformId>(['A', 'B']);

function pendingOn(key: string, platform: PlatformId): CatalogItem {
  return makeItem(key, { sourcePlatforms: [platform], syncState: 'Pending' });
}

describe('Push Dispatcher', () => {
  it('should push pending items to the platforms missing them', async () => {
    const items = catalogOf(pendingOn('P1', 'A'), pendingOn('P2', 'B'), makeItem('S'));
    const push = vi.fn(async (platform: PlatformId, _item: CatalogItem): Promise<PushReceipt> => ({
      recordId: `${platform}-rec`,
      operation: 'created',
    }));

    const outcome = await dispatchPending(items, { concurrency: 2, reachable: BOTH, push });

    expect(push).toHaveBeenCalledTimes(2);
    expect(push.mock.calls.map(([platform, item]) => `${platform}:${item.key}`)).toEqual(['B:P1', 'A:P2']);
    expect(outcome.attempted).toBe(2);
    expect(outcome.failures).toEqual({});
    expect(outcome.platforms.A).toEqual({ created: 1, updated: 0, errored: 0, deferred: 0 });
    expect(outcome.platforms.B).toEqual({ created: 1, updated: 0, errored: 0, deferred: 0 });
    expect(items.get('P1')).toMatchObject({ sourcePlatforms: ['A', 'B'], syncState: 'Synced' });
    expect(items.get('P2')).toMatchObject({ sourcePlatforms: ['A', 'B'], syncState: 'Synced' });
  });

  it('should count updates reported by the platform', async () => {
    const items = catalogOf(pendingOn('P1', 'A'));
    const push = vi.fn(async (): Promise<PushReceipt> => ({ recordId: 'b-1', operation: 'updated' }));

    const outcome = await dispatchPending(items, { concurrency: 1, reachable: BOTH, push });

    expect(outcome.platforms.B.updated).toBe(1);
  });

  it('should mark failed items Error and keep going', async () => {
    const items = catalogOf(pendingOn('P1', 'A'), pendingOn('P2', 'A'));
    const push = vi.fn(async (_platform: PlatformId, item: CatalogItem): Promise<PushReceipt> => {
      if (item.key === 'P1') {
        throw new Error('rejected by B');
      }
      return { recordId: 'b-2', operation: 'created' };
    });

    const outcome = await dispatchPending(items, { concurrency: 2, reachable: BOTH, push });

    expect(outcome.failures).toEqual({
      P1: [{ platform: 'B', reason: 'Push of P1 to platform B failed: rejected by B' }],
    });
    expect(outcome.platforms.B).toEqual({ created: 1, updated: 0, errored: 1, deferred: 0 });
    expect(items.get('P1')).toMatchObject({ sourcePlatforms: ['A'], syncState: 'Error' });
    expect(items.get('P2')).toMatchObject({ sourcePlatforms: ['A', 'B'], syncState: 'Synced' });
  });

  it('should defer pushes to platforms that were not reachable', async () => {
    const items = catalogOf(pendingOn('P1', 'A'));
    const push = vi.fn(async (): Promise<PushReceipt> => ({ recordId: 'x', operation: 'created' }));

    const outcome = await dispatchPending(items, { concurrency: 1, reachable: new Set<PlatformId>(['A']), push });

    expect(push).not.toHaveBeenCalled();
    expect(outcome.attempted).toBe(0);
    expect(outcome.platforms.B.deferred).toBe(1);
    expect(items.get('P1')?.syncState).toBe('Pending');
  });

  it('should skip excluded keys', async () => {
    const items = catalogOf(pendingOn('P1', 'A'), pendingOn('STALE', 'A'));
    const push = vi.fn(async (_platform: PlatformId, _item: CatalogItem): Promise<PushReceipt> => ({
      recordId: 'x',
      operation: 'created',
    }));

    await dispatchPending(items, { concurrency: 1, reachable: BOTH, exclude: new Set(['STALE']), push });

    expect(push.mock.calls.map(([, item]) => item.key)).toEqual(['P1']);
    expect(items.get('STALE')?.syncState).toBe('Pending');
  });

  it('should hand the adapter a copy of the item', async () => {
    const items = catalogOf(pendingOn('P1', 'A'));
    const push = vi.fn(async (_platform: PlatformId, item: CatalogItem): Promise<PushReceipt> => {
      item.displayName = 'mutated by adapter';
      return { recordId: 'x', operation: 'created' };
    });

    await dispatchPending(items, { concurrency: 1, reachable: BOTH, push });

    expect(items.get('P1')?.displayName).toBe('Item P1');
  });

  it('should respect the concurrency limit', async () => {
    const items = catalogOf(...['P1', 'P2', 'P3', 'P4', 'P5'].map((key) => pendingOn(key, 'A')));
    let active = 0;
    let peak = 0;
    const push = vi.fn(async (): Promise<PushReceipt> => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
      return { recordId: 'x', operation: 'created' };
    });

    const outcome = await dispatchPending(items, { concurrency: 2, reachable: BOTH, push });

    expect(outcome.attempted).toBe(5);
    expect(peak).toBe(2);
  });
});
