import { describe, it, expect } from 'vitest';
import { mapLimitSettled } from '../../src/utils/mapLimit';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('mapLimitSettled', () => {
  it('should keep input order regardless of completion order', async () => {
    const results = await mapLimitSettled([30, 10, 20], 3, async (ms) => {
      await delay(ms);
      return ms;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 30 },
      { status: 'fulfilled', value: 10 },
      { status: 'fulfilled', value: 20 },
    ]);
  });

  it('should never exceed the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    await mapLimitSettled([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(2);
  });

  it('should attempt every item even when some reject', async () => {
    const seen: number[] = [];
    const results = await mapLimitSettled([1, 2, 3], 1, async (n) => {
      seen.push(n);
      if (n === 2) {
        throw new Error('two');
      }
      return n * 10;
    });

    expect(seen).toEqual([1, 2, 3]);
    expect(results[0]).toEqual({ status: 'fulfilled', value: 10 });
    expect(results[1]?.status).toBe('rejected');
    expect(results[2]).toEqual({ status: 'fulfilled', value: 30 });
  });

  it('should return an empty list for no items', async () => {
    await expect(mapLimitSettled([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('should reject a non-positive limit', async () => {
    await expect(mapLimitSettled([1], 0, async () => 1)).rejects.toThrow('Limit must be greater than 0');
  });
});
