import { describe, it, expect } from 'vitest';
import { Bulkhead, BulkheadRejectedError } from '../../src/utils/bulkhead';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Bulkhead', () => {
  it('should run up to the limit and queue the rest', async () => {
    const bulkhead = new Bulkhead({ name: 'test', limit: 2, queueSize: 2 });
    const gate = deferred();
    const runs = [1, 2, 3].map((n) => bulkhead.run(async () => {
      await gate.promise;
      return n;
    }));

    expect(bulkhead.getStats()).toMatchObject({ active: 2, queued: 1 });
    expect(bulkhead.isIdle()).toBe(false);

    gate.resolve();
    await expect(Promise.all(runs)).resolves.toEqual([1, 2, 3]);
    expect(bulkhead.getStats()).toMatchObject({ active: 0, queued: 0, completed: 3 });
    expect(bulkhead.isIdle()).toBe(true);
  });

  it('should reject when the queue is full', async () => {
    const bulkhead = new Bulkhead({ name: 'tight', limit: 1, queueSize: 0 });
    const gate = deferred();
    const first = bulkhead.run(() => gate.promise);

    await expect(bulkhead.run(async () => 'second')).rejects.toBeInstanceOf(BulkheadRejectedError);
    expect(bulkhead.getStats().rejected).toBe(1);

    gate.resolve();
    await first;
  });

  it('should free the slot when an operation fails', async () => {
    const bulkhead = new Bulkhead({ name: 'failing', limit: 1, queueSize: 1 });

    await expect(bulkhead.run(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(bulkhead.run(async () => 'next')).resolves.toBe('next');
  });
});
