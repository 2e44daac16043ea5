/**
 * Run fn over items with at most `limit` calls in flight. Results keep the
 * input order; a rejection never stops the remaining items.
 */
export async function mapLimitSettled<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  if (limit <= 0) {
    throw new Error('Limit must be greater than 0');
  }

  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const currentIndex = next++;
      const item = items[currentIndex];
      if (item === undefined) {
        results[currentIndex] = {
          status: 'rejected',
          reason: new Error(`Item at index ${currentIndex} is undefined`),
        };
        continue;
      }

      try {
        results[currentIndex] = { status: 'fulfilled', value: await fn(item, currentIndex) };
      } catch (error) {
        results[currentIndex] = { status: 'rejected', reason: error };
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);

  return results;
}
