/**
 * Run `worker` over every item with at most `limit` calls in flight.
 *
 * Results are returned in input order as settled results, so one failing
 * item never prevents the others from running.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  const slots = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  const drain = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: slots }, () => drain()));
  return results;
}
