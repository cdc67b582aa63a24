/**
 * Run `worker` over `items` with at most `limit` in flight.
 * Results keep the input order. A throwing worker rejects the whole run,
 * so callers that need every result catch inside the worker.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  // One shared iterator: each runner pulls the next unclaimed item
  const queue = items.entries();

  const runner = async (): Promise<void> => {
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
    }
  };

  const workerCount = Math.min(Math.max(1, limit), items.length);
  await Promise.all(Array.from({ length: workerCount }, () => runner()));
  return results;
}
