/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results keep the order of `items`. Workers pull the next index from a
 * shared cursor, so a slow item never holds back the rest of the queue.
 *
 * The worker is expected to capture its own failures; a rejection aborts
 * the pool and rejects with the first error once in-flight calls settle.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;
  let failure: { error: unknown } | undefined;

  const runWorker = async (): Promise<void> => {
    while (!failure && cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failure ??= { error };
      }
    }
  };

  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));

  if (failure) {
    throw failure.error;
  }
  return results;
}
