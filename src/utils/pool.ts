/**
 * Runs `processor` over `items` with at most `concurrency` calls in flight.
 * Workers pull the next item as soon as they finish one. Once `signal` is
 * aborted no new item starts; calls already running are awaited.
 */
export async function forEachAsync<T>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      await processor(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
  await Promise.all(workers);
}
