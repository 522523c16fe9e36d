/**
 * Async helpers shared by the Gmail client and the orchestrator.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface ConcurrentMapOptions<T, R> {
  /** Items to process */
  items: T[];
  /** Async function to apply to each item */
  fn: (item: T) => Promise<R>;
  /** Max concurrent operations. Default: 5 */
  concurrency?: number;
  /** Called for each rejected item. */
  onError?: (item: T, error: unknown) => void;
  /** Called after each settled item with the number settled so far. */
  onProgress?: (settled: number, total: number) => void;
}

/**
 * Map over items with bounded concurrency using Promise.allSettled.
 * Failed items are left out of the result (reported via onError); the
 * fulfilled results keep the input order.
 */
export async function concurrentMap<T, R>({
  items,
  fn,
  concurrency = 5,
  onError,
  onProgress,
}: ConcurrentMapOptions<T, R>): Promise<Array<{ item: T; value: R }>> {
  if (concurrency < 1) {
    throw new Error(`concurrentMap: concurrency must be >= 1, got ${concurrency}`);
  }
  const results: Array<{ item: T; value: R }> = [];
  let settledCount = 0;

  for (let i = 0; i < items.length; i += concurrency) {
    const batch = items.slice(i, i + concurrency);
    const settled = await Promise.allSettled(
      batch.map(async (item) => {
        try {
          return await fn(item);
        } finally {
          settledCount++;
          onProgress?.(settledCount, items.length);
        }
      })
    );

    batch.forEach((item, index) => {
      const entry = settled[index];
      if (!entry) return;
      if (entry.status === "fulfilled") {
        results.push({ item, value: entry.value });
      } else {
        onError?.(item, entry.reason);
      }
    });
  }

  return results;
}
