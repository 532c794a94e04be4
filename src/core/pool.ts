/**
 * Bounded worker pool.
 */

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Results
 * keep the order of `items`. A rejected worker rejects the whole run after
 * the in-flight workers settle.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const width = Math.max(1, Math.min(concurrency, items.length));
  const lanes = Array.from({ length: width }, () => lane());
  const settled = await Promise.allSettled(lanes);
  for (const s of settled) {
    if (s.status === "rejected") throw s.reason;
  }
  return results;
}
