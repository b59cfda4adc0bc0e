/**
 * Bounded-concurrency mapping
 *
 * Runs `fn` over `items` with at most `concurrency` calls in flight, using a
 * shared index and a fixed set of workers. Results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  let currentIndex = 0;

  const worker = async (): Promise<void> => {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) break;
      results[index] = await fn(item, index);
    }
  };

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}
