/**
 * Runs `processor` over `items` with at most `concurrency` calls in
 * flight. Each result lands in its item's slot, so the output order
 * matches the input order whatever order the calls finish in.
 */
export async function processInParallel<T, R>(
  items: T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>,
  onProgress?: (completed: number, total: number) => void
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let currentIndex = 0;
  let completed = 0;

  async function processNext(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      results[index] = await processor(items[index], index);
      completed++;
      onProgress?.(completed, items.length);
    }
  }

  const workers = Array.from(
    { length: Math.min(Math.max(1, concurrency), items.length) },
    () => processNext()
  );

  await Promise.all(workers);
  return results;
}
