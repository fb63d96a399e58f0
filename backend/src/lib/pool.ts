/**
 * Run `processor` over `items` with at most `concurrency` calls in flight.
 *
 * Workers pull the next index from a shared counter and write their result
 * into their own slot, so results keep the input order. `onComplete` fires
 * as each item finishes, in completion order. A rejected processor call
 * rejects the whole pool; callers that need partial results settle inside
 * the processor.
 */
export async function processPooled<T, R>(
  items: T[],
  processor: (item: T) => Promise<R>,
  concurrency = 5,
  onComplete?: (result: R, item: T) => void
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.min(Math.max(concurrency, 1), items.length) }, async () => {
    while (nextIndex < items.length) {
      const idx = nextIndex++;
      const result = await processor(items[idx]);
      results[idx] = result;
      onComplete?.(result, items[idx]);
    }
  });

  await Promise.all(workers);
  return results;
}
