/**
 * Like `Promise.all(items.map(worker))` but with at most `limit` workers in
 * flight. Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const laneCount = Math.min(Math.max(1, Math.floor(limit)), items.length);
  const lanes = Array.from({ length: laneCount }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  });
  await Promise.all(lanes);
  return results;
}
