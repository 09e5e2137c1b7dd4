/**
 * Bounded-parallelism runner with a sliding admission window.
 *
 * At most `limit` workers are in flight; a new one starts only when the
 * in-flight count drops below the cap. Each worker writes to its own result
 * slot, so results come back in input order regardless of completion order.
 */

export type SettledResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<SettledResult<R>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results: SettledResult<R>[] = new Array(items.length);
  let nextIndex = 0;

  // Each lane pulls the next unclaimed item as soon as its previous one settles
  const lane = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const laneCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: laneCount }, () => lane()));

  return results;
}

/**
 * Split an inclusive block range into consecutive batches of `batchSize` blocks
 */
export function partitionRange(start: number, end: number, batchSize: number): Array<{ start: number; end: number }> {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`Batch size must be a positive integer, got ${batchSize}`);
  }

  const batches: Array<{ start: number; end: number }> = [];
  for (let batchStart = start; batchStart <= end; batchStart += batchSize) {
    batches.push({ start: batchStart, end: Math.min(batchStart + batchSize - 1, end) });
  }
  return batches;
}
