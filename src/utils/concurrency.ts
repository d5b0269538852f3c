/**
 * Bounded-parallel mapping over a list.
 */
import * as os from 'node:os';

/**
 * Default parallelism: 75% of available CPUs, min 2, max 16.
 */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/**
 * Map items through an async function in batches of `limit`.
 * Results keep input order. The first rejection rejects the whole map once
 * its batch has settled.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, Math.floor(limit));
  const results: R[] = [];

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const settled = await Promise.allSettled(batch.map((item, j) => fn(item, i + j)));

    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      results.push(outcome.value);
    }
  }

  return results;
}
