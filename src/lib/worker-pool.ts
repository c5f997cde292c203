/**
 * Bounded async pool. At most `concurrency` workers run at once; results land
 * in per-index slots so completion order never leaks into output order.
 */

export interface PoolOptions {
  concurrency: number;
  /** When aborted, no further items are dispatched. In-flight work finishes. */
  signal?: AbortSignal;
}

export type PoolSlot<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<PoolSlot<R>[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const slots = items.map((): PoolSlot<R> => ({ status: 'skipped' }));
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length) {
      if (options.signal?.aborted) return;
      const index = next++;
      try {
        slots[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (error) {
        slots[index] = { status: 'rejected', reason: error };
      }
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => drain());
  await Promise.all(workers);
  return slots;
}
