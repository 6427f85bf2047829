/**
 * @module pool
 *
 * Bounded worker pool with cooperative stop.
 *
 * `concurrency` workers pull from one shared iterator until it is drained,
 * so the input is consumed lazily and never materialized. When the stop
 * signal fires, workers stop taking new items; items already started run to
 * completion. Nothing in flight is interrupted, which keeps a fetch from
 * being killed halfway through writing an artifact.
 */

export interface PoolOptions {
  /** Cooperative stop: no new item is started once aborted. */
  signal?: AbortSignal;
}

export interface PoolResult {
  /** Items handed to a worker. */
  started: number;
  /** Items whose worker call settled successfully. */
  completed: number;
  /** Whether the pool stopped early because `signal` aborted. */
  stopped: boolean;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 *
 * @param items - Any iterable, including a lazy generator.
 * @param concurrency - Upper bound on in-flight calls; values below 1 count as 1.
 * @param worker - Called once per item with the item and its zero-based index.
 * @returns Counters describing how far the pool got.
 * @throws The first error thrown by `worker`, after every in-flight call has
 *   settled. No new items are started once a worker has failed.
 *
 * @example
 * ```typescript
 * await runPool(plan.tiles(), 8, async tile => {
 *   await fetcher.fetch(tile, tilePath(root, tile));
 * });
 * ```
 */
export async function runPool<T>(
  items: Iterable<T>,
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  options: PoolOptions = {},
): Promise<PoolResult> {
  const { signal } = options;
  const iterator = items[Symbol.iterator]();
  const result: PoolResult = { started: 0, completed: 0, stopped: false };
  const failures: unknown[] = [];
  let done = false;

  const next = (): { item: T; index: number } | null => {
    if (done || failures.length > 0) return null;
    if (signal?.aborted) {
      result.stopped = true;
      return null;
    }
    const step = iterator.next();
    if (step.done) {
      done = true;
      return null;
    }
    return { item: step.value, index: result.started++ };
  };

  const run = async (): Promise<void> => {
    for (let task = next(); task; task = next()) {
      try {
        await worker(task.item, task.index);
        result.completed++;
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const width = Math.max(1, Math.floor(concurrency));
  await Promise.all(Array.from({ length: width }, () => run()));

  if (failures.length > 0) throw failures[0];
  return result;
}
