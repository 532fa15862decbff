import { CancelledError } from './errors.js';

/**
 * Bounded worker pool: a shared queue drained by `concurrency` workers.
 * Results come back in input order. `slot` identifies the worker, so a task
 * can hold a resource that must never be shared between concurrent workers.
 *
 * The task is expected to handle its own failures; a rejection stops the pool.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, slot: number, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const limit = Math.max(1, Math.floor(concurrency) || 1);

  const workers = new Array(Math.min(limit, queue.length)).fill(0).map(async (_, slot) => {
    while (queue.length > 0) {
      if (signal?.aborted) return;
      const next = queue.shift();
      if (!next) break;
      results[next.index] = await task(next.item, slot, next.index);
    }
  });

  await Promise.all(workers);
  if (signal?.aborted) throw new CancelledError();
  return results;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, timeoutError: Error): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(timeoutError), Math.max(timeoutMs, 1));
    promise
      .then((r) => {
        clearTimeout(timer);
        resolve(r);
      })
      .catch((e: unknown) => {
        clearTimeout(timer);
        reject(e);
      });
  });
}
