/**
 * Pricewise — Worker Pool
 *
 * Fixed-size pool of async runners draining a shared task list.
 * Settles every task; a failing task never rejects the batch.
 */

export type Settled<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; error: unknown; durationMs: number };

export interface PoolOptions {
  /** Number of tasks allowed in flight at once. */
  concurrency: number;
  /** Per-task budget in ms. 0 or undefined disables it. */
  taskTimeoutMs?: number;
}

export class TaskTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
  }
}

/**
 * Race a task against a timer. The timer is always cleared, so a finished
 * batch leaves nothing scheduled on the event loop.
 */
export async function withTimeout<T>(task: () => Promise<T>, timeoutMs?: number): Promise<T> {
  if (!timeoutMs || timeoutMs <= 0) {
    return task();
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TaskTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `worker` over every item with at most `concurrency` in flight.
 * Results line up with `items` by index.
 */
export async function runPool<I, T>(
  items: readonly I[],
  worker: (item: I, index: number) => Promise<T>,
  options: PoolOptions
): Promise<Settled<T>[]> {
  const results: Settled<T>[] = new Array(items.length);
  if (items.length === 0) {
    return results;
  }

  const concurrency = Math.max(1, Math.min(options.concurrency, items.length));
  let next = 0;

  const runners = Array.from({ length: concurrency }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      const startTime = Date.now();

      try {
        // Wrapped so a synchronous throw inside the worker is caught too
        const value = await withTimeout(
          () => Promise.resolve().then(() => worker(items[index], index)),
          options.taskTimeoutMs
        );
        results[index] = { ok: true, value, durationMs: Date.now() - startTime };
      } catch (error) {
        results[index] = { ok: false, error, durationMs: Date.now() - startTime };
      }
    }
  });

  await Promise.all(runners);
  return results;
}
