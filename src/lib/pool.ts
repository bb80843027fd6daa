/**
 * Bounded-concurrency task runner
 *
 * Keeps at most `concurrency` tasks in flight. Once the signal aborts or a task
 * throws, no further tasks start; tasks already running are allowed to finish.
 */

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export interface PoolResult {
  started: number; // Tasks handed to the worker
  cancelled: boolean; // Stopped by the signal before every task started
}

export async function runWithConcurrency<T>(
  tasks: readonly T[],
  worker: (task: T, index: number) => Promise<void>,
  options: PoolOptions
): Promise<PoolResult> {
  const { concurrency, signal } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const active = new Set<Promise<void>>();
  const failure: { failed: boolean; error: unknown } = { failed: false, error: undefined };
  let next = 0;

  while (next < tasks.length || active.size > 0) {
    // Fill up to concurrency limit
    while (
      next < tasks.length &&
      active.size < concurrency &&
      !failure.failed &&
      !signal?.aborted
    ) {
      const index = next++;
      const task = tasks[index];
      const promise: Promise<void> = Promise.resolve()
        .then(() => worker(task, index))
        .catch((error: unknown) => {
          if (!failure.failed) {
            failure.failed = true;
            failure.error = error;
          }
        })
        .finally(() => {
          active.delete(promise);
        });
      active.add(promise);
    }

    if (active.size === 0) break;

    // Wait for at least one to complete
    await Promise.race(active);
  }

  if (failure.failed) {
    throw failure.error;
  }

  return { started: next, cancelled: next < tasks.length };
}
