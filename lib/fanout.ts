/**
 * Bounded concurrency helpers for fetching independent series
 */

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Semaphore over async tasks. A finishing task hands its slot straight to
 * the next waiter, so no more than `concurrency` ever run at once.
 */
export function createLimiter(concurrency: number): Limiter {
  const max = Math.max(1, Math.floor(concurrency));
  const waiting: Array<() => void> = [];
  let active = 0;

  const release = (): void => {
    const next = waiting.shift();
    if (next) next();
    else active--;
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (active < max) active++;
    else await new Promise<void>((resolve) => waiting.push(resolve));
    try {
      return await task();
    } finally {
      release();
    }
  };
}

export interface FanoutTask<K, T> {
  id: K;
  run: () => Promise<T>;
}

export interface FanoutFailure<K> {
  id: K;
  error: unknown;
}

export interface FanoutResult<K, T> {
  results: Map<K, T>;
  failures: FanoutFailure<K>[];
}

/**
 * Runs every task with at most `concurrency` in flight. A failure is recorded
 * against its id and never stops the siblings.
 */
export async function settleAll<K, T>(
  tasks: readonly FanoutTask<K, T>[],
  concurrency: number,
): Promise<FanoutResult<K, T>> {
  const limit = createLimiter(concurrency);
  const settled = await Promise.allSettled(tasks.map((task) => limit(task.run)));

  const results = new Map<K, T>();
  const failures: FanoutFailure<K>[] = [];
  settled.forEach((outcome, i) => {
    const { id } = tasks[i];
    if (outcome.status === 'fulfilled') results.set(id, outcome.value);
    else failures.push({ id, error: outcome.reason });
  });
  return { results, failures };
}
