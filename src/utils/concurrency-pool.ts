/**
 * Bounded concurrency pool: N workers pull tasks from a shared queue.
 */

export type TaskOutcome<T> = { status: 'fulfilled'; value: T } | { status: 'rejected'; error: Error };

export interface ConcurrencyResult<T> {
  /** Per-task outcomes, in input order */
  results: TaskOutcome<T>[];
  succeeded: number;
  failed: number;
}

/**
 * Run task factories with at most `limit` in flight. A task that throws does
 * not stop the others.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number
): Promise<ConcurrencyResult<T>> {
  if (tasks.length === 0) {
    return { results: [], succeeded: 0, failed: 0 };
  }

  const effectiveLimit = Math.max(1, Math.min(Math.floor(limit) || 1, tasks.length));
  const results = new Map<number, TaskOutcome<T>>();
  let nextIndex = 0;
  let succeeded = 0;
  let failed = 0;

  async function runWorker(): Promise<void> {
    while (nextIndex < tasks.length) {
      const i = nextIndex++;
      try {
        const value = await tasks[i]();
        results.set(i, { status: 'fulfilled', value });
        succeeded++;
      } catch (err) {
        results.set(i, { status: 'rejected', error: err instanceof Error ? err : new Error(String(err)) });
        failed++;
      }
    }
  }

  await Promise.all(Array.from({ length: effectiveLimit }, () => runWorker()));

  const ordered: TaskOutcome<T>[] = [];
  for (let i = 0; i < tasks.length; i++) {
    ordered.push(results.get(i) ?? { status: 'rejected', error: new Error(`Task ${i} did not run`) });
  }
  return { results: ordered, succeeded, failed };
}
