/**
 * Bounded worker pool. Outcomes come back in task order regardless of
 * completion order, so callers can attribute results by index.
 */

export type PoolOutcome<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; reason: unknown }
  | { status: "skipped" };

export interface PoolOptions {
  /** Maximum tasks in flight (at least 1). */
  concurrency: number;
  /** After the first rejection, tasks not yet started are skipped. */
  stopOnError?: boolean;
}

export async function runPool<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  options: PoolOptions,
): Promise<PoolOutcome<T>[]> {
  const outcomes: PoolOutcome<T>[] = tasks.map(() => ({ status: "skipped" }));
  let next = 0;
  let stopped = false;

  async function worker(): Promise<void> {
    while (!stopped && next < tasks.length) {
      const index = next++;
      try {
        outcomes[index] = { status: "fulfilled", value: await tasks[index]() };
      } catch (reason) {
        outcomes[index] = { status: "rejected", reason };
        if (options.stopOnError) stopped = true;
      }
    }
  }

  const workers = Math.min(Math.max(1, Math.floor(options.concurrency)), tasks.length);
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return outcomes;
}
