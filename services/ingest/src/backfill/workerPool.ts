export type TaskOutcome<T, R> = { item: T; ok: true; value: R } | { item: T; ok: false; error: unknown };

/**
 * Runs `worker` over `items` with at most `concurrency` tasks in flight.
 * Resolves once every task settled, with outcomes in completion order. A failed
 * task is reported, never retried, and does not stop the others.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>
): Promise<TaskOutcome<T, R>[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const outcomes: TaskOutcome<T, R>[] = [];
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next];
      next += 1;
      if (item === undefined) {
        continue;
      }
      try {
        outcomes.push({ item, ok: true, value: await worker(item) });
      } catch (error) {
        outcomes.push({ item, ok: false, error });
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => lane()));
  return outcomes;
}
