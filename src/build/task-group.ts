export type TaskOutcome<R> =
  | { ok: true; value: R }
  | { ok: false; error: unknown };

export interface TaskGroupOptions {
  /** Maximum number of tasks running at once */
  concurrency: number;
  /** Once aborted, tasks that have not started are skipped */
  signal?: AbortSignal;
}

/**
 * Run one task per item with bounded concurrency and wait for all of them.
 *
 * A failing task never stops its siblings: every outcome is recorded, in
 * input order. Skipped tasks fail with the signal's abort reason.
 */
export async function runTaskGroup<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: TaskGroupOptions
): Promise<TaskOutcome<R>[]> {
  const outcomes: TaskOutcome<R>[] = new Array(items.length);
  const { signal } = options;
  let idx = 0;

  async function worker(): Promise<void> {
    while (idx < items.length) {
      const i = idx++;

      if (signal?.aborted) {
        outcomes[i] = { ok: false, error: signal.reason };
        continue;
      }

      try {
        outcomes[i] = { ok: true, value: await fn(items[i], i) };
      } catch (error) {
        outcomes[i] = { ok: false, error };
      }
    }
  }

  const workers = Math.max(1, Math.min(options.concurrency, items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  return outcomes;
}
