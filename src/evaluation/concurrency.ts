// ── Bounded Fan-out / Fan-in ────────────────────────────────────────────────

/**
 * Options for `runWithConcurrency()`.
 *
 * Each task function receives an `AbortSignal` that fires on either:
 *   1. Parent signal abort (caller cancellation)
 *   2. Fail-fast abort (another task returned a failed result), only when
 *      `isFailed` is given
 */
export interface ConcurrencyOptions<T> {
  readonly tasks: ReadonlyArray<(signal: AbortSignal) => Promise<T>>;
  /** Maximum number of tasks running simultaneously. Clamped to >= 1. */
  readonly maxConcurrency: number;
  readonly signal?: AbortSignal;
  /** Enables fail-fast: the first result matching this stops the batch. */
  readonly isFailed?: (result: T) => boolean;
}

export interface ConcurrencyResult<T> {
  /** Results in input order. Only includes slots for tasks that were started. */
  readonly results: readonly T[];
  /** Index of the first task that failed (fail-fast mode or a thrown task). */
  readonly firstFailureIndex: number | null;
  /** True if the parent signal (not fail-fast) caused the abort. */
  readonly aborted: boolean;
}

/**
 * Execute async tasks with bounded concurrency.
 *
 * - Launches up to `maxConcurrency` tasks at a time; waits for every launched
 *   task to settle before resolving
 * - With `isFailed`, the first failure aborts in-flight tasks through a child
 *   `AbortController` and stops launching new ones
 * - A task that throws counts as a failure and is omitted from `results`
 * - Never throws
 */
export async function runWithConcurrency<T>(
  options: ConcurrencyOptions<T>,
): Promise<ConcurrencyResult<T>> {
  const { tasks, maxConcurrency, signal, isFailed } = options;

  if (tasks.length === 0) {
    return { results: [], firstFailureIndex: null, aborted: false };
  }

  if (signal?.aborted) {
    return { results: [], firstFailureIndex: null, aborted: true };
  }

  const effectiveConcurrency = Math.max(1, Math.min(maxConcurrency, tasks.length));

  const childController = new AbortController();
  const childSignal = childController.signal;

  const slots: { value: T }[] = [];
  let nextIndex = 0;
  let launchedCount = 0;
  let settledCount = 0;
  let firstFailureIndex: number | null = null;
  let parentAborted = false;

  return new Promise<ConcurrencyResult<T>>((resolve) => {
    const onParentAbort = () => {
      parentAborted = true;
      childController.abort();
      tryResolve();
    };

    const tryResolve = () => {
      if (settledCount < launchedCount) return;
      if (!parentAborted && !childSignal.aborted && nextIndex < tasks.length) return;

      signal?.removeEventListener("abort", onParentAbort);

      const results: T[] = [];
      for (let i = 0; i < launchedCount; i++) {
        const slot = slots[i];
        if (slot) results.push(slot.value);
      }

      resolve({ results, firstFailureIndex, aborted: parentAborted });
    };

    const markFailed = (index: number) => {
      if (firstFailureIndex === null) {
        firstFailureIndex = index;
        childController.abort();
      }
    };

    const launchNext = () => {
      while (
        nextIndex < tasks.length &&
        !childSignal.aborted &&
        launchedCount - settledCount < effectiveConcurrency
      ) {
        launchTask(nextIndex++);
      }
    };

    const launchTask = (index: number) => {
      const taskFn = tasks[index];
      if (!taskFn) return;
      launchedCount++;

      taskFn(childSignal).then(
        (value) => {
          settledCount++;
          slots[index] = { value };
          if (isFailed?.(value)) {
            markFailed(index);
          }
          launchNext();
          tryResolve();
        },
        () => {
          settledCount++;
          markFailed(index);
          tryResolve();
        },
      );
    };

    signal?.addEventListener("abort", onParentAbort, { once: true });

    launchNext();
  });
}
