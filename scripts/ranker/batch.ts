export type BatchTask<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Starts every task at once and waits for all of them to settle. The first
 * failure aborts the signal handed to the remaining tasks and is rethrown
 * once they have settled; their results are discarded.
 */
export async function runBatch<T>(tasks: ReadonlyArray<BatchTask<T>>, parent?: AbortSignal): Promise<T[]> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", forwardAbort, { once: true });
  }

  const state: { failure?: { error: unknown } } = {};

  try {
    const settled = await Promise.allSettled(
      tasks.map(async (task) => {
        try {
          return await task(controller.signal);
        } catch (error) {
          if (!state.failure) {
            state.failure = { error };
            controller.abort(error);
          }
          throw error;
        }
      })
    );

    if (state.failure) {
      throw state.failure.error;
    }

    return settled.map((result) => {
      if (result.status === "rejected") {
        throw result.reason;
      }
      return result.value;
    });
  } finally {
    parent?.removeEventListener("abort", forwardAbort);
  }
}

/** Runs `worker` over `items` in consecutive batches of `size`, one batch at a time. */
export async function runInBatches<I, T>(
  items: readonly I[],
  size: number,
  worker: (item: I, signal: AbortSignal) => Promise<T>,
  options: { signal?: AbortSignal; onBatch?: (index: number, count: number) => void } = {}
): Promise<T[]> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Batch size must be a positive integer, got ${size}`);
  }

  const results: T[] = [];
  for (let start = 0; start < items.length; start += size) {
    const batch = items.slice(start, start + size);
    options.onBatch?.(start / size, batch.length);
    const batchResults = await runBatch(
      batch.map((item) => (signal: AbortSignal) => worker(item, signal)),
      options.signal
    );
    results.push(...batchResults);
  }
  return results;
}
