import { QueryAbortedError } from './errors';

export const DEFAULT_LOAD_CONCURRENCY = 8;

/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight. Results
 * land at the index of their input, so the output order never depends on
 * completion order. The first failure stops further scheduling and is
 * rethrown once in-flight tasks settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  let cursor = 0;
  const state: { failed: boolean; error: unknown } = { failed: false, error: undefined };

  const worker = async (): Promise<void> => {
    while (!state.failed && cursor < items.length) {
      if (signal?.aborted) {
        state.failed = true;
        state.error = new QueryAbortedError();
        return;
      }
      const index = cursor;
      cursor += 1;
      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        if (!state.failed) {
          state.failed = true;
          state.error = error;
        }
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (state.failed) {
    throw state.error;
  }
  return results;
}
