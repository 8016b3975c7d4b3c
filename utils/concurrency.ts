export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs `worker` over `items` with at most `maxConcurrent` calls in flight.
 * Results come back in input order; a rejected call is reported as its
 * error instead of failing the whole batch.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrent: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<Array<{ value: R; error: null } | { value: null; error: Error }>> {
  const limit = Math.max(1, Math.floor(maxConcurrent));
  const results: Array<{ value: R; error: null } | { value: null; error: Error }> = new Array(items.length);
  let next = 0;

  const runners = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      try {
        const value = await worker(items[index], index);
        results[index] = { value, error: null };
      } catch (error) {
        results[index] = { value: null, error: error instanceof Error ? error : new Error(String(error)) };
      }
    }
  });

  await Promise.all(runners);
  return results;
}

/**
 * Races `task` against a timer. On expiry the controller passed to `task`
 * is aborted and `onTimeout()` is thrown.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new Error('Operation aborted');
  }
}
