/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type WaitForOptions = {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
};

/**
 * Poll `predicate` until it holds or the timeout elapses.
 * Yields between polls, so nothing is held while waiting.
 *
 * @returns whether the predicate held before the timeout
 */
export async function waitFor(predicate: () => boolean, options: WaitForOptions): Promise<boolean> {
  const startedAt = Date.now();
  while (Date.now() - startedAt < options.timeoutMs) {
    if (predicate()) {
      return true;
    }
    await delay(options.intervalMs, options.signal);
  }
  return predicate();
}
