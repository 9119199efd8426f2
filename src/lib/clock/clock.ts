/**
 * Time source used by the resilience components.
 *
 * Everything that reads the time or waits goes through a `Clock`, so tests can
 * drive refill windows, recovery timeouts and backoff with fake timers.
 */

export interface Clock {
  /** Current time in epoch milliseconds */
  now: () => number;
  /**
   * Waits for `ms` milliseconds. Resolves early (never rejects) when `signal`
   * aborts; callers check `signal.aborted` afterwards.
   */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const createSystemClock = (): Clock => ({
  now: () => Date.now(),
  sleep,
});

export const systemClock: Clock = createSystemClock();
