/**
 * Clock
 *
 * Time source and sleeper for the orchestration layer. Injected so that
 * quota windows and waits can be driven by virtual time in tests.
 */

export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
  /**
   * Resolve after `ms` milliseconds. Rejects with the signal's reason if
   * the signal fires first.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
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
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: delay,
};
