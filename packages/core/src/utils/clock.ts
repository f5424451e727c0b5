/**
 * Time source used by the rate limiter and run loop; tests swap in a fake.
 */
export interface Clock {
  now(): number;
  /**
   * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Longest delay `setTimeout` honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", finish);
      resolve();
    };
    const schedule = () => {
      const chunk = Math.min(Math.max(remaining, 0), MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        remaining -= chunk;
        if (remaining > 0) {
          schedule();
        } else {
          finish();
        }
      }, chunk);
    };

    signal?.addEventListener("abort", finish, { once: true });
    schedule();
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
