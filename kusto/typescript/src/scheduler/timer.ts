/**
 * Abortable sleep for delays of any length.
 *
 * @module kusto-connector/scheduler/timer
 */

/**
 * Longest delay a single timer can hold; larger values fire after 1 ms.
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

function sleepOnce(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Resolve after `ms` milliseconds, or as soon as `signal` aborts.
 * Delays past {@link MAX_TIMER_DELAY_MS} are waited out in chunks.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  let remaining = Math.max(0, ms);
  do {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await sleepOnce(chunk, signal);
    remaining -= chunk;
  } while (remaining > 0 && !signal?.aborted);
}
