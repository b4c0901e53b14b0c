/**
 * Backoff delay arithmetic.
 *
 * @module kusto-connector/scheduler/backoff
 */

/**
 * Longest allowed wait between two probe calls (one minute)
 */
export const MAX_BACKOFF_DELAY_MS = 60_000;

/**
 * Double the delay, never past the ceiling. A delay already above the
 * ceiling stays as it is.
 */
export function nextBackoffDelay(currentMs: number, ceilingMs: number = MAX_BACKOFF_DELAY_MS): number {
  return Math.max(currentMs, Math.min(currentMs * 2, ceilingMs));
}

/**
 * First `count` delays of the sequence starting at `stepDelayMs`.
 *
 * @example
 * ```typescript
 * backoffDelays(1000, 4); // [1000, 2000, 4000, 8000]
 * ```
 */
export function backoffDelays(
  stepDelayMs: number,
  count: number,
  ceilingMs: number = MAX_BACKOFF_DELAY_MS
): number[] {
  const delays: number[] = [];
  let delay = stepDelayMs;
  for (let i = 0; i < count; i++) {
    delays.push(delay);
    delay = nextBackoffDelay(delay, ceilingMs);
  }
  return delays;
}
