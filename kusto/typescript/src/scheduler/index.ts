/**
 * Backoff scheduling primitives.
 *
 * @module kusto-connector/scheduler
 */

export {
  BackoffScheduler,
  bounded,
  unbounded,
  scheduleWithBackoff,
  type BackoffTask,
  type BackoffSchedulerOptions,
  type IterationBudget,
} from './scheduler.js';
export { WaitHandle, type WaitOutcome, type WaitSignal } from './wait-handle.js';
export { sleep, MAX_TIMER_DELAY_MS } from './timer.js';
export { MAX_BACKOFF_DELAY_MS, nextBackoffDelay, backoffDelays } from './backoff.js';
