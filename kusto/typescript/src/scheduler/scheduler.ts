/**
 * Backoff Scheduler
 *
 * Runs a probe on a timer, doubling the delay between calls while the probe's
 * result asks to keep going. Stops when the result says stop, when the
 * iteration budget runs out, or when the caller aborts.
 *
 * @module kusto-connector/scheduler
 */

import {
  InvalidConfiguration,
  IterationBudgetExhausted,
  PollCancelled,
  ProbeFault,
  isKustoError,
  wrapError,
} from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { MAX_BACKOFF_DELAY_MS, nextBackoffDelay } from './backoff.js';
import { sleep } from './timer.js';
import { WaitHandle, type WaitSignal } from './wait-handle.js';

/**
 * How many times a task may run
 */
export type IterationBudget =
  | { kind: 'bounded'; maxIterations: number }
  | { kind: 'unbounded' };

/**
 * A unit of repeated work
 */
export interface BackoffTask<R> {
  /** Called once per iteration; must be safe to call repeatedly */
  probe: () => R | Promise<R>;
  /** `true` schedules another call */
  shouldContinue: (result: R) => boolean;
  /** Called once with the last result when polling stops on its own */
  onStop: (result: R) => void;
  /** Delay before the first call */
  initialDelayMs: number;
  /** Delay before the second call; doubles afterwards up to the ceiling, and is never shortened */
  stepDelayMs: number;
  budget: IterationBudget;
  /** Aborting stops the task before its next call */
  signal?: AbortSignal;
}

/**
 * Scheduler options
 */
export interface BackoffSchedulerOptions {
  /** Ceiling for the delay between calls (default: one minute) */
  maxDelayMs?: number;
  logger?: Logger;
  /**
   * Receives every failure that ends a run, except those of runs whose
   * signal has aborted.
   * Defaults to logging at error level.
   */
  onFault?: (error: Error) => void;
}

/**
 * Shorthand for a budget of at most `maxIterations` calls
 */
export function bounded(maxIterations: number): IterationBudget {
  return { kind: 'bounded', maxIterations };
}

/**
 * Shorthand for a budget without a cap
 */
export function unbounded(): IterationBudget {
  return { kind: 'unbounded' };
}

/**
 * Exponential backoff scheduler.
 *
 * Each scheduled task runs as one loop with at most one pending timer, so
 * calls to the probe never overlap and always happen off the caller's stack.
 *
 * @example
 * ```typescript
 * const scheduler = new BackoffScheduler();
 * let last: string | undefined;
 * const handle = scheduler.schedule({
 *   probe: () => client.status(id),
 *   shouldContinue: (state) => state === 'InProgress',
 *   onStop: (state) => { last = state; },
 *   initialDelayMs: 0,
 *   stepDelayMs: 1000,
 *   budget: bounded(20),
 * });
 * await handle.wait(60_000);
 * ```
 */
export class BackoffScheduler {
  private readonly maxDelayMs: number;
  private readonly logger: Logger;
  private readonly onFault: (error: Error) => void;

  constructor(options: BackoffSchedulerOptions = {}) {
    const maxDelayMs = options.maxDelayMs ?? MAX_BACKOFF_DELAY_MS;
    if (!Number.isFinite(maxDelayMs) || maxDelayMs < 0) {
      throw new InvalidConfiguration('Backoff ceiling must be a non-negative number', [
        `maxDelayMs ${maxDelayMs}`,
      ]);
    }
    this.maxDelayMs = maxDelayMs;
    this.logger = options.logger ?? new NoopLogger();
    this.onFault =
      options.onFault ??
      ((error) => this.logger.error('Scheduled task failed', { error: error.name, message: error.message }));
  }

  /**
   * Start a task. Returns at once; the returned handle settles when the task
   * stops for any reason.
   */
  schedule<R>(task: BackoffTask<R>): WaitSignal {
    validateTask(task);

    const handle = new WaitHandle(task.budget.kind === 'bounded' ? task.budget.maxIterations : 1);
    this.run(task, handle).catch((error: unknown) => {
      handle.fail(wrapError(error));
    });
    return handle.asSignal();
  }

  private async run<R>(task: BackoffTask<R>, handle: WaitHandle): Promise<void> {
    let delayMs = task.initialDelayMs;
    let stepMs = task.stepDelayMs;
    let iteration = 0;

    try {
      for (;;) {
        await sleep(delayMs, task.signal);
        if (task.signal?.aborted) {
          this.logger.debug('Scheduled task cancelled', { iterations: iteration });
          handle.fail(new PollCancelled(iteration));
          return;
        }

        iteration++;
        let result: R;
        try {
          result = await task.probe();
        } catch (error) {
          throw new ProbeFault(iteration, wrapError(error));
        }

        if (task.budget.kind === 'bounded' && handle.countDown() === 0) {
          throw new IterationBudgetExhausted(task.budget.maxIterations);
        }

        if (!task.shouldContinue(result)) {
          task.onStop(result);
          handle.resolve();
          this.logger.debug('Scheduled task finished', { iterations: iteration });
          return;
        }

        delayMs = stepMs;
        stepMs = nextBackoffDelay(stepMs, this.maxDelayMs);
        this.logger.trace('Scheduling next call', { iteration, delayMs });
      }
    } catch (error) {
      const failure = isKustoError(error) ? error : new ProbeFault(iteration, wrapError(error));
      handle.fail(failure);
      if (task.signal?.aborted) {
        this.logger.debug('Cancelled task failed after abort', { error: failure.name, message: failure.message });
        return;
      }
      this.onFault(failure);
    }
  }
}

function validateTask<R>(task: BackoffTask<R>): void {
  const issues: string[] = [];
  if (!Number.isFinite(task.initialDelayMs) || task.initialDelayMs < 0) {
    issues.push(`initialDelayMs must be a non-negative number, got ${task.initialDelayMs}`);
  }
  if (!Number.isFinite(task.stepDelayMs) || task.stepDelayMs < 0) {
    issues.push(`stepDelayMs must be a non-negative number, got ${task.stepDelayMs}`);
  }
  if (
    task.budget.kind === 'bounded' &&
    (!Number.isInteger(task.budget.maxIterations) || task.budget.maxIterations < 1)
  ) {
    issues.push(`maxIterations must be a positive integer, got ${task.budget.maxIterations}`);
  }
  if (issues.length > 0) {
    throw new InvalidConfiguration('Invalid backoff task', issues);
  }
}

/**
 * Schedule a task on a scheduler built from `options`
 */
export function scheduleWithBackoff<R>(task: BackoffTask<R>, options?: BackoffSchedulerOptions): WaitSignal {
  return new BackoffScheduler(options).schedule(task);
}
