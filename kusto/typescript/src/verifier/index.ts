/**
 * Operation Completion Verifier
 *
 * Polls a remote operation's status until it leaves `InProgress`, then
 * decides whether the operation succeeded.
 *
 * @module kusto-connector/verifier
 */

import { InvalidConfiguration, OperationFailed, OverallTimeoutExceeded } from '../errors/index.js';
import {
  KustoMetrics,
  NoopLogger,
  NoopMetricsCollector,
  type Logger,
  type MetricsCollector,
} from '../observability/index.js';
import { BackoffScheduler, bounded, unbounded, type IterationBudget } from '../scheduler/index.js';
import {
  NO_TIMEOUT,
  TERMINAL_STATES,
  type OperationStatus,
  type VerificationOutcome,
  type WaitTimeout,
} from '../types/index.js';

/**
 * Fetches a fresh status for an operation. Failures propagate to the poll,
 * which treats them as fatal.
 */
export interface StatusQuery {
  fetch(operationId: string): Promise<OperationStatus>;
}

/**
 * Extra calls allowed on top of `timeout / period`, so the scheduler's own cap
 * never fires before the caller's timeout does.
 */
export const ITERATION_SAFETY_MARGIN = 5;

/**
 * Clamp a sample period to a whole number of milliseconds, at least 1.
 */
export function normalizeSamplePeriod(samplePeriodMs: number): number {
  if (!Number.isFinite(samplePeriodMs) || samplePeriodMs < 1) {
    return 1;
  }
  return Math.floor(samplePeriodMs);
}

/**
 * Iteration budget for a wait of `timeout` polling every `samplePeriodMs`.
 */
export function deriveIterationBudget(timeout: WaitTimeout, samplePeriodMs: number): IterationBudget {
  if (timeout === NO_TIMEOUT) {
    return unbounded();
  }
  const period = normalizeSamplePeriod(samplePeriodMs);
  return bounded(Math.floor(timeout / period) + ITERATION_SAFETY_MARGIN);
}

/**
 * Verifier dependencies
 */
export interface OperationCompletionVerifierOptions {
  scheduler?: BackoffScheduler;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Waits for asynchronous remote operations to finish.
 *
 * @example
 * ```typescript
 * const verifier = new OperationCompletionVerifier();
 * await verifier.verify(statusQuery, operationId, 1000, 600_000);
 * ```
 */
export class OperationCompletionVerifier {
  private readonly scheduler: BackoffScheduler;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: OperationCompletionVerifierOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.scheduler = options.scheduler ?? new BackoffScheduler({ logger: this.logger });
  }

  /**
   * Wait for the operation and throw unless it completed.
   *
   * @throws OverallTimeoutExceeded if `timeout` elapses first
   * @throws OperationFailed if the operation stopped in any state but Completed
   * @throws ProbeFault if the status query threw
   * @throws IterationBudgetExhausted if the poll used up its budget
   */
  async verify(
    statusQuery: StatusQuery,
    operationId: string,
    samplePeriodMs: number,
    timeout: WaitTimeout
  ): Promise<void> {
    const outcome = await this.awaitOutcome(statusQuery, operationId, samplePeriodMs, timeout);

    if (outcome.timedOut && timeout !== NO_TIMEOUT) {
      this.metrics.increment(KustoMetrics.OPERATION_VERIFICATIONS_TOTAL, 1, { result: 'timeout' });
      throw new OverallTimeoutExceeded(operationId, timeout);
    }

    const last = outcome.lastStatus;
    if (last === undefined || last.state !== 'Completed') {
      this.metrics.increment(KustoMetrics.OPERATION_VERIFICATIONS_TOTAL, 1, { result: 'failed' });
      throw new OperationFailed(
        last?.operationId ?? operationId,
        last?.rawState ?? 'Unknown',
        last?.statusDetail ?? ''
      );
    }

    this.metrics.increment(KustoMetrics.OPERATION_VERIFICATIONS_TOTAL, 1, { result: 'completed' });
    this.logger.info('Operation completed', { operationId });
  }

  /**
   * Wait for the operation and report what was seen, without judging it.
   * Scheduler failures still reject.
   */
  async awaitOutcome(
    statusQuery: StatusQuery,
    operationId: string,
    samplePeriodMs: number,
    timeout: WaitTimeout
  ): Promise<VerificationOutcome> {
    if (timeout !== NO_TIMEOUT && (!Number.isFinite(timeout) || timeout < 0)) {
      throw new InvalidConfiguration(`Timeout must be a non-negative number of milliseconds or '${NO_TIMEOUT}'`, [
        `timeout ${timeout}`,
      ]);
    }

    const period = normalizeSamplePeriod(samplePeriodMs);
    const budget = deriveIterationBudget(timeout, period);
    const controller = new AbortController();
    const startTime = Date.now();
    const captured: { last?: OperationStatus } = {};

    this.logger.debug('Waiting for operation', {
      operationId,
      samplePeriodMs: period,
      timeout,
      maxIterations: budget.kind === 'bounded' ? budget.maxIterations : 'unbounded',
    });

    const handle = this.scheduler.schedule<OperationStatus>({
      probe: async () => {
        const status = await statusQuery.fetch(operationId);
        this.metrics.increment(KustoMetrics.OPERATION_POLLS_TOTAL, 1, { state: status.state });
        this.logger.debug('Polled operation status', { operationId, state: status.rawState });
        return status;
      },
      shouldContinue: (status) => status.state === 'InProgress',
      onStop: (status) => {
        captured.last = status;
      },
      initialDelayMs: 0,
      stepDelayMs: period,
      budget,
      signal: controller.signal,
    });

    let resolved: boolean;
    try {
      resolved = timeout === NO_TIMEOUT ? await handle.wait() : await handle.wait(timeout);
    } finally {
      this.metrics.histogram(KustoMetrics.OPERATION_WAIT_DURATION_MS, Date.now() - startTime);
    }

    if (!resolved) {
      controller.abort();
      this.logger.warn('Gave up waiting for operation', { operationId, timeout });
      return { resolved: false, timedOut: true, lastStatus: captured.last };
    }

    const lastStatus = captured.last;
    if (lastStatus !== undefined && !TERMINAL_STATES.includes(lastStatus.state)) {
      this.logger.warn('Operation left InProgress for a non-terminal state', {
        operationId,
        state: lastStatus.rawState,
      });
    }

    return { resolved: true, timedOut: false, lastStatus };
  }
}
