/**
 * Tests for OperationCompletionVerifier
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ITERATION_SAFETY_MARGIN,
  OperationCompletionVerifier,
  deriveIterationBudget,
  normalizeSamplePeriod,
  type StatusQuery,
} from '../index.js';
import {
  InvalidConfiguration,
  OperationFailed,
  OverallTimeoutExceeded,
  ProbeFault,
  isTimeoutError,
} from '../../errors/index.js';
import { InMemoryMetricsCollector, KustoMetrics } from '../../observability/index.js';
import { NO_TIMEOUT, type OperationState, type OperationStatus } from '../../types/index.js';
import { RecordingLogger, operationStatus } from '../../testing/index.js';

function statusQuery(...states: OperationState[]) {
  const fetch = vi.fn(async (_operationId: string): Promise<OperationStatus> => {
    return operationStatus(states[states.length - 1]);
  });
  for (const state of states.slice(0, -1)) {
    fetch.mockResolvedValueOnce(operationStatus(state));
  }
  return { fetch } satisfies StatusQuery;
}

function settle(promise: Promise<unknown>): { result: Promise<unknown>; done: () => boolean } {
  let finished = false;
  const result = promise.then(
    () => {
      finished = true;
      return undefined;
    },
    (error: unknown) => {
      finished = true;
      return error;
    }
  );
  return { result, done: () => finished };
}

describe('normalizeSamplePeriod', () => {
  it('should clamp periods below one millisecond', () => {
    expect(normalizeSamplePeriod(0)).toBe(1);
    expect(normalizeSamplePeriod(0.4)).toBe(1);
    expect(normalizeSamplePeriod(-20)).toBe(1);
    expect(normalizeSamplePeriod(Number.NaN)).toBe(1);
  });

  it('should floor fractional periods', () => {
    expect(normalizeSamplePeriod(1500.7)).toBe(1500);
  });
});

describe('deriveIterationBudget', () => {
  it('should allow timeout / period calls plus a safety margin', () => {
    expect(deriveIterationBudget(5000, 1000)).toEqual({ kind: 'bounded', maxIterations: 10 });
    expect(deriveIterationBudget(999, 1000)).toEqual({ kind: 'bounded', maxIterations: 5 });
    expect(deriveIterationBudget(0, 1000)).toEqual({ kind: 'bounded', maxIterations: 5 });
  });

  it('should use the clamped period', () => {
    expect(deriveIterationBudget(10_000, 0)).toEqual({ kind: 'bounded', maxIterations: 10_005 });
  });

  it('should be unbounded without a timeout', () => {
    expect(deriveIterationBudget(NO_TIMEOUT, 1000)).toEqual({ kind: 'unbounded' });
  });

  it('should always be floor(timeout / period) + 5 and at least 5', () => {
    const cases: Array<[number, number]> = [
      [0, 1],
      [1, 1],
      [59_999, 60_000],
      [3_600_000, 1000],
      [7, 3],
      [1_000_000, 7],
    ];
    for (const [timeout, period] of cases) {
      const budget = deriveIterationBudget(timeout, period);
      expect(budget.kind).toBe('bounded');
      if (budget.kind === 'bounded') {
        expect(budget.maxIterations).toBe(Math.floor(timeout / period) + ITERATION_SAFETY_MARGIN);
        expect(budget.maxIterations).toBeGreaterThanOrEqual(5);
      }
    }
  });
});

describe('OperationCompletionVerifier', () => {
  let metrics: InMemoryMetricsCollector;
  let logger: RecordingLogger;
  let verifier: OperationCompletionVerifier;

  beforeEach(() => {
    vi.useFakeTimers();
    metrics = new InMemoryMetricsCollector();
    logger = new RecordingLogger();
    verifier = new OperationCompletionVerifier({ metrics, logger });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('verify', () => {
    it('should return after one call when the operation is already complete', async () => {
      const query = statusQuery('Completed');

      const pending = settle(verifier.verify(query, 'op-1', 1000, 60_000));
      await vi.advanceTimersByTimeAsync(1);

      expect(await pending.result).toBeUndefined();
      expect(query.fetch).toHaveBeenCalledTimes(1);
      expect(query.fetch).toHaveBeenCalledWith('op-1');
      expect(
        metrics.getCounter(KustoMetrics.OPERATION_VERIFICATIONS_TOTAL, { result: 'completed' })
      ).toBe(1);
      expect(metrics.getCounter(KustoMetrics.OPERATION_POLLS_TOTAL, { state: 'Completed' })).toBe(1);
    });

    it('should return once the operation completes after a few polls', async () => {
      // Delays double from the period (1s, 2s, 4s), so the fourth call lands at
      // 7s; a 5s timeout would expire before it.
      const query = statusQuery('InProgress', 'InProgress', 'InProgress', 'Completed');

      const pending = settle(verifier.verify(query, 'op-1', 1000, 10_000));

      await vi.advanceTimersByTimeAsync(6999);
      expect(pending.done()).toBe(false);
      expect(query.fetch).toHaveBeenCalledTimes(3);

      await vi.advanceTimersByTimeAsync(1);
      expect(await pending.result).toBeUndefined();
      expect(query.fetch).toHaveBeenCalledTimes(4);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should fail with the terminal state when the Nth call reports Failed', async () => {
      const query = {
        fetch: vi
          .fn(async (_operationId: string) => operationStatus('Failed', 'Extent merge failed'))
          .mockResolvedValueOnce(operationStatus('InProgress'))
          .mockResolvedValueOnce(operationStatus('InProgress')),
      } satisfies StatusQuery;

      const pending = settle(verifier.verify(query, 'op-1', 1000, 60_000));
      await vi.advanceTimersByTimeAsync(3000);

      const error = await pending.result;
      expect(error).toBeInstanceOf(OperationFailed);
      expect(error instanceof OperationFailed && error.state).toBe('Failed');
      expect(error instanceof OperationFailed && error.statusDetail).toBe('Extent merge failed');
      expect(error instanceof Error && error.message).toBe(
        "Failed to execute Kusto operation with OperationId 'op-1', State: 'Failed', Status: 'Extent merge failed'"
      );
      expect(query.fetch).toHaveBeenCalledTimes(3);
      expect(metrics.getCounter(KustoMetrics.OPERATION_VERIFICATIONS_TOTAL, { result: 'failed' })).toBe(1);
    });

    it('should fail when the operation stops in a state it does not recognise', async () => {
      const query: StatusQuery = {
        fetch: vi.fn(async () => ({
          operationId: 'op-1',
          state: 'Unknown' as const,
          rawState: 'Abandoned',
          statusDetail: 'Node restarted',
        })),
      };

      const pending = settle(verifier.verify(query, 'op-1', 1000, 60_000));
      await vi.advanceTimersByTimeAsync(1);

      const error = await pending.result;
      expect(error).toBeInstanceOf(OperationFailed);
      expect(error instanceof OperationFailed && error.state).toBe('Abandoned');
      expect(logger.entries.map((entry) => entry.message)).toContain(
        'Operation left InProgress for a non-terminal state'
      );
    });

    it('should time out when the operation never leaves InProgress', async () => {
      const query = statusQuery('InProgress');

      const pending = settle(verifier.verify(query, 'op-1', 1000, 5000));

      await vi.advanceTimersByTimeAsync(4999);
      expect(pending.done()).toBe(false);

      await vi.advanceTimersByTimeAsync(1);

      const error = await pending.result;
      expect(error).toBeInstanceOf(OverallTimeoutExceeded);
      expect(isTimeoutError(error)).toBe(true);
      expect(error instanceof OverallTimeoutExceeded && error.timeoutMs).toBe(5000);
      expect(error instanceof OverallTimeoutExceeded && error.operationId).toBe('op-1');
      expect(query.fetch).toHaveBeenCalledTimes(3);
      expect(metrics.getCounter(KustoMetrics.OPERATION_VERIFICATIONS_TOTAL, { result: 'timeout' })).toBe(1);

      await vi.advanceTimersByTimeAsync(120_000);
      expect(query.fetch).toHaveBeenCalledTimes(3);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should propagate a status query failure without polling again', async () => {
      const networkError = new Error('socket hang up');
      const query = statusQuery('InProgress');
      query.fetch.mockResolvedValueOnce(operationStatus('InProgress')).mockRejectedValueOnce(networkError);

      const pending = settle(verifier.verify(query, 'op-1', 1000, 60_000));
      await vi.advanceTimersByTimeAsync(1000);

      const error = await pending.result;
      expect(error).toBeInstanceOf(ProbeFault);
      expect(error instanceof ProbeFault && error.cause).toBe(networkError);
      expect(query.fetch).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(60_000);
      expect(query.fetch).toHaveBeenCalledTimes(2);
    });

    it('should wait without a limit when no timeout is given', async () => {
      const query = statusQuery('InProgress', 'InProgress', 'InProgress', 'InProgress', 'InProgress', 'Completed');

      const pending = settle(verifier.verify(query, 'op-1', 1000, NO_TIMEOUT));

      await vi.advanceTimersByTimeAsync(30_999);
      expect(pending.done()).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      expect(await pending.result).toBeUndefined();
      expect(query.fetch).toHaveBeenCalledTimes(6);
    });

    it('should poll every millisecond at most when the period is zero', async () => {
      const query = statusQuery('InProgress', 'Completed');

      const pending = settle(verifier.verify(query, 'op-1', 0, 1000));
      await vi.advanceTimersByTimeAsync(0);
      expect(query.fetch).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(await pending.result).toBeUndefined();
      expect(query.fetch).toHaveBeenCalledTimes(2);
    });

    it('should honour a timeout longer than one timer can hold', async () => {
      const thirtyDays = 30 * 24 * 60 * 60 * 1000;
      const query = statusQuery('InProgress', 'Completed');

      const pending = settle(verifier.verify(query, 'op-1', 50, thirtyDays));
      await vi.advanceTimersByTimeAsync(1000);

      expect(await pending.result).toBeUndefined();
      expect(query.fetch).toHaveBeenCalledTimes(2);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should poll at a period above one minute without running out of calls', async () => {
      let calls = 0;
      const query = {
        fetch: vi.fn(async (_operationId: string) => {
          calls++;
          return operationStatus(calls >= 21 ? 'Completed' : 'InProgress');
        }),
      } satisfies StatusQuery;

      expect(deriveIterationBudget(3_600_000, 120_000)).toEqual({ kind: 'bounded', maxIterations: 35 });

      const pending = settle(verifier.verify(query, 'op-1', 120_000, 3_600_000));

      await vi.advanceTimersByTimeAsync(2_399_999);
      expect(pending.done()).toBe(false);
      expect(query.fetch).toHaveBeenCalledTimes(20);

      await vi.advanceTimersByTimeAsync(1);
      expect(await pending.result).toBeUndefined();
      expect(query.fetch).toHaveBeenCalledTimes(21);
    });

    it('should reject a negative timeout', async () => {
      const query = statusQuery('Completed');

      await expect(verifier.verify(query, 'op-1', 1000, -1)).rejects.toBeInstanceOf(InvalidConfiguration);
      expect(query.fetch).not.toHaveBeenCalled();
    });
  });

  describe('awaitOutcome', () => {
    it('should report the last status once resolved', async () => {
      const query = statusQuery('InProgress', 'Completed');

      const outcome = verifier.awaitOutcome(query, 'op-1', 100, 10_000);
      await vi.advanceTimersByTimeAsync(100);

      await expect(outcome).resolves.toEqual({
        resolved: true,
        timedOut: false,
        lastStatus: operationStatus('Completed'),
      });
    });

    it('should report a timeout without throwing', async () => {
      const query = statusQuery('InProgress');

      const outcome = verifier.awaitOutcome(query, 'op-1', 100, 250);
      await vi.advanceTimersByTimeAsync(250);

      await expect(outcome).resolves.toEqual({
        resolved: false,
        timedOut: true,
        lastStatus: undefined,
      });
    });
  });
});
