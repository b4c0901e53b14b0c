/**
 * Wait handle
 *
 * Single-assignment completion signal shared by a scheduler run (writer) and
 * its caller (reader).
 *
 * @module kusto-connector/scheduler/wait-handle
 */

import { sleep } from './timer.js';

/**
 * How a handle settled
 */
export type WaitOutcome = { status: 'resolved' } | { status: 'failed'; error: Error };

/**
 * Reader side of a {@link WaitHandle}: it can be waited on and inspected,
 * but not counted down or settled.
 */
export interface WaitSignal {
  readonly targetCount: number;
  readonly count: number;
  readonly isSettled: boolean;
  readonly result: WaitOutcome | undefined;
  wait(timeoutMs?: number): Promise<boolean>;
}

/**
 * Completion signal for one scheduled task.
 *
 * The remaining count starts at the target count and only ever goes down.
 * Settling drops it to zero; only the first settlement counts.
 */
export class WaitHandle implements WaitSignal {
  readonly targetCount: number;
  private remaining: number;
  private outcome?: WaitOutcome;
  private readonly settled: Promise<WaitOutcome>;
  private readonly release: (outcome: WaitOutcome) => void;

  constructor(targetCount = 1) {
    if (!Number.isInteger(targetCount) || targetCount < 1) {
      throw new RangeError(`Wait handle target count must be a positive integer, got ${targetCount}`);
    }
    this.targetCount = targetCount;
    this.remaining = targetCount;

    let release: (outcome: WaitOutcome) => void = () => undefined;
    this.settled = new Promise<WaitOutcome>((resolve) => {
      release = resolve;
    });
    this.release = release;
  }

  /**
   * Remaining count
   */
  get count(): number {
    return this.remaining;
  }

  get isSettled(): boolean {
    return this.outcome !== undefined;
  }

  /**
   * The settlement, once there is one
   */
  get result(): WaitOutcome | undefined {
    return this.outcome;
  }

  /**
   * Decrement the remaining count by one and return the new value.
   * Does nothing once the count is zero.
   */
  countDown(): number {
    if (this.remaining > 0) {
      this.remaining--;
    }
    return this.remaining;
  }

  /**
   * Settle successfully. Returns false if the handle had already settled.
   */
  resolve(): boolean {
    return this.settle({ status: 'resolved' });
  }

  /**
   * Settle with a failure. Returns false if the handle had already settled.
   */
  fail(error: Error): boolean {
    return this.settle({ status: 'failed', error });
  }

  /**
   * Wait for the handle to settle.
   *
   * Without a timeout this waits as long as it takes and resolves `true`.
   * With one, it resolves `false` if the handle has not settled when the
   * timeout elapses. Rejects with the failure if the handle failed.
   */
  async wait(timeoutMs?: number): Promise<boolean> {
    if (timeoutMs === undefined) {
      return this.unwrap(await this.settled);
    }

    const expiry = new AbortController();
    const expired = sleep(timeoutMs, expiry.signal).then(() => undefined);

    try {
      const outcome = await Promise.race([this.settled, expired]);
      return outcome === undefined ? false : this.unwrap(outcome);
    } finally {
      expiry.abort();
    }
  }

  /**
   * A view of this handle for readers
   */
  asSignal(): WaitSignal {
    const handle = this;
    return Object.freeze({
      targetCount: handle.targetCount,
      get count() {
        return handle.count;
      },
      get isSettled() {
        return handle.isSettled;
      },
      get result() {
        return handle.result;
      },
      wait: (timeoutMs?: number) => handle.wait(timeoutMs),
    });
  }

  private settle(outcome: WaitOutcome): boolean {
    if (this.outcome !== undefined) {
      return false;
    }
    this.outcome = outcome;
    this.remaining = 0;
    this.release(outcome);
    return true;
  }

  private unwrap(outcome: WaitOutcome): boolean {
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
    return true;
  }
}
