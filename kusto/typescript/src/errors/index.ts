/**
 * Error types for the Kusto connector.
 *
 * @module kusto-connector/errors
 */

/**
 * Error category for classification
 */
export type ErrorCategory = 'configuration' | 'polling' | 'timeout' | 'operation' | 'service';

/**
 * Base error class for all connector errors
 */
export abstract class KustoError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly isRetryable: boolean;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid option values or environment
 */
export class InvalidConfiguration extends KustoError {
  readonly category = 'configuration' as const;
  readonly isRetryable = false;
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: Error }) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.issues = issues;
  }
}

// ============================================================================
// Polling Errors
// ============================================================================

/**
 * The probe (status query) threw. Fatal to the poll, never retried.
 */
export class ProbeFault extends KustoError {
  readonly category = 'polling' as const;
  readonly isRetryable = false;
  readonly iteration: number;

  constructor(iteration: number, cause: Error) {
    super(`Probe failed on iteration ${iteration}: ${cause.message}`, { cause });
    this.iteration = iteration;
  }
}

/**
 * The poll was aborted through its signal
 */
export class PollCancelled extends KustoError {
  readonly category = 'polling' as const;
  readonly isRetryable = false;
  readonly iterations: number;

  constructor(iterations: number) {
    super(`Polling cancelled after ${iterations} iteration(s)`);
    this.iterations = iterations;
  }
}

// ============================================================================
// Timeout Errors
// ============================================================================

/**
 * Base class for timeout-class failures
 */
export abstract class OperationTimeout extends KustoError {
  readonly category = 'timeout' as const;
  readonly isRetryable = false;
}

/**
 * Polled the maximum number of times while the probe still asked to continue
 */
export class IterationBudgetExhausted extends OperationTimeout {
  readonly maxIterations: number;

  constructor(maxIterations: number) {
    super(`Timed out based on maximal allowed repetitions (${maxIterations}), aborting`);
    this.maxIterations = maxIterations;
  }
}

/**
 * The caller's bounded wait elapsed before the operation resolved
 */
export class OverallTimeoutExceeded extends OperationTimeout {
  readonly operationId: string;
  readonly timeoutMs: number;

  constructor(operationId: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms while waiting for operation with OperationId '${operationId}'`);
    this.operationId = operationId;
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================================
// Operation Errors
// ============================================================================

/**
 * The remote operation reached a terminal state other than Completed
 */
export class OperationFailed extends KustoError {
  readonly category = 'operation' as const;
  readonly isRetryable = false;
  readonly operationId: string;
  readonly state: string;
  readonly statusDetail: string;

  constructor(operationId: string, state: string, statusDetail: string) {
    super(
      `Failed to execute Kusto operation with OperationId '${operationId}', State: '${state}', Status: '${statusDetail}'`
    );
    this.operationId = operationId;
    this.state = state;
    this.statusDetail = statusDetail;
  }
}

// ============================================================================
// Service Errors
// ============================================================================

/**
 * A result table from the service could not be interpreted
 */
export class MalformedResponse extends KustoError {
  readonly category = 'service' as const;
  readonly isRetryable = false;
  readonly command?: string;

  constructor(message: string, command?: string) {
    super(command ? `${message} (command: ${command})` : message);
    this.command = command;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a connector error
 */
export function isKustoError(error: unknown): error is KustoError {
  return error instanceof KustoError;
}

/**
 * Check if an error is timeout-class
 */
export function isTimeoutError(error: unknown): error is OperationTimeout {
  return error instanceof OperationTimeout;
}

/**
 * Normalize anything thrown into an Error
 */
export function wrapError(error: unknown, context?: string): Error {
  if (error instanceof Error) {
    return error;
  }

  const message = String(error);
  return new Error(context ? `${context}: ${message}` : message);
}
