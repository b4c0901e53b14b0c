/**
 * Shared types for the Kusto connector.
 *
 * @module kusto-connector/types
 */

// ============================================================================
// Operation Status
// ============================================================================

/**
 * Lifecycle state of an asynchronous remote operation
 */
export type OperationState = 'Pending' | 'InProgress' | 'Completed' | 'Failed' | 'Unknown';

/**
 * States after which no further change is expected
 */
export const TERMINAL_STATES: readonly OperationState[] = ['Completed', 'Failed'];

/**
 * Snapshot of an operation's status, read once per poll
 */
export interface OperationStatus {
  readonly operationId: string;
  readonly state: OperationState;
  /** State text exactly as the service reported it */
  readonly rawState: string;
  readonly statusDetail: string;
}

/**
 * Final judgment of a completion wait
 */
export interface VerificationOutcome {
  /** The poll settled before the caller's wait gave up */
  readonly resolved: boolean;
  readonly timedOut: boolean;
  readonly lastStatus?: OperationStatus;
}

// ============================================================================
// Timeouts
// ============================================================================

/**
 * Sentinel for "wait without a time limit"
 */
export const NO_TIMEOUT = 'unlimited' as const;

/**
 * Milliseconds, or no limit at all
 */
export type WaitTimeout = number | typeof NO_TIMEOUT;

// ============================================================================
// Query Results
// ============================================================================

/**
 * Scalar cell value in a result table
 */
export type KustoValue = string | number | boolean | null;

/**
 * Column descriptor
 */
export interface KustoColumn {
  readonly name: string;
  readonly type?: string;
}

/**
 * Primary result table of a query or management command
 */
export interface KustoResultTable {
  readonly columns: readonly KustoColumn[];
  readonly rows: readonly (readonly KustoValue[])[];
}

/**
 * Per-request properties sent alongside a command
 */
export interface ClientRequestProperties {
  /** Correlation id for the request, e.g. `KPC.execute;<uuid>` */
  clientRequestId?: string;
  /** Server-side timeout in milliseconds */
  serverTimeoutMs?: number;
}

/**
 * Narrow "execute a command, get the rows back" capability
 */
export interface KustoQueryExecutor {
  execute(
    database: string,
    command: string,
    properties?: ClientRequestProperties
  ): Promise<KustoResultTable>;
}
