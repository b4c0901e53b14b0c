/**
 * Result table parsing for operation tracking.
 *
 * @module kusto-connector/operations/parser
 */

import { MalformedResponse } from '../errors/index.js';
import type { KustoResultTable, KustoValue, OperationState, OperationStatus } from '../types/index.js';

/**
 * Column names in the `.show operations` result
 */
export const OperationColumns = {
  OPERATION_ID: 'OperationId',
  STATE: 'State',
  STATUS: 'Status',
} as const;

const KNOWN_STATES: ReadonlySet<string> = new Set<string>([
  'Pending',
  'InProgress',
  'Completed',
  'Failed',
]);

function isKnownState(value: string): value is OperationState {
  return KNOWN_STATES.has(value);
}

/**
 * Map the service's state text to an {@link OperationState}.
 * Matching is exact; anything unrecognised is `Unknown`.
 */
export function parseOperationState(value: string): OperationState {
  return isKnownState(value) ? value : 'Unknown';
}

function cellToString(value: KustoValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value);
}

/**
 * Index of each column by name
 */
export function columnIndex(table: KustoResultTable): Map<string, number> {
  const index = new Map<string, number>();
  table.columns.forEach((column, i) => index.set(column.name, i));
  return index;
}

/**
 * Read the first row of a `.show operations` result.
 *
 * @param requestedId - used when the table carries no OperationId column
 */
export function parseOperationStatus(
  table: KustoResultTable,
  requestedId: string,
  command?: string
): OperationStatus {
  const columns = columnIndex(table);
  const stateIdx = columns.get(OperationColumns.STATE);
  if (stateIdx === undefined) {
    throw new MalformedResponse(`Operation status result has no '${OperationColumns.STATE}' column`, command);
  }

  const row = table.rows[0];
  if (row === undefined) {
    throw new MalformedResponse(`No status returned for operation '${requestedId}'`, command);
  }

  const statusIdx = columns.get(OperationColumns.STATUS);
  const idIdx = columns.get(OperationColumns.OPERATION_ID);
  const rawState = cellToString(row[stateIdx]);
  const reportedId = idIdx === undefined ? '' : cellToString(row[idIdx]);

  return {
    operationId: reportedId || requestedId,
    state: parseOperationState(rawState),
    rawState,
    statusDetail: statusIdx === undefined ? '' : cellToString(row[statusIdx]),
  };
}

/**
 * Operation id returned by an async management command: the first cell of
 * its first row.
 */
export function operationIdFromCommandResult(table: KustoResultTable): string {
  const id = cellToString(table.rows[0]?.[0]).trim();
  if (!id) {
    throw new MalformedResponse('Async command result does not contain an operation id');
  }
  return id;
}
