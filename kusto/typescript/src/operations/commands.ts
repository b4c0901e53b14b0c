/**
 * Management command text for operation tracking.
 *
 * @module kusto-connector/operations/commands
 */

import { InvalidConfiguration } from '../errors/index.js';

const OPERATION_ID_PATTERN = /^[^\s'"`;|]+$/;

/**
 * Throw unless `operationId` is safe to splice into a command
 */
export function assertOperationId(operationId: string): void {
  if (!OPERATION_ID_PATTERN.test(operationId)) {
    throw new InvalidConfiguration(`Invalid operation id: '${operationId}'`);
  }
}

/**
 * `.show operations <id>`
 */
export function generateOperationsShowCommand(operationId: string): string {
  assertOperationId(operationId);
  return `.show operations ${operationId}`;
}
