/**
 * Operation tracking against the service.
 *
 * @module kusto-connector/operations
 */

export { generateOperationsShowCommand, assertOperationId } from './commands.js';
export {
  OperationColumns,
  columnIndex,
  parseOperationState,
  parseOperationStatus,
  operationIdFromCommandResult,
} from './parser.js';
export { KustoOperationStatusQuery, CLIENT_REQUEST_ID_PREFIX } from './status-query.js';
