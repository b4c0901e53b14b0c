/**
 * Status query over `.show operations`.
 *
 * @module kusto-connector/operations/status-query
 */

import { v4 as uuidv4 } from 'uuid';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { KustoQueryExecutor, OperationStatus } from '../types/index.js';
import type { StatusQuery } from '../verifier/index.js';
import { generateOperationsShowCommand } from './commands.js';
import { parseOperationStatus } from './parser.js';

/**
 * Prefix of the client request id sent with each status check
 */
export const CLIENT_REQUEST_ID_PREFIX = 'KPC.execute';

/**
 * Fetches an operation's status from a database with one management command
 * per call.
 */
export class KustoOperationStatusQuery implements StatusQuery {
  private readonly executor: KustoQueryExecutor;
  private readonly database: string;
  private readonly logger: Logger;

  constructor(executor: KustoQueryExecutor, database: string, logger: Logger = new NoopLogger()) {
    this.executor = executor;
    this.database = database;
    this.logger = logger;
  }

  async fetch(operationId: string): Promise<OperationStatus> {
    const command = generateOperationsShowCommand(operationId);
    const clientRequestId = `${CLIENT_REQUEST_ID_PREFIX};${uuidv4()}`;

    this.logger.trace('Checking operation status', {
      database: this.database,
      operationId,
      clientRequestId,
    });

    const table = await this.executor.execute(this.database, command, { clientRequestId });
    return parseOperationStatus(table, operationId, command);
  }
}
