/**
 * Kusto Operations Client
 *
 * Runs asynchronous management commands and waits for the operations they
 * start to finish.
 *
 * @module kusto-connector/client
 */

import { createPollingConfig, type OperationPollingConfig, type OperationPollingConfigOptions } from '../config/index.js';
import { wrapError } from '../errors/index.js';
import {
  ConsoleLogger,
  NoopMetricsCollector,
  reportFailure,
  type Logger,
  type MetricsCollector,
} from '../observability/index.js';
import { KustoOperationStatusQuery, operationIdFromCommandResult } from '../operations/index.js';
import { BackoffScheduler } from '../scheduler/index.js';
import type { KustoQueryExecutor, KustoResultTable, WaitTimeout } from '../types/index.js';
import { OperationCompletionVerifier } from '../verifier/index.js';

const REPORTER = 'KustoOperationsClient';

/**
 * Client options
 */
export interface KustoOperationsClientOptions {
  /** Polling configuration; validated and defaulted */
  config?: OperationPollingConfigOptions;
  /** Cluster name, used in failure reports */
  cluster?: string;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Per-call overrides of the configured polling values
 */
export interface WaitOverrides {
  samplePeriodMs?: number;
  timeout?: WaitTimeout;
}

/**
 * Client for asynchronous management commands.
 *
 * @example
 * ```typescript
 * const client = new KustoOperationsClient(executor, { config: { timeout: 600_000 } });
 * const operationId = await client.executeAsyncCommand(
 *   'Telemetry',
 *   '.set-or-append async Events <| RawEvents | where Level == "Error"'
 * );
 * ```
 */
export class KustoOperationsClient {
  readonly config: OperationPollingConfig;
  private readonly executor: KustoQueryExecutor;
  private readonly cluster?: string;
  private readonly logger: Logger;
  private readonly verifier: OperationCompletionVerifier;

  constructor(executor: KustoQueryExecutor, options: KustoOperationsClientOptions = {}) {
    this.config = createPollingConfig(options.config);
    this.executor = executor;
    this.cluster = options.cluster;
    this.logger = options.logger ?? new ConsoleLogger('kusto-connector', this.config.logLevel);
    this.verifier = new OperationCompletionVerifier({
      scheduler: new BackoffScheduler({ logger: this.logger }),
      logger: this.logger,
      metrics: options.metrics ?? new NoopMetricsCollector(),
    });
  }

  /**
   * Change the log level at runtime
   */
  setLoggingLevel(level: OperationPollingConfig['logLevel']): void {
    this.logger.setLevel(level);
  }

  /**
   * Wait for the operation started by an async command.
   *
   * @param commandResult - result table of the async command
   * @returns The operation id
   */
  async verifyAsyncCommandCompletion(
    database: string,
    commandResult: KustoResultTable,
    overrides: WaitOverrides = {}
  ): Promise<string> {
    const operationId = operationIdFromCommandResult(commandResult);
    const statusQuery = new KustoOperationStatusQuery(this.executor, database, this.logger);

    try {
      await this.verifier.verify(
        statusQuery,
        operationId,
        overrides.samplePeriodMs ?? this.config.samplePeriodMs,
        overrides.timeout ?? this.config.timeout
      );
    } catch (error) {
      reportFailure(this.logger, REPORTER, wrapError(error), {
        doingWhat: `waiting for operation '${operationId}'`,
        cluster: this.cluster,
        database,
      });
    }

    return operationId;
  }

  /**
   * Run an async management command and wait for its operation to finish.
   *
   * @returns The operation id
   */
  async executeAsyncCommand(database: string, command: string, overrides: WaitOverrides = {}): Promise<string> {
    this.logger.debug('Executing async command', { database, cluster: this.cluster });
    const result = await this.executor.execute(database, command);
    return this.verifyAsyncCommandCompletion(database, result, overrides);
  }
}
