/**
 * Kusto connector: asynchronous operation tracking.
 *
 * @example
 * ```typescript
 * import { KustoOperationsClient } from 'kusto-connector';
 *
 * const client = new KustoOperationsClient(executor, {
 *   config: { samplePeriodMs: 1000, timeout: 'unlimited' },
 * });
 * await client.executeAsyncCommand('Telemetry', '.set-or-append async Events <| RawEvents');
 * ```
 *
 * @module kusto-connector
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './scheduler/index.js';
export * from './verifier/index.js';
export * from './operations/index.js';
export * from './client/index.js';
