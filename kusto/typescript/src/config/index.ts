/**
 * Configuration for operation polling.
 *
 * Values can be given directly or read from the environment:
 * - `KUSTO_OPERATION_SAMPLE_PERIOD_MS`
 * - `KUSTO_OPERATION_TIMEOUT_MS` (a number, or `unlimited`)
 * - `KUSTO_LOG_LEVEL` (`trace` | `debug` | `info` | `warn` | `error`)
 *
 * @module kusto-connector/config
 */

import { z } from 'zod';
import { InvalidConfiguration } from '../errors/index.js';
import { LogLevel, parseLogLevel } from '../observability/index.js';
import { NO_TIMEOUT, type WaitTimeout } from '../types/index.js';

/**
 * Configuration constants
 */
export const DEFAULTS = {
  /** Delay between status checks before backoff kicks in */
  SAMPLE_PERIOD_MS: 1000,
  /** Overall wait for an operation to finish (1 hour) */
  TIMEOUT_MS: 3_600_000,
  LOG_LEVEL: LogLevel.Info,
} as const;

/**
 * Validated polling configuration
 */
export interface OperationPollingConfig {
  readonly samplePeriodMs: number;
  readonly timeout: WaitTimeout;
  readonly logLevel: LogLevel;
}

const timeoutSchema = z.union([
  z.number().int('must be an integer').nonnegative('must not be negative'),
  z.literal(NO_TIMEOUT),
]);

const pollingConfigSchema = z.object({
  samplePeriodMs: z.number().finite().nonnegative('must not be negative').default(DEFAULTS.SAMPLE_PERIOD_MS),
  timeout: timeoutSchema.default(DEFAULTS.TIMEOUT_MS),
  logLevel: z.nativeEnum(LogLevel).default(DEFAULTS.LOG_LEVEL),
});

/**
 * Input accepted by {@link createPollingConfig}
 */
export type OperationPollingConfigOptions = z.input<typeof pollingConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`);
}

/**
 * Validate options and fill in defaults
 */
export function createPollingConfig(options: OperationPollingConfigOptions = {}): OperationPollingConfig {
  const parsed = pollingConfigSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidConfiguration('Invalid operation polling configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

function parseNumberVar(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new InvalidConfiguration(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

/**
 * Build the configuration from environment variables
 */
export function pollingConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OperationPollingConfig {
  const options: OperationPollingConfigOptions = {};

  const samplePeriod = env['KUSTO_OPERATION_SAMPLE_PERIOD_MS'];
  if (samplePeriod !== undefined) {
    options.samplePeriodMs = parseNumberVar('KUSTO_OPERATION_SAMPLE_PERIOD_MS', samplePeriod);
  }

  const timeout = env['KUSTO_OPERATION_TIMEOUT_MS'];
  if (timeout !== undefined) {
    options.timeout =
      timeout.trim().toLowerCase() === NO_TIMEOUT
        ? NO_TIMEOUT
        : parseNumberVar('KUSTO_OPERATION_TIMEOUT_MS', timeout);
  }

  const logLevel = env['KUSTO_LOG_LEVEL'];
  if (logLevel !== undefined) {
    const level = parseLogLevel(logLevel);
    if (level === undefined) {
      throw new InvalidConfiguration(`KUSTO_LOG_LEVEL is not a log level: '${logLevel}'`);
    }
    options.logLevel = level;
  }

  return createPollingConfig(options);
}
