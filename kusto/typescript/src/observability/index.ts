/**
 * Observability components for the Kusto connector.
 *
 * Includes metrics and logging for:
 * - Operation status polling
 * - Completion verification
 */

// ============================================================================
// Metrics
// ============================================================================

/**
 * Metric value type
 */
export interface MetricValue {
  value: number;
  timestamp: number;
  labels?: Record<string, string>;
}

/**
 * Metrics collector interface
 */
export interface MetricsCollector {
  /**
   * Increment a counter
   */
  increment(name: string, value?: number, labels?: Record<string, string>): void;

  /**
   * Record a histogram value
   */
  histogram(name: string, value: number, labels?: Record<string, string>): void;

  /**
   * Get all metrics
   */
  getMetrics(): Map<string, MetricValue[]>;
}

/**
 * No-op metrics collector
 */
export class NoopMetricsCollector implements MetricsCollector {
  increment(_name: string, _value?: number, _labels?: Record<string, string>): void {
    // No-op
  }

  histogram(_name: string, _value: number, _labels?: Record<string, string>): void {
    // No-op
  }

  getMetrics(): Map<string, MetricValue[]> {
    return new Map();
  }
}

/**
 * In-memory metrics collector for testing and development
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private metrics = new Map<string, MetricValue[]>();
  private counters = new Map<string, number>();

  increment(name: string, value = 1, labels?: Record<string, string>): void {
    const key = this.buildKey(name, labels);
    const current = this.counters.get(key) ?? 0;
    this.counters.set(key, current + value);

    this.record(name, current + value, labels);
  }

  histogram(name: string, value: number, labels?: Record<string, string>): void {
    this.record(name, value, labels);
  }

  getMetrics(): Map<string, MetricValue[]> {
    return new Map(this.metrics);
  }

  /**
   * Get counter value
   */
  getCounter(name: string, labels?: Record<string, string>): number {
    const key = this.buildKey(name, labels);
    return this.counters.get(key) ?? 0;
  }

  reset(): void {
    this.metrics.clear();
    this.counters.clear();
  }

  private record(name: string, value: number, labels?: Record<string, string>): void {
    const values = this.metrics.get(name) ?? [];
    values.push({
      value,
      timestamp: Date.now(),
      labels,
    });
    this.metrics.set(name, values);
  }

  private buildKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name;
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}{${labelStr}}`;
  }
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Log level
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

/**
 * Logger interface
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  setLevel(level: LogLevel): void;
}

/**
 * No-op logger implementation
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  debug(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  setLevel(_level: LogLevel): void {
    // No-op
  }
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel = LogLevel.Info;
  private readonly name?: string;

  constructor(name?: string, level?: LogLevel) {
    this.name = name;
    if (level !== undefined) {
      this.level = level;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level].toUpperCase();
    const prefix = this.name ? `[${this.name}]` : '';

    const logFn =
      level === LogLevel.Error
        ? console.error
        : level === LogLevel.Warn
          ? console.warn
          : level <= LogLevel.Debug
            ? console.debug
            : console.log;

    if (context && Object.keys(context).length > 0) {
      logFn(`${timestamp} ${levelStr}${prefix} ${message}`, redactSensitive(context));
    } else {
      logFn(`${timestamp} ${levelStr}${prefix} ${message}`);
    }
  }
}

const SENSITIVE_KEYS = ['authorization', 'token', 'password', 'secret', 'appkey', 'sas'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replace secret-looking values in a log context
 */
export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.some((k) => key.toLowerCase().includes(k))) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value) && !(value instanceof Error)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Parse a level name such as `debug` or `WARN`
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.trim().toLowerCase()) {
    case 'trace':
      return LogLevel.Trace;
    case 'debug':
      return LogLevel.Debug;
    case 'info':
      return LogLevel.Info;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return undefined;
  }
}

// ============================================================================
// Failure Reporting
// ============================================================================

/**
 * Where a failure happened, for the log line
 */
export interface FailureContext {
  doingWhat?: string;
  cluster?: string;
  database?: string;
  table?: string;
}

/**
 * Log a caught error with its context, then rethrow it unless told not to.
 */
export function reportFailure(
  logger: Logger,
  reporter: string,
  error: Error,
  context: FailureContext = {},
  options: { shouldNotThrow?: boolean } = {}
): void {
  const whatFailed = context.doingWhat ? ` when ${context.doingWhat}` : '';
  const details: Record<string, unknown> = {
    error: error.name,
    message: error.message,
  };
  if (context.cluster) details.cluster = context.cluster;
  if (context.database) details.database = context.database;
  if (context.table) details.table = context.table;

  if (!options.shouldNotThrow) {
    logger.error(`${reporter}: caught exception${whatFailed}`, details);
    throw error;
  }

  logger.warn(`${reporter}: caught exception${whatFailed}, exception ignored`, details);
}

// ============================================================================
// Observability Context
// ============================================================================

/**
 * Combined observability context
 */
export interface ObservabilityContext {
  metrics: MetricsCollector;
  logger: Logger;
}

/**
 * Create a default observability context
 */
export function createDefaultObservability(level: LogLevel = LogLevel.Info): ObservabilityContext {
  return {
    metrics: new NoopMetricsCollector(),
    logger: new ConsoleLogger('kusto-connector', level),
  };
}

/**
 * Create a test observability context with in-memory metrics and no log output
 */
export function createTestObservability(): ObservabilityContext & {
  metrics: InMemoryMetricsCollector;
} {
  return {
    metrics: new InMemoryMetricsCollector(),
    logger: new NoopLogger(),
  };
}

// ============================================================================
// Kusto-specific Metrics
// ============================================================================

/**
 * Metric names for operation polling
 */
export const KustoMetrics = {
  OPERATION_POLLS_TOTAL: 'kusto_operation_polls_total',
  OPERATION_VERIFICATIONS_TOTAL: 'kusto_operation_verifications_total',
  OPERATION_WAIT_DURATION_MS: 'kusto_operation_wait_duration_ms',
} as const;
