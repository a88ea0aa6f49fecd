/**
 * Logging and metrics for the provisioning client.
 *
 * Every component takes a {@link Logger} and a {@link MetricsCollector};
 * both default to no-op implementations so the library stays silent unless
 * the caller opts in.
 */

// ============================================================================
// Metrics
// ============================================================================

/**
 * A single recorded metric sample
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
  increment(name: string, value?: number, labels?: Record<string, string>): void;
  histogram(name: string, value: number, labels?: Record<string, string>): void;
  getMetrics(): Map<string, MetricValue[]>;
}

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
 * In-memory metrics collector for tests and local runs
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private metrics = new Map<string, MetricValue[]>();
  private counters = new Map<string, number>();

  increment(name: string, value = 1, labels?: Record<string, string>): void {
    const key = this.buildKey(name, labels);
    const current = (this.counters.get(key) ?? 0) + value;
    this.counters.set(key, current);
    this.record(name, current, labels);
  }

  histogram(name: string, value: number, labels?: Record<string, string>): void {
    this.record(name, value, labels);
  }

  getMetrics(): Map<string, MetricValue[]> {
    return new Map(this.metrics);
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.buildKey(name, labels)) ?? 0;
  }

  reset(): void {
    this.metrics.clear();
    this.counters.clear();
  }

  private record(name: string, value: number, labels?: Record<string, string>): void {
    const values = this.metrics.get(name) ?? [];
    values.push({ value, timestamp: Date.now(), labels });
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

/**
 * Metric names emitted by the client
 */
export const ProvisioningMetrics = {
  API_REQUESTS_TOTAL: 'provisioning_api_requests_total',
  RETRIES_TOTAL: 'provisioning_retries_total',
  OPERATIONS_TOTAL: 'provisioning_operations_total',
  OPERATION_DURATION_SECONDS: 'provisioning_operation_duration_seconds',
} as const;

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  setLevel(level: LogLevel): void;
}

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

const SENSITIVE_KEYS = [
  'authorization',
  'token',
  'password',
  'secret',
  'access_token',
  'client_secret',
];

/**
 * Replace the values of sensitive keys with a redaction marker, recursively
 */
export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.some((k) => key.toLowerCase().includes(k))) {
      result[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Levelled console logger with sensitive-key redaction
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
    const levelStr = LogLevel[level]?.toUpperCase() ?? 'UNKNOWN';
    const prefix = this.name ? `[${this.name}]` : '';

    // stderr for everything: stdout is reserved for the serialized result
    const logFn = level === LogLevel.Warn ? console.warn : console.error;

    if (context && Object.keys(context).length > 0) {
      logFn(`${timestamp} ${levelStr}${prefix} ${message}`, redactSensitive(context));
    } else {
      logFn(`${timestamp} ${levelStr}${prefix} ${message}`);
    }
  }
}

/**
 * Logger that keeps entries in memory
 */
export class InMemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];
  private level: LogLevel = LogLevel.Trace;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.push(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.push(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.push(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.push(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.push(LogLevel.Error, message, context);
  }

  private push(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;
    this.entries.push({
      level,
      message,
      timestamp: Date.now(),
      context: context ? redactSensitive(context) : undefined,
    });
  }
}
