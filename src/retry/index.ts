/**
 * Retry policy with exponential backoff and jitter.
 *
 * Wraps one logical call. Transient failures (rate limiting, 5xx, network
 * failures, timeouts) are retried up to `maxAttempts` executions; permanent
 * failures are rethrown on the first attempt. Loop state (attempt count,
 * delays) lives here and never in the request.
 */

import { systemClock, type Clock } from '../clock/index.js';
import type { RetrySettings } from '../config/index.js';
import {
  ExecutionError,
  OperationCancelled,
  RetryExhausted,
  type ExecutionErrorKind,
} from '../errors/index.js';
import {
  NoopLogger,
  NoopMetricsCollector,
  ProvisioningMetrics,
  type Logger,
  type MetricsCollector,
} from '../observability/index.js';
import type { ApiResponse, RetryDecision } from '../types/index.js';

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxAttempts: 5,
  baseDelayMs: 2_000,
  maxDelayMs: 30_000,
  jitterFraction: 0.2,
};

export interface RetryPolicyConfig extends Partial<RetrySettings> {
  /** Source of randomness in [0, 1) for jitter; inject a constant for reproducible delays */
  random?: () => number;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Outcome of one attempt, reported as it happens
 */
export interface AttemptReport {
  attempt: number;
  outcome: 'success' | ExecutionErrorKind;
  statusCode?: number;
  durationMs: number;
}

export interface RetryExecuteOptions {
  signal?: AbortSignal;
  onAttempt?: (report: AttemptReport) => void;
  /** Name used in log lines */
  label?: string;
}

export class RetryPolicy {
  readonly settings: Readonly<RetrySettings>;
  private readonly random: () => number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(config: RetryPolicyConfig = {}) {
    this.settings = Object.freeze({
      maxAttempts: config.maxAttempts ?? DEFAULT_RETRY_SETTINGS.maxAttempts,
      baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_SETTINGS.baseDelayMs,
      maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_SETTINGS.maxDelayMs,
      jitterFraction: config.jitterFraction ?? DEFAULT_RETRY_SETTINGS.jitterFraction,
    });
    this.random = config.random ?? Math.random;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? new NoopLogger();
    this.metrics = config.metrics ?? new NoopMetricsCollector();
  }

  /**
   * Backoff after the `attempt`-th failure (1-indexed), before jitter:
   * `min(base * 2^(attempt-1), maxDelay)`.
   */
  computeBackoff(attempt: number): number {
    const exponential = this.settings.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    return Math.min(exponential, this.settings.maxDelayMs);
  }

  /**
   * Backoff with +/- `jitterFraction` applied
   */
  nextDelay(attempt: number): number {
    const base = this.computeBackoff(attempt);
    const spread = this.settings.jitterFraction * (2 * this.random() - 1);
    return Math.max(0, Math.round(base * (1 + spread)));
  }

  /**
   * Decide what to do after the `attempt`-th execution failed with `error`
   */
  decide(error: unknown, attempt: number): RetryDecision {
    if (!(error instanceof ExecutionError)) {
      return { retry: false, reason: 'not a request failure' };
    }
    if (!error.isRetryable) {
      return { retry: false, reason: `${error.kind} is not retryable` };
    }
    if (attempt >= this.settings.maxAttempts) {
      return { retry: false, reason: `exhausted ${attempt} of ${this.settings.maxAttempts} attempts` };
    }
    if (error.kind === 'RateLimited' && error.retryAfterMs !== undefined) {
      return { retry: true, delayMs: error.retryAfterMs };
    }
    return { retry: true, delayMs: this.nextDelay(attempt) };
  }

  /**
   * Run `send` until it succeeds, fails permanently or runs out of attempts.
   * `send` receives the 1-based attempt number and must build a fresh request.
   *
   * @throws {ExecutionError} for a permanent failure, unchanged
   * @throws {RetryExhausted} after `maxAttempts` transient failures
   * @throws {OperationCancelled} when `signal` aborts
   */
  async execute(
    send: (attempt: number) => Promise<ApiResponse>,
    options: RetryExecuteOptions = {}
  ): Promise<ApiResponse> {
    const { signal, onAttempt } = options;
    const label = options.label ?? 'request';

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new OperationCancelled(`${label} cancelled before attempt ${attempt}`);
      }

      const started = this.clock.now();
      try {
        const response = await send(attempt);
        onAttempt?.({
          attempt,
          outcome: 'success',
          statusCode: response.status,
          durationMs: this.clock.now() - started,
        });
        return response;
      } catch (error) {
        if (!(error instanceof ExecutionError)) {
          throw error;
        }

        onAttempt?.({
          attempt,
          outcome: error.kind,
          statusCode: error.statusCode,
          durationMs: this.clock.now() - started,
        });

        const decision = this.decide(error, attempt);
        if (!decision.retry) {
          if (!error.isRetryable) {
            throw error;
          }
          this.logger.warn('Retries exhausted', { label, attempts: attempt, kind: error.kind });
          throw new RetryExhausted(error, attempt);
        }

        this.metrics.increment(ProvisioningMetrics.RETRIES_TOTAL, 1, { kind: error.kind });
        this.logger.debug('Retrying after transient failure', {
          label,
          attempt,
          kind: error.kind,
          statusCode: error.statusCode,
          delayMs: decision.delayMs,
        });

        await this.clock.sleep(decision.delayMs, signal);
      }
    }
  }
}
