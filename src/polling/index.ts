/**
 * Async operation poller.
 *
 * Queries a resource's status until it reaches a terminal state, the timeout
 * elapses or the caller cancels. The polling interval only governs the wait
 * between successful, non-terminal checks; failed individual checks are
 * handled by the retry policy's own backoff.
 */

import type { Credential } from '../auth/index.js';
import { assertTimerDelay, mergeSignals, systemClock, type Clock } from '../clock/index.js';
import type { PollingSettings } from '../config/index.js';
import { ExecutionError, OperationCancelled, PollError } from '../errors/index.js';
import type { HttpExecutor } from '../http/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { AttemptReport, RetryPolicy } from '../retry/index.js';
import {
  OperationStatus,
  isTerminalStatus,
  type ApiRequest,
  type ApiResponse,
  type StatusObservation,
} from '../types/index.js';

export const DEFAULT_POLLING_SETTINGS: PollingSettings = {
  timeoutMs: 30 * 60 * 1000,
  intervalMs: 15_000,
};

export type StatusRequestBuilder = () => ApiRequest;
export type StatusExtractor = (response: ApiResponse) => StatusObservation;

export interface PollOutcome {
  status: OperationStatus;
  /** Last raw state reported by the resource */
  rawState?: string;
  message?: string;
  /** Logical status checks issued (retries of one check count once) */
  iterations: number;
}

export interface PollUntilTerminalOptions extends Partial<PollingSettings> {
  /** Aborting makes the poller reject with `PollError{Cancelled}` */
  signal?: AbortSignal;
  /** Per-attempt request timeout */
  requestTimeoutMs?: number;
  onAttempt?: (report: AttemptReport) => void;
  onObservation?: (observation: StatusObservation, iteration: number) => void;
  /**
   * Turn a permanent status-request failure into an observation (for
   * example a 404 while waiting for a deletion). Returning `undefined`
   * rethrows the error.
   */
  recoverStatusError?: (error: ExecutionError) => StatusObservation | undefined;
  /** Name used in log lines */
  label?: string;
}

export interface OperationPollerConfig {
  executor: HttpExecutor;
  retry: RetryPolicy;
  clock?: Clock;
  logger?: Logger;
}

export class OperationPoller {
  private readonly executor: HttpExecutor;
  private readonly retry: RetryPolicy;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: OperationPollerConfig) {
    this.executor = config.executor;
    this.retry = config.retry;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? new NoopLogger();
  }

  /**
   * Poll until a terminal status.
   *
   * Resolves with `TIMED_OUT` (and the last raw state seen) once `timeoutMs`
   * has elapsed; never reports success on timeout.
   *
   * @throws {ConfigurationError} when `timeoutMs` is longer than a timer can wait
   * @throws {PollError} `Cancelled` or `StatusExtractionFailed`
   * @throws {ExecutionError} for a permanent status-request failure
   * @throws {RetryExhausted} when a single status check ran out of attempts
   */
  async pollUntilTerminal(
    credential: Credential,
    buildStatusRequest: StatusRequestBuilder,
    extractStatus: StatusExtractor,
    options: PollUntilTerminalOptions = {}
  ): Promise<PollOutcome> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_POLLING_SETTINGS.timeoutMs;
    const intervalMs = options.intervalMs ?? DEFAULT_POLLING_SETTINGS.intervalMs;
    const label = options.label ?? 'operation';
    const { signal } = options;
    assertTimerDelay('Poll timeout', timeoutMs);

    const startedAt = this.clock.now();
    let last: StatusObservation | undefined;
    let iterations = 0;

    const timedOut = (): PollOutcome => {
      this.logger.warn('Polling timed out', { label, timeoutMs, lastState: last?.rawState });
      return {
        status: OperationStatus.TIMED_OUT,
        rawState: last?.rawState,
        message: `No terminal state after ${timeoutMs}ms`,
        iterations,
      };
    };

    // Interrupts an in-flight request or backoff once the budget is spent
    const deadline = new AbortController();
    const deadlineTimer = setTimeout(() => deadline.abort(), timeoutMs);
    const merged = mergeSignals(signal, deadline.signal);

    try {
      while (true) {
        this.throwIfCancelled(signal, label, last);
        if (this.clock.now() - startedAt >= timeoutMs) {
          return timedOut();
        }

        iterations++;
        let observation: StatusObservation;
        try {
          const response = await this.retry.execute(
            () =>
              this.executor.execute(credential, buildStatusRequest(), {
                timeoutMs: options.requestTimeoutMs,
                signal: merged.signal,
              }),
            { signal: merged.signal, onAttempt: options.onAttempt, label: `${label} status` }
          );
          observation = this.extract(extractStatus, response, label, last);
        } catch (error) {
          if (error instanceof OperationCancelled) {
            this.throwIfCancelled(signal, label, last);
            if (deadline.signal.aborted) {
              return timedOut();
            }
          }
          const recovered =
            error instanceof ExecutionError ? options.recoverStatusError?.(error) : undefined;
          if (recovered === undefined) {
            throw error;
          }
          observation = recovered;
        }

        last = observation;
        options.onObservation?.(observation, iterations);
        this.logger.debug('Observed status', {
          label,
          iteration: iterations,
          status: observation.status,
          rawState: observation.rawState,
        });

        if (isTerminalStatus(observation.status)) {
          return {
            status: observation.status,
            rawState: observation.rawState,
            message: observation.message,
            iterations,
          };
        }

        const remaining = timeoutMs - (this.clock.now() - startedAt);
        if (remaining <= 0) {
          return timedOut();
        }

        this.throwIfCancelled(signal, label, last);
        try {
          await this.clock.sleep(Math.min(intervalMs, remaining), merged.signal);
        } catch (error) {
          if (error instanceof OperationCancelled) {
            this.throwIfCancelled(signal, label, last);
            if (deadline.signal.aborted) {
              return timedOut();
            }
          }
          throw error;
        }
      }
    } finally {
      clearTimeout(deadlineTimer);
      merged.dispose();
    }
  }

  private extract(
    extractStatus: StatusExtractor,
    response: ApiResponse,
    label: string,
    last: StatusObservation | undefined
  ): StatusObservation {
    try {
      return extractStatus(response);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PollError('StatusExtractionFailed', `Could not read ${label} status: ${reason}`, {
        lastObservedState: last?.rawState,
        cause: error,
      });
    }
  }

  private throwIfCancelled(
    signal: AbortSignal | undefined,
    label: string,
    last: StatusObservation | undefined
  ): void {
    if (signal?.aborted) {
      throw new PollError('Cancelled', `Polling ${label} was cancelled`, {
        lastObservedState: last?.rawState,
        cause: signal.reason,
      });
    }
  }
}
