/**
 * Time source used by the retry policy and the poller.
 *
 * Injected so tests can run backoff and polling schedules without waiting.
 */

import { ConfigurationError, OperationCancelled } from '../errors/index.js';

/**
 * Longest delay `setTimeout` honors. Node fires anything larger after 1ms,
 * so every timeout and budget is capped here.
 */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * @throws {ConfigurationError} when `ms` is longer than one timer can wait
 */
export function assertTimerDelay(name: string, ms: number): void {
  if (ms > MAX_TIMER_MS) {
    throw new ConfigurationError(`${name} must be at most ${MAX_TIMER_MS}ms, got ${ms}ms`);
  }
}

export interface Clock {
  /** Milliseconds since an arbitrary origin */
  now(): number;
  /**
   * Resolve after `ms`, or reject with {@link OperationCancelled} as soon as
   * `signal` aborts.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Sleep with abort support.
 */
export function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelled('Sleep aborted', { cause: signal.reason }));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(new OperationCancelled('Sleep aborted', { cause: signal?.reason }));
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: sleepWithAbort,
};

/**
 * Combine several optional signals into one that aborts when any of them does.
 * Returns a disposer that detaches the listeners.
 */
export function mergeSignals(
  ...signals: Array<AbortSignal | undefined>
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const present = signals.filter((s): s is AbortSignal => s !== undefined);

  const onAbort = (): void => controller.abort();

  for (const s of present) {
    if (s.aborted) {
      controller.abort();
      break;
    }
    s.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const s of present) {
        s.removeEventListener('abort', onAbort);
      }
    },
  };
}
