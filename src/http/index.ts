/**
 * HTTP request executor.
 *
 * Sends exactly one request per call and turns the outcome into either an
 * {@link ApiResponse} (2xx) or a classified {@link ExecutionError}. Retrying
 * is the retry policy's job, not this module's.
 */

import { authorizationHeader, type Credential } from '../auth/index.js';
import { assertTimerDelay, mergeSignals } from '../clock/index.js';
import {
  ExecutionError,
  OperationCancelled,
  executionKindForStatus,
  parseApiErrorBody,
} from '../errors/index.js';
import {
  NoopLogger,
  NoopMetricsCollector,
  ProvisioningMetrics,
  type Logger,
  type MetricsCollector,
} from '../observability/index.js';
import type { ApiRequest, ApiResponse } from '../types/index.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpExecutorConfig {
  /** Per-attempt timeout when the call does not pass one (default: 30000) */
  defaultTimeoutMs?: number;
  userAgent?: string;
  /** Defaults to the global `fetch` */
  fetch?: FetchFn;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  /** Aborting rejects with {@link OperationCancelled} */
  signal?: AbortSignal;
}

export class HttpExecutor {
  private readonly defaultTimeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(config: HttpExecutorConfig = {}) {
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? 30_000;
    this.userAgent = config.userAgent ?? 'databricks-provisioning-client/0.1.0';
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger ?? new NoopLogger();
    this.metrics = config.metrics ?? new NoopMetricsCollector();
  }

  /**
   * Send a single request
   *
   * @throws {ExecutionError} for any non-2xx outcome or transport failure
   * @throws {OperationCancelled} when `options.signal` aborts
   */
  async execute(
    credential: Credential,
    request: ApiRequest,
    options: ExecuteOptions = {}
  ): Promise<ApiResponse> {
    const label = `${request.method} ${request.path}`;
    if (options.signal?.aborted) {
      throw new OperationCancelled(`${label} cancelled before it was sent`);
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    assertTimerDelay('Request timeout', timeoutMs);
    const url = buildUrl(credential.baseUrl, request);

    const headers: Record<string, string> = {
      Authorization: authorizationHeader(credential),
      Accept: 'application/json',
      'User-Agent': this.userAgent,
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const timeoutController = new AbortController();
    const timer = setTimeout(() => timeoutController.abort(), timeoutMs);
    const merged = mergeSignals(timeoutController.signal, options.signal);

    let response: Response;
    let rawBody: string;
    try {
      response = await this.fetchFn(url, {
        method: request.method,
        headers,
        body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
        signal: merged.signal,
      });
      rawBody = await response.text();
    } catch (error) {
      if (options.signal?.aborted) {
        throw new OperationCancelled(`${label} cancelled`, { cause: error });
      }
      if (timeoutController.signal.aborted) {
        this.recordOutcome(request, 'Timeout');
        throw new ExecutionError('Timeout', `${label} timed out after ${timeoutMs}ms`, {
          cause: error,
        });
      }
      this.recordOutcome(request, 'NetworkError');
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExecutionError('NetworkError', `${label} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
      merged.dispose();
    }

    const apiResponse: ApiResponse = {
      status: response.status,
      body: parseBody(rawBody),
      rawBody,
      headers: headersToRecord(response.headers),
    };

    const kind = executionKindForStatus(response.status);
    this.recordOutcome(request, kind ?? 'success');

    if (kind === undefined) {
      this.logger.trace('Request succeeded', { request: label, status: response.status });
      return apiResponse;
    }

    const { message, errorCode } = parseApiErrorBody(
      apiResponse.body,
      rawBody.trim() || response.statusText || 'Unknown error'
    );
    this.logger.debug('Request failed', { request: label, status: response.status, kind, errorCode });

    throw new ExecutionError(kind, `${label} returned ${response.status}: ${message}`, {
      statusCode: response.status,
      errorCode,
      retryAfterMs:
        kind === 'RateLimited' ? parseRetryAfter(apiResponse.headers['retry-after']) : undefined,
    });
  }

  private recordOutcome(request: ApiRequest, outcome: string): void {
    this.metrics.increment(ProvisioningMetrics.API_REQUESTS_TOTAL, 1, {
      method: request.method,
      outcome,
    });
  }
}

/**
 * Join the base URL, the request path and its query parameters
 */
export function buildUrl(baseUrl: string, request: ApiRequest): string {
  const path = request.path.startsWith('/') ? request.path : `/${request.path}`;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(request.query ?? {})) {
    if (value !== undefined) {
      params.set(key, String(value));
    }
  }
  const query = params.toString();
  return query ? `${baseUrl}${path}?${query}` : `${baseUrl}${path}`;
}

/**
 * Parse a `Retry-After` header (delta-seconds or HTTP-date) into milliseconds
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

function parseBody(rawBody: string): Record<string, unknown> {
  if (rawBody.trim() === '') {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(rawBody);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function headersToRecord(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key.toLowerCase()] = value;
  });
  return result;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
