/**
 * Error types for the provisioning client.
 */

/**
 * Error category for classification
 */
export type ErrorCategory =
  | 'configuration'
  | 'execution'
  | 'retry'
  | 'poll'
  | 'provisioning'
  | 'cancellation';

/**
 * Base error class for all provisioning client errors
 */
export abstract class ProvisioningClientError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly isRetryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid or missing configuration. Raised before any network activity.
 */
export class ConfigurationError extends ProvisioningClientError {
  readonly category = 'configuration' as const;
  readonly isRetryable = false;
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message, options);
    this.issues = issues;
  }
}

// ============================================================================
// Execution Errors
// ============================================================================

export type ExecutionErrorKind =
  | 'Timeout'
  | 'NetworkError'
  | 'Unauthorized'
  | 'RateLimited'
  | 'InvalidRequest'
  | 'ServerError';

const TRANSIENT_KINDS: ReadonlySet<ExecutionErrorKind> = new Set([
  'Timeout',
  'NetworkError',
  'RateLimited',
  'ServerError',
]);

/**
 * Whether an execution error kind is worth another attempt
 */
export function isTransientKind(kind: ExecutionErrorKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

/**
 * A single request attempt that did not produce a 2xx response
 */
export class ExecutionError extends ProvisioningClientError {
  readonly category = 'execution' as const;
  readonly isRetryable: boolean;
  readonly kind: ExecutionErrorKind;
  /** HTTP status, absent for Timeout and NetworkError */
  readonly statusCode?: number;
  /** API `error_code` field, when the body carried one */
  readonly errorCode?: string;
  /** Server-provided wait hint for RateLimited responses */
  readonly retryAfterMs?: number;

  constructor(
    kind: ExecutionErrorKind,
    message: string,
    options?: { statusCode?: number; errorCode?: string; retryAfterMs?: number; cause?: unknown }
  ) {
    super(message, options);
    this.kind = kind;
    this.isRetryable = isTransientKind(kind);
    this.statusCode = options?.statusCode;
    this.errorCode = options?.errorCode;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/**
 * Map an HTTP status code to an execution error kind; `undefined` for 2xx.
 */
export function executionKindForStatus(status: number): ExecutionErrorKind | undefined {
  if (status >= 200 && status < 300) return undefined;
  if (status === 401 || status === 403) return 'Unauthorized';
  if (status === 429) return 'RateLimited';
  if (status >= 500) return 'ServerError';
  return 'InvalidRequest';
}

// ============================================================================
// Retry Errors
// ============================================================================

/**
 * Every allowed attempt failed with a transient error
 */
export class RetryExhausted extends ProvisioningClientError {
  readonly category = 'retry' as const;
  readonly isRetryable = false;
  readonly lastError: ExecutionError;
  readonly attempts: number;

  constructor(lastError: ExecutionError, attempts: number) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

// ============================================================================
// Cancellation
// ============================================================================

/**
 * A suspension point (request, backoff or poll sleep) was interrupted by an
 * abort signal
 */
export class OperationCancelled extends ProvisioningClientError {
  readonly category = 'cancellation' as const;
  readonly isRetryable = false;

  constructor(message: string = 'Operation was cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

// ============================================================================
// Poll Errors
// ============================================================================

export type PollErrorKind = 'Cancelled' | 'StatusExtractionFailed';

export class PollError extends ProvisioningClientError {
  readonly category = 'poll' as const;
  readonly isRetryable = false;
  readonly kind: PollErrorKind;
  readonly lastObservedState?: string;

  constructor(
    kind: PollErrorKind,
    message: string,
    options?: { lastObservedState?: string; cause?: unknown }
  ) {
    super(message, options);
    this.kind = kind;
    this.lastObservedState = options?.lastObservedState;
  }
}

// ============================================================================
// Provisioning Errors
// ============================================================================

export type ProvisioningErrorKind = 'CreateFailed' | 'CleanupFailed' | 'UpdateUnsupported';

export class ProvisioningError extends ProvisioningClientError {
  readonly category = 'provisioning' as const;
  readonly isRetryable = false;
  readonly kind: ProvisioningErrorKind;
  readonly resourceId?: string;

  constructor(
    kind: ProvisioningErrorKind,
    message: string,
    options?: { resourceId?: string; cause?: unknown }
  ) {
    super(message, options);
    this.kind = kind;
    this.resourceId = options?.resourceId;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function isProvisioningClientError(error: unknown): error is ProvisioningClientError {
  return error instanceof ProvisioningClientError;
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof ProvisioningClientError && error.isRetryable;
}

/**
 * Pull a human-readable message and error code out of an API error body
 */
export function parseApiErrorBody(
  body: Record<string, unknown>,
  fallback: string
): { message: string; errorCode?: string } {
  const message =
    typeof body['message'] === 'string'
      ? body['message']
      : typeof body['error'] === 'string'
        ? body['error']
        : fallback;
  const errorCode = typeof body['error_code'] === 'string' ? body['error_code'] : undefined;
  return { message, errorCode };
}
