/**
 * Core data model shared across the provisioning client.
 */

import type { ExecutionErrorKind } from '../errors/index.js';

// ============================================================================
// Requests & Responses
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

/**
 * One REST call. Built fresh for every attempt and never mutated.
 */
export interface ApiRequest {
  readonly method: HttpMethod;
  /** Path relative to the workspace base URL, e.g. `/api/2.0/clusters/get` */
  readonly path: string;
  readonly body?: Record<string, unknown>;
  readonly query?: Readonly<Record<string, QueryValue>>;
}

export interface ApiResponse {
  status: number;
  /** Parsed JSON object; `{}` when the payload is empty or not a JSON object */
  body: Record<string, unknown>;
  rawBody: string;
  headers: Record<string, string>;
}

// ============================================================================
// Operation Status
// ============================================================================

export const OperationStatus = {
  PENDING: 'PENDING',
  RUNNING: 'RUNNING',
  SUCCEEDED: 'SUCCEEDED',
  FAILED: 'FAILED',
  TIMED_OUT: 'TIMED_OUT',
  UNKNOWN: 'UNKNOWN',
} as const;

export type OperationStatus = (typeof OperationStatus)[keyof typeof OperationStatus];

export type TerminalStatus = 'SUCCEEDED' | 'FAILED' | 'TIMED_OUT';

export function isTerminalStatus(status: OperationStatus): status is TerminalStatus {
  return (
    status === OperationStatus.SUCCEEDED ||
    status === OperationStatus.FAILED ||
    status === OperationStatus.TIMED_OUT
  );
}

/**
 * What a status extractor reads out of a status response
 */
export interface StatusObservation {
  status: OperationStatus;
  /** The resource's own state string, e.g. `RUNNING` or `TERMINATED/FAILED` */
  rawState?: string;
  message?: string;
}

// ============================================================================
// Retry
// ============================================================================

export type RetryDecision =
  | { readonly retry: true; readonly delayMs: number }
  | { readonly retry: false; readonly reason: string };

// ============================================================================
// Resource kinds
// ============================================================================

export type ResourceKindName = 'cluster' | 'job' | 'instancePool';

export const RESOURCE_KIND_NAMES: readonly ResourceKindName[] = ['cluster', 'job', 'instancePool'];

export function isResourceKindName(value: string): value is ResourceKindName {
  return (RESOURCE_KIND_NAMES as readonly string[]).includes(value);
}

// ============================================================================
// Results
// ============================================================================

export type CallOperation = 'lookup' | 'create' | 'status' | 'update' | 'delete' | 'cleanup';

export type LifecycleOperation = 'provision' | 'update' | 'delete';

/**
 * One attempted HTTP call, kept for diagnostics
 */
export interface CallRecord {
  operation: CallOperation;
  method: HttpMethod;
  path: string;
  /** 1-based attempt number within the logical call */
  attempt: number;
  outcome: 'success' | ExecutionErrorKind;
  statusCode?: number;
  durationMs: number;
}

export type ErrorDetailKind =
  | ExecutionErrorKind
  | 'ConfigurationError'
  | 'RetryExhausted'
  | 'Cancelled'
  | 'StatusExtractionFailed'
  | 'CreateFailed'
  | 'CleanupFailed'
  | 'UpdateUnsupported'
  | 'ResourceFailed'
  | 'TimedOut'
  | 'Unexpected';

export interface ErrorDetail {
  kind: ErrorDetailKind;
  message: string;
  lastHttpStatus?: number;
  lastObservedState?: string;
  /** Number of HTTP attempts made during the orchestration */
  attemptCount: number;
  /** Set when the best-effort cleanup after a failure also failed */
  cleanupError?: { kind: ErrorDetailKind; message: string; lastHttpStatus?: number };
}

export interface ProvisionResult {
  kind: ResourceKindName;
  operation: LifecycleOperation;
  /** Empty when no identifier was ever obtained */
  resourceId: string;
  status: OperationStatus;
  /** True when an existing resource was adopted instead of created */
  reusedExisting: boolean;
  calls: CallRecord[];
  error?: ErrorDetail;
}
