/**
 * Contract every resource kind implements.
 *
 * A kind knows its REST paths, how to read an identifier out of a create
 * response and how to map its own state strings onto {@link OperationStatus}.
 * The orchestrator is generic over this contract.
 */

import { isRecord } from '../http/index.js';
import type {
  ApiRequest,
  ApiResponse,
  ResourceKindName,
  StatusObservation,
} from '../types/index.js';

/**
 * Desired-state payload, passed through to the API as JSON
 */
export type DesiredSpec = Record<string, unknown>;

/**
 * A resource found by the existing-resource lookup
 */
export interface ExistingResource {
  id: string;
  observation: StatusObservation;
}

export interface ResourceKindStrategy<TSpec extends DesiredSpec = DesiredSpec> {
  readonly kind: ResourceKindName;
  /** Human-readable name for logs and messages */
  readonly displayName: string;

  buildCreateRequest(spec: TSpec): ApiRequest;
  /** Identifier of the newly created resource, `undefined` if absent */
  extractId(response: ApiResponse): string | undefined;

  buildStatusRequest(id: string): ApiRequest;
  /**
   * Terminal-state mapping for provisioning and updates.
   * Throws when the response does not carry a state at all.
   */
  extractStatus(response: ApiResponse): StatusObservation;

  /** Absent for kinds that cannot be updated in place */
  buildUpdateRequest?(id: string, spec: TSpec): ApiRequest;

  buildDeleteRequest(id: string): ApiRequest;
  /**
   * Terminal-state mapping while waiting for a deletion. Absent for kinds
   * whose delete call completes synchronously.
   */
  extractDeleteStatus?(response: ApiResponse): StatusObservation;

  /** Name the lookup matches on */
  nameOf(spec: TSpec): string | undefined;
  buildListRequest(pageToken?: string): ApiRequest;
  /** Every entry on a list page carrying the name, in list order */
  findAllByName(response: ApiResponse, name: string): ExistingResource[];
  /** Token for the next page of a list response, if any */
  nextPageToken(response: ApiResponse): string | undefined;
}

// ============================================================================
// Response helpers
// ============================================================================

/**
 * Read an identifier field that may be a string or a number
 */
export function readId(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (typeof value === 'string' && value.trim() !== '') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export function readString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read a required state field, throwing when it is missing
 */
export function requireState(body: Record<string, unknown>, key: string, kind: string): string {
  const state = readString(body, key);
  if (state === undefined || state === '') {
    throw new Error(`${kind} response has no "${key}" field`);
  }
  return state;
}

export function readRecords(body: Record<string, unknown>, key: string): Record<string, unknown>[] {
  const value = body[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Copy a spec, dropping the given keys
 */
export function omitKeys(spec: DesiredSpec, keys: readonly string[]): DesiredSpec {
  const result: DesiredSpec = {};
  for (const [key, value] of Object.entries(spec)) {
    if (!keys.includes(key)) {
      result[key] = value;
    }
  }
  return result;
}
