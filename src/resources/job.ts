/**
 * One-time job runs (`/api/2.1/jobs/runs`).
 *
 * A run is submitted, then reported through a life-cycle state plus, once
 * terminated, a result state. Only `TERMINATED` with `SUCCESS` counts as
 * success.
 */

import { isRecord } from '../http/index.js';
import { OperationStatus, type StatusObservation } from '../types/index.js';
import {
  readId,
  readRecords,
  readString,
  requireState,
  type DesiredSpec,
  type ExistingResource,
  type ResourceKindStrategy,
} from './types.js';

const BASE_PATH = '/api/2.1/jobs/runs';

export type RunLifeCycleState =
  | 'QUEUED'
  | 'PENDING'
  | 'BLOCKED'
  | 'WAITING_FOR_RETRY'
  | 'RUNNING'
  | 'TERMINATING'
  | 'TERMINATED'
  | 'SKIPPED'
  | 'INTERNAL_ERROR';

export type RunResultState =
  | 'SUCCESS'
  | 'FAILED'
  | 'TIMEDOUT'
  | 'CANCELED'
  | 'MAXIMUM_CONCURRENT_RUNS_REACHED'
  | 'EXCLUDED'
  | 'SUCCESS_WITH_FAILURES'
  | 'UPSTREAM_FAILED'
  | 'UPSTREAM_CANCELED';

export interface JobRunSpec extends DesiredSpec {
  run_name?: string;
  tasks?: Record<string, unknown>[];
  timeout_seconds?: number;
  idempotency_token?: string;
}

/** Fields the repair endpoint accepts from an update spec */
const REPAIR_FIELDS = [
  'rerun_tasks',
  'rerun_all_failed_tasks',
  'rerun_dependent_tasks',
  'latest_repair_id',
  'job_parameters',
  'notebook_params',
  'python_params',
  'jar_params',
] as const;

const LIFE_CYCLE_STATES: Record<RunLifeCycleState, OperationStatus> = {
  QUEUED: OperationStatus.PENDING,
  PENDING: OperationStatus.PENDING,
  BLOCKED: OperationStatus.PENDING,
  WAITING_FOR_RETRY: OperationStatus.PENDING,
  RUNNING: OperationStatus.RUNNING,
  TERMINATING: OperationStatus.RUNNING,
  TERMINATED: OperationStatus.FAILED, // refined by the result state
  SKIPPED: OperationStatus.FAILED,
  INTERNAL_ERROR: OperationStatus.FAILED,
};

function isLifeCycleState(value: string): value is RunLifeCycleState {
  return Object.hasOwn(LIFE_CYCLE_STATES, value);
}

function observe(run: Record<string, unknown>): StatusObservation {
  const state = run['state'];
  if (!isRecord(state)) {
    throw new Error('Job run response has no "state" object');
  }
  const lifeCycle = requireState(state, 'life_cycle_state', 'Job run');
  const result = readString(state, 'result_state');
  const message = readString(state, 'state_message');

  if (lifeCycle === 'TERMINATED') {
    return {
      status: result === 'SUCCESS' ? OperationStatus.SUCCEEDED : OperationStatus.FAILED,
      rawState: result ? `${lifeCycle}/${result}` : lifeCycle,
      message,
    };
  }

  return {
    status: isLifeCycleState(lifeCycle) ? LIFE_CYCLE_STATES[lifeCycle] : OperationStatus.UNKNOWN,
    rawState: lifeCycle,
    message,
  };
}

/**
 * Run ids are int64 on the wire; keep numeric ids numeric
 */
function toRunId(id: string): number | string {
  return /^\d+$/.test(id) ? Number(id) : id;
}

export const jobKind: ResourceKindStrategy<JobRunSpec> & { readonly kind: 'job' } = {
  kind: 'job',
  displayName: 'job run',

  buildCreateRequest: (spec) => ({
    method: 'POST',
    path: `${BASE_PATH}/submit`,
    body: { ...spec },
  }),

  extractId: (response) => readId(response.body, 'run_id'),

  buildStatusRequest: (id) => ({
    method: 'GET',
    path: `${BASE_PATH}/get`,
    query: { run_id: id },
  }),

  extractStatus: (response) => observe(response.body),

  buildUpdateRequest: (id, spec) => {
    const body: Record<string, unknown> = { rerun_all_failed_tasks: true };
    for (const field of REPAIR_FIELDS) {
      if (spec[field] !== undefined) {
        body[field] = spec[field];
      }
    }
    if (Array.isArray(body['rerun_tasks'])) {
      delete body['rerun_all_failed_tasks'];
    }
    body['run_id'] = toRunId(id);
    return { method: 'POST', path: `${BASE_PATH}/repair`, body };
  },

  buildDeleteRequest: (id) => ({
    method: 'POST',
    path: `${BASE_PATH}/delete`,
    body: { run_id: toRunId(id) },
  }),

  nameOf: (spec) => spec.run_name,

  // Active and completed one-time runs, newest first
  buildListRequest: (pageToken) => ({
    method: 'GET',
    path: `${BASE_PATH}/list`,
    query: { run_type: 'SUBMIT_RUN', limit: 25, page_token: pageToken },
  }),

  findAllByName: (response, name) => {
    const matches: ExistingResource[] = [];
    for (const run of readRecords(response.body, 'runs')) {
      const id = readId(run, 'run_id');
      if (id !== undefined && readString(run, 'run_name') === name) {
        matches.push({ id, observation: observe(run) });
      }
    }
    return matches;
  },

  nextPageToken: (response) => readString(response.body, 'next_page_token') || undefined,
};
