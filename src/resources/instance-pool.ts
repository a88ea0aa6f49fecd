/**
 * Instance pools (`/api/2.0/instance-pools`). Pools become `ACTIVE` on
 * creation and are removed synchronously on delete.
 */

import { OperationStatus, type StatusObservation } from '../types/index.js';
import {
  omitKeys,
  readId,
  readRecords,
  readString,
  requireState,
  type DesiredSpec,
  type ResourceKindStrategy,
} from './types.js';

const BASE_PATH = '/api/2.0/instance-pools';

export type InstancePoolState = 'ACTIVE' | 'STOPPED' | 'DELETED';

export interface InstancePoolSpec extends DesiredSpec {
  instance_pool_name?: string;
  node_type_id?: string;
  min_idle_instances?: number;
  max_capacity?: number;
  idle_instance_autotermination_minutes?: number;
  preloaded_spark_versions?: string[];
}

const POOL_STATES: Record<InstancePoolState, OperationStatus> = {
  ACTIVE: OperationStatus.SUCCEEDED,
  STOPPED: OperationStatus.FAILED,
  DELETED: OperationStatus.FAILED,
};

function isPoolState(value: string): value is InstancePoolState {
  return Object.hasOwn(POOL_STATES, value);
}

function observe(body: Record<string, unknown>): StatusObservation {
  const state = requireState(body, 'state', 'Instance pool');
  return {
    status: isPoolState(state) ? POOL_STATES[state] : OperationStatus.UNKNOWN,
    rawState: state,
  };
}

export const instancePoolKind: ResourceKindStrategy<InstancePoolSpec> & {
  readonly kind: 'instancePool';
} = {
  kind: 'instancePool',
  displayName: 'instance pool',

  buildCreateRequest: (spec) => ({
    method: 'POST',
    path: `${BASE_PATH}/create`,
    body: { ...spec },
  }),

  extractId: (response) => readId(response.body, 'instance_pool_id'),

  buildStatusRequest: (id) => ({
    method: 'GET',
    path: `${BASE_PATH}/get`,
    query: { instance_pool_id: id },
  }),

  extractStatus: (response) => observe(response.body),

  buildUpdateRequest: (id, spec) => ({
    method: 'POST',
    path: `${BASE_PATH}/edit`,
    body: { ...omitKeys(spec, ['instance_pool_id']), instance_pool_id: id },
  }),

  buildDeleteRequest: (id) => ({
    method: 'POST',
    path: `${BASE_PATH}/delete`,
    body: { instance_pool_id: id },
  }),

  nameOf: (spec) => spec.instance_pool_name,

  buildListRequest: () => ({
    method: 'GET',
    path: `${BASE_PATH}/list`,
  }),

  findAllByName: (response, name) =>
    readRecords(response.body, 'instance_pools').flatMap((pool) => {
      const id = readId(pool, 'instance_pool_id');
      return id !== undefined && readString(pool, 'instance_pool_name') === name
        ? [{ id, observation: observe(pool) }]
        : [];
    }),

  nextPageToken: () => undefined,
};
