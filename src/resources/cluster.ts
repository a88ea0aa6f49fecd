/**
 * All-purpose compute clusters (`/api/2.0/clusters`).
 */

import { OperationStatus, type StatusObservation } from '../types/index.js';
import {
  omitKeys,
  readId,
  readRecords,
  readString,
  requireState,
  type DesiredSpec,
  type ExistingResource,
  type ResourceKindStrategy,
} from './types.js';

const BASE_PATH = '/api/2.0/clusters';

export type ClusterState =
  | 'PENDING'
  | 'RUNNING'
  | 'RESTARTING'
  | 'RESIZING'
  | 'TERMINATING'
  | 'TERMINATED'
  | 'ERROR'
  | 'UNKNOWN';

export interface ClusterSpec extends DesiredSpec {
  cluster_name?: string;
  spark_version?: string;
  node_type_id?: string;
  num_workers?: number;
  autoscale?: { min_workers: number; max_workers: number };
  instance_pool_id?: string;
  autotermination_minutes?: number;
  spark_conf?: Record<string, string>;
  custom_tags?: Record<string, string>;
}

const PROVISION_STATES: Record<ClusterState, OperationStatus> = {
  PENDING: OperationStatus.PENDING,
  RUNNING: OperationStatus.SUCCEEDED,
  RESTARTING: OperationStatus.RUNNING,
  RESIZING: OperationStatus.RUNNING,
  TERMINATING: OperationStatus.RUNNING,
  TERMINATED: OperationStatus.FAILED,
  ERROR: OperationStatus.FAILED,
  UNKNOWN: OperationStatus.UNKNOWN,
};

const DELETE_STATES: Record<ClusterState, OperationStatus> = {
  PENDING: OperationStatus.RUNNING,
  RUNNING: OperationStatus.RUNNING,
  RESTARTING: OperationStatus.RUNNING,
  RESIZING: OperationStatus.RUNNING,
  TERMINATING: OperationStatus.RUNNING,
  TERMINATED: OperationStatus.SUCCEEDED,
  ERROR: OperationStatus.FAILED,
  UNKNOWN: OperationStatus.UNKNOWN,
};

function isClusterState(value: string): value is ClusterState {
  return Object.hasOwn(PROVISION_STATES, value);
}

function observe(
  body: Record<string, unknown>,
  table: Record<ClusterState, OperationStatus>
): StatusObservation {
  const state = requireState(body, 'state', 'Cluster');
  return {
    status: isClusterState(state) ? table[state] : OperationStatus.UNKNOWN,
    rawState: state,
    message: readString(body, 'state_message'),
  };
}

export const clusterKind: ResourceKindStrategy<ClusterSpec> & { readonly kind: 'cluster' } = {
  kind: 'cluster',
  displayName: 'cluster',

  buildCreateRequest: (spec) => ({
    method: 'POST',
    path: `${BASE_PATH}/create`,
    body: { ...spec },
  }),

  extractId: (response) => readId(response.body, 'cluster_id'),

  buildStatusRequest: (id) => ({
    method: 'GET',
    path: `${BASE_PATH}/get`,
    query: { cluster_id: id },
  }),

  extractStatus: (response) => observe(response.body, PROVISION_STATES),

  buildUpdateRequest: (id, spec) => ({
    method: 'POST',
    path: `${BASE_PATH}/edit`,
    body: { ...omitKeys(spec, ['cluster_id']), cluster_id: id },
  }),

  buildDeleteRequest: (id) => ({
    method: 'POST',
    path: `${BASE_PATH}/delete`,
    body: { cluster_id: id },
  }),

  extractDeleteStatus: (response) => observe(response.body, DELETE_STATES),

  nameOf: (spec) => spec.cluster_name,

  buildListRequest: () => ({
    method: 'GET',
    path: `${BASE_PATH}/list`,
  }),

  findAllByName: (response, name) => {
    const matches: ExistingResource[] = [];
    for (const cluster of readRecords(response.body, 'clusters')) {
      const id = readId(cluster, 'cluster_id');
      if (id !== undefined && readString(cluster, 'cluster_name') === name) {
        matches.push({ id, observation: observe(cluster, PROVISION_STATES) });
      }
    }
    return matches;
  },

  nextPageToken: (response) => readString(response.body, 'next_page_token') || undefined,
};
