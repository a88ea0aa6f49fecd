/**
 * Resource kinds supported by the orchestrator.
 */

import { clusterKind } from './cluster.js';
import { instancePoolKind } from './instance-pool.js';
import { jobKind } from './job.js';
import type { ResourceKindName } from '../types/index.js';
import type { ResourceKindStrategy } from './types.js';

export * from './types.js';
export * from './cluster.js';
export * from './job.js';
export * from './instance-pool.js';

/**
 * Tagged variant over the built-in kinds, discriminated by `kind`
 */
export type ResourceKind = typeof clusterKind | typeof jobKind | typeof instancePoolKind;

export const resourceKinds = {
  cluster: clusterKind,
  job: jobKind,
  instancePool: instancePoolKind,
} as const satisfies Record<ResourceKindName, ResourceKind>;

export function getResourceKind(name: ResourceKindName): ResourceKindStrategy {
  return resourceKinds[name];
}
