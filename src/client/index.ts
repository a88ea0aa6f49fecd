/**
 * Provisioning client.
 *
 * Entry point that wires one validated configuration, logger and metrics
 * collector into an orchestrator per resource kind.
 *
 * @example
 * ```typescript
 * import { createProvisioningClient } from 'databricks-provisioning-client';
 *
 * const client = createProvisioningClient({
 *   host: 'https://my-workspace.cloud.databricks.com',
 *   token: process.env.DATABRICKS_TOKEN,
 * });
 *
 * const result = await client.clusters.provision({
 *   cluster_name: 'nightly-etl',
 *   spark_version: '14.3.x-scala2.12',
 *   node_type_id: 'i3.xlarge',
 *   num_workers: 2,
 * });
 * ```
 */

import type { Clock } from '../clock/index.js';
import { ProvisioningConfig, type ProvisioningConfigOptions } from '../config/index.js';
import { HttpExecutor, type FetchFn } from '../http/index.js';
import {
  NoopLogger,
  NoopMetricsCollector,
  type Logger,
  type MetricsCollector,
} from '../observability/index.js';
import {
  ResourceOrchestrator,
  lookupByName,
  type ResourceOrchestratorConfig,
} from '../orchestrator/index.js';
import {
  clusterKind,
  instancePoolKind,
  jobKind,
  type ClusterSpec,
  type DesiredSpec,
  type InstancePoolSpec,
  type JobRunSpec,
  type ResourceKindStrategy,
} from '../resources/index.js';
import { RetryPolicy } from '../retry/index.js';
import type { ResourceKindName } from '../types/index.js';

export interface ProvisioningClientDependencies {
  logger?: Logger;
  metrics?: MetricsCollector;
  clock?: Clock;
  fetch?: FetchFn;
  /** Jitter source for retry backoff */
  random?: () => number;
  /** Enable the name-based existing-resource lookup before create */
  lookupExisting?: boolean;
}

export type ProvisioningClientOptions = ProvisioningConfigOptions & ProvisioningClientDependencies;

export class ProvisioningClient {
  readonly config: ProvisioningConfig;
  readonly clusters: ResourceOrchestrator<ClusterSpec>;
  readonly jobs: ResourceOrchestrator<JobRunSpec>;
  readonly instancePools: ResourceOrchestrator<InstancePoolSpec>;

  constructor(config: ProvisioningConfig, deps: ProvisioningClientDependencies = {}) {
    this.config = config;

    const logger = deps.logger ?? new NoopLogger();
    const metrics = deps.metrics ?? new NoopMetricsCollector();
    const executor = new HttpExecutor({
      defaultTimeoutMs: config.requestTimeoutMs,
      userAgent: config.userAgent,
      fetch: deps.fetch,
      logger,
      metrics,
    });
    const retry = new RetryPolicy({
      ...config.retry,
      random: deps.random,
      clock: deps.clock,
      logger,
      metrics,
    });

    const build = <TSpec extends DesiredSpec>(
      kind: ResourceKindStrategy<TSpec>
    ): ResourceOrchestrator<TSpec> => {
      const options: ResourceOrchestratorConfig<TSpec> = {
        config,
        kind,
        executor,
        retry,
        clock: deps.clock,
        logger,
        metrics,
      };
      if (deps.lookupExisting) {
        options.lookup = lookupByName(kind);
      }
      return new ResourceOrchestrator(options);
    };

    this.clusters = build(clusterKind);
    this.jobs = build(jobKind);
    this.instancePools = build(instancePoolKind);
  }

  /**
   * Orchestrator for a kind chosen at run time
   */
  orchestratorFor(kind: ResourceKindName): ResourceOrchestrator {
    switch (kind) {
      case 'cluster':
        return this.clusters;
      case 'job':
        return this.jobs;
      case 'instancePool':
        return this.instancePools;
    }
  }
}

/**
 * @throws {ConfigurationError} when the options do not validate
 */
export function createProvisioningClient(options: ProvisioningClientOptions): ProvisioningClient {
  const { logger, metrics, clock, fetch, random, lookupExisting, ...configOptions } = options;
  return new ProvisioningClient(ProvisioningConfig.create(configOptions), {
    logger,
    metrics,
    clock,
    fetch,
    random,
    lookupExisting,
  });
}

/**
 * Build a client from an environment record (`DATABRICKS_HOST`,
 * `DATABRICKS_TOKEN` and the optional `PROVISIONING_*` tuning variables).
 *
 * @throws {ConfigurationError} when a variable is missing or malformed
 */
export function createClientFromEnv(
  env: Readonly<Record<string, string | undefined>>,
  deps: ProvisioningClientDependencies = {}
): ProvisioningClient {
  return new ProvisioningClient(ProvisioningConfig.fromEnv(env), deps);
}
