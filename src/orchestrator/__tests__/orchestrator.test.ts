/**
 * Tests for ResourceOrchestrator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ResourceOrchestrator,
  lookupByName,
  serializeResult,
  type ExistingResourceLookup,
} from '../index.js';
import { ProvisioningConfig } from '../../config/index.js';
import type { FetchFn } from '../../http/index.js';
import {
  InMemoryLogger,
  InMemoryMetricsCollector,
  ProvisioningMetrics,
} from '../../observability/index.js';
import {
  clusterKind,
  instancePoolKind,
  jobKind,
  type DesiredSpec,
  type ResourceKindStrategy,
} from '../../resources/index.js';
import { FakeClock, FakeDatabricksApi, jsonResponse } from '../../testing/index.js';
import { OperationStatus } from '../../types/index.js';

const CLUSTERS = '/api/2.0/clusters';
const RUNS = '/api/2.1/jobs/runs';
const POOLS = '/api/2.0/instance-pools';

describe('ResourceOrchestrator', () => {
  let api: FakeDatabricksApi;
  let clock: FakeClock;
  let logger: InMemoryLogger;
  let metrics: InMemoryMetricsCollector;
  let config: ProvisioningConfig;

  function orchestrator<TSpec extends DesiredSpec>(
    kind: ResourceKindStrategy<TSpec>,
    options: { lookup?: ExistingResourceLookup<TSpec>; fetch?: FetchFn } = {}
  ): ResourceOrchestrator<TSpec> {
    return new ResourceOrchestrator({
      config,
      kind,
      lookup: options.lookup,
      fetch: options.fetch ?? api.fetch,
      random: () => 0.5,
      clock,
      logger,
      metrics,
    });
  }

  beforeEach(() => {
    api = new FakeDatabricksApi();
    clock = new FakeClock();
    logger = new InMemoryLogger();
    metrics = new InMemoryMetricsCollector();
    config = ProvisioningConfig.create({
      host: 'https://workspace.example.com',
      token: 'test-token',
      polling: { timeoutMs: 60_000, intervalMs: 1000 },
    });
  });

  describe('provision', () => {
    it('should create a cluster and wait until it is running', async () => {
      api
        .on('POST', `${CLUSTERS}/create`, jsonResponse({ cluster_id: 'c-1' }))
        .on(
          'GET',
          `${CLUSTERS}/get`,
          jsonResponse({ state: 'PENDING' }),
          jsonResponse({ state: 'PENDING' }),
          jsonResponse({ state: 'RUNNING' })
        );

      const result = await orchestrator(clusterKind).provision({
        cluster_name: 'etl',
        num_workers: 2,
      });

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.resourceId).toBe('c-1');
      expect(result.reusedExisting).toBe(false);
      expect(result.error).toBeUndefined();
      expect(result.calls.map((c) => `${c.operation}:${c.attempt}:${c.outcome}`)).toEqual([
        'create:1:success',
        'status:1:success',
        'status:1:success',
        'status:1:success',
      ]);
      expect(result.calls[0]).toEqual({
        operation: 'create',
        method: 'POST',
        path: `${CLUSTERS}/create`,
        attempt: 1,
        outcome: 'success',
        statusCode: 200,
        durationMs: 0,
      });
      expect(api.callsTo('POST', `${CLUSTERS}/create`)[0]?.body).toEqual({
        cluster_name: 'etl',
        num_workers: 2,
      });
      expect(clock.sleeps).toEqual([1000, 1000]);
      expect(
        metrics.getCounter(ProvisioningMetrics.OPERATIONS_TOTAL, {
          kind: 'cluster',
          operation: 'provision',
          status: 'SUCCEEDED',
        })
      ).toBe(1);
    });

    it('should stop at a rejected credential without polling', async () => {
      api.on(
        'POST',
        `${CLUSTERS}/create`,
        jsonResponse({ error_code: 'PERMISSION_DENIED', message: 'Invalid access token' }, 401)
      );

      const result = await orchestrator(clusterKind).provision({ cluster_name: 'etl' });

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.resourceId).toBe('');
      expect(result.error).toEqual({
        kind: 'Unauthorized',
        message: 'POST /api/2.0/clusters/create returned 401: Invalid access token',
        lastHttpStatus: 401,
        lastObservedState: undefined,
        attemptCount: 1,
        cleanupError: undefined,
      });
      expect(api.requests).toHaveLength(1);
    });

    it('should clean up a job run that ends in failure', async () => {
      api
        .on('POST', `${RUNS}/submit`, jsonResponse({ run_id: 77 }))
        .on(
          'GET',
          `${RUNS}/get`,
          jsonResponse({ message: 'busy' }, 503),
          jsonResponse({ message: 'busy' }, 503),
          jsonResponse({
            state: {
              life_cycle_state: 'TERMINATED',
              result_state: 'FAILED',
              state_message: 'Task ingest failed',
            },
          })
        )
        .on('POST', `${RUNS}/delete`, jsonResponse({}));

      const result = await orchestrator(jobKind).provision({ run_name: 'nightly', tasks: [] });

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.resourceId).toBe('77');
      expect(result.calls.map((c) => `${c.operation}:${c.attempt}:${c.outcome}`)).toEqual([
        'create:1:success',
        'status:1:ServerError',
        'status:2:ServerError',
        'status:3:success',
        'cleanup:1:success',
      ]);
      expect(result.error?.kind).toBe('ResourceFailed');
      expect(result.error?.message).toBe(
        'job run 77 ended in state TERMINATED/FAILED: Task ingest failed'
      );
      expect(result.error?.lastObservedState).toBe('TERMINATED/FAILED');
      expect(result.error?.attemptCount).toBe(5);
      expect(result.error?.cleanupError).toBeUndefined();
      expect(api.callsTo('POST', `${RUNS}/delete`)[0]?.body).toEqual({ run_id: 77 });
      expect(clock.sleeps).toEqual([2000, 4000]);
    });

    it('should keep the original failure when cleanup fails too', async () => {
      api
        .on('POST', `${RUNS}/submit`, jsonResponse({ run_id: 77 }))
        .on(
          'GET',
          `${RUNS}/get`,
          jsonResponse({ state: { life_cycle_state: 'INTERNAL_ERROR' } })
        )
        .on('POST', `${RUNS}/delete`, jsonResponse({ message: 'run is locked' }, 400));

      const result = await orchestrator(jobKind).provision({ run_name: 'nightly' });

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.error?.kind).toBe('ResourceFailed');
      expect(result.error?.message).toBe('job run 77 ended in state INTERNAL_ERROR');
      expect(result.error?.cleanupError).toEqual({
        kind: 'CleanupFailed',
        message:
          'Cleanup of job run 77 failed: POST /api/2.1/jobs/runs/delete returned 400: run is locked',
        lastHttpStatus: 400,
      });
    });

    it('should time out without cleaning up', async () => {
      api
        .on('POST', `${CLUSTERS}/create`, jsonResponse({ cluster_id: 'c-1' }))
        .on('GET', `${CLUSTERS}/get`, jsonResponse({ state: 'PENDING' }));

      const result = await orchestrator(clusterKind).provision(
        { cluster_name: 'etl' },
        { timeoutMs: 3000, intervalMs: 1000 }
      );

      expect(result.status).toBe(OperationStatus.TIMED_OUT);
      expect(result.error?.kind).toBe('TimedOut');
      expect(result.error?.message).toBe(
        'cluster c-1 did not reach a terminal state: No terminal state after 3000ms'
      );
      expect(result.error?.lastObservedState).toBe('PENDING');
      expect(result.calls).toHaveLength(4);
      expect(api.callsTo('POST', `${CLUSTERS}/delete`)).toHaveLength(0);
    });

    it('should fail when the create response carries no id', async () => {
      api.on('POST', `${CLUSTERS}/create`, jsonResponse({}));

      const result = await orchestrator(clusterKind).provision({ cluster_name: 'etl' });

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.error?.kind).toBe('CreateFailed');
      expect(result.error?.message).toBe('Create response did not contain a cluster identifier');
      expect(api.requests).toHaveLength(1);
    });

    it('should report exhausted retries with the last HTTP status', async () => {
      api.on('POST', `${CLUSTERS}/create`, jsonResponse({ message: 'busy' }, 503));

      const result = await orchestrator(clusterKind).provision({ cluster_name: 'etl' });

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.error?.kind).toBe('RetryExhausted');
      expect(result.error?.message).toBe(
        'Gave up after 5 attempts: POST /api/2.0/clusters/create returned 503: busy'
      );
      expect(result.error?.lastHttpStatus).toBe(503);
      expect(result.error?.attemptCount).toBe(5);
      expect(clock.sleeps).toEqual([2000, 4000, 8000, 16000]);
    });

    it('should report a status response it cannot read as UNKNOWN', async () => {
      api
        .on('POST', `${CLUSTERS}/create`, jsonResponse({ cluster_id: 'c-1' }))
        .on('GET', `${CLUSTERS}/get`, jsonResponse({ cluster_id: 'c-1' }));

      const result = await orchestrator(clusterKind).provision({ cluster_name: 'etl' });

      expect(result.status).toBe(OperationStatus.UNKNOWN);
      expect(result.error?.kind).toBe('StatusExtractionFailed');
    });
  });

  describe('existing-resource lookup', () => {
    it('should reuse a running cluster with the same name', async () => {
      api.on(
        'GET',
        `${CLUSTERS}/list`,
        jsonResponse({ clusters: [{ cluster_id: 'c-9', cluster_name: 'etl', state: 'RUNNING' }] })
      );

      const result = await orchestrator(clusterKind, {
        lookup: lookupByName(clusterKind),
      }).provision({ cluster_name: 'etl' });

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.resourceId).toBe('c-9');
      expect(result.reusedExisting).toBe(true);
      expect(result.calls.map((c) => c.operation)).toEqual(['lookup']);
      expect(api.callsTo('POST', `${CLUSTERS}/create`)).toHaveLength(0);
    });

    it('should wait for a reused cluster that is still starting', async () => {
      api
        .on(
          'GET',
          `${CLUSTERS}/list`,
          jsonResponse({ clusters: [{ cluster_id: 'c-9', cluster_name: 'etl', state: 'PENDING' }] })
        )
        .on('GET', `${CLUSTERS}/get`, jsonResponse({ state: 'RUNNING' }));

      const result = await orchestrator(clusterKind, {
        lookup: lookupByName(clusterKind),
      }).provision({ cluster_name: 'etl' });

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.reusedExisting).toBe(true);
      expect(result.calls.map((c) => c.operation)).toEqual(['lookup', 'status']);
    });

    it('should create a new cluster when the existing one has failed', async () => {
      api
        .on(
          'GET',
          `${CLUSTERS}/list`,
          jsonResponse({ clusters: [{ cluster_id: 'c-9', cluster_name: 'etl', state: 'ERROR' }] })
        )
        .on('POST', `${CLUSTERS}/create`, jsonResponse({ cluster_id: 'c-10' }))
        .on('GET', `${CLUSTERS}/get`, jsonResponse({ state: 'RUNNING' }));

      const result = await orchestrator(clusterKind, {
        lookup: lookupByName(clusterKind),
      }).provision({ cluster_name: 'etl' });

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.resourceId).toBe('c-10');
      expect(result.reusedExisting).toBe(false);
    });

    it('should prefer a healthy cluster over a failed one with the same name', async () => {
      api.on(
        'GET',
        `${CLUSTERS}/list`,
        jsonResponse({
          clusters: [
            { cluster_id: 'c-old', cluster_name: 'etl', state: 'TERMINATED' },
            { cluster_id: 'c-2', cluster_name: 'etl', state: 'RUNNING' },
          ],
        })
      );

      const result = await orchestrator(clusterKind, {
        lookup: lookupByName(clusterKind),
      }).provision({ cluster_name: 'etl' });

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.resourceId).toBe('c-2');
      expect(result.reusedExisting).toBe(true);
      expect(api.callsTo('POST', `${CLUSTERS}/create`)).toHaveLength(0);
    });

    it('should look past a failed match on an earlier page', async () => {
      api
        .on(
          'GET',
          `${CLUSTERS}/list`,
          jsonResponse({
            clusters: [{ cluster_id: 'c-old', cluster_name: 'etl', state: 'ERROR' }],
            next_page_token: 'page-2',
          }),
          jsonResponse({
            clusters: [{ cluster_id: 'c-2', cluster_name: 'etl', state: 'PENDING' }],
          })
        )
        .on('GET', `${CLUSTERS}/get`, jsonResponse({ state: 'RUNNING' }));

      const result = await orchestrator(clusterKind, {
        lookup: lookupByName(clusterKind),
      }).provision({ cluster_name: 'etl' });

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.resourceId).toBe('c-2');
      expect(result.calls.map((c) => c.operation)).toEqual(['lookup', 'lookup', 'status']);
      expect(api.callsTo('POST', `${CLUSTERS}/create`)).toHaveLength(0);
    });

    it('should not submit a job run twice', async () => {
      const runs: Array<Record<string, unknown>> = [];
      api
        .on('GET', `${RUNS}/list`, () => jsonResponse({ runs }))
        .on('POST', `${RUNS}/submit`, () => {
          runs.push({
            run_id: 12,
            run_name: 'nightly',
            state: { life_cycle_state: 'TERMINATED', result_state: 'SUCCESS' },
          });
          return jsonResponse({ run_id: 12 });
        })
        .on(
          'GET',
          `${RUNS}/get`,
          jsonResponse({ state: { life_cycle_state: 'TERMINATED', result_state: 'SUCCESS' } })
        );
      const jobs = orchestrator(jobKind, { lookup: lookupByName(jobKind) });

      const first = await jobs.provision({ run_name: 'nightly', tasks: [] });
      const second = await jobs.provision({ run_name: 'nightly', tasks: [] });

      expect(first.status).toBe(OperationStatus.SUCCEEDED);
      expect(first.reusedExisting).toBe(false);
      expect(second.status).toBe(OperationStatus.SUCCEEDED);
      expect(second.resourceId).toBe('12');
      expect(second.reusedExisting).toBe(true);
      expect(second.calls.map((c) => c.operation)).toEqual(['lookup']);
      expect(api.callsTo('POST', `${RUNS}/submit`)).toHaveLength(1);
    });

    it('should follow list pages', async () => {
      api
        .on(
          'GET',
          `${RUNS}/list`,
          jsonResponse({ runs: [], next_page_token: 'page-2' }),
          jsonResponse({
            runs: [
              {
                run_id: 12,
                run_name: 'nightly',
                state: { life_cycle_state: 'TERMINATED', result_state: 'SUCCESS' },
              },
            ],
          })
        );

      const result = await orchestrator(jobKind, { lookup: lookupByName(jobKind) }).provision({
        run_name: 'nightly',
      });

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.resourceId).toBe('12');
      expect(api.requests.map((r) => r.query)).toEqual([
        { run_type: 'SUBMIT_RUN', limit: '25' },
        { run_type: 'SUBMIT_RUN', limit: '25', page_token: 'page-2' },
      ]);
    });

    it('should skip the lookup for a spec without a name', async () => {
      api
        .on('POST', `${POOLS}/create`, jsonResponse({ instance_pool_id: 'p-1' }))
        .on('GET', `${POOLS}/get`, jsonResponse({ state: 'ACTIVE' }));

      const result = await orchestrator(instancePoolKind, {
        lookup: lookupByName(instancePoolKind),
      }).provision({ node_type_id: 'i3.xlarge' });

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.calls.map((c) => c.operation)).toEqual(['create', 'status']);
    });
  });

  describe('cancellation', () => {
    it('should end as UNKNOWN without cleanup when cancelled mid-poll', async () => {
      const controller = new AbortController();
      api
        .on('POST', `${CLUSTERS}/create`, jsonResponse({ cluster_id: 'c-1' }))
        .on('GET', `${CLUSTERS}/get`, () => {
          controller.abort();
          return jsonResponse({ state: 'PENDING' });
        });

      const result = await orchestrator(clusterKind).provision(
        { cluster_name: 'etl' },
        { signal: controller.signal }
      );

      expect(result.status).toBe(OperationStatus.UNKNOWN);
      expect(result.resourceId).toBe('c-1');
      expect(result.error?.kind).toBe('Cancelled');
      expect(result.error?.message).toBe('cluster provision was cancelled');
      expect(result.error?.lastObservedState).toBe('PENDING');
      expect(api.callsTo('POST', `${CLUSTERS}/delete`)).toHaveLength(0);
    });

    it('should send nothing when cancelled before starting', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await orchestrator(clusterKind).provision(
        { cluster_name: 'etl' },
        { signal: controller.signal }
      );

      expect(result.status).toBe(OperationStatus.UNKNOWN);
      expect(result.error?.kind).toBe('Cancelled');
      expect(result.error?.attemptCount).toBe(0);
      expect(api.requests).toHaveLength(0);
    });

    it('should time out when the run budget is spent', async () => {
      const hanging: FetchFn = (_input, init) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')), {
            once: true,
          });
        });

      const result = await orchestrator(clusterKind, { fetch: hanging }).provision(
        { cluster_name: 'etl' },
        { budgetMs: 20 }
      );

      expect(result.status).toBe(OperationStatus.TIMED_OUT);
      expect(result.error?.kind).toBe('TimedOut');
      expect(result.error?.message).toBe('cluster provision ran out of its time budget');
    });
  });

  describe('options', () => {
    it('should refuse a budget longer than a timer can wait', async () => {
      const result = await orchestrator(clusterKind).provision(
        { cluster_name: 'etl' },
        { budgetMs: 2 ** 31 }
      );

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.error?.kind).toBe('ConfigurationError');
      expect(result.error?.message).toBe(
        'Invalid orchestration options: budgetMs: must be at most 2147483647ms'
      );
      expect(api.requests).toHaveLength(0);
    });

    it('should refuse a poll timeout longer than a timer can wait', async () => {
      const result = await orchestrator(clusterKind).delete('c-1', { timeoutMs: 2 ** 31 });

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.error?.message).toBe(
        'Invalid orchestration options: timeoutMs: must be at most 2147483647ms'
      );
      expect(api.requests).toHaveLength(0);
    });
  });

  describe('update', () => {
    it('should edit a cluster and wait for it to settle', async () => {
      api
        .on('POST', `${CLUSTERS}/edit`, jsonResponse({}))
        .on(
          'GET',
          `${CLUSTERS}/get`,
          jsonResponse({ state: 'RESIZING' }),
          jsonResponse({ state: 'RUNNING' })
        );

      const result = await orchestrator(clusterKind).update('c-1', { num_workers: 4 });

      expect(result.operation).toBe('update');
      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.calls.map((c) => c.operation)).toEqual(['update', 'status', 'status']);
      expect(api.callsTo('POST', `${CLUSTERS}/edit`)[0]?.body).toEqual({
        num_workers: 4,
        cluster_id: 'c-1',
      });
    });

    it('should not delete a resource whose update failed', async () => {
      api
        .on('POST', `${CLUSTERS}/edit`, jsonResponse({}))
        .on('GET', `${CLUSTERS}/get`, jsonResponse({ state: 'ERROR' }));

      const result = await orchestrator(clusterKind).update('c-1', { num_workers: 4 });

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.error?.kind).toBe('ResourceFailed');
      expect(api.callsTo('POST', `${CLUSTERS}/delete`)).toHaveLength(0);
    });

    it('should refuse kinds without an update endpoint before any call', async () => {
      const readOnlyPools: ResourceKindStrategy<DesiredSpec> = {
        ...instancePoolKind,
        buildUpdateRequest: undefined,
      };

      const result = await orchestrator(readOnlyPools).update('p-1', { max_capacity: 4 });

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.resourceId).toBe('p-1');
      expect(result.error?.kind).toBe('UpdateUnsupported');
      expect(result.error?.message).toBe('instance pool does not support in-place updates');
      expect(result.error?.attemptCount).toBe(0);
      expect(api.requests).toHaveLength(0);
    });
  });

  describe('delete', () => {
    it('should wait until a cluster is gone', async () => {
      api
        .on('POST', `${CLUSTERS}/delete`, jsonResponse({}))
        .on(
          'GET',
          `${CLUSTERS}/get`,
          jsonResponse({ state: 'TERMINATING' }),
          jsonResponse({ error_code: 'RESOURCE_DOES_NOT_EXIST', message: 'no such cluster' }, 404)
        );

      const result = await orchestrator(clusterKind).delete('c-1');

      expect(result.operation).toBe('delete');
      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.calls.map((c) => `${c.operation}:${c.outcome}`)).toEqual([
        'delete:success',
        'status:success',
        'status:InvalidRequest',
      ]);
    });

    it('should treat a terminated cluster as deleted', async () => {
      api
        .on('POST', `${CLUSTERS}/delete`, jsonResponse({}))
        .on('GET', `${CLUSTERS}/get`, jsonResponse({ state: 'TERMINATED' }));

      const result = await orchestrator(clusterKind).delete('c-1');

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
    });

    it('should succeed when the resource no longer exists', async () => {
      api.on(
        'POST',
        `${CLUSTERS}/delete`,
        jsonResponse({ error_code: 'RESOURCE_DOES_NOT_EXIST', message: 'no such cluster' }, 400)
      );

      const result = await orchestrator(clusterKind).delete('c-1');

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.error).toBeUndefined();
      expect(api.requests).toHaveLength(1);
    });

    it('should delete an instance pool without polling', async () => {
      api.on('POST', `${POOLS}/delete`, jsonResponse({}));

      const result = await orchestrator(instancePoolKind).delete('p-1');

      expect(result.status).toBe(OperationStatus.SUCCEEDED);
      expect(result.calls).toHaveLength(1);
      expect(api.callsTo('GET', `${POOLS}/get`)).toHaveLength(0);
    });

    it('should fail on a rejected delete', async () => {
      api.on('POST', `${CLUSTERS}/delete`, jsonResponse({ message: 'forbidden' }, 403));

      const result = await orchestrator(clusterKind).delete('c-1');

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.error?.kind).toBe('Unauthorized');
      expect(result.error?.lastHttpStatus).toBe(403);
    });
  });

  describe('isolation', () => {
    it('should keep concurrent runs apart', async () => {
      api
        .on(
          'POST',
          `${CLUSTERS}/create`,
          jsonResponse({ cluster_id: 'c-1' }),
          jsonResponse({ cluster_id: 'c-2' })
        )
        .on('GET', `${CLUSTERS}/get`, jsonResponse({ state: 'RUNNING' }));
      const clusters = orchestrator(clusterKind);

      const results = await Promise.all([
        clusters.provision({ cluster_name: 'a' }),
        clusters.provision({ cluster_name: 'b' }),
      ]);

      expect(results.map((r) => r.resourceId).sort()).toEqual(['c-1', 'c-2']);
      for (const result of results) {
        expect(result.status).toBe(OperationStatus.SUCCEEDED);
        expect(result.calls.map((c) => c.operation)).toEqual(['create', 'status']);
      }
    });

    it('should never log the token', async () => {
      api.on('POST', `${CLUSTERS}/create`, jsonResponse({ message: 'nope' }, 401));

      await orchestrator(clusterKind).provision({ cluster_name: 'etl' });

      expect(logger.entries.length).toBeGreaterThan(0);
      expect(JSON.stringify(logger.entries)).not.toContain('test-token');
    });
  });
});

describe('serializeResult', () => {
  it('should drop absent optional fields', () => {
    const serialized = serializeResult({
      kind: 'cluster',
      operation: 'provision',
      resourceId: '',
      status: OperationStatus.FAILED,
      reusedExisting: false,
      calls: [
        {
          operation: 'create',
          method: 'POST',
          path: '/api/2.0/clusters/create',
          attempt: 1,
          outcome: 'NetworkError',
          statusCode: undefined,
          durationMs: 12,
        },
      ],
      error: {
        kind: 'NetworkError',
        message: 'POST /api/2.0/clusters/create failed: fetch failed',
        lastHttpStatus: undefined,
        lastObservedState: undefined,
        attemptCount: 1,
        cleanupError: undefined,
      },
    });

    expect(JSON.parse(JSON.stringify(serialized))).toStrictEqual(serialized);
    expect(serialized).toStrictEqual({
      kind: 'cluster',
      operation: 'provision',
      resourceId: '',
      status: 'FAILED',
      reusedExisting: false,
      calls: [
        {
          operation: 'create',
          method: 'POST',
          path: '/api/2.0/clusters/create',
          attempt: 1,
          outcome: 'NetworkError',
          durationMs: 12,
        },
      ],
      error: {
        kind: 'NetworkError',
        message: 'POST /api/2.0/clusters/create failed: fetch failed',
        attemptCount: 1,
      },
    });
  });
});
