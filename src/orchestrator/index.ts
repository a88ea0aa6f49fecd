/**
 * Resource lifecycle orchestrator.
 *
 * One orchestrator per resource kind. Each `provision`, `update` or `delete`
 * call is an independent orchestration run that owns its own call trace and
 * retry/poll state, and always resolves with exactly one
 * {@link ProvisionResult}; runtime failures are folded into the result
 * rather than thrown.
 */

import { z } from 'zod';
import type { Credential } from '../auth/index.js';
import { mergeSignals, systemClock, type Clock } from '../clock/index.js';
import { timerMsSchema, type ProvisioningConfig } from '../config/index.js';
import {
  ConfigurationError,
  ExecutionError,
  OperationCancelled,
  PollError,
  ProvisioningError,
  RetryExhausted,
} from '../errors/index.js';
import { HttpExecutor, type FetchFn } from '../http/index.js';
import {
  NoopLogger,
  NoopMetricsCollector,
  ProvisioningMetrics,
  type Logger,
  type MetricsCollector,
} from '../observability/index.js';
import { OperationPoller, type PollOutcome, type StatusExtractor } from '../polling/index.js';
import type { DesiredSpec, ExistingResource, ResourceKindStrategy } from '../resources/index.js';
import { RetryPolicy, type AttemptReport } from '../retry/index.js';
import {
  OperationStatus,
  type ApiRequest,
  type ApiResponse,
  type CallOperation,
  type CallRecord,
  type ErrorDetail,
  type ErrorDetailKind,
  type LifecycleOperation,
  type ProvisionResult,
  type StatusObservation,
} from '../types/index.js';

// ============================================================================
// Existing-resource lookup
// ============================================================================

/**
 * What a lookup may use to talk to the API. Calls made through `send` go
 * through the retry policy and appear in the result's call trace.
 */
export interface LookupContext {
  readonly credential: Credential;
  readonly signal: AbortSignal;
  send(request: ApiRequest): Promise<ApiResponse>;
}

export interface ExistingResourceLookup<TSpec extends DesiredSpec = DesiredSpec> {
  find(spec: TSpec, context: LookupContext): Promise<ExistingResource | undefined>;
}

const MAX_LOOKUP_PAGES = 20;

/**
 * Lookup that lists resources of the kind and matches on the spec's name.
 * Specs without a name never match.
 *
 * The first match not in `FAILED` wins, even when failed leftovers with the
 * same name come before it. When every match has failed the first one is
 * returned, and provisioning creates a fresh resource.
 */
export function lookupByName<TSpec extends DesiredSpec>(
  kind: ResourceKindStrategy<TSpec>
): ExistingResourceLookup<TSpec> {
  return {
    async find(spec, context) {
      const name = kind.nameOf(spec);
      if (name === undefined || name === '') {
        return undefined;
      }

      let firstFailed: ExistingResource | undefined;
      let pageToken: string | undefined;
      for (let page = 0; page < MAX_LOOKUP_PAGES; page++) {
        const response = await context.send(kind.buildListRequest(pageToken));
        for (const match of kind.findAllByName(response, name)) {
          if (match.observation.status !== OperationStatus.FAILED) {
            return match;
          }
          firstFailed ??= match;
        }
        pageToken = kind.nextPageToken(response);
        if (pageToken === undefined) {
          break;
        }
      }
      return firstFailed;
    },
  };
}

// ============================================================================
// Orchestrator
// ============================================================================

export interface ResourceOrchestratorConfig<TSpec extends DesiredSpec> {
  config: ProvisioningConfig;
  kind: ResourceKindStrategy<TSpec>;
  lookup?: ExistingResourceLookup<TSpec>;
  executor?: HttpExecutor;
  retry?: RetryPolicy;
  /** Used by the default executor */
  fetch?: FetchFn;
  /** Jitter source for the default retry policy */
  random?: () => number;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
}

const orchestrationOptionsSchema = z.object({
  timeoutMs: timerMsSchema.optional(),
  intervalMs: timerMsSchema.optional(),
  budgetMs: timerMsSchema.optional(),
});

export interface OrchestrationOptions {
  /** Aborting ends the run with status `UNKNOWN` and error kind `Cancelled` */
  signal?: AbortSignal;
  /** Poll timeout override */
  timeoutMs?: number;
  /** Poll interval override */
  intervalMs?: number;
  /**
   * Wall-clock budget for the whole run, as imposed by the execution host.
   * Running out ends the run with `TIMED_OUT`.
   */
  budgetMs?: number;
}

export class ResourceOrchestrator<TSpec extends DesiredSpec = DesiredSpec> {
  readonly kind: ResourceKindStrategy<TSpec>;
  private readonly config: ProvisioningConfig;
  private readonly lookup?: ExistingResourceLookup<TSpec>;
  private readonly executor: HttpExecutor;
  private readonly retry: RetryPolicy;
  private readonly poller: OperationPoller;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: ResourceOrchestratorConfig<TSpec>) {
    this.config = options.config;
    this.kind = options.kind;
    this.lookup = options.lookup;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.executor =
      options.executor ??
      new HttpExecutor({
        defaultTimeoutMs: this.config.requestTimeoutMs,
        userAgent: this.config.userAgent,
        fetch: options.fetch,
        logger: this.logger,
        metrics: this.metrics,
      });
    this.retry =
      options.retry ??
      new RetryPolicy({
        ...this.config.retry,
        random: options.random,
        clock: this.clock,
        logger: this.logger,
        metrics: this.metrics,
      });
    this.poller = new OperationPoller({
      executor: this.executor,
      retry: this.retry,
      clock: this.clock,
      logger: this.logger,
    });
  }

  /**
   * Create the resource (or adopt an existing one), wait for it to become
   * ready and clean it up if it ends up failed.
   */
  async provision(spec: TSpec, options: OrchestrationOptions = {}): Promise<ProvisionResult> {
    const run = this.startRun('provision', options);
    try {
      this.arm(run, options);
      const existing = this.lookup
        ? await this.lookup.find(spec, this.lookupContext(run))
        : undefined;

      if (existing && existing.observation.status !== OperationStatus.FAILED) {
        run.resourceId = existing.id;
        run.reusedExisting = true;
        run.lastObservation = existing.observation;
        this.logger.info(`Reusing existing ${this.kind.displayName}`, {
          resourceId: existing.id,
          state: existing.observation.rawState,
        });
        if (existing.observation.status === OperationStatus.SUCCEEDED) {
          return this.finish(run, OperationStatus.SUCCEEDED);
        }
      } else {
        const response = await this.call(run, 'create', () => this.kind.buildCreateRequest(spec));
        const id = this.kind.extractId(response);
        if (id === undefined) {
          throw new ProvisioningError(
            'CreateFailed',
            `Create response did not contain a ${this.kind.displayName} identifier`
          );
        }
        run.resourceId = id;
        this.logger.info(`Created ${this.kind.displayName}`, { resourceId: id });
      }

      const outcome = await this.poll(run, run.resourceId, (r) => this.kind.extractStatus(r), options);

      if (outcome.status === OperationStatus.FAILED) {
        await this.cleanup(run);
      }
      return this.finishWithOutcome(run, outcome);
    } catch (error) {
      return this.fail(run, error);
    } finally {
      run.dispose();
    }
  }

  /**
   * Apply a new desired state to an existing resource and wait for it to
   * settle. A failed update does not delete the resource.
   */
  async update(
    resourceId: string,
    spec: TSpec,
    options: OrchestrationOptions = {}
  ): Promise<ProvisionResult> {
    const run = this.startRun('update', options);
    run.resourceId = resourceId;
    try {
      this.arm(run, options);
      const buildUpdate = this.kind.buildUpdateRequest;
      if (buildUpdate === undefined) {
        throw new ProvisioningError(
          'UpdateUnsupported',
          `${this.kind.displayName} does not support in-place updates`,
          { resourceId }
        );
      }

      await this.call(run, 'update', () => buildUpdate.call(this.kind, resourceId, spec));
      const outcome = await this.poll(run, resourceId, (r) => this.kind.extractStatus(r), options);
      return this.finishWithOutcome(run, outcome);
    } catch (error) {
      return this.fail(run, error);
    } finally {
      run.dispose();
    }
  }

  /**
   * Delete a resource and, for kinds whose deletion is asynchronous, wait
   * until it is gone. Deleting a resource that no longer exists succeeds.
   */
  async delete(resourceId: string, options: OrchestrationOptions = {}): Promise<ProvisionResult> {
    const run = this.startRun('delete', options);
    run.resourceId = resourceId;
    try {
      this.arm(run, options);
      try {
        await this.call(run, 'delete', () => this.kind.buildDeleteRequest(resourceId));
      } catch (error) {
        if (isNotFound(error)) {
          run.lastObservation = { status: OperationStatus.SUCCEEDED, rawState: 'NOT_FOUND' };
          return this.finish(run, OperationStatus.SUCCEEDED);
        }
        throw error;
      }

      const extractDeleteStatus = this.kind.extractDeleteStatus;
      if (extractDeleteStatus === undefined) {
        return this.finish(run, OperationStatus.SUCCEEDED);
      }

      const outcome = await this.poll(
        run,
        resourceId,
        (r) => extractDeleteStatus.call(this.kind, r),
        options,
        (error) =>
          isNotFound(error) ? { status: OperationStatus.SUCCEEDED, rawState: 'NOT_FOUND' } : undefined
      );
      return this.finishWithOutcome(run, outcome);
    } catch (error) {
      return this.fail(run, error);
    } finally {
      run.dispose();
    }
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private async call(
    run: OrchestrationRun,
    operation: CallOperation,
    build: () => ApiRequest
  ): Promise<ApiResponse> {
    let sent: ApiRequest | undefined;
    return this.retry.execute(
      () => {
        sent = build();
        return this.executor.execute(this.config.credential, sent, { signal: run.signal });
      },
      {
        signal: run.signal,
        label: `${this.kind.displayName} ${operation}`,
        onAttempt: (report) => {
          if (sent) run.record(operation, sent, report);
        },
      }
    );
  }

  private async poll(
    run: OrchestrationRun,
    resourceId: string,
    extract: StatusExtractor,
    options: OrchestrationOptions,
    recoverStatusError?: (error: ExecutionError) => StatusObservation | undefined
  ): Promise<PollOutcome> {
    const settings = this.config.pollingFor(this.kind.kind);
    let sent: ApiRequest | undefined;

    return this.poller.pollUntilTerminal(
      this.config.credential,
      () => {
        sent = this.kind.buildStatusRequest(resourceId);
        return sent;
      },
      extract,
      {
        timeoutMs: options.timeoutMs ?? settings.timeoutMs,
        intervalMs: options.intervalMs ?? settings.intervalMs,
        signal: run.signal,
        label: `${this.kind.displayName} ${resourceId}`,
        recoverStatusError,
        onAttempt: (report) => {
          if (sent) run.record('status', sent, report);
        },
        onObservation: (observation) => {
          run.lastObservation = observation;
        },
      }
    );
  }

  /**
   * Best-effort delete after a failed provisioning. Its failure is recorded
   * next to, never instead of, the original failure.
   */
  private async cleanup(run: OrchestrationRun): Promise<void> {
    try {
      await this.call(run, 'cleanup', () => this.kind.buildDeleteRequest(run.resourceId));
      this.logger.info(`Deleted failed ${this.kind.displayName}`, { resourceId: run.resourceId });
    } catch (error) {
      const cause = describeError(error);
      const cleanupError = new ProvisioningError(
        'CleanupFailed',
        `Cleanup of ${this.kind.displayName} ${run.resourceId} failed: ${cause.message}`,
        { resourceId: run.resourceId, cause: error }
      );
      run.cleanupError = {
        kind: cleanupError.kind,
        message: cleanupError.message,
        lastHttpStatus: cause.lastHttpStatus,
      };
      this.logger.warn(cleanupError.message, { resourceId: run.resourceId });
    }
  }

  private lookupContext(run: OrchestrationRun): LookupContext {
    return {
      credential: this.config.credential,
      signal: run.signal,
      send: (request) => this.call(run, 'lookup', () => request),
    };
  }

  // ==========================================================================
  // Results
  // ==========================================================================

  private startRun(operation: LifecycleOperation, options: OrchestrationOptions): OrchestrationRun {
    this.logger.debug(`Starting ${this.kind.displayName} ${operation}`, {
      config: this.config.toLoggable(),
    });
    return new OrchestrationRun(operation, this.clock.now(), options.signal);
  }

  /**
   * Validate the per-run overrides, then start the run's budget timer
   *
   * @throws {ConfigurationError} for a timeout, interval or budget out of range
   */
  private arm(run: OrchestrationRun, options: OrchestrationOptions): void {
    const parsed = orchestrationOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigurationError('Invalid orchestration options', issues);
    }
    if (parsed.data.budgetMs !== undefined) {
      run.startBudget(parsed.data.budgetMs);
    }
  }

  private finishWithOutcome(run: OrchestrationRun, outcome: PollOutcome): ProvisionResult {
    switch (outcome.status) {
      case OperationStatus.SUCCEEDED:
        return this.finish(run, OperationStatus.SUCCEEDED);
      case OperationStatus.TIMED_OUT:
        return this.finish(run, OperationStatus.TIMED_OUT, {
          kind: 'TimedOut',
          message: `${this.kind.displayName} ${run.resourceId} did not reach a terminal state: ${outcome.message ?? 'timed out'}`,
          lastObservedState: outcome.rawState,
        });
      default:
        return this.finish(run, outcome.status, {
          kind: 'ResourceFailed',
          message: `${this.kind.displayName} ${run.resourceId} ended in state ${outcome.rawState ?? outcome.status}${outcome.message ? `: ${outcome.message}` : ''}`,
          lastObservedState: outcome.rawState,
        });
    }
  }

  private fail(run: OrchestrationRun, error: unknown): ProvisionResult {
    if (isCancellation(error)) {
      if (run.cancelledByCaller()) {
        return this.finish(run, OperationStatus.UNKNOWN, {
          kind: 'Cancelled',
          message: `${this.kind.displayName} ${run.operation} was cancelled`,
        });
      }
      if (run.budgetExceeded()) {
        return this.finish(run, OperationStatus.TIMED_OUT, {
          kind: 'TimedOut',
          message: `${this.kind.displayName} ${run.operation} ran out of its time budget`,
        });
      }
    }

    const detail = describeError(error);
    const status =
      detail.kind === 'StatusExtractionFailed' ? OperationStatus.UNKNOWN : OperationStatus.FAILED;
    this.logger.error(`${this.kind.displayName} ${run.operation} failed`, {
      resourceId: run.resourceId,
      kind: detail.kind,
      message: detail.message,
    });
    return this.finish(run, status, detail);
  }

  private finish(
    run: OrchestrationRun,
    status: OperationStatus,
    error?: Partial<ErrorDetail> & { kind: ErrorDetailKind; message: string }
  ): ProvisionResult {
    const result: ProvisionResult = {
      kind: this.kind.kind,
      operation: run.operation,
      resourceId: run.resourceId,
      status,
      reusedExisting: run.reusedExisting,
      calls: [...run.calls],
    };

    if (error !== undefined) {
      const lastCall = run.calls[run.calls.length - 1];
      result.error = {
        kind: error.kind,
        message: error.message,
        lastHttpStatus: error.lastHttpStatus ?? lastCall?.statusCode,
        lastObservedState: error.lastObservedState ?? run.lastObservation?.rawState,
        attemptCount: run.calls.length,
        cleanupError: run.cleanupError,
      };
    }

    const durationSeconds = (this.clock.now() - run.startedAt) / 1000;
    const labels = { kind: this.kind.kind, operation: run.operation, status };
    this.metrics.increment(ProvisioningMetrics.OPERATIONS_TOTAL, 1, labels);
    this.metrics.histogram(ProvisioningMetrics.OPERATION_DURATION_SECONDS, durationSeconds, labels);
    this.logger.info(`${this.kind.displayName} ${run.operation} finished`, {
      resourceId: run.resourceId,
      status,
      attempts: run.calls.length,
    });

    return result;
  }
}

// ============================================================================
// Serialization
// ============================================================================

function compact(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

/**
 * Plain JSON-safe form of a result with absent optional fields dropped
 */
export function serializeResult(result: ProvisionResult): Record<string, unknown> {
  return compact({
    kind: result.kind,
    operation: result.operation,
    resourceId: result.resourceId,
    status: result.status,
    reusedExisting: result.reusedExisting,
    calls: result.calls.map((call) => compact({ ...call })),
    error: result.error && compact({
      ...result.error,
      cleanupError: result.error.cleanupError && compact({ ...result.error.cleanupError }),
    }),
  });
}

// ============================================================================
// Run state
// ============================================================================

/**
 * Mutable state of one orchestration run; never shared between runs
 */
class OrchestrationRun {
  readonly calls: CallRecord[] = [];
  readonly signal: AbortSignal;
  resourceId = '';
  reusedExisting = false;
  lastObservation?: StatusObservation;
  cleanupError?: ErrorDetail['cleanupError'];

  private readonly budget = new AbortController();
  private budgetTimer?: ReturnType<typeof setTimeout>;
  private readonly disposeSignal: () => void;

  constructor(
    readonly operation: LifecycleOperation,
    readonly startedAt: number,
    private readonly callerSignal?: AbortSignal
  ) {
    const merged = mergeSignals(callerSignal, this.budget.signal);
    this.signal = merged.signal;
    this.disposeSignal = merged.dispose;
  }

  startBudget(budgetMs: number): void {
    this.budgetTimer = setTimeout(() => this.budget.abort(), budgetMs);
  }

  record(operation: CallOperation, request: ApiRequest, report: AttemptReport): void {
    this.calls.push({
      operation,
      method: request.method,
      path: request.path,
      attempt: report.attempt,
      outcome: report.outcome,
      statusCode: report.statusCode,
      durationMs: report.durationMs,
    });
  }

  cancelledByCaller(): boolean {
    return this.callerSignal?.aborted ?? false;
  }

  budgetExceeded(): boolean {
    return this.budget.signal.aborted;
  }

  dispose(): void {
    if (this.budgetTimer !== undefined) {
      clearTimeout(this.budgetTimer);
    }
    this.disposeSignal();
  }
}

// ============================================================================
// Error mapping
// ============================================================================

function isCancellation(error: unknown): boolean {
  return (
    error instanceof OperationCancelled ||
    (error instanceof PollError && error.kind === 'Cancelled')
  );
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof ExecutionError &&
    (error.statusCode === 404 || error.errorCode === 'RESOURCE_DOES_NOT_EXIST')
  );
}

function describeError(
  error: unknown
): { kind: ErrorDetailKind; message: string; lastHttpStatus?: number; lastObservedState?: string } {
  if (error instanceof ExecutionError) {
    return { kind: error.kind, message: error.message, lastHttpStatus: error.statusCode };
  }
  if (error instanceof RetryExhausted) {
    return {
      kind: 'RetryExhausted',
      message: error.message,
      lastHttpStatus: error.lastError.statusCode,
    };
  }
  if (error instanceof PollError) {
    return { kind: error.kind, message: error.message, lastObservedState: error.lastObservedState };
  }
  if (error instanceof ProvisioningError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof OperationCancelled) {
    return { kind: 'Cancelled', message: error.message };
  }
  if (error instanceof ConfigurationError) {
    return { kind: 'ConfigurationError', message: error.message };
  }
  return {
    kind: 'Unexpected',
    message: error instanceof Error ? error.message : String(error),
  };
}
