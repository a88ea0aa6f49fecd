/**
 * Configuration for the provisioning client.
 *
 * Configuration is an explicit value handed to the client at construction;
 * the library itself never consults `process.env`. {@link ProvisioningConfig.fromEnv}
 * takes the environment record as an argument so callers decide where it
 * comes from.
 */

import { z } from 'zod';
import { createCredential, maskToken, type Credential } from '../auth/index.js';
import { MAX_TIMER_MS } from '../clock/index.js';
import { ConfigurationError } from '../errors/index.js';
import type { ResourceKindName } from '../types/index.js';

/**
 * Retry/backoff settings
 */
export interface RetrySettings {
  /** Total executions allowed for one logical call (default: 5) */
  maxAttempts: number;
  /** Delay before the second attempt (default: 2000) */
  baseDelayMs: number;
  /** Upper bound for the exponential delay before jitter (default: 30000) */
  maxDelayMs: number;
  /** Jitter as a fraction of the delay, applied as +/- (default: 0.2) */
  jitterFraction: number;
}

/**
 * Polling settings for asynchronous operations
 */
export interface PollingSettings {
  /** Overall wait before giving up with TIMED_OUT (default: 30 minutes) */
  timeoutMs: number;
  /** Pause between successful but non-terminal status checks (default: 15s) */
  intervalMs: number;
}

export const DEFAULTS = {
  REQUEST_TIMEOUT_MS: 30_000,
  MAX_ATTEMPTS: 5,
  BASE_DELAY_MS: 2_000,
  MAX_DELAY_MS: 30_000,
  JITTER_FRACTION: 0.2,
  POLL_TIMEOUT_MS: 30 * 60 * 1000,
  POLL_INTERVAL_MS: 15_000,
  USER_AGENT: 'databricks-provisioning-client/0.1.0',
} as const;

export interface ProvisioningConfigOptions {
  /** Workspace base URL, e.g. `https://adb-123.azuredatabricks.net` */
  host: string | undefined;
  /** Bearer token */
  token: string | undefined;
  /** Per-attempt request timeout */
  requestTimeoutMs?: number;
  retry?: Partial<RetrySettings>;
  polling?: Partial<PollingSettings>;
  /** Per resource kind polling settings, layered over `polling` */
  pollingOverrides?: Partial<Record<ResourceKindName, Partial<PollingSettings>>>;
  userAgent?: string;
}

const positiveInt = z.number().int().positive();

/** A delay that can be armed as a single timer */
export const timerMsSchema = positiveInt.max(MAX_TIMER_MS, {
  message: `must be at most ${MAX_TIMER_MS}ms`,
});

const pollingSchema = z.object({
  timeoutMs: timerMsSchema,
  intervalMs: timerMsSchema,
});

const settingsSchema = z
  .object({
    requestTimeoutMs: timerMsSchema,
    retry: z.object({
      maxAttempts: positiveInt.max(20),
      baseDelayMs: z.number().int().nonnegative(),
      maxDelayMs: z.number().int().nonnegative(),
      jitterFraction: z.number().min(0).max(1),
    }),
    polling: pollingSchema,
    pollingOverrides: z.record(pollingSchema.partial()),
    userAgent: z.string().min(1),
  })
  .refine((s) => s.retry.maxDelayMs >= s.retry.baseDelayMs, {
    message: 'maxDelayMs must be at least baseDelayMs',
    path: ['retry', 'maxDelayMs'],
  });

/**
 * Validated, immutable client configuration
 */
export class ProvisioningConfig {
  readonly credential: Credential;
  readonly requestTimeoutMs: number;
  readonly retry: Readonly<RetrySettings>;
  readonly polling: Readonly<PollingSettings>;
  readonly pollingOverrides: Readonly<Partial<Record<ResourceKindName, Partial<PollingSettings>>>>;
  readonly userAgent: string;

  private constructor(
    credential: Credential,
    settings: {
      requestTimeoutMs: number;
      retry: RetrySettings;
      polling: PollingSettings;
      pollingOverrides: Partial<Record<ResourceKindName, Partial<PollingSettings>>>;
      userAgent: string;
    }
  ) {
    this.credential = credential;
    this.requestTimeoutMs = settings.requestTimeoutMs;
    this.retry = Object.freeze({ ...settings.retry });
    this.polling = Object.freeze({ ...settings.polling });
    this.pollingOverrides = Object.freeze({ ...settings.pollingOverrides });
    this.userAgent = settings.userAgent;
  }

  /**
   * Merge defaults into the options and validate the result
   *
   * @throws {ConfigurationError} on a missing or malformed value
   */
  static create(options: ProvisioningConfigOptions): ProvisioningConfig {
    const credential = createCredential({ token: options.token, baseUrl: options.host });

    const settings = {
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS,
      retry: {
        maxAttempts: options.retry?.maxAttempts ?? DEFAULTS.MAX_ATTEMPTS,
        baseDelayMs: options.retry?.baseDelayMs ?? DEFAULTS.BASE_DELAY_MS,
        maxDelayMs: options.retry?.maxDelayMs ?? DEFAULTS.MAX_DELAY_MS,
        jitterFraction: options.retry?.jitterFraction ?? DEFAULTS.JITTER_FRACTION,
      },
      polling: {
        timeoutMs: options.polling?.timeoutMs ?? DEFAULTS.POLL_TIMEOUT_MS,
        intervalMs: options.polling?.intervalMs ?? DEFAULTS.POLL_INTERVAL_MS,
      },
      pollingOverrides: options.pollingOverrides ?? {},
      userAgent: options.userAgent ?? DEFAULTS.USER_AGENT,
    };

    const result = settingsSchema.safeParse(settings);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigurationError('Invalid configuration', issues);
    }

    return new ProvisioningConfig(credential, settings);
  }

  /**
   * Build configuration from an environment record.
   *
   * Required: `DATABRICKS_HOST`, `DATABRICKS_TOKEN`.
   * Optional: `PROVISIONING_MAX_ATTEMPTS`, `PROVISIONING_REQUEST_TIMEOUT_MS`,
   * `PROVISIONING_POLL_TIMEOUT_MS`, `PROVISIONING_POLL_INTERVAL_MS`.
   */
  static fromEnv(
    env: Readonly<Record<string, string | undefined>>,
    overrides: Omit<ProvisioningConfigOptions, 'host' | 'token'> = {}
  ): ProvisioningConfig {
    return ProvisioningConfig.create({
      ...overrides,
      host: env['DATABRICKS_HOST'],
      token: env['DATABRICKS_TOKEN'],
      requestTimeoutMs:
        overrides.requestTimeoutMs ?? parseIntVar(env, 'PROVISIONING_REQUEST_TIMEOUT_MS'),
      retry: {
        ...overrides.retry,
        maxAttempts: overrides.retry?.maxAttempts ?? parseIntVar(env, 'PROVISIONING_MAX_ATTEMPTS'),
      },
      polling: {
        ...overrides.polling,
        timeoutMs: overrides.polling?.timeoutMs ?? parseIntVar(env, 'PROVISIONING_POLL_TIMEOUT_MS'),
        intervalMs:
          overrides.polling?.intervalMs ?? parseIntVar(env, 'PROVISIONING_POLL_INTERVAL_MS'),
      },
    });
  }

  /**
   * Effective polling settings for a resource kind
   */
  pollingFor(kind: ResourceKindName): PollingSettings {
    const override = this.pollingOverrides[kind];
    return {
      timeoutMs: override?.timeoutMs ?? this.polling.timeoutMs,
      intervalMs: override?.intervalMs ?? this.polling.intervalMs,
    };
  }

  /**
   * Configuration with the token masked, for logging
   */
  toLoggable(): Record<string, unknown> {
    return {
      host: this.credential.baseUrl,
      bearer: maskToken(this.credential.token.expose()),
      requestTimeoutMs: this.requestTimeoutMs,
      retry: { ...this.retry },
      polling: { ...this.polling },
      pollingOverrides: { ...this.pollingOverrides },
      userAgent: this.userAgent,
    };
  }
}

function parseIntVar(
  env: Readonly<Record<string, string | undefined>>,
  name: string
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}
