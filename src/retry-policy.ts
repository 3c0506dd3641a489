/**
 * Retries transient storage failures with exponential backoff.
 *
 * Only the transport is retried: each attempt re-runs the whole unit of work,
 * and application outcomes such as version conflicts are never retried.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { ConfigurationError, OperationCancelledError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { RetryObserver } from './telemetry';
import { isTransientError } from './transient-error-detector';

export interface RetryConfig {
  enabled: boolean;
  /** Total attempts including the first; 0 behaves like 1. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  enabled: true,
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
});

export const RetryPresets = {
  default: DEFAULT_RETRY_CONFIG,
  noRetry: Object.freeze({ ...DEFAULT_RETRY_CONFIG, enabled: false, maxAttempts: 1 }),
  /** Slower, longer retries for databases on network shares. */
  networkStorage: Object.freeze({
    enabled: true,
    maxAttempts: 5,
    initialDelayMs: 500,
    maxDelayMs: 10000,
    backoffMultiplier: 2,
  }),
  /** Many quick retries for heavily contended local databases. */
  highContention: Object.freeze({
    enabled: true,
    maxAttempts: 10,
    initialDelayMs: 50,
    maxDelayMs: 2000,
    backoffMultiplier: 1.5,
  }),
} satisfies Record<string, Readonly<RetryConfig>>;

/**
 * @throws ConfigurationError naming the first invalid field
 */
export function validateRetryConfig(config: RetryConfig): void {
  if (typeof config.enabled !== 'boolean') {
    throw new ConfigurationError(`retry.enabled must be a boolean.`);
  }
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 0) {
    throw new ConfigurationError(
      `retry.maxAttempts must be a non-negative integer, got ${config.maxAttempts}.`,
    );
  }
  if (!Number.isFinite(config.initialDelayMs) || config.initialDelayMs < 0) {
    throw new ConfigurationError(
      `retry.initialDelayMs must be a non-negative number, got ${config.initialDelayMs}.`,
    );
  }
  if (!Number.isFinite(config.maxDelayMs) || config.maxDelayMs < config.initialDelayMs) {
    throw new ConfigurationError(
      `retry.maxDelayMs must be at least initialDelayMs (${config.initialDelayMs}), got ${config.maxDelayMs}.`,
    );
  }
  if (!Number.isFinite(config.backoffMultiplier) || config.backoffMultiplier < 1) {
    throw new ConfigurationError(
      `retry.backoffMultiplier must be at least 1, got ${config.backoffMultiplier}.`,
    );
  }
}

/**
 * Merges a partial configuration over the defaults field by field and validates
 * the result. Fields set to `undefined` keep their default.
 */
export function resolveRetryConfig(partial: Partial<RetryConfig> = {}): RetryConfig {
  const pick = <K extends keyof RetryConfig>(key: K): RetryConfig[K] =>
    partial[key] ?? DEFAULT_RETRY_CONFIG[key];
  const config: RetryConfig = {
    enabled: pick('enabled'),
    maxAttempts: pick('maxAttempts'),
    initialDelayMs: pick('initialDelayMs'),
    maxDelayMs: pick('maxDelayMs'),
    backoffMultiplier: pick('backoffMultiplier'),
  };
  validateRetryConfig(config);
  return config;
}

/**
 * Wait before retry `retry` (1 for the retry after the first failed attempt):
 * `min(maxDelayMs, initialDelayMs * backoffMultiplier^(retry - 1))`.
 */
export function delayForRetry(config: RetryConfig, retry: number): number {
  return Math.min(config.maxDelayMs, config.initialDelayMs * config.backoffMultiplier ** (retry - 1));
}

export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;

const defaultDelay: DelayFn = async (ms, signal) => {
  await sleep(ms, undefined, { signal });
};

export interface RetryPolicyOptions {
  observer?: RetryObserver;
  logger?: Logger;
  /** Replaces the timer, e.g. to record delays in tests. */
  delay?: DelayFn;
  isTransient?: (error: unknown) => boolean;
}

export interface ExecuteOptions {
  /** Name reported to logs and the observer. */
  operation?: string;
  signal?: AbortSignal;
}

export class RetryPolicy {
  readonly config: Readonly<RetryConfig>;
  private readonly observer?: RetryObserver;
  private readonly logger: Logger;
  private readonly delay: DelayFn;
  private readonly isTransient: (error: unknown) => boolean;

  constructor(config: Partial<RetryConfig> = {}, options: RetryPolicyOptions = {}) {
    this.config = Object.freeze(resolveRetryConfig(config));
    this.observer = options.observer;
    this.logger = options.logger ?? silentLogger;
    this.delay = options.delay ?? defaultDelay;
    this.isTransient = options.isTransient ?? isTransientError;
  }

  /** Attempts one call may make. */
  get attemptBudget(): number {
    return this.config.enabled && this.config.maxAttempts > 0 ? this.config.maxAttempts : 1;
  }

  /**
   * Runs `work` until it succeeds, fails with a non-transient error or uses up the
   * attempt budget; the last error is rethrown as it was raised.
   *
   * @throws OperationCancelledError when `signal` aborts before an attempt or during a wait
   */
  async execute<R>(work: (attempt: number) => R | Promise<R>, options: ExecuteOptions = {}): Promise<R> {
    const { operation = 'operation', signal } = options;
    const budget = this.attemptBudget;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new OperationCancelledError(operation, { cause: signal.reason });
      }

      try {
        return await work(attempt);
      } catch (error) {
        if (!this.isTransient(error)) {
          throw error;
        }

        if (attempt >= budget) {
          if (this.config.enabled && this.config.maxAttempts > 0) {
            this.logger.error(`${operation} failed after ${attempt} attempt(s)`, error);
            this.notify((observer) => observer.onExhausted({ operation, attempts: attempt, error }));
          }
          throw error;
        }

        const delayMs = delayForRetry(this.config, attempt);
        this.logger.warn(
          `${operation} hit a transient error (attempt ${attempt}/${budget}), retrying in ${delayMs}ms`,
        );
        this.notify((observer) =>
          observer.onRetry({ operation, attempt, maxAttempts: budget, delayMs, error }),
        );
        await this.wait(delayMs, operation, signal);
      }
    }
  }

  private async wait(ms: number, operation: string, signal: AbortSignal | undefined): Promise<void> {
    try {
      await this.delay(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError(operation, { cause: error });
      }
      throw error;
    }
  }

  /** Observer callbacks run on a microtask and never affect the retry loop. */
  private notify(emit: (observer: RetryObserver) => void): void {
    const observer = this.observer;
    if (!observer) return;
    queueMicrotask(() => {
      try {
        emit(observer);
      } catch (error) {
        this.logger.error('Retry observer failed', error);
      }
    });
  }
}
