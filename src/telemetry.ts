/**
 * Retry observability.
 *
 * The retry policy reports every retry and every exhaustion to a `RetryObserver`.
 * The default observer records OpenTelemetry counters; without a registered SDK
 * the API hands out no-op instruments.
 */

import { metrics, type Attributes, type Counter, type Meter } from '@opentelemetry/api';

export interface RetryEvent {
  operation: string;
  /** The attempt that failed, 1-based. */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryExhaustedEvent {
  operation: string;
  attempts: number;
  error: unknown;
}

export interface RetryObserver {
  onRetry(event: RetryEvent): void;
  onExhausted(event: RetryExhaustedEvent): void;
}

export const METER_NAME = 'versioned-sqlite-orm';

/** SQLite or system code when the error carries one, else its class name. */
export function errorType(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    if ('code' in error && typeof error.code === 'string') return error.code;
    if (error instanceof Error) return error.name;
  }
  return typeof error;
}

export class OpenTelemetryRetryObserver implements RetryObserver {
  private readonly attempts: Counter;
  private readonly exhausted: Counter;

  constructor(meter: Pick<Meter, 'createCounter'> = metrics.getMeter(METER_NAME)) {
    this.attempts = meter.createCounter('orm.retry.attempts', {
      description: 'Number of retried command attempts',
      unit: '{attempt}',
    });
    this.exhausted = meter.createCounter('orm.retry.exhausted', {
      description: 'Number of operations that failed after using every attempt',
      unit: '{operation}',
    });
  }

  onRetry(event: RetryEvent): void {
    const attributes: Attributes = {
      'orm.operation': event.operation,
      'orm.retry.attempt': event.attempt,
      'error.type': errorType(event.error),
    };
    this.attempts.add(1, attributes);
  }

  onExhausted(event: RetryExhaustedEvent): void {
    this.exhausted.add(1, {
      'orm.operation': event.operation,
      'error.type': errorType(event.error),
    });
  }
}
