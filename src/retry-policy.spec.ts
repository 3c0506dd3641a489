import { ConcurrencyConflictError, ConfigurationError, OperationCancelledError } from './errors';
import {
  DEFAULT_RETRY_CONFIG,
  RetryPolicy,
  RetryPresets,
  delayForRetry,
  resolveRetryConfig,
  type DelayFn,
} from './retry-policy';
import type { RetryObserver } from './telemetry';

function busyError(): Error {
  return Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
}

function recordingDelay() {
  return jest.fn<ReturnType<DelayFn>, Parameters<DelayFn>>().mockResolvedValue(undefined);
}

function recordingObserver() {
  const onRetry = jest.fn<void, Parameters<RetryObserver['onRetry']>>();
  const onExhausted = jest.fn<void, Parameters<RetryObserver['onExhausted']>>();
  const observer: RetryObserver = { onRetry, onExhausted };
  return { observer, onRetry, onExhausted };
}

/** Fails with `error` on the first `failures` attempts, then returns the attempt number. */
function flaky(failures: number, error: () => Error = busyError) {
  return jest.fn((attempt: number) => {
    if (attempt <= failures) throw error();
    return attempt;
  });
}

const flushMicrotasks = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('resolveRetryConfig', () => {
  it('should merge field by field over the defaults', () => {
    expect(resolveRetryConfig({ maxAttempts: 5, maxDelayMs: undefined })).toEqual({
      ...DEFAULT_RETRY_CONFIG,
      maxAttempts: 5,
    });
  });

  it('should reject invalid values', () => {
    expect(() => resolveRetryConfig({ maxAttempts: -1 })).toThrow(ConfigurationError);
    expect(() => resolveRetryConfig({ maxAttempts: 2.5 })).toThrow(ConfigurationError);
    expect(() => resolveRetryConfig({ initialDelayMs: -5 })).toThrow(ConfigurationError);
    expect(() => resolveRetryConfig({ initialDelayMs: 100, maxDelayMs: 10 })).toThrow(
      'retry.maxDelayMs must be at least initialDelayMs (100), got 10.',
    );
    expect(() => resolveRetryConfig({ backoffMultiplier: 0.5 })).toThrow(
      'retry.backoffMultiplier must be at least 1, got 0.5.',
    );
  });

  it('should ship valid presets', () => {
    for (const preset of Object.values(RetryPresets)) {
      expect(() => resolveRetryConfig(preset)).not.toThrow();
    }
  });
});

describe('delayForRetry', () => {
  it('should grow exponentially from the initial delay', () => {
    expect([1, 2, 3].map((retry) => delayForRetry(DEFAULT_RETRY_CONFIG, retry))).toEqual([100, 200, 400]);
  });

  it('should cap at the maximum delay', () => {
    const config = resolveRetryConfig({ initialDelayMs: 500, maxDelayMs: 10000, backoffMultiplier: 2 });
    expect(delayForRetry(config, 5)).toBe(8000);
    expect(delayForRetry(config, 6)).toBe(10000);
  });
});

describe('RetryPolicy', () => {
  it('should succeed after waiting 500ms and then 1000ms', async () => {
    const delay = recordingDelay();
    const policy = new RetryPolicy(
      { enabled: true, maxAttempts: 5, initialDelayMs: 500, backoffMultiplier: 2, maxDelayMs: 10000 },
      { delay },
    );
    const work = flaky(2);

    await expect(policy.execute(work)).resolves.toBe(3);
    expect(work).toHaveBeenCalledTimes(3);
    expect(delay.mock.calls.map(([ms]) => ms)).toEqual([500, 1000]);
  });

  it('should rethrow the last error once the attempts are used up', async () => {
    const delay = recordingDelay();
    const { observer, onRetry, onExhausted } = recordingObserver();
    const policy = new RetryPolicy({ maxAttempts: 3 }, { delay, observer });
    const work = flaky(10);

    await expect(policy.execute(work, { operation: 'Item.update' })).rejects.toThrow('database is locked');
    await flushMicrotasks();

    expect(work).toHaveBeenCalledTimes(3);
    expect(delay.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][0]).toMatchObject({
      operation: 'Item.update',
      attempt: 1,
      maxAttempts: 3,
      delayMs: 100,
    });
    expect(onExhausted).toHaveBeenCalledTimes(1);
    expect(onExhausted.mock.calls[0][0]).toMatchObject({ operation: 'Item.update', attempts: 3 });
  });

  it('should make exactly one attempt when disabled', async () => {
    const delay = recordingDelay();
    const { observer, onRetry, onExhausted } = recordingObserver();
    const policy = new RetryPolicy({ enabled: false, maxAttempts: 5 }, { delay, observer });
    const work = flaky(1);

    await expect(policy.execute(work)).rejects.toThrow('database is locked');
    await flushMicrotasks();

    expect(policy.attemptBudget).toBe(1);
    expect(work).toHaveBeenCalledTimes(1);
    expect(delay).not.toHaveBeenCalled();
    expect(onRetry).not.toHaveBeenCalled();
    expect(onExhausted).not.toHaveBeenCalled();
  });

  it('should treat zero attempts as one', async () => {
    const { observer, onExhausted } = recordingObserver();
    const policy = new RetryPolicy({ maxAttempts: 0 }, { delay: recordingDelay(), observer });
    const work = flaky(1);

    await expect(policy.execute(work)).rejects.toThrow('database is locked');
    await flushMicrotasks();

    expect(work).toHaveBeenCalledTimes(1);
    expect(onExhausted).not.toHaveBeenCalled();
  });

  it('should not retry permanent errors', async () => {
    const delay = recordingDelay();
    const policy = new RetryPolicy({ maxAttempts: 5 }, { delay });
    const constraint = () =>
      Object.assign(new Error('UNIQUE constraint failed: Items.Id'), { code: 'SQLITE_CONSTRAINT_PRIMARYKEY' });
    const work = flaky(1, constraint);

    await expect(policy.execute(work)).rejects.toThrow('UNIQUE constraint failed: Items.Id');
    expect(work).toHaveBeenCalledTimes(1);
    expect(delay).not.toHaveBeenCalled();
  });

  it('should never retry a version conflict', async () => {
    const policy = new RetryPolicy({ maxAttempts: 5 }, { delay: recordingDelay() });
    const work = jest.fn(() => {
      throw new ConcurrencyConflictError('i1', 3, 2);
    });

    await expect(policy.execute(work)).rejects.toBeInstanceOf(ConcurrencyConflictError);
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('should retry async work', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2 }, { delay: recordingDelay() });
    const work = jest.fn(async (attempt: number) => {
      if (attempt === 1) throw busyError();
      return 'done';
    });

    await expect(policy.execute(work)).resolves.toBe('done');
  });

  it('should keep retrying when the observer throws', async () => {
    const observer: RetryObserver = {
      onRetry: () => {
        throw new Error('observer down');
      },
      onExhausted: () => undefined,
    };
    const policy = new RetryPolicy({ maxAttempts: 3 }, { delay: recordingDelay(), observer });

    await expect(policy.execute(flaky(2))).resolves.toBe(3);
    await flushMicrotasks();
  });

  describe('cancellation', () => {
    it('should not start when the signal has already fired', async () => {
      const controller = new AbortController();
      controller.abort();
      const work = flaky(0);
      const policy = new RetryPolicy();

      await expect(policy.execute(work, { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError,
      );
      expect(work).not.toHaveBeenCalled();
    });

    it('should stop waiting when the signal fires during a backoff', async () => {
      const controller = new AbortController();
      const policy = new RetryPolicy({ maxAttempts: 3, initialDelayMs: 60_000, maxDelayMs: 60_000 });
      const work = jest.fn(() => {
        controller.abort();
        throw busyError();
      });

      await expect(policy.execute(work, { operation: 'Item.get', signal: controller.signal })).rejects.toThrow(
        "Operation 'Item.get' was cancelled.",
      );
      expect(work).toHaveBeenCalledTimes(1);
    });
  });
});
