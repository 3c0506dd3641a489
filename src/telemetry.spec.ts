import { OpenTelemetryRetryObserver, errorType } from './telemetry';

function fakeMeter() {
  const counters = new Map<string, jest.Mock>();
  const meter = {
    createCounter: (name: string) => {
      const counter = { add: jest.fn() };
      counters.set(name, counter.add);
      return counter;
    },
  };
  return { meter, counters };
}

function busyError(): Error {
  return Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
}

describe('errorType', () => {
  it('should prefer the error code', () => {
    expect(errorType(busyError())).toBe('SQLITE_BUSY');
  });

  it('should fall back to the error class name', () => {
    expect(errorType(new TypeError('bad'))).toBe('TypeError');
  });

  it('should name the type of non-error values', () => {
    expect(errorType('locked')).toBe('string');
    expect(errorType(undefined)).toBe('undefined');
  });
});

describe('OpenTelemetryRetryObserver', () => {
  it('should create both counters up front', () => {
    const { meter, counters } = fakeMeter();
    new OpenTelemetryRetryObserver(meter);

    expect([...counters.keys()]).toEqual(['orm.retry.attempts', 'orm.retry.exhausted']);
  });

  it('should count each retry with its operation, attempt and error type', () => {
    const { meter, counters } = fakeMeter();
    const observer = new OpenTelemetryRetryObserver(meter);

    observer.onRetry({ operation: 'Item.update', attempt: 2, maxAttempts: 3, delayMs: 200, error: busyError() });

    expect(counters.get('orm.retry.attempts')?.mock.calls).toEqual([
      [1, { 'orm.operation': 'Item.update', 'orm.retry.attempt': 2, 'error.type': 'SQLITE_BUSY' }],
    ]);
    expect(counters.get('orm.retry.exhausted')).not.toHaveBeenCalled();
  });

  it('should count exhausted operations', () => {
    const { meter, counters } = fakeMeter();
    const observer = new OpenTelemetryRetryObserver(meter);

    observer.onExhausted({ operation: 'transaction', attempts: 3, error: new Error('disk I/O error') });

    expect(counters.get('orm.retry.exhausted')?.mock.calls).toEqual([
      [1, { 'orm.operation': 'transaction', 'error.type': 'Error' }],
    ]);
  });

  it('should work without a registered SDK', () => {
    const observer = new OpenTelemetryRetryObserver();
    expect(() =>
      observer.onRetry({ operation: 'Item.get', attempt: 1, maxAttempts: 3, delayMs: 100, error: busyError() }),
    ).not.toThrow();
  });
});
