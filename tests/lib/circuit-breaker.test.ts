import { CircuitBreaker } from '../../src/lib/circuit-breaker.js';

describe('CircuitBreaker', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 10_000;
  });

  function breaker(failureThreshold = 3, timeoutMs = 60_000) {
    return new CircuitBreaker('woolworths', { failureThreshold, timeoutMs, now });
  }

  it('starts closed and allows calls', () => {
    const cb = breaker();
    expect(cb.canExecute()).toBe(true);
    expect(cb.snapshot()).toEqual({ serviceName: 'woolworths', state: 'closed', failureCount: 0, lastFailureTime: 0 });
  });

  it('opens once failures reach the threshold', () => {
    const cb = breaker(3);
    cb.recordFailure();
    cb.recordFailure();
    expect(cb.snapshot().state).toBe('closed');
    cb.recordFailure();
    expect(cb.snapshot()).toMatchObject({ state: 'open', failureCount: 3, lastFailureTime: 10_000 });
    expect(cb.canExecute()).toBe(false);
  });

  it('resets the failure count on success while closed', () => {
    const cb = breaker(3);
    cb.recordFailure();
    cb.recordFailure();
    cb.recordSuccess();
    cb.recordFailure();
    expect(cb.snapshot()).toMatchObject({ state: 'closed', failureCount: 1 });
  });

  it('stays open until strictly more than the timeout has passed', () => {
    const cb = breaker(1, 60_000);
    cb.recordFailure();
    clock += 60_000;
    expect(cb.canExecute()).toBe(false);
    clock += 1;
    expect(cb.canExecute()).toBe(true);
    expect(cb.snapshot().state).toBe('half-open');
  });

  it('admits a single trial call while half-open', () => {
    const cb = breaker(1, 1_000);
    cb.recordFailure();
    clock += 1_001;
    expect(cb.canExecute()).toBe(true);
    expect(cb.canExecute()).toBe(false);
  });

  it('closes after a successful trial', () => {
    const cb = breaker(1, 1_000);
    cb.recordFailure();
    clock += 1_001;
    cb.canExecute();
    cb.recordSuccess();
    expect(cb.snapshot()).toMatchObject({ state: 'closed', failureCount: 0 });
    expect(cb.canExecute()).toBe(true);
  });

  it('re-opens immediately after a failed trial and restarts the timeout', () => {
    const cb = breaker(5, 1_000);
    for (let i = 0; i < 5; i++) cb.recordFailure();
    clock += 1_001;
    cb.canExecute();
    cb.recordFailure();
    expect(cb.snapshot()).toMatchObject({ state: 'open', failureCount: 6, lastFailureTime: 11_001 });
    clock += 500;
    expect(cb.canExecute()).toBe(false);
  });

  it('reports half-open once the timeout has run out, before any call', () => {
    const cb = breaker(1, 1_000);
    cb.recordFailure();
    clock += 1_000;
    expect(cb.snapshot().state).toBe('open');
    clock += 1;
    expect(cb.snapshot()).toMatchObject({ state: 'half-open', failureCount: 1, lastFailureTime: 10_000 });
    expect(cb.canExecute()).toBe(true);
    expect(cb.canExecute()).toBe(false);
  });

  it('can be tripped open by hand', () => {
    const cb = breaker();
    cb.trip();
    expect(cb.snapshot().state).toBe('open');
    expect(cb.canExecute()).toBe(false);
  });
});
