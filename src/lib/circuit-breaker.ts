import { createLogger } from './logger.js';

const log = createLogger('circuit-breaker');

export type CircuitStateName = 'closed' | 'open' | 'half-open';

export interface CircuitState {
  serviceName: string;
  state: CircuitStateName;
  failureCount: number;
  lastFailureTime: number;
}

export interface CircuitBreakerOptions {
  /** Consecutive failures before the circuit opens. */
  failureThreshold?: number;
  /** How long an open circuit rejects calls before allowing one trial. */
  timeoutMs?: number;
  now?: () => number;
}

/**
 * Per-source circuit breaker.
 *
 *   closed ──(failures ≥ threshold)──▶ open
 *   open ──(timeout elapsed, next call)──▶ half-open (one trial admitted)
 *   half-open ──success──▶ closed (failureCount = 0)
 *   half-open ──failure──▶ open (timeout clock restarts)
 */
export class CircuitBreaker {
  readonly serviceName: string;
  readonly failureThreshold: number;
  readonly timeoutMs: number;
  private readonly now: () => number;

  private state: CircuitStateName = 'closed';
  private failureCount = 0;
  private lastFailureTime = 0;
  private trialInFlight = false;

  constructor(serviceName: string, options: CircuitBreakerOptions = {}) {
    this.serviceName = serviceName;
    this.failureThreshold = Math.max(1, options.failureThreshold ?? 5);
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  private openTimeoutElapsed(): boolean {
    return this.now() - this.lastFailureTime > this.timeoutMs;
  }

  canExecute(): boolean {
    if (this.state === 'closed') return true;

    if (this.state === 'open') {
      if (this.openTimeoutElapsed()) {
        this.state = 'half-open';
        this.trialInFlight = true;
        log.info(`Circuit half-open for ${this.serviceName}, allowing one trial call`);
        return true;
      }
      return false;
    }

    // half-open: only one trial at a time
    if (this.trialInFlight) return false;
    this.trialInFlight = true;
    return true;
  }

  recordSuccess(): void {
    if (this.state !== 'closed') {
      log.info(`Circuit closed for ${this.serviceName}`);
    }
    this.state = 'closed';
    this.failureCount = 0;
    this.trialInFlight = false;
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    this.trialInFlight = false;

    if (this.state === 'half-open') {
      this.state = 'open';
      log.warn(`Trial call failed, circuit re-opened for ${this.serviceName}`);
      return;
    }

    if (this.state === 'closed' && this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      log.warn(`Circuit opened for ${this.serviceName} after ${this.failureCount} failures`);
    }
  }

  /** Forces the circuit open, e.g. for maintenance of a source. */
  trip(): void {
    this.state = 'open';
    this.lastFailureTime = this.now();
    this.trialInFlight = false;
  }

  /** An open circuit whose timeout has run out reports half-open before the next call moves it there. */
  snapshot(): CircuitState {
    const state = this.state === 'open' && this.openTimeoutElapsed() ? 'half-open' : this.state;
    return {
      serviceName: this.serviceName,
      state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
    };
  }
}
