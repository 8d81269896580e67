/**
 * Graceful Degradation
 *
 * Wraps each source call with a circuit breaker, a timeout and a fallback
 * chain, and fans a query out to many sources at once.
 *
 * Fallback chain when the primary is skipped (circuit open), times out or throws:
 *   1. the caller's fallback (a function or anything with invoke())
 *   2. the source's last known good result, if younger than lastGoodMaxAgeMs
 *   3. failure carrying the original error
 *
 * Nothing here rejects. Every call resolves to a ServiceResult.
 */

import { CircuitBreaker, type CircuitState } from './circuit-breaker.js';
import { createLogger } from './logger.js';
import { errorMessage } from './errors.js';

const log = createLogger('degradation');

export type ServiceStatus = 'available' | 'degraded' | 'unavailable';

export interface ServiceResult<T> {
  success: boolean;
  data: T | null;
  error?: string;
  responseTimeMs: number;
  fallbackUsed: boolean;
  degradationReason?: string;
}

export type Fallback<T> = (() => Promise<T> | T) | { invoke(): Promise<T> | T };

export interface DegradationConfig {
  enableFallbacks: boolean;
  enableCachedFallback: boolean;
  defaultTimeoutMs: number;
  minSuccessRate: number;
  circuitBreakerThreshold: number;
  circuitBreakerTimeoutMs: number;
  lastGoodMaxAgeMs: number;
}

export const DEFAULT_DEGRADATION_CONFIG: DegradationConfig = {
  enableFallbacks: true,
  enableCachedFallback: true,
  defaultTimeoutMs: 10_000,
  minSuccessRate: 0.3,
  circuitBreakerThreshold: 5,
  circuitBreakerTimeoutMs: 60_000,
  lastGoodMaxAgeMs: 60 * 60 * 1000,
};

export interface ExecuteOptions {
  timeoutMs?: number;
  /** Use the last known good result as a final fallback. Defaults to true. */
  cachedFallback?: boolean;
}

export interface MultiSourceResult<T> {
  results: Record<string, ServiceResult<T[]>>;
  candidates: Record<string, T[]>;
  succeeded: string[];
  failed: string[];
  successRate: number;
}

export interface DegradationSummary {
  serviceStatusCounts: Record<ServiceStatus, number>;
  services: Record<string, ServiceStatus>;
  circuitBreakers: Record<string, CircuitState>;
  cachedResultsCount: number;
}

export class SourceTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs / 1000}s`);
    this.name = 'SourceTimeoutError';
  }
}

interface LastGood<T> {
  result: T[];
  timestamp: number;
}

function invokeFallback<T>(fallback: Fallback<T>): Promise<T> | T {
  return typeof fallback === 'function' ? fallback() : fallback.invoke();
}

export type SourceTask<T> = (signal: AbortSignal) => Promise<T> | T;

/**
 * Runs a task with a deadline. On timeout the task's signal is aborted with
 * the SourceTimeoutError, so work the task started (requests, backoff sleeps)
 * stops too. The timer is always cleared once the task settles.
 */
export function runWithTimeout<T>(task: SourceTask<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const err = new SourceTimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
    Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        }
      );
  });
}

/**
 * One manager per kind of source result. `T` is the item type every source
 * returns a list of, so last-known-good lists stay typed.
 */
export class DegradationManager<T> {
  readonly config: DegradationConfig;
  private readonly now: () => number;
  private readonly circuitBreakers = new Map<string, CircuitBreaker>();
  private readonly serviceStatus = new Map<string, ServiceStatus>();
  private readonly lastSuccessfulResults = new Map<string, LastGood<T>>();

  constructor(config: Partial<DegradationConfig> = {}, now: () => number = Date.now) {
    this.config = { ...DEFAULT_DEGRADATION_CONFIG, ...config };
    this.now = now;
  }

  getCircuitBreaker(serviceName: string): CircuitBreaker {
    let breaker = this.circuitBreakers.get(serviceName);
    if (!breaker) {
      breaker = new CircuitBreaker(serviceName, {
        failureThreshold: this.config.circuitBreakerThreshold,
        timeoutMs: this.config.circuitBreakerTimeoutMs,
        now: this.now,
      });
      this.circuitBreakers.set(serviceName, breaker);
    }
    return breaker;
  }

  /** Seeds the last-known-good slot for a source. */
  rememberResult(serviceName: string, result: T[]): void {
    this.lastSuccessfulResults.set(serviceName, { result, timestamp: this.now() });
  }

  async executeWithDegradation(
    serviceName: string,
    primary: SourceTask<T[]>,
    fallback?: Fallback<T[]>,
    options: ExecuteOptions = {}
  ): Promise<ServiceResult<T[]>> {
    const started = this.now();
    const timeoutMs = options.timeoutMs ?? this.config.defaultTimeoutMs;
    const cachedFallback = options.cachedFallback ?? true;
    const breaker = this.getCircuitBreaker(serviceName);

    if (!breaker.canExecute()) {
      log.warn(`Circuit breaker open for ${serviceName}, skipping primary call`);
      return this.tryFallback(serviceName, fallback, cachedFallback, started, 'circuit open');
    }

    try {
      log.debug(`Executing primary function for ${serviceName}`);
      const result = await runWithTimeout(primary, timeoutMs);
      const responseTimeMs = this.now() - started;

      breaker.recordSuccess();
      this.serviceStatus.set(serviceName, 'available');
      if (this.config.enableCachedFallback) {
        this.rememberResult(serviceName, result);
      }

      log.debug(`Primary function succeeded for ${serviceName} in ${responseTimeMs}ms`);
      return { success: true, data: result, responseTimeMs, fallbackUsed: false };
    } catch (err) {
      breaker.recordFailure();
      const message = errorMessage(err);
      if (err instanceof SourceTimeoutError) {
        log.warn(`Primary function timed out for ${serviceName} after ${timeoutMs / 1000}s`);
      } else {
        log.warn(`Primary function failed for ${serviceName}: ${message}`);
      }
      return this.tryFallback(serviceName, fallback, cachedFallback, started, message);
    }
  }

  private async tryFallback(
    serviceName: string,
    fallback: Fallback<T[]> | undefined,
    cachedFallback: boolean,
    started: number,
    originalError: string
  ): Promise<ServiceResult<T[]>> {
    if (fallback && this.config.enableFallbacks) {
      try {
        log.info(`Trying fallback function for ${serviceName}`);
        const result = await invokeFallback(fallback);
        this.serviceStatus.set(serviceName, 'degraded');
        log.info(`Fallback function succeeded for ${serviceName}`);
        return {
          success: true,
          data: result,
          responseTimeMs: this.now() - started,
          fallbackUsed: true,
          degradationReason: `Primary failed: ${originalError}`,
        };
      } catch (err) {
        log.warn(`Fallback function failed for ${serviceName}: ${errorMessage(err)}`);
      }
    }

    if (cachedFallback && this.config.enableCachedFallback) {
      const cached = this.lastSuccessfulResults.get(serviceName);
      if (cached) {
        const ageMs = this.now() - cached.timestamp;
        if (ageMs < this.config.lastGoodMaxAgeMs) {
          this.serviceStatus.set(serviceName, 'degraded');
          const ageSec = Math.round(ageMs / 1000);
          log.info(`Using cached fallback for ${serviceName} (age: ${ageSec}s)`);
          return {
            success: true,
            data: cached.result,
            responseTimeMs: this.now() - started,
            fallbackUsed: true,
            degradationReason: `Using cached data from ${ageSec}s ago`,
          };
        }
      }
    }

    this.serviceStatus.set(serviceName, 'unavailable');
    return {
      success: false,
      data: null,
      error: originalError,
      responseTimeMs: this.now() - started,
      fallbackUsed: false,
    };
  }

  /**
   * Runs every source concurrently, each with its own timeout. One slow or
   * failing source never holds back or fails the others.
   */
  async executeMultiSourceSearch(
    sources: Record<string, SourceTask<T[]>>,
    fallbacks: Record<string, Fallback<T[]>> = {},
    options: ExecuteOptions & { minSuccessRate?: number } = {}
  ): Promise<MultiSourceResult<T>> {
    const names = Object.keys(sources);
    const threshold = options.minSuccessRate ?? this.config.minSuccessRate;

    const settled = await Promise.all(
      names.map((name) => this.executeWithDegradation(name, sources[name], fallbacks[name], options))
    );

    const results: Record<string, ServiceResult<T[]>> = {};
    const candidates: Record<string, T[]> = {};
    const succeeded: string[] = [];
    const failed: string[] = [];

    names.forEach((name, i) => {
      const result = settled[i];
      results[name] = result;
      if (result.success) {
        candidates[name] = result.data ?? [];
        succeeded.push(name);
        if (result.fallbackUsed) {
          log.info(`Used fallback for ${name}: ${result.degradationReason}`);
        }
      } else {
        candidates[name] = [];
        failed.push(name);
      }
    });

    const successRate = names.length > 0 ? succeeded.length / names.length : 0;
    if (names.length > 0 && successRate < threshold) {
      log.warn(
        `Source success rate (${(successRate * 100).toFixed(0)}%) below threshold (${(threshold * 100).toFixed(0)}%)`,
        { succeeded, failed, successRate, threshold }
      );
    }

    const totalCandidates = Object.values(candidates).reduce((sum, list) => sum + list.length, 0);
    log.info('Multi-source search completed', { succeeded, failed, totalCandidates, successRate });

    return { results, candidates, succeeded, failed, successRate };
  }

  getStatusSummary(): DegradationSummary {
    const serviceStatusCounts: Record<ServiceStatus, number> = { available: 0, degraded: 0, unavailable: 0 };
    const services: Record<string, ServiceStatus> = {};
    for (const [name, status] of this.serviceStatus) {
      serviceStatusCounts[status]++;
      services[name] = status;
    }

    const circuitBreakers: Record<string, CircuitState> = {};
    for (const [name, breaker] of this.circuitBreakers) {
      circuitBreakers[name] = breaker.snapshot();
    }

    return {
      serviceStatusCounts,
      services,
      circuitBreakers,
      cachedResultsCount: this.lastSuccessfulResults.size,
    };
  }
}
