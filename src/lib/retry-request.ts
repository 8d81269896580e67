/**
 * Retrying Request Executor
 *
 * Performs one logical outbound GET with bounded retries and exponential
 * backoff. Never rejects: every outcome resolves to a tagged result so the
 * degradation layer can treat all source failures the same way.
 *
 * Schedule with maxRetries = 3, backoffFactor = 1:
 *   attempt 1 → fail → sleep 1s → attempt 2 → fail → sleep 2s → attempt 3
 *
 * Classification:
 *   200                      → read and parse JSON (parse failure is terminal,
 *                              a transport error while reading is retried)
 *   429, 500, 502, 503, 504  → retry, then 'retryable-status-exhausted'
 *   any other status         → 'terminal-status', no retry
 *   timeout / network error  → retry, then 'timeout' / 'network'
 *   anything else thrown     → 'unexpected', no retry
 *
 * An aborted `signal` stops the loop before the next attempt or during a
 * backoff sleep, and resolves to 'aborted'.
 */

import { request, type Dispatcher } from 'undici';
import { createLogger } from './logger.js';
import { errorMessage } from './errors.js';

const log = createLogger('retry-request');

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const TIMEOUT_CODES = new Set([
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'ETIMEDOUT',
  'ABORT_ERR',
]);

const NETWORK_CODES = new Set([
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

export type AttemptOutcome = 'success' | 'retryable-failure' | 'terminal-failure' | 'timeout' | 'network-error';

export interface RetryAttempt {
  attempt: number;
  latencyMs: number;
  outcome: AttemptOutcome;
  status?: number;
  retryDelayMs?: number;
}

export type FailureReason =
  | 'retryable-status-exhausted'
  | 'terminal-status'
  | 'parse-failure'
  | 'timeout'
  | 'network'
  | 'aborted'
  | 'unexpected';

export type RequestResult =
  | { ok: true; data: unknown; status: number; attempts: RetryAttempt[] }
  | { ok: false; reason: FailureReason; status?: number; error?: string; attempts: RetryAttempt[] };

export interface RequestSpec {
  url: string;
  params?: Record<string, string | number | boolean>;
  headers?: Record<string, string>;
  /** Extra fields attached to every log line (source, query, postcode). */
  context?: Record<string, unknown>;
  signal?: AbortSignal;
}

export interface RetryOptions {
  maxRetries?: number;
  /** Seconds multiplied into 2^attempt. */
  backoffFactor?: number;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  /** Must resolve early once `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

class BodyReadError extends Error {
  constructor(readonly original: unknown) {
    super(errorMessage(original));
    this.name = 'BodyReadError';
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('cause' in err) return errorCode(err.cause);
  return undefined;
}

export function classifyTransportError(err: unknown): 'timeout' | 'network' | 'unexpected' {
  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return 'timeout';
  }
  const code = errorCode(err);
  if (code && TIMEOUT_CODES.has(code)) return 'timeout';
  if (code && NETWORK_CODES.has(code)) return 'network';
  return 'unexpected';
}

export function backoffDelayMs(attemptIndex: number, backoffFactor: number): number {
  return Math.pow(2, attemptIndex) * backoffFactor * 1000;
}

export class RetryingRequestExecutor {
  readonly maxRetries: number;
  readonly backoffFactor: number;
  readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RetryOptions = {}) {
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.backoffFactor = options.backoffFactor ?? 1;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.dispatcher = options.dispatcher;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute(spec: RequestSpec): Promise<RequestResult> {
    const attempts: RetryAttempt[] = [];
    const baseLog = { url: spec.url, ...spec.context };
    let lastStatus: number | undefined;
    let lastError: string | undefined;
    const aborted = (): RequestResult => {
      log.info('Request aborted by caller', { ...baseLog, attempts: attempts.length });
      return { ok: false, reason: 'aborted', status: lastStatus, error: lastError, attempts };
    };

    for (let attemptIndex = 0; attemptIndex < this.maxRetries; attemptIndex++) {
      if (spec.signal?.aborted) return aborted();
      const attemptNo = attemptIndex + 1;
      const isLast = attemptNo >= this.maxRetries;
      const retryDelayMs = isLast ? undefined : backoffDelayMs(attemptIndex, this.backoffFactor);
      const started = Date.now();

      try {
        const res = await request(spec.url, {
          method: 'GET',
          query: spec.params,
          headers: spec.headers,
          headersTimeout: this.timeoutMs,
          bodyTimeout: this.timeoutMs,
          ...(spec.signal ? { signal: spec.signal } : {}),
          ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
        });
        const latencyMs = Date.now() - started;
        const status = res.statusCode;
        lastStatus = status;
        const logData = { ...baseLog, status, latencyMs, attempt: attemptNo };

        if (status === 200) {
          let text: string;
          try {
            text = await res.body.text();
          } catch (readErr) {
            throw new BodyReadError(readErr);
          }
          let data: unknown;
          try {
            data = JSON.parse(text);
          } catch (parseErr) {
            attempts.push({ attempt: attemptNo, latencyMs, outcome: 'terminal-failure', status });
            log.error('Failed to parse JSON response', { ...logData, parseError: errorMessage(parseErr) });
            return { ok: false, reason: 'parse-failure', status, error: errorMessage(parseErr), attempts };
          }
          attempts.push({ attempt: attemptNo, latencyMs, outcome: 'success', status });
          log.info('HTTP request successful', logData);
          return { ok: true, data, status, attempts };
        }

        if (RETRYABLE_STATUSES.has(status)) {
          await res.body.dump();
          attempts.push({ attempt: attemptNo, latencyMs, outcome: 'retryable-failure', status, retryDelayMs });
          if (retryDelayMs !== undefined) {
            log.warn(`Retryable status ${status}, retrying in ${retryDelayMs / 1000}s`, { ...logData, retryDelayMs });
            await this.sleep(retryDelayMs, spec.signal);
            continue;
          }
          log.error(`Max retries reached for status ${status}`, { ...logData, maxRetries: this.maxRetries });
          return { ok: false, reason: 'retryable-status-exhausted', status, attempts };
        }

        const text = await res.body.text();
        attempts.push({ attempt: attemptNo, latencyMs, outcome: 'terminal-failure', status });
        log.error(`Non-retryable status ${status}`, { ...logData, responseText: text.slice(0, 200) });
        return { ok: false, reason: 'terminal-status', status, attempts };
      } catch (caught) {
        if (spec.signal?.aborted) return aborted();
        const latencyMs = Date.now() - started;
        const err = caught instanceof BodyReadError ? caught.original : caught;
        const kind = classifyTransportError(err);
        lastError = errorMessage(err);
        const logData = { ...baseLog, latencyMs, attempt: attemptNo, errorType: kind, error: lastError };

        if (kind === 'unexpected') {
          attempts.push({ attempt: attemptNo, latencyMs, outcome: 'terminal-failure' });
          log.error('Unexpected error during HTTP request', logData);
          return { ok: false, reason: 'unexpected', error: lastError, attempts };
        }

        attempts.push({
          attempt: attemptNo,
          latencyMs,
          outcome: kind === 'timeout' ? 'timeout' : 'network-error',
          retryDelayMs,
        });
        if (retryDelayMs !== undefined) {
          log.warn(`Request ${kind} error, retrying in ${retryDelayMs / 1000}s`, { ...logData, retryDelayMs });
          await this.sleep(retryDelayMs, spec.signal);
          continue;
        }
        log.error(`Request ${kind} error after ${this.maxRetries} attempts`, logData);
        return { ok: false, reason: kind, error: lastError, attempts };
      }
    }

    // Only reachable if maxRetries were 0, which the constructor prevents
    log.error('All retry attempts failed', { ...baseLog, lastStatus, lastError });
    return { ok: false, reason: 'unexpected', status: lastStatus, error: lastError, attempts };
  }
}
