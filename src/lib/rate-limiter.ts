/**
 * Client rate limiting.
 *
 * Two checks run for every request and both must pass:
 *   - sliding window: at most `requests` admissions inside the last `windowSeconds`
 *   - token bucket: refills `requests / windowSeconds` tokens per second up to
 *     `burst` (or `requests`), one token per admission
 *
 * Records are keyed by (limit class, client id), so a client's /check quota and
 * its global quota never share counters. Blocks apply to a client across every
 * class.
 */

import { createHash } from 'crypto';
import type { LimitClass, RateLimitRule } from '../config.js';
import { createLogger } from './logger.js';

const log = createLogger('rate-limiter');

export interface RateLimitClientRecord {
  /** Admission times in ms, oldest first. */
  requestTimestamps: number[];
  tokens: number;
  lastRefill: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  /** Seconds until the client may retry; 0 when allowed. */
  retryAfterSeconds: number;
  headers: Record<string, string>;
}

export interface ClientClassStats {
  requestsInWindow: number;
  tokens: number;
  lastRequest: number | null;
}

export interface ClientStats {
  exists: boolean;
  blockedUntil: number;
  isBlocked: boolean;
  classes: Partial<Record<LimitClass, ClientClassStats>>;
}

export interface RateLimiterOptions {
  limits: Record<LimitClass, RateLimitRule>;
  now?: () => number;
}

export const DEFAULT_BLOCK_SECONDS = 300;

export function isLimitClass(value: string, limits: Record<LimitClass, RateLimitRule>): value is LimitClass {
  return Object.prototype.hasOwnProperty.call(limits, value);
}

/** Four-digit bucket of the user agent string. */
export function userAgentHash(userAgent: string): string {
  const digest = createHash('sha1').update(userAgent).digest();
  return String(digest.readUInt32BE(0) % 10_000).padStart(4, '0');
}

type HeaderValue = string | string[] | undefined;

function firstHeader(value: HeaderValue): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Client identity: X-Real-IP, else the first X-Forwarded-For hop, else the
 * socket address, joined with a hash of the User-Agent.
 */
export function deriveClientId(socketIp: string | undefined, headers: Record<string, HeaderValue>): string {
  const realIp = firstHeader(headers['x-real-ip']);
  const forwardedFor = firstHeader(headers['x-forwarded-for'])?.split(',')[0].trim();
  const ip = realIp || forwardedFor || socketIp || 'unknown';
  const userAgent = firstHeader(headers['user-agent']) ?? 'unknown';
  return `${ip}:${userAgentHash(userAgent)}`;
}

export class RateLimiter {
  readonly limits: Record<LimitClass, RateLimitRule>;
  private readonly now: () => number;
  private readonly clients = new Map<string, Map<LimitClass, RateLimitClientRecord>>();
  private readonly blocks = new Map<string, number>();

  constructor(options: RateLimiterOptions) {
    this.limits = options.limits;
    this.now = options.now ?? Date.now;
  }

  resolveClass(limitClass: string): LimitClass {
    return isLimitClass(limitClass, this.limits) ? limitClass : 'global';
  }

  checkRateLimit(clientId: string, requestedClass: string = 'global'): RateLimitDecision {
    const limitClass = this.resolveClass(requestedClass);
    const rule = this.limits[limitClass];
    const now = this.now();
    const record = this.recordFor(clientId, limitClass, rule, now);

    const blockedUntil = this.blocks.get(clientId) ?? 0;
    let retryAfterMs: number | null = null;

    if (blockedUntil > now) {
      retryAfterMs = blockedUntil - now;
    } else {
      this.dropOldRequests(record, rule, now);
      this.refillTokens(record, rule, now);

      if (record.requestTimestamps.length >= rule.requests) {
        const oldest = record.requestTimestamps[0];
        retryAfterMs = Math.max(0, rule.windowSeconds * 1000 - (now - oldest));
      } else if (record.tokens < 1) {
        const tokensPerSecond = rule.requests / rule.windowSeconds;
        retryAfterMs = ((1 - record.tokens) / tokensPerSecond) * 1000;
      }
    }

    const headers: Record<string, string> = {
      'X-RateLimit-Limit': String(rule.requests),
      'X-RateLimit-Window': String(rule.windowSeconds),
    };

    if (retryAfterMs !== null) {
      const retryAfterSeconds = retryAfterMs / 1000;
      headers['X-RateLimit-Remaining'] = String(Math.max(0, rule.requests - record.requestTimestamps.length));
      headers['Retry-After'] = String(Math.floor(retryAfterSeconds) + 1);
      log.warn(`Rate limit exceeded for client ${clientId}`, {
        limitClass,
        requestsInWindow: record.requestTimestamps.length,
        limit: rule.requests,
        window: rule.windowSeconds,
        retryAfterSeconds,
      });
      return { allowed: false, retryAfterSeconds, headers };
    }

    record.requestTimestamps.push(now);
    record.tokens = Math.max(0, record.tokens - 1);
    headers['X-RateLimit-Remaining'] = String(Math.max(0, rule.requests - record.requestTimestamps.length));

    log.debug(`Rate limit check passed for client ${clientId}`, {
      limitClass,
      requestsInWindow: record.requestTimestamps.length,
      tokensRemaining: record.tokens,
    });
    return { allowed: true, retryAfterSeconds: 0, headers };
  }

  blockClient(clientId: string, durationSeconds: number = DEFAULT_BLOCK_SECONDS): number {
    const blockedUntil = this.now() + durationSeconds * 1000;
    this.blocks.set(clientId, blockedUntil);
    log.warn(`Client ${clientId} blocked for ${durationSeconds} seconds`, { blockedUntil });
    return blockedUntil;
  }

  /** Returns false when the client had no block to lift. */
  unblockClient(clientId: string): boolean {
    const existed = this.blocks.delete(clientId);
    if (existed) log.info(`Client ${clientId} unblocked`);
    return existed;
  }

  getClientStats(clientId: string): ClientStats {
    const now = this.now();
    const blockedUntil = this.blocks.get(clientId) ?? 0;
    const records = this.clients.get(clientId);
    const classes: Partial<Record<LimitClass, ClientClassStats>> = {};

    if (records) {
      for (const [limitClass, record] of records) {
        const timestamps = record.requestTimestamps;
        classes[limitClass] = {
          requestsInWindow: timestamps.length,
          tokens: record.tokens,
          lastRequest: timestamps.length > 0 ? timestamps[timestamps.length - 1] : null,
        };
      }
    }

    return {
      exists: records !== undefined || blockedUntil > 0,
      blockedUntil,
      isBlocked: blockedUntil > now,
      classes,
    };
  }

  /**
   * Drops class records with no admission inside `maxAgeSeconds`, and whole
   * clients left with no records and no active block. Returns how many
   * clients were removed.
   */
  cleanupExpiredClients(maxAgeSeconds = 3600): number {
    const now = this.now();
    const cutoff = now - maxAgeSeconds * 1000;
    let removed = 0;

    for (const [clientId, until] of this.blocks) {
      if (until <= now) this.blocks.delete(clientId);
    }

    for (const [clientId, records] of this.clients) {
      for (const [limitClass, record] of records) {
        const timestamps = record.requestTimestamps;
        const last = timestamps.length > 0 ? timestamps[timestamps.length - 1] : null;
        if (last === null || last < cutoff) records.delete(limitClass);
      }
      if (records.size === 0 && !this.blocks.has(clientId)) {
        this.clients.delete(clientId);
        removed++;
      }
    }

    log.info(`Cleaned up ${removed} expired clients`);
    return removed;
  }

  clientCount(): number {
    return this.clients.size;
  }

  private recordFor(clientId: string, limitClass: LimitClass, rule: RateLimitRule, now: number): RateLimitClientRecord {
    let records = this.clients.get(clientId);
    if (!records) {
      records = new Map();
      this.clients.set(clientId, records);
    }
    let record = records.get(limitClass);
    if (!record) {
      record = { requestTimestamps: [], tokens: bucketCapacity(rule), lastRefill: now };
      records.set(limitClass, record);
    }
    return record;
  }

  private dropOldRequests(record: RateLimitClientRecord, rule: RateLimitRule, now: number): void {
    const cutoff = now - rule.windowSeconds * 1000;
    let drop = 0;
    while (drop < record.requestTimestamps.length && record.requestTimestamps[drop] <= cutoff) {
      drop++;
    }
    if (drop > 0) record.requestTimestamps.splice(0, drop);
  }

  private refillTokens(record: RateLimitClientRecord, rule: RateLimitRule, now: number): void {
    const elapsedSeconds = (now - record.lastRefill) / 1000;
    if (elapsedSeconds <= 0) return;
    const tokensPerSecond = rule.requests / rule.windowSeconds;
    record.tokens = Math.min(bucketCapacity(rule), record.tokens + elapsedSeconds * tokensPerSecond);
    record.lastRefill = now;
  }
}

function bucketCapacity(rule: RateLimitRule): number {
  return rule.burst ?? rule.requests;
}
