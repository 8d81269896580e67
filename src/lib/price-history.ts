/**
 * Price history
 *
 * Every winning candidate and every alternative shown to a shopper is appended
 * to a per-product series so later lookups can chart prices over time.
 *
 * Keys: `pricehist:{productKey}` where productKey is the candidate sku, or
 * `{source}:{normalized name}` when the retailer gave no stock code.
 * Alternatives are also listed per query under `alts:{normalized query}`.
 *
 * Both stores keep entries for HISTORY_TTL_DAYS. The in-memory store also caps
 * each list at MAX_SERIES_LENGTH, dropping the oldest entries first.
 */

import { z } from 'zod';
import type { ProductCandidate } from '../types/product.js';
import { normalizeProductName } from './product-matcher.js';
import { createLogger } from './logger.js';

const log = createLogger('price-history');

const DAY_MS = 24 * 60 * 60 * 1000;
export const HISTORY_TTL_DAYS = 90;
export const MAX_SERIES_LENGTH = 500;
const REDIS_TIMEOUT_MS = 2_000;

export const PriceHistoryEntrySchema = z.object({
  productKey: z.string(),
  name: z.string(),
  source: z.string(),
  price: z.number().nullable(),
  was: z.number().nullable(),
  onSale: z.boolean(),
  promoText: z.string().nullable(),
  query: z.string().optional(),
  recordedAt: z.number(),
});

export type PriceHistoryEntry = z.infer<typeof PriceHistoryEntrySchema>;

export const AlternativeEntrySchema = PriceHistoryEntrySchema.extend({
  query: z.string(),
  /** 1-based position among the alternatives shown for the query */
  rank: z.number().int(),
});

export type AlternativeEntry = z.infer<typeof AlternativeEntrySchema>;

export interface PriceHistoryStore {
  recordPrice(candidate: ProductCandidate, timestamp: number, query?: string): Promise<void>;
  /** Returns how many alternatives were written. */
  recordAlternatives(query: string, candidates: readonly ProductCandidate[]): Promise<number>;
  /** Entries newer than `windowDays`, oldest first. */
  readPriceHistory(productKey: string, windowDays: number): Promise<PriceHistoryEntry[]>;
  /** Alternatives recorded for a query, newest first, then by rank. */
  readAlternatives(query: string, windowDays: number, source?: string): Promise<AlternativeEntry[]>;
}

export function productKeyFor(candidate: Pick<ProductCandidate, 'sku' | 'source' | 'name'>): string {
  return candidate.sku ?? `${candidate.source}:${normalizeProductName(candidate.name)}`;
}

export function isOnSale(candidate: Pick<ProductCandidate, 'promoFlag' | 'price' | 'was' | 'promoText'>): boolean {
  if (candidate.promoFlag) return true;
  if (candidate.price !== null && candidate.was !== null && candidate.price < candidate.was) return true;
  return Boolean(candidate.promoText);
}

export function toHistoryEntry(candidate: ProductCandidate, timestamp: number, query?: string): PriceHistoryEntry {
  return {
    productKey: productKeyFor(candidate),
    name: candidate.name,
    source: candidate.source,
    price: candidate.price,
    was: candidate.was,
    onSale: isOnSale(candidate),
    promoText: candidate.promoText,
    ...(query !== undefined ? { query } : {}),
    recordedAt: timestamp,
  };
}

export function alternativesKeyFor(query: string): string {
  return normalizeProductName(query);
}

function toAlternativeEntries(query: string, candidates: readonly ProductCandidate[], timestamp: number): AlternativeEntry[] {
  return candidates.map((candidate, i) => ({ ...toHistoryEntry(candidate, timestamp, query), query, rank: i + 1 }));
}

function withinWindow(entries: PriceHistoryEntry[], windowDays: number, now: number): PriceHistoryEntry[] {
  const cutoff = now - windowDays * DAY_MS;
  return entries.filter((e) => e.recordedAt >= cutoff).sort((a, b) => a.recordedAt - b.recordedAt);
}

function selectAlternatives(
  entries: AlternativeEntry[],
  windowDays: number,
  now: number,
  source?: string
): AlternativeEntry[] {
  const cutoff = now - windowDays * DAY_MS;
  return entries
    .filter((e) => e.recordedAt >= cutoff && (source === undefined || e.source === source))
    .sort((a, b) => b.recordedAt - a.recordedAt || a.rank - b.rank);
}

/* ------------------------------------------------------------------ */
/*  In memory                                                          */
/* ------------------------------------------------------------------ */

export class InMemoryPriceHistory implements PriceHistoryStore {
  private readonly series = new Map<string, PriceHistoryEntry[]>();
  private readonly alternatives = new Map<string, AlternativeEntry[]>();
  private readonly ttlMs: number;

  constructor(
    private readonly now: () => number = Date.now,
    ttlDays: number = HISTORY_TTL_DAYS
  ) {
    this.ttlMs = Math.max(1, ttlDays) * DAY_MS;
  }

  /** Drops expired entries, then the oldest beyond the cap. */
  private append<E extends PriceHistoryEntry>(lists: Map<string, E[]>, key: string, added: readonly E[]): void {
    const cutoff = this.now() - this.ttlMs;
    const kept = (lists.get(key) ?? []).filter((e) => e.recordedAt >= cutoff);
    kept.push(...added.filter((e) => e.recordedAt >= cutoff));
    if (kept.length === 0) {
      lists.delete(key);
      return;
    }
    lists.set(key, kept.slice(-MAX_SERIES_LENGTH));
  }

  async recordPrice(candidate: ProductCandidate, timestamp: number, query?: string): Promise<void> {
    const entry = toHistoryEntry(candidate, timestamp, query);
    this.append(this.series, entry.productKey, [entry]);
  }

  async recordAlternatives(query: string, candidates: readonly ProductCandidate[]): Promise<number> {
    const timestamp = this.now();
    for (const candidate of candidates) {
      await this.recordPrice(candidate, timestamp, query);
    }
    this.append(this.alternatives, alternativesKeyFor(query), toAlternativeEntries(query, candidates, timestamp));
    return candidates.length;
  }

  async readPriceHistory(productKey: string, windowDays: number): Promise<PriceHistoryEntry[]> {
    return withinWindow(this.series.get(productKey) ?? [], windowDays, this.now());
  }

  async readAlternatives(query: string, windowDays: number, source?: string): Promise<AlternativeEntry[]> {
    return selectAlternatives(this.alternatives.get(alternativesKeyFor(query)) ?? [], windowDays, this.now(), source);
  }
}

/* ------------------------------------------------------------------ */
/*  Upstash Redis (REST)                                               */
/* ------------------------------------------------------------------ */

// z.unknown() accepts a missing key, so require it explicitly. null is a valid reply.
const RedisReplySchema = z.object({ result: z.unknown() }).refine((reply) => reply.result !== undefined);

export interface UpstashPriceHistoryOptions {
  url: string;
  token: string;
  ttlDays?: number;
  /** Per-command deadline. */
  timeoutMs?: number;
  now?: () => number;
}

export class UpstashPriceHistory implements PriceHistoryStore {
  private readonly base: string;
  private readonly token: string;
  private readonly ttlSec: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: UpstashPriceHistoryOptions) {
    this.base = options.url.replace(/\/$/, '');
    this.token = options.token;
    this.ttlSec = Math.max(1, options.ttlDays ?? HISTORY_TTL_DAYS) * 24 * 60 * 60;
    this.timeoutMs = options.timeoutMs ?? REDIS_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  private async redisCall(...parts: string[]): Promise<unknown> {
    const encoded = parts.map((part) => encodeURIComponent(part));
    const res = await fetch(`${this.base}/${encoded.join('/')}`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.token}` },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Redis error ${res.status}: ${text}`);
    }

    const reply = RedisReplySchema.safeParse(await res.json());
    if (!reply.success) {
      throw new Error('Redis reply missing result');
    }
    return reply.data.result;
  }

  private key(productKey: string): string {
    return `pricehist:${productKey}`;
  }

  private alternativesKey(query: string): string {
    return `alts:${alternativesKeyFor(query)}`;
  }

  private async pushWithExpiry(key: string, values: string[]): Promise<void> {
    await this.redisCall('RPUSH', key, ...values);
    await this.redisCall('EXPIRE', key, `${this.ttlSec}`);
  }

  private async readList(key: string): Promise<unknown[]> {
    const raw = await this.redisCall('LRANGE', key, '0', '-1');
    if (!Array.isArray(raw)) return [];

    const parsed: unknown[] = [];
    for (const item of raw) {
      if (typeof item !== 'string') continue;
      try {
        parsed.push(JSON.parse(item));
      } catch (err) {
        log.warn('price-history entry parse failed', { key, error: String(err) });
      }
    }
    return parsed;
  }

  async recordPrice(candidate: ProductCandidate, timestamp: number, query?: string): Promise<void> {
    const entry = toHistoryEntry(candidate, timestamp, query);
    await this.pushWithExpiry(this.key(entry.productKey), [JSON.stringify(entry)]);
  }

  /** Writes run concurrently; the count covers the product series that were written. */
  async recordAlternatives(query: string, candidates: readonly ProductCandidate[]): Promise<number> {
    if (candidates.length === 0) return 0;
    const timestamp = this.now();
    const listed = toAlternativeEntries(query, candidates, timestamp).map((entry) => JSON.stringify(entry));

    const [listWrite, ...seriesWrites] = await Promise.allSettled([
      this.pushWithExpiry(this.alternativesKey(query), listed),
      ...candidates.map((candidate) => this.recordPrice(candidate, timestamp, query)),
    ]);

    if (listWrite.status === 'rejected') {
      log.warn('alternatives list write failed', { query, error: String(listWrite.reason) });
    }
    const failed = seriesWrites.filter((r) => r.status === 'rejected').length;
    if (failed > 0) {
      log.warn(`${failed} of ${candidates.length} alternative writes failed`, { query });
    }
    return candidates.length - failed;
  }

  async readPriceHistory(productKey: string, windowDays: number): Promise<PriceHistoryEntry[]> {
    const entries: PriceHistoryEntry[] = [];
    for (const item of await this.readList(this.key(productKey))) {
      const parsed = PriceHistoryEntrySchema.safeParse(item);
      if (parsed.success) entries.push(parsed.data);
    }
    return withinWindow(entries, windowDays, this.now());
  }

  async readAlternatives(query: string, windowDays: number, source?: string): Promise<AlternativeEntry[]> {
    const entries: AlternativeEntry[] = [];
    for (const item of await this.readList(this.alternativesKey(query))) {
      const parsed = AlternativeEntrySchema.safeParse(item);
      if (parsed.success) entries.push(parsed.data);
    }
    return selectAlternatives(entries, windowDays, this.now(), source);
  }
}
