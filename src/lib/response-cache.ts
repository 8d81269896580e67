/**
 * In-process TTL + LRU cache for source search responses.
 *
 * Entries are keyed by (source, query, location). A Map gives O(1) lookup and a
 * doubly-linked list keeps recency order: head is least recently used, tail is
 * most recently used. Every method runs synchronously to completion, so a
 * get-evict-insert sequence can never interleave with another caller on the
 * event loop.
 *
 * `null` and `[]` are valid cached values. Use `lookup()` when a caller needs to
 * tell a cached empty value from a miss.
 */

import { createLogger } from './logger.js';

const log = createLogger('response-cache');

const SWEEP_EVERY_PUTS = 100;

interface CacheEntry<V> {
  key: string;
  value: V;
  expiresAt: number;
  prev: CacheEntry<V> | null;
  next: CacheEntry<V> | null;
}

export type CacheLookup<V> = { hit: true; value: V } | { hit: false };

export interface CacheStats {
  size: number;
  maxSize: number;
  expiredItems: number;
  defaultTtlMs: number;
  hits: number;
  misses: number;
  evictions: number;
}

export interface ResponseCacheOptions {
  maxSize?: number;
  defaultTtlMs?: number;
  now?: () => number;
}

function normalizeQuery(query: string): string {
  return query.toLowerCase().trim().replace(/\s+/g, ' ');
}

export function makeCacheKey(source: string, query: string, location: string): string {
  return `${source}:${normalizeQuery(query)}:${location.trim()}`;
}

export class ResponseCache<V = unknown> {
  readonly maxSize: number;
  readonly defaultTtlMs: number;
  private readonly now: () => number;

  private readonly entries = new Map<string, CacheEntry<V>>();
  private head: CacheEntry<V> | null = null;
  private tail: CacheEntry<V> | null = null;

  private putCount = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ResponseCacheOptions = {}) {
    this.maxSize = Math.max(1, options.maxSize ?? 1000);
    this.defaultTtlMs = options.defaultTtlMs ?? 10 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  get(source: string, query: string, location: string): V | undefined {
    const result = this.lookup(source, query, location);
    return result.hit ? result.value : undefined;
  }

  lookup(source: string, query: string, location: string): CacheLookup<V> {
    const key = makeCacheKey(source, query, location);
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return { hit: false };
    }

    if (this.isExpired(entry)) {
      this.removeEntry(entry);
      this.misses++;
      return { hit: false };
    }

    this.moveToTail(entry);
    this.hits++;
    return { hit: true, value: entry.value };
  }

  /**
   * Stores a value. `ttlMs` overrides the default; values <= 0 expire at once.
   */
  put(source: string, query: string, location: string, value: V, ttlMs?: number): void {
    const key = makeCacheKey(source, query, location);
    const ttl = ttlMs ?? this.defaultTtlMs;
    const expiresAt = ttl <= 0 ? this.now() - 1 : this.now() + ttl;

    this.putCount++;
    if (this.putCount % SWEEP_EVERY_PUTS === 0) {
      this.sweepExpired();
    }

    const existing = this.entries.get(key);
    if (existing) {
      existing.value = value;
      existing.expiresAt = expiresAt;
      this.moveToTail(existing);
    } else {
      const entry: CacheEntry<V> = { key, value, expiresAt, prev: null, next: null };
      this.entries.set(key, entry);
      this.appendToTail(entry);
    }

    while (this.entries.size > this.maxSize && this.head) {
      log.debug('Evicting least recently used entry', { key: this.head.key });
      this.removeEntry(this.head);
      this.evictions++;
    }
  }

  delete(source: string, query: string, location: string): boolean {
    const entry = this.entries.get(makeCacheKey(source, query, location));
    if (!entry) return false;
    this.removeEntry(entry);
    return true;
  }

  clear(): void {
    this.entries.clear();
    this.head = null;
    this.tail = null;
  }

  size(): number {
    return this.entries.size;
  }

  /** Keys from least to most recently used. */
  keys(): string[] {
    const keys: string[] = [];
    for (let node = this.head; node; node = node.next) {
      keys.push(node.key);
    }
    return keys;
  }

  stats(): CacheStats {
    let expiredItems = 0;
    for (const entry of this.entries.values()) {
      if (this.isExpired(entry)) expiredItems++;
    }
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      expiredItems,
      defaultTtlMs: this.defaultTtlMs,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  /** Removes every expired entry. Returns how many were dropped. */
  sweepExpired(): number {
    let removed = 0;
    let node = this.head;
    while (node) {
      const next = node.next;
      if (this.isExpired(node)) {
        this.removeEntry(node);
        removed++;
      }
      node = next;
    }
    if (removed > 0) {
      log.debug(`Swept ${removed} expired entries`);
    }
    return removed;
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return this.now() > entry.expiresAt;
  }

  private appendToTail(entry: CacheEntry<V>): void {
    entry.prev = this.tail;
    entry.next = null;
    if (this.tail) {
      this.tail.next = entry;
    } else {
      this.head = entry;
    }
    this.tail = entry;
  }

  private unlink(entry: CacheEntry<V>): void {
    if (entry.prev) {
      entry.prev.next = entry.next;
    } else {
      this.head = entry.next;
    }
    if (entry.next) {
      entry.next.prev = entry.prev;
    } else {
      this.tail = entry.prev;
    }
    entry.prev = null;
    entry.next = null;
  }

  private moveToTail(entry: CacheEntry<V>): void {
    if (this.tail === entry) return;
    this.unlink(entry);
    this.appendToTail(entry);
  }

  private removeEntry(entry: CacheEntry<V>): void {
    this.unlink(entry);
    this.entries.delete(entry.key);
  }
}
