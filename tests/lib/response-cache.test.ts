import { ResponseCache, makeCacheKey } from '../../src/lib/response-cache.js';

describe('response-cache', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000_000;
  });

  describe('makeCacheKey', () => {
    it('normalizes case and whitespace of the query', () => {
      expect(makeCacheKey('woolworths', '  Milk   2L ', ' 2000 ')).toBe('woolworths:milk 2l:2000');
    });

    it('makes differently spaced queries collide', () => {
      expect(makeCacheKey('woolworths', '  Milk 2L ', '2000')).toBe(makeCacheKey('woolworths', 'milk 2l', '2000'));
    });
  });

  describe('get / put', () => {
    it('returns what was stored before the TTL elapses', () => {
      const cache = new ResponseCache<string[]>({ defaultTtlMs: 60_000, now });
      cache.put('woolworths', 'milk', '2000', ['a', 'b']);
      clock += 59_999;
      expect(cache.get('woolworths', 'MILK', '2000')).toEqual(['a', 'b']);
    });

    it('misses and deletes the entry once the TTL has passed', () => {
      const cache = new ResponseCache<string[]>({ defaultTtlMs: 60_000, now });
      cache.put('woolworths', 'milk', '2000', ['a']);
      clock += 60_001;
      expect(cache.get('woolworths', 'milk', '2000')).toBeUndefined();
      expect(cache.size()).toBe(0);
    });

    it('honours a per-entry TTL override', () => {
      const cache = new ResponseCache<string>({ defaultTtlMs: 60_000, now });
      cache.put('s', 'q', 'l', 'short', 1_000);
      clock += 1_001;
      expect(cache.get('s', 'q', 'l')).toBeUndefined();
    });

    it('expires entries stored with a TTL of zero or less immediately', () => {
      const cache = new ResponseCache<string>({ now });
      cache.put('s', 'zero', 'l', 'x', 0);
      cache.put('s', 'negative', 'l', 'y', -5);
      expect(cache.get('s', 'zero', 'l')).toBeUndefined();
      expect(cache.get('s', 'negative', 'l')).toBeUndefined();
    });

    it('distinguishes a cached empty list from a miss via lookup', () => {
      const cache = new ResponseCache<string[]>({ now });
      cache.put('s', 'nothing', 'l', []);
      expect(cache.lookup('s', 'nothing', 'l')).toEqual({ hit: true, value: [] });
      expect(cache.lookup('s', 'other', 'l')).toEqual({ hit: false });
    });

    it('caches null as a value', () => {
      const cache = new ResponseCache<string | null>({ now });
      cache.put('s', 'q', 'l', null);
      expect(cache.lookup('s', 'q', 'l')).toEqual({ hit: true, value: null });
    });

    it('overwrites an existing key without growing', () => {
      const cache = new ResponseCache<number>({ now });
      cache.put('s', 'q', 'l', 1);
      cache.put('s', 'Q', 'l', 2);
      expect(cache.size()).toBe(1);
      expect(cache.get('s', 'q', 'l')).toBe(2);
    });
  });

  describe('LRU eviction', () => {
    it('evicts the least recently used entry when full', () => {
      const cache = new ResponseCache<number>({ maxSize: 2, now });
      cache.put('s', 'a', 'l', 1);
      cache.put('s', 'b', 'l', 2);
      cache.put('s', 'c', 'l', 3);

      expect(cache.get('s', 'a', 'l')).toBeUndefined();
      expect(cache.get('s', 'b', 'l')).toBe(2);
      expect(cache.get('s', 'c', 'l')).toBe(3);
      expect(cache.stats().evictions).toBe(1);
    });

    it('treats a get hit as a use', () => {
      const cache = new ResponseCache<number>({ maxSize: 2, now });
      cache.put('s', 'a', 'l', 1);
      cache.put('s', 'b', 'l', 2);
      cache.get('s', 'a', 'l');
      cache.put('s', 'c', 'l', 3);

      expect(cache.keys()).toEqual(['s:a:l', 's:c:l']);
    });

    it('treats re-putting a key as a use', () => {
      const cache = new ResponseCache<number>({ maxSize: 2, now });
      cache.put('s', 'a', 'l', 1);
      cache.put('s', 'b', 'l', 2);
      cache.put('s', 'a', 'l', 10);
      cache.put('s', 'c', 'l', 3);

      expect(cache.get('s', 'b', 'l')).toBeUndefined();
      expect(cache.get('s', 'a', 'l')).toBe(10);
    });
  });

  describe('housekeeping', () => {
    it('sweeps expired entries on every 100th put', () => {
      const cache = new ResponseCache<number>({ defaultTtlMs: 1_000, now });
      cache.put('s', 'old', 'l', 0);
      clock += 5_000;
      for (let i = 1; i < 99; i++) {
        cache.put('s', `fresh-${i}`, 'l', i);
      }
      expect(cache.size()).toBe(99);
      cache.put('s', 'fresh-99', 'l', 99);
      expect(cache.size()).toBe(99);
      expect(cache.keys()).not.toContain('s:old:l');
    });

    it('reports stats including expired entries not yet swept', () => {
      const cache = new ResponseCache<number>({ maxSize: 10, defaultTtlMs: 1_000, now });
      cache.put('s', 'a', 'l', 1);
      cache.put('s', 'b', 'l', 2, 10_000);
      cache.get('s', 'b', 'l');
      cache.get('s', 'missing', 'l');
      clock += 2_000;

      expect(cache.stats()).toEqual({
        size: 2,
        maxSize: 10,
        expiredItems: 1,
        defaultTtlMs: 1_000,
        hits: 1,
        misses: 1,
        evictions: 0,
      });
    });

    it('deletes and clears', () => {
      const cache = new ResponseCache<number>({ now });
      cache.put('s', 'a', 'l', 1);
      cache.put('s', 'b', 'l', 2);
      expect(cache.delete('s', 'a', 'l')).toBe(true);
      expect(cache.delete('s', 'a', 'l')).toBe(false);
      cache.clear();
      expect(cache.size()).toBe(0);
      expect(cache.keys()).toEqual([]);
    });
  });
});
