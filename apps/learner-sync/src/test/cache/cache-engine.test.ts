/**
 * Cache Engine Tests
 *
 * @see src/cache/cache-engine.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { CacheEntry } from '@courseline/shared-types';
import { LocalStore, SYSTEM_COLLECTIONS } from '../../store/local-store';
import { CacheEngine, type CacheEngineConfig, type EvictionReason } from '../../cache/cache-engine';
import { ValidationError } from '../../errors';
import { ManualClock } from '../harness';

// Deterministic PRNG for the capacity fuzz test
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('CacheEngine', () => {
  let store: LocalStore;
  let clock: ManualClock;
  let cache: CacheEngine;

  const createCache = (config: Partial<CacheEngineConfig> = {}) =>
    new CacheEngine(store, { capacity: 100, now: clock.now, ...config });

  /** Cache a value under `key` with an explicit size */
  const put = (key: string, sizeBytes: number, priority = 0) =>
    cache.fetchOrCompute(key, priority, async () => key, { sizeBytes });

  beforeEach(async () => {
    store = await LocalStore.open();
    clock = new ManualClock();
    cache = createCache();
  });

  afterEach(async () => {
    await store.close();
  });

  // ==========================================================================
  // Fetch
  // ==========================================================================

  describe('fetchOrCompute', () => {
    it('should run the loader only on a miss', async () => {
      const loader = vi.fn(async () => ({ title: 'Algebra I' }));

      const first = await cache.fetchOrCompute('courses/algebra', 1, loader);
      const second = await cache.fetchOrCompute('courses/algebra', 1, loader);

      expect(first).toEqual({ title: 'Algebra I' });
      expect(second).toEqual({ title: 'Algebra I' });
      expect(loader).toHaveBeenCalledTimes(1);
      expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, entryCount: 1 });
    });

    it('should size payloads by their JSON length', async () => {
      await cache.fetchOrCompute('k', 0, async () => ({ a: 'é' }));

      // {"a":"é"} is 9 characters, 10 bytes
      expect(cache.stats().totalSize).toBe(10);
    });

    it('should propagate loader failures and cache nothing', async () => {
      const loader = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('backend down'))
        .mockResolvedValueOnce('recovered');

      await expect(cache.fetchOrCompute('k', 0, loader)).rejects.toThrow('backend down');
      expect(cache.has('k')).toBe(false);

      await expect(cache.fetchOrCompute('k', 0, loader)).resolves.toBe('recovered');
      expect(loader).toHaveBeenCalledTimes(2);
    });

    it('should share one loader call between concurrent requests', async () => {
      let release: (value: { items: number[] }) => void = () => undefined;
      const loader = vi.fn(
        () =>
          new Promise<{ items: number[] }>((resolve) => {
            release = resolve;
          })
      );

      const leader = cache.fetchOrCompute('k', 0, loader);
      const follower = cache.fetchOrCompute('k', 0, loader);
      release({ items: [1, 2, 3] });

      expect(await leader).toEqual({ items: [1, 2, 3] });
      expect(await follower).toEqual({ items: [1, 2, 3] });
      expect(loader).toHaveBeenCalledTimes(1);
    });

    it('should reject followers when the shared loader fails', async () => {
      let fail: (error: Error) => void = () => undefined;
      const loader = () =>
        new Promise<string>((_, reject) => {
          fail = reject;
        });

      const leader = cache.fetchOrCompute('k', 0, loader);
      const follower = cache.fetchOrCompute('k', 0, loader);
      fail(new Error('timeout'));

      await expect(leader).rejects.toThrow('timeout');
      await expect(follower).rejects.toThrow('timeout');
    });

    it('should return but not cache a payload larger than capacity', async () => {
      const value = await cache.fetchOrCompute('huge', 0, async () => 'video manifest', { sizeBytes: 101 });

      expect(value).toBe('video manifest');
      expect(cache.has('huge')).toBe(false);
      expect(cache.stats().totalSize).toBe(0);
    });

    it('should reject an entry size that is not a finite byte count', async () => {
      const loader = vi.fn(async () => 'outline');

      for (const sizeBytes of [Number.NaN, -1, Number.POSITIVE_INFINITY]) {
        await expect(cache.fetchOrCompute('k', 0, loader, { sizeBytes })).rejects.toThrow(ValidationError);
      }
      await expect(cache.fetchOrCompute('k', 0, loader, { sizeBytes: Number.NaN })).rejects.toThrow(
        'Invalid cache entry size for k: NaN'
      );

      expect(loader).not.toHaveBeenCalled();
      expect(cache.stats()).toMatchObject({ totalSize: 0, entryCount: 0 });
    });

    it('should refresh and persist the access time on a hit', async () => {
      await put('k', 10);
      clock.advance(500);
      await put('k', 10);

      const entry = store.get<CacheEntry>(SYSTEM_COLLECTIONS.cacheEntries, 'k');
      expect(entry?.lastAccessedAt).toBe(1_000_500);
      expect(entry?.createdAt).toBe(1_000_000);
    });
  });

  // ==========================================================================
  // Eviction
  // ==========================================================================

  describe('eviction', () => {
    it('should evict exactly the least recently accessed entry when full', async () => {
      cache = createCache({ evictionTargetRatio: 1 });
      const evicted: string[] = [];
      cache.on('evict', ({ key }) => evicted.push(key));

      await put('a', 40);
      clock.advance(1);
      await put('b', 40);
      clock.advance(1);
      await put('a', 40); // touch a; b is now least recent
      clock.advance(1);
      await put('c', 40);

      expect(evicted).toEqual(['b']);
      expect(cache.stats().totalSize).toBe(80);

      clock.advance(1);
      await put('d', 40);

      expect(evicted).toEqual(['b', 'a']);
      expect(cache.has('c')).toBe(true);
      expect(cache.has('d')).toBe(true);
      expect(cache.stats()).toMatchObject({ totalSize: 80, entryCount: 2, evictions: 2 });
    });

    it('should free space down to the target ratio once eviction starts', async () => {
      for (const key of ['a', 'b', 'c']) {
        await put(key, 30);
        clock.advance(1);
      }

      await put('d', 30);

      // 90 + 30 > 100, so entries go until the total is at most 80
      expect(cache.has('a')).toBe(false);
      expect(cache.has('b')).toBe(false);
      expect(cache.stats()).toMatchObject({ totalSize: 60, entryCount: 2, evictions: 2 });
    });

    it('should evict lower priorities before older entries', async () => {
      cache = createCache({ evictionTargetRatio: 1 });
      await put('old-important', 50, 5);
      clock.advance(1);
      await put('new-cheap', 40, 0);
      clock.advance(1);

      await put('incoming', 40, 1);

      expect(cache.has('new-cheap')).toBe(false);
      expect(cache.has('old-important')).toBe(true);
    });

    it('should drop expired entries before anything else', async () => {
      const reasons: [string, EvictionReason][] = [];
      cache.on('evict', ({ key, reason }) => reasons.push([key, reason]));

      await put('fresh', 40);
      await cache.fetchOrCompute('short-lived', 9, async () => 'x', { sizeBytes: 40, ttlMs: 1000 });
      clock.advance(1000);

      await put('incoming', 40);

      expect(reasons).toEqual([['short-lived', 'expired']]);
      expect(cache.has('fresh')).toBe(true);
      expect(cache.stats()).toMatchObject({ totalSize: 80, expirations: 1, evictions: 0 });
    });

    it('should never exceed capacity under random load', async () => {
      cache = createCache({ capacity: 200 });
      const random = mulberry32(42);

      for (let i = 0; i < 300; i++) {
        const key = `k${Math.floor(random() * 40)}`;
        const size = 1 + Math.floor(random() * 80);
        const priority = Math.floor(random() * 3);
        clock.advance(1 + Math.floor(random() * 5));

        if (random() < 0.1) {
          cache.invalidate(key);
        } else {
          await put(key, size, priority);
        }

        const persisted = [...store.scan<CacheEntry>(SYSTEM_COLLECTIONS.cacheEntries)];
        const persistedSize = persisted.reduce((sum, entry) => sum + entry.sizeBytes, 0);
        const stats = cache.stats();

        expect(stats.totalSize).toBeLessThanOrEqual(200);
        expect(stats.totalSize).toBe(persistedSize);
        expect(stats.entryCount).toBe(persisted.length);
        expect(store.count(SYSTEM_COLLECTIONS.cachePayloads)).toBe(persisted.length);
      }
    });
  });

  // ==========================================================================
  // Expiry and staleness
  // ==========================================================================

  describe('expiry and staleness', () => {
    it('should treat an expired entry as a miss', async () => {
      const loader = vi.fn(async () => 'catalog');
      await cache.fetchOrCompute('catalog', 0, loader, { ttlMs: 1000 });

      clock.advance(999);
      await cache.fetchOrCompute('catalog', 0, loader, { ttlMs: 1000 });
      expect(loader).toHaveBeenCalledTimes(1);

      clock.advance(1);
      await cache.fetchOrCompute('catalog', 0, loader, { ttlMs: 1000 });
      expect(loader).toHaveBeenCalledTimes(2);
      expect(cache.stats().expirations).toBe(1);
    });

    it('should apply the default TTL', async () => {
      cache = createCache({ defaultTtlMs: 500 });
      await put('k', 10);

      clock.advance(500);
      expect(cache.has('k')).toBe(false);
    });

    it('should sweep expired entries on demand', async () => {
      await cache.fetchOrCompute('a', 0, async () => 1, { ttlMs: 100 });
      await cache.fetchOrCompute('b', 0, async () => 2, { ttlMs: 300 });
      await cache.fetchOrCompute('c', 0, async () => 3);

      clock.advance(200);

      expect(cache.sweepExpired()).toBe(1);
      expect(cache.stats().entryCount).toBe(2);
    });

    it('should recompute once a collection it depends on changes', async () => {
      const loader = vi.fn(async () => [...store.scan('courses')].length);
      store.put('courses', 'c1', { title: 'A' });

      expect(await cache.fetchOrCompute('course-count', 0, loader, { dependsOn: ['courses'] })).toBe(1);
      expect(await cache.fetchOrCompute('course-count', 0, loader, { dependsOn: ['courses'] })).toBe(1);

      store.put('courses', 'c2', { title: 'B' });

      expect(await cache.fetchOrCompute('course-count', 0, loader, { dependsOn: ['courses'] })).toBe(2);
      expect(loader).toHaveBeenCalledTimes(2);
    });

    it('should ignore changes to unrelated collections', async () => {
      const loader = vi.fn(async () => 'value');
      await cache.fetchOrCompute('k', 0, loader, { dependsOn: ['courses'] });

      store.put('lessons', 'l1', { title: 'Intro' });
      await cache.fetchOrCompute('k', 0, loader, { dependsOn: ['courses'] });

      expect(loader).toHaveBeenCalledTimes(1);
    });
  });

  // ==========================================================================
  // Invalidation and persistence
  // ==========================================================================

  describe('invalidation', () => {
    it('should drop every key with the prefix', async () => {
      await put('courses/a', 1);
      await put('courses/a/lessons', 1);
      await put('courses/b', 1);

      expect(cache.invalidate('courses/a')).toBe(2);
      expect(cache.has('courses/b')).toBe(true);
      expect(cache.stats().entryCount).toBe(1);
    });

    it('should drop one entity and its nested keys only', async () => {
      await put('courses/1', 1);
      await put('courses/1/outline', 1);
      await put('courses/10', 1);

      expect(cache.invalidateEntity('courses/1')).toBe(2);
      expect(cache.has('courses/10')).toBe(true);
      expect(cache.stats().entryCount).toBe(1);
    });

    it('should not cache a load invalidated while it runs', async () => {
      let release: (value: string) => void = () => undefined;
      const running = cache.fetchOrCompute(
        'courses/c1/summary',
        0,
        () =>
          new Promise<string>((resolve) => {
            release = resolve;
          })
      );

      expect(cache.invalidate('courses/c1')).toBe(0);
      release('old summary');

      expect(await running).toBe('old summary');
      expect(cache.has('courses/c1/summary')).toBe(false);

      const loader = vi.fn(async () => 'new summary');
      expect(await cache.fetchOrCompute('courses/c1/summary', 0, loader)).toBe('new summary');
      expect(loader).toHaveBeenCalledTimes(1);
    });

    it('should start a fresh load for requests made after an invalidation', async () => {
      const releases: ((value: string) => void)[] = [];
      const loader = () =>
        new Promise<string>((resolve) => {
          releases.push(resolve);
        });

      const before = cache.fetchOrCompute('courses/c1', 0, loader);
      cache.invalidate('courses');
      const after = cache.fetchOrCompute('courses/c1', 0, loader);
      releases[0]('old');
      releases[1]('new');

      expect(await before).toBe('old');
      expect(await after).toBe('new');
      expect(await cache.fetchOrCompute('courses/c1', 0, loader)).toBe('new');
      expect(releases).toHaveLength(2);
    });

    it('should clear everything', async () => {
      await put('a', 1);
      await put('b', 1);
      cache.clear();

      expect(cache.stats()).toMatchObject({ entryCount: 0, totalSize: 0 });
      expect(store.count(SYSTEM_COLLECTIONS.cachePayloads)).toBe(0);
    });

    it('should serve persisted entries after a reload', async () => {
      await cache.fetchOrCompute('courses/a', 0, async () => ({ title: 'Algebra' }));

      const reloaded = createCache();
      const loader = vi.fn(async () => ({ title: 'other' }));

      expect(await reloaded.fetchOrCompute('courses/a', 0, loader)).toEqual({ title: 'Algebra' });
      expect(loader).not.toHaveBeenCalled();
      expect(reloaded.stats().totalSize).toBe(cache.stats().totalSize);
    });

    it('should reset counters', async () => {
      await put('a', 1);
      await put('a', 1);
      cache.resetStats();

      expect(cache.stats()).toMatchObject({ hits: 0, misses: 0, evictions: 0, expirations: 0, entryCount: 1 });
    });
  });
});
