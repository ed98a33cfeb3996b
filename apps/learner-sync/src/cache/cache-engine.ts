/**
 * Cache Eviction Engine
 *
 * Size-bounded cache of derived payloads (course listings, lesson indexes,
 * rendered summaries) kept in the local store so it survives restarts.
 *
 * Features:
 * - Compute-on-miss with single-flight loaders
 * - Priority-aware LRU eviction down to a target fill ratio
 * - TTL expiry with on-demand and periodic sweeps
 * - Staleness tracking against local store collection revisions
 * - Statistics tracking
 */

import type { CacheEntry, CacheStats } from '@courseline/shared-types';
import { SYSTEM_COLLECTIONS, type LocalStore, type StoreOp } from '../store/local-store';
import { ValidationError } from '../errors';
import { TypedEventEmitter } from '../utils/typed-emitter';
import { systemClock, type Clock } from '../utils/clock';

// ============================================================================
// Types
// ============================================================================

export interface CacheEngineConfig {
  /** Maximum total payload size in bytes */
  capacity: number;
  /** Once eviction starts, fill is brought down to this share of capacity */
  evictionTargetRatio: number;
  /** Default TTL in milliseconds (0 = no expiry) */
  defaultTtlMs: number;
  now: Clock;
}

export const DEFAULT_CACHE_CONFIG: CacheEngineConfig = {
  capacity: 50 * 1024 * 1024, // 50MB
  evictionTargetRatio: 0.8,
  defaultTtlMs: 0,
  now: systemClock,
};

export interface FetchOptions {
  /** Overrides the default TTL; 0 = no expiry */
  ttlMs?: number;
  /** Collections whose changes make the payload stale */
  dependsOn?: string[];
  /** Explicit size; defaults to the UTF-8 length of the JSON payload */
  sizeBytes?: number;
}

export type EvictionReason = 'capacity' | 'expired' | 'stale' | 'invalidated';

export interface CacheEngineEvents {
  evict: { key: string; sizeBytes: number; reason: EvictionReason };
}

interface StoredPayload<T> {
  value: T;
}

/** A loader still running; invalidation while it runs keeps its result out of the cache */
interface InflightLoad {
  encoded: Promise<string>;
  invalidated: boolean;
}

const ENTRIES = SYSTEM_COLLECTIONS.cacheEntries;
const PAYLOADS = SYSTEM_COLLECTIONS.cachePayloads;

// ============================================================================
// Cache Engine
// ============================================================================

export class CacheEngine {
  private readonly config: CacheEngineConfig;
  private readonly store: LocalStore;
  private readonly events = new TypedEventEmitter<CacheEngineEvents>('CacheEngine');
  private readonly entries: Map<string, CacheEntry> = new Map();
  private readonly inflight: Map<string, InflightLoad> = new Map();

  private currentSize = 0;
  private nextSeq = 1;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  // Statistics
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(store: LocalStore, config: Partial<CacheEngineConfig> = {}) {
    this.store = store;
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };

    for (const entry of store.scan<CacheEntry>(ENTRIES)) {
      this.entries.set(entry.key, entry);
      this.currentSize += entry.sizeBytes;
      this.nextSeq = Math.max(this.nextSeq, entry.seq + 1);
    }
  }

  // ==========================================================================
  // Core Operations
  // ==========================================================================

  /**
   * Return the cached payload for `key`, running `loader` on a miss.
   * Loader errors propagate and nothing is cached.
   */
  async fetchOrCompute<T>(
    key: string,
    priority: number,
    loader: () => Promise<T>,
    options: FetchOptions = {}
  ): Promise<T> {
    const cached = this.lookup<T>(key);
    if (cached) {
      this.hits++;
      return cached.value;
    }

    const running = this.inflight.get(key);
    if (running) {
      const value: T = JSON.parse(await running.encoded);
      return value;
    }

    if (options.sizeBytes !== undefined && !(Number.isFinite(options.sizeBytes) && options.sizeBytes >= 0)) {
      throw new ValidationError(`Invalid cache entry size for ${key}: ${options.sizeBytes}`, [
        { path: ['sizeBytes'], message: 'Expected a finite number of bytes >= 0', code: 'invalid_size' },
      ]);
    }

    this.misses++;
    // Capture revisions before loading so writes made meanwhile count as newer
    const dependsOn = this.captureRevisions(options.dependsOn ?? []);

    let resolveEncoded: (encoded: string) => void = () => undefined;
    let rejectEncoded: (error: unknown) => void = () => undefined;
    const encodedPromise = new Promise<string>((resolve, reject) => {
      resolveEncoded = resolve;
      rejectEncoded = reject;
    });
    // Followers attach their own handlers; this keeps a leader-only failure from going unhandled
    encodedPromise.catch(() => undefined);
    const load: InflightLoad = { encoded: encodedPromise, invalidated: false };
    this.inflight.set(key, load);

    try {
      const value = await loader();
      const encoded = JSON.stringify(value);
      if (encoded === undefined) {
        console.warn(`[CacheEngine] Loader for ${key} returned a value that cannot be cached`);
        rejectEncoded(new TypeError(`Uncacheable payload for ${key}`));
        return value;
      }

      if (!load.invalidated) {
        const sizeBytes = options.sizeBytes ?? Buffer.byteLength(encoded, 'utf8');
        this.insert(key, value, sizeBytes, priority, options.ttlMs ?? this.config.defaultTtlMs, dependsOn);
      }
      resolveEncoded(encoded);
      return value;
    } catch (error) {
      rejectEncoded(error);
      throw error;
    } finally {
      if (this.inflight.get(key) === load) {
        this.inflight.delete(key);
      }
    }
  }

  /**
   * Drop every entry whose key starts with `keyPrefix`. Loads still running
   * for matching keys finish for their callers but are not cached.
   * @returns Number of entries removed
   */
  invalidate(keyPrefix: string): number {
    return this.invalidateWhere((key) => key.startsWith(keyPrefix));
  }

  /**
   * Drop the entry for `key` and every entry nested under `key/`
   * @returns Number of entries removed
   */
  invalidateEntity(key: string): number {
    const nested = `${key}/`;
    return this.invalidateWhere((candidate) => candidate === key || candidate.startsWith(nested));
  }

  /**
   * Remove expired entries
   * @returns Number of entries removed
   */
  sweepExpired(): number {
    const now = this.config.now();
    const expired = [...this.entries.values()]
      .filter((entry) => this.isExpired(entry, now))
      .map((entry) => entry.key);

    this.removeEntries(expired, 'expired');
    return expired.length;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry, this.config.now());
  }

  clear(): void {
    this.invalidateWhere(() => true);
  }

  stats(): CacheStats {
    return {
      totalSize: this.currentSize,
      entryCount: this.entries.size,
      capacity: this.config.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.expirations = 0;
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Sweep expired entries every `intervalMs`
   */
  startMaintenance(intervalMs: number): void {
    this.stopMaintenance();
    if (intervalMs <= 0) return;

    this.sweepTimer = setInterval(() => {
      try {
        this.sweepExpired();
      } catch (error) {
        console.error('[CacheEngine] Expiry sweep failed:', error);
      }
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopMaintenance(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  // ==========================================================================
  // Event System
  // ==========================================================================

  on<K extends keyof CacheEngineEvents>(
    event: K,
    listener: (data: CacheEngineEvents[K]) => void
  ): () => void {
    return this.events.on(event, listener);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Valid cached payload for `key`, refreshing its access time
   */
  private lookup<T>(key: string): StoredPayload<T> | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    const now = this.config.now();
    if (this.isExpired(entry, now)) {
      this.removeEntries([key], 'expired');
      return null;
    }
    if (this.isStale(entry)) {
      this.removeEntries([key], 'stale');
      return null;
    }

    const payload = this.store.get<StoredPayload<T>>(PAYLOADS, entry.payloadRef);
    if (!payload) {
      // Payload row was quarantined
      this.removeEntries([key], 'invalidated');
      return null;
    }

    const touched: CacheEntry = { ...entry, lastAccessedAt: now };
    this.entries.set(key, touched);
    this.store.put(ENTRIES, key, touched);
    return payload;
  }

  private insert(
    key: string,
    value: unknown,
    sizeBytes: number,
    priority: number,
    ttlMs: number,
    dependsOn: Record<string, number>
  ): void {
    const ops: StoreOp[] = [];

    // A replaced entry no longer counts toward the total
    const previous = this.entries.get(key);
    if (previous) {
      this.entries.delete(key);
      this.currentSize -= previous.sizeBytes;
      ops.push({ type: 'delete', collection: ENTRIES, id: key });
      ops.push({ type: 'delete', collection: PAYLOADS, id: previous.payloadRef });
    }

    if (sizeBytes > this.config.capacity) {
      console.warn(
        `[CacheEngine] Payload for ${key} (${sizeBytes} bytes) exceeds capacity ${this.config.capacity}, not cached`
      );
      this.store.transact(ops);
      return;
    }

    const evicted = this.selectEvictions(sizeBytes);
    for (const victim of evicted) {
      ops.push({ type: 'delete', collection: ENTRIES, id: victim.entry.key });
      ops.push({ type: 'delete', collection: PAYLOADS, id: victim.entry.payloadRef });
    }

    const now = this.config.now();
    const entry: CacheEntry = {
      key,
      payloadRef: key,
      sizeBytes,
      priority,
      lastAccessedAt: now,
      expiresAt: ttlMs > 0 ? now + ttlMs : null,
      createdAt: now,
      seq: this.nextSeq++,
      dependsOn,
    };
    ops.push({ type: 'put', collection: PAYLOADS, id: entry.payloadRef, value: { value } });
    ops.push({ type: 'put', collection: ENTRIES, id: key, value: entry });

    this.store.transact(ops);

    for (const victim of evicted) {
      this.forget(victim.entry, victim.reason);
    }
    this.entries.set(key, entry);
    this.currentSize += sizeBytes;
  }

  /**
   * Entries to drop so that `incoming` bytes fit. Nothing is evicted while
   * the insert fits; once over capacity, expired entries go first, then the
   * lowest-priority, least recently used ones until the target ratio is met.
   */
  private selectEvictions(incoming: number): { entry: CacheEntry; reason: EvictionReason }[] {
    if (this.currentSize + incoming <= this.config.capacity) return [];

    const now = this.config.now();
    const target = this.config.capacity * this.config.evictionTargetRatio;
    const selected: { entry: CacheEntry; reason: EvictionReason }[] = [];
    let remaining = this.currentSize;

    const candidates: CacheEntry[] = [];
    for (const entry of this.entries.values()) {
      if (this.isExpired(entry, now)) {
        selected.push({ entry, reason: 'expired' });
        remaining -= entry.sizeBytes;
      } else {
        candidates.push(entry);
      }
    }

    candidates.sort(
      (a, b) => a.priority - b.priority || a.lastAccessedAt - b.lastAccessedAt || a.seq - b.seq
    );

    for (const entry of candidates) {
      if (remaining + incoming <= target) break;
      selected.push({ entry, reason: 'capacity' });
      remaining -= entry.sizeBytes;
    }

    return selected;
  }

  private invalidateWhere(matches: (key: string) => boolean): number {
    for (const [key, load] of this.inflight) {
      if (!matches(key)) continue;
      load.invalidated = true;
      this.inflight.delete(key);
    }

    const keys = [...this.entries.keys()].filter(matches);
    this.removeEntries(keys, 'invalidated');
    return keys.length;
  }

  private removeEntries(keys: string[], reason: EvictionReason): void {
    const removed: CacheEntry[] = [];
    const ops: StoreOp[] = [];
    for (const key of keys) {
      const entry = this.entries.get(key);
      if (!entry) continue;
      removed.push(entry);
      ops.push({ type: 'delete', collection: ENTRIES, id: key });
      ops.push({ type: 'delete', collection: PAYLOADS, id: entry.payloadRef });
    }
    if (removed.length === 0) return;

    this.store.transact(ops);
    for (const entry of removed) {
      this.forget(entry, reason);
    }
  }

  private forget(entry: CacheEntry, reason: EvictionReason): void {
    this.entries.delete(entry.key);
    this.currentSize -= entry.sizeBytes;
    if (reason === 'expired') this.expirations++;
    if (reason === 'capacity') this.evictions++;
    this.events.emit('evict', { key: entry.key, sizeBytes: entry.sizeBytes, reason });
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return entry.expiresAt !== null && now >= entry.expiresAt;
  }

  private isStale(entry: CacheEntry): boolean {
    return Object.entries(entry.dependsOn).some(
      ([collection, revision]) => this.store.collectionRevision(collection) !== revision
    );
  }

  private captureRevisions(collections: string[]): Record<string, number> {
    const revisions: Record<string, number> = {};
    for (const collection of collections) {
      revisions[collection] = this.store.collectionRevision(collection);
    }
    return revisions;
  }
}
