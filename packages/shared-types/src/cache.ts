/**
 * Cache entry metadata
 */

export interface CacheEntry {
  key: string;
  /** Id of the payload row in the local store */
  payloadRef: string;
  sizeBytes: number;
  /** Lower priorities are evicted first */
  priority: number;
  lastAccessedAt: number;
  expiresAt: number | null;
  createdAt: number;
  /** Insertion order, breaks eviction ties */
  seq: number;
  /** Store revision per collection at compute time */
  dependsOn: Record<string, number>;
}

export interface CacheStats {
  totalSize: number;
  entryCount: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
}
