/**
 * Local Store
 *
 * Durable, typed key-value persistence for entity records and the engine's
 * own tables (actions, downloads, cache entries, sync cursors). Backed by an
 * in-memory SQLite database (sql.js) that is snapshotted to disk.
 *
 * Features:
 * - get/put/delete by (collection, id)
 * - Lazy paged scans in insertion order
 * - Atomic multi-record transactions
 * - Monotonic store and per-collection revision counters
 * - Quarantine of records that fail to decode
 * - Debounced, atomic snapshot to disk (write temp file, then rename)
 */

import type { BindParams, Database, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import { loadSqlJs } from './sql-loader';
import * as queries from './queries';
import { CorruptLocalStateError, errorMessage } from '../errors';
import { TypedEventEmitter } from '../utils/typed-emitter';

// ============================================================================
// Types
// ============================================================================

export type StoreOp =
  | { type: 'put'; collection: string; id: string; value: unknown }
  | { type: 'delete'; collection: string; id: string };

/**
 * Validates a decoded record. Returning false quarantines it.
 */
export type RecordDecoder = (value: unknown) => boolean;

export interface StoreChange {
  collection: string;
  id: string;
  type: 'put' | 'delete';
  revision: number;
}

export interface QuarantinedRecord {
  collection: string;
  id: string;
  raw: string;
  reason: string;
  quarantinedAt: number;
}

export interface LocalStoreEvents {
  change: StoreChange;
  corrupt: CorruptLocalStateError;
}

/**
 * The snapshot file was unreadable and the store started empty
 */
export interface StoreResetInfo {
  reason: string;
  movedTo: string;
}

export interface LocalStoreConfig {
  /** Snapshot file; omit for a memory-only store */
  filePath: string | null;
  /** Debounce between a mutation and the snapshot write */
  persistDelayMs: number;
  /** Rows fetched per scan page */
  scanPageSize: number;
  /** Per-collection record validators */
  decoders: Record<string, RecordDecoder>;
}

export const DEFAULT_STORE_CONFIG: LocalStoreConfig = {
  filePath: null,
  persistDelayMs: 50,
  scanPageSize: 100,
  decoders: {},
};

/**
 * Collections reserved for engine tables
 */
export const SYSTEM_COLLECTIONS = {
  actions: '_actions',
  downloads: '_downloads',
  cacheEntries: '_cache_entries',
  cachePayloads: '_cache_payloads',
  cursors: '_cursors',
} as const;

// ============================================================================
// Local Store
// ============================================================================

export class LocalStore {
  private readonly config: LocalStoreConfig;
  private readonly db: Database;
  private readonly events = new TypedEventEmitter<LocalStoreEvents>('LocalStore');
  private readonly decoders: Map<string, RecordDecoder>;

  private globalRevision = 0;
  private collectionRevisions: Map<string, number> = new Map();
  private inTransaction = false;
  private closed = false;

  private persistTimer: ReturnType<typeof setTimeout> | null = null;
  private persistChain: Promise<void> = Promise.resolve();
  private pendingPersist = false;

  private constructor(db: Database, config: LocalStoreConfig) {
    this.db = db;
    this.config = config;
    this.decoders = new Map(Object.entries(config.decoders));
  }

  // ==========================================================================
  // Initialization
  // ==========================================================================

  /**
   * Open (or create) a store. An unreadable snapshot file is moved aside,
   * the store starts empty and {@link LocalStore.resetInfo} says so.
   */
  static async open(config: Partial<LocalStoreConfig> = {}): Promise<LocalStore> {
    const resolved: LocalStoreConfig = { ...DEFAULT_STORE_CONFIG, ...config };
    const SQL = await loadSqlJs();

    let reset: StoreResetInfo | null = null;
    let db: Database | null = null;

    if (resolved.filePath && fs.existsSync(resolved.filePath)) {
      const buffer = await fs.promises.readFile(resolved.filePath);
      try {
        db = new SQL.Database(new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength));
        db.exec(queries.SCHEMA);
      } catch (error) {
        db?.close();
        db = null;
        const movedTo = `${resolved.filePath}.corrupt-${Date.now()}`;
        await fs.promises.rename(resolved.filePath, movedTo);
        reset = { reason: errorMessage(error), movedTo };
        console.error(
          `[LocalStore] Unreadable database ${resolved.filePath}, moved to ${movedTo}:`,
          error
        );
      }
    }

    if (!db) {
      db = new SQL.Database();
      db.exec(queries.SCHEMA);
    }

    const store = new LocalStore(db, resolved);
    store.loadRevisions();
    store.resetInfo = reset;
    if (reset) {
      store.schedulePersist();
    }
    return store;
  }

  /**
   * Set when {@link LocalStore.open} had to discard an unreadable snapshot
   */
  resetInfo: StoreResetInfo | null = null;

  private loadRevisions(): void {
    for (const [collection, revision] of this.rows(queries.SELECT_REVISIONS)) {
      if (typeof collection !== 'string' || typeof revision !== 'number') continue;
      if (collection === queries.GLOBAL_REVISION_KEY) {
        this.globalRevision = revision;
      } else {
        this.collectionRevisions.set(collection, revision);
      }
    }
  }

  // ==========================================================================
  // Core Operations
  // ==========================================================================

  /**
   * Read a record. Returns null when absent or quarantined.
   */
  get<T>(collection: string, id: string): T | null {
    this.assertOpen();
    const [row] = this.rows(queries.SELECT_RECORD, [collection, id]);
    if (!row) return null;

    const raw = row[0];
    if (typeof raw !== 'string') {
      this.quarantine(collection, id, String(raw), 'data column is not text');
      return null;
    }
    return this.decode<T>(collection, id, raw);
  }

  has(collection: string, id: string): boolean {
    this.assertOpen();
    return this.rows(queries.SELECT_RECORD, [collection, id]).length > 0;
  }

  put<T>(collection: string, id: string, value: T): void {
    this.transact([{ type: 'put', collection, id, value }]);
  }

  /**
   * @returns Whether a record was removed
   */
  delete(collection: string, id: string): boolean {
    return this.transact([{ type: 'delete', collection, id }]).length > 0;
  }

  /**
   * Apply all operations or none of them.
   * @returns The changes that took effect
   */
  transact(ops: StoreOp[]): StoreChange[] {
    this.assertOpen();
    if (this.inTransaction) {
      throw new Error('Nested transactions are not supported');
    }
    if (ops.length === 0) return [];

    const changes: StoreChange[] = [];
    const stagedCollections = new Map(this.collectionRevisions);
    let stagedGlobal = this.globalRevision;

    this.inTransaction = true;
    this.db.run('BEGIN');
    try {
      for (const op of ops) {
        if (op.type === 'put') {
          const encoded = JSON.stringify(op.value);
          if (encoded === undefined) {
            throw new TypeError(`Cannot store undefined at ${op.collection}/${op.id}`);
          }
          stagedGlobal++;
          this.db.run(queries.UPSERT_RECORD, [op.collection, op.id, encoded, stagedGlobal]);
        } else {
          this.db.run(queries.DELETE_RECORD, [op.collection, op.id]);
          if (this.db.getRowsModified() === 0) continue;
          stagedGlobal++;
        }

        stagedCollections.set(op.collection, (stagedCollections.get(op.collection) ?? 0) + 1);
        changes.push({
          collection: op.collection,
          id: op.id,
          type: op.type,
          revision: stagedGlobal,
        });
      }

      if (changes.length > 0) {
        this.db.run(queries.UPSERT_REVISION, [queries.GLOBAL_REVISION_KEY, stagedGlobal]);
        for (const collection of new Set(changes.map((c) => c.collection))) {
          this.db.run(queries.UPSERT_REVISION, [collection, stagedCollections.get(collection) ?? 0]);
        }
      }

      this.db.run('COMMIT');
    } catch (error) {
      this.db.run('ROLLBACK');
      throw error;
    } finally {
      this.inTransaction = false;
    }

    if (changes.length === 0) return changes;

    this.globalRevision = stagedGlobal;
    this.collectionRevisions = stagedCollections;
    this.schedulePersist();

    for (const change of changes) {
      this.events.emit('change', change);
    }
    return changes;
  }

  /**
   * Lazily iterate a collection in insertion order. Rows are fetched a page
   * at a time; records failing to decode are quarantined and skipped.
   */
  *scan<T>(collection: string, predicate?: (record: T) => boolean): Generator<T> {
    let lastRowId = 0;

    while (true) {
      this.assertOpen();
      const page = this.rows(queries.SCAN_PAGE, [collection, lastRowId, this.config.scanPageSize]);
      if (page.length === 0) return;

      for (const [rowId, id, raw] of page) {
        if (typeof rowId === 'number') lastRowId = rowId;
        if (typeof id !== 'string') continue;
        if (typeof raw !== 'string') {
          this.quarantine(collection, id, String(raw), 'data column is not text');
          continue;
        }
        const value = this.decode<T>(collection, id, raw);
        if (value === null) continue;
        if (!predicate || predicate(value)) {
          yield value;
        }
      }

      if (page.length < this.config.scanPageSize) return;
    }
  }

  count(collection: string): number {
    this.assertOpen();
    const [row] = this.rows(queries.COUNT_RECORDS, [collection]);
    const value = row?.[0];
    return typeof value === 'number' ? value : 0;
  }

  // ==========================================================================
  // Revisions
  // ==========================================================================

  /**
   * Store-wide revision; increases with every successful put/delete
   */
  get revision(): number {
    return this.globalRevision;
  }

  collectionRevision(collection: string): number {
    return this.collectionRevisions.get(collection) ?? 0;
  }

  // ==========================================================================
  // Corruption handling
  // ==========================================================================

  registerDecoder(collection: string, decoder: RecordDecoder): void {
    this.decoders.set(collection, decoder);
  }

  listQuarantined(): QuarantinedRecord[] {
    this.assertOpen();
    return this.rows(queries.SELECT_QUARANTINE).map(([collection, id, raw, reason, at]) => ({
      collection: String(collection),
      id: String(id),
      raw: String(raw),
      reason: String(reason),
      quarantinedAt: Number(at),
    }));
  }

  private decode<T>(collection: string, id: string, raw: string): T | null {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      this.quarantine(collection, id, raw, `invalid JSON: ${errorMessage(error)}`);
      return null;
    }

    const decoder = this.decoders.get(collection);
    if (decoder && !decoder(value)) {
      this.quarantine(collection, id, raw, 'rejected by decoder');
      return null;
    }
    return value as T;
  }

  /**
   * Move a record out of its collection so it stops failing reads
   */
  private quarantine(collection: string, id: string, raw: string, reason: string): void {
    const error = new CorruptLocalStateError(collection, id, reason);
    console.warn(`[LocalStore] Quarantining ${collection}/${id}: ${reason}`);

    this.db.run('BEGIN');
    try {
      this.db.run(queries.INSERT_QUARANTINE, [collection, id, raw, reason, Date.now()]);
      this.db.run(queries.DELETE_RECORD, [collection, id]);
      this.db.run('COMMIT');
    } catch (txError) {
      this.db.run('ROLLBACK');
      throw txError;
    }
    this.schedulePersist();

    this.events.emit('corrupt', error);
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  /**
   * Bytes used by the database
   */
  sizeBytes(): number {
    this.assertOpen();
    const [pageCount] = this.rows('PRAGMA page_count');
    const [pageSize] = this.rows('PRAGMA page_size');
    return Number(pageCount?.[0] ?? 0) * Number(pageSize?.[0] ?? 0);
  }

  /**
   * Write the current snapshot to disk now
   */
  flush(): Promise<void> {
    if (this.persistTimer) {
      clearTimeout(this.persistTimer);
      this.persistTimer = null;
    }
    if (!this.config.filePath || !this.pendingPersist || this.closed) {
      return this.persistChain;
    }

    this.pendingPersist = false;
    const filePath = this.config.filePath;
    // export() must run outside a transaction; transact() is synchronous so none is open here
    const snapshot = this.db.export();

    const run = this.persistChain.then(async () => {
      const tmpPath = `${filePath}.tmp`;
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, snapshot);
      await fs.promises.rename(tmpPath, filePath);
    });
    // The caller gets the failure through `run`; later writes still queue up
    this.persistChain = run.catch(() => undefined);
    return run;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
    this.db.close();
    this.events.removeAllListeners();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private schedulePersist(): void {
    if (!this.config.filePath) return;
    this.pendingPersist = true;
    if (this.persistTimer) return;

    this.persistTimer = setTimeout(() => {
      this.persistTimer = null;
      this.flush().catch((error) => {
        // Keep the snapshot pending so the next mutation or flush retries it
        this.pendingPersist = true;
        console.error('[LocalStore] Failed to persist snapshot:', error);
      });
    }, this.config.persistDelayMs);
    this.persistTimer.unref();
  }

  // ==========================================================================
  // Event System
  // ==========================================================================

  on<K extends keyof LocalStoreEvents>(
    event: K,
    listener: (data: LocalStoreEvents[K]) => void
  ): () => void {
    return this.events.on(event, listener);
  }

  // ==========================================================================
  // Utilities
  // ==========================================================================

  private rows(sql: string, params?: BindParams): SqlValue[][] {
    const stmt = this.db.prepare(sql);
    try {
      if (params) stmt.bind(params);
      const result: SqlValue[][] = [];
      while (stmt.step()) {
        result.push(stmt.get());
      }
      return result;
    } finally {
      stmt.free();
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Local store is closed');
    }
  }
}
