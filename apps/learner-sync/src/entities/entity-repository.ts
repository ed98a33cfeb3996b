/**
 * Entity Repository
 *
 * Read model over entity records in the local store, plus the store
 * operations that change them (optimistic local edits, pulled remote
 * records, push confirmations).
 */

import { readable, type Readable } from 'svelte/store';
import type {
  EntityRecord,
  EntityView,
  NewOfflineAction,
  RemoteRecord,
} from '@courseline/shared-types';
import type { LocalStore, StoreOp } from '../store/local-store';
import { ValidationError } from '../errors';
import { ConflictResolver, DELETED_GROUP } from '../sync/conflict-resolver';
import { parseEntityKey, type EntityKey } from '../utils/keys';
import { systemClock, type Clock } from '../utils/clock';

export interface EntityRepositoryConfig {
  /** Records last synced longer ago read as stale; 0 = only never-synced ones */
  staleAfterMs: number;
  now: Clock;
}

export const DEFAULT_REPOSITORY_CONFIG: EntityRepositoryConfig = {
  staleAfterMs: 24 * 60 * 60 * 1000,
  now: systemClock,
};

export class EntityRepository {
  private readonly config: EntityRepositoryConfig;

  constructor(
    private readonly store: LocalStore,
    private readonly resolver: ConflictResolver,
    config: Partial<EntityRepositoryConfig> = {}
  ) {
    this.config = { ...DEFAULT_REPOSITORY_CONFIG, ...config };
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Stored record including tombstones
   */
  getRecord<T = Record<string, unknown>>(collection: string, id: string): EntityRecord<T> | null {
    return this.store.get<EntityRecord<T>>(collection, id);
  }

  read<T = Record<string, unknown>>(collection: string, id: string): EntityView<T> | null {
    const record = this.getRecord<T>(collection, id);
    if (!record || record.deleted) return null;
    return this.toView(record);
  }

  list<T = Record<string, unknown>>(collection: string): EntityView<T>[] {
    const views: EntityView<T>[] = [];
    for (const record of this.store.scan<EntityRecord<T>>(collection, (r) => !r.deleted)) {
      views.push(this.toView(record));
    }
    return views;
  }

  /**
   * Live view of one entity; updates whenever the record changes
   */
  watch<T = Record<string, unknown>>(collection: string, id: string): Readable<EntityView<T> | null> {
    return readable<EntityView<T> | null>(this.read<T>(collection, id), (set) => {
      set(this.read<T>(collection, id));

      return this.store.on('change', (change) => {
        if (change.collection === collection && change.id === id) {
          set(this.read<T>(collection, id));
        }
      });
    });
  }

  // ==========================================================================
  // Write operations
  // ==========================================================================

  /**
   * The optimistic local change an action describes, as store operations.
   * Commit them together with the queued action.
   */
  localChangeOps(action: NewOfflineAction): StoreOp[] {
    const { collection, id } = requireKey(action.targetKey);
    const now = this.config.now();
    const existing = this.getRecord(collection, id);
    const payload = action.payload ?? {};

    let record: EntityRecord;
    switch (action.kind) {
      case 'create':
      case 'update': {
        const base = action.kind === 'update' && existing && !existing.deleted ? existing.data : {};
        const touched = this.resolver.groupsOf(collection, Object.keys(payload));
        const groupUpdatedAt = { ...(existing?.groupUpdatedAt ?? {}) };
        delete groupUpdatedAt[DELETED_GROUP];
        for (const group of touched) {
          groupUpdatedAt[group] = now;
        }
        record = {
          collection,
          id,
          data: { ...base, ...payload },
          updatedAt: existing?.updatedAt ?? 0,
          lastSyncedAt: existing?.lastSyncedAt ?? null,
          dirty: true,
          deleted: false,
          groupUpdatedAt,
          ...(existing?.offline ? { offline: existing.offline } : {}),
        };
        break;
      }
      case 'delete':
        record = {
          collection,
          id,
          data: existing?.data ?? {},
          updatedAt: existing?.updatedAt ?? 0,
          lastSyncedAt: existing?.lastSyncedAt ?? null,
          dirty: true,
          deleted: true,
          groupUpdatedAt: { ...(existing?.groupUpdatedAt ?? {}), [DELETED_GROUP]: now },
          ...(existing?.offline ? { offline: existing.offline } : {}),
        };
        break;
    }

    return [{ type: 'put', collection, id, value: record }];
  }

  /**
   * Merge a pulled record into the local copy
   * @returns The operation to commit (null when nothing changes) and whether local edits conflicted
   */
  remoteMergeOp(collection: string, remote: RemoteRecord): { op: StoreOp | null; conflict: boolean } {
    const local = this.getRecord(collection, remote.id);
    const outcome = this.resolver.mergeRemote(collection, local, remote, this.config.now());

    if (outcome.record === null) {
      return {
        op: local ? { type: 'delete', collection, id: remote.id } : null,
        conflict: outcome.conflict,
      };
    }
    return {
      op: { type: 'put', collection, id: remote.id, value: outcome.record },
      conflict: outcome.conflict,
    };
  }

  /**
   * Mark an entity as matching the remote store once nothing for it is left
   * to push. Confirmed tombstones are removed.
   */
  markSyncedOps(targetKey: string, serverUpdatedAt: number): StoreOp[] {
    const key = parseEntityKey(targetKey);
    if (!key) return [];
    const record = this.getRecord(key.collection, key.id);
    if (!record) return [];

    if (record.deleted) {
      return [{ type: 'delete', collection: key.collection, id: key.id }];
    }

    const synced: EntityRecord = {
      ...record,
      dirty: false,
      groupUpdatedAt: {},
      lastSyncedAt: this.config.now(),
      updatedAt: Math.max(record.updatedAt, serverUpdatedAt),
    };
    return [{ type: 'put', collection: key.collection, id: key.id, value: synced }];
  }

  // ==========================================================================
  // Utilities
  // ==========================================================================

  private toView<T>(record: EntityRecord<T>): EntityView<T> {
    const now = this.config.now();
    const stale =
      record.lastSyncedAt === null ||
      (this.config.staleAfterMs > 0 && now - record.lastSyncedAt > this.config.staleAfterMs);

    return {
      collection: record.collection,
      id: record.id,
      data: record.data,
      dirty: record.dirty,
      stale,
      lastSyncedAt: record.lastSyncedAt,
      availableOffline: record.offline !== undefined,
      localPath: record.offline?.localPath ?? null,
    };
  }
}

function requireKey(targetKey: string): EntityKey {
  const key = parseEntityKey(targetKey);
  if (!key) {
    throw new ValidationError(`Invalid target key: ${targetKey}`, [
      { path: ['targetKey'], message: 'Expected collection/id', code: 'invalid_key' },
    ]);
  }
  return key;
}
