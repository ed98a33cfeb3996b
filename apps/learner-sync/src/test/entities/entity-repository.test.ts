/**
 * Entity Repository Tests
 *
 * @see src/entities/entity-repository.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { get } from 'svelte/store';
import type { EntityRecord, EntityView } from '@courseline/shared-types';
import { LocalStore, type StoreOp } from '../../store/local-store';
import { EntityRepository } from '../../entities/entity-repository';
import { ConflictResolver, DELETED_GROUP } from '../../sync/conflict-resolver';
import { ValidationError } from '../../errors';
import { ManualClock } from '../harness';

const HOUR = 60 * 60 * 1000;

const createRecord = (overrides: Partial<EntityRecord> = {}): EntityRecord => ({
  collection: 'progress',
  id: 'l1',
  data: { percent: 20, stars: 4 },
  updatedAt: 900_000,
  lastSyncedAt: 900_000,
  dirty: false,
  deleted: false,
  groupUpdatedAt: {},
  ...overrides,
});

describe('EntityRepository', () => {
  let store: LocalStore;
  let clock: ManualClock;
  let repository: EntityRepository;

  /** Apply the single put op and return the record it writes */
  const apply = (ops: StoreOp[]): EntityRecord | null => {
    store.transact(ops);
    return store.get<EntityRecord>('progress', 'l1');
  };

  beforeEach(async () => {
    store = await LocalStore.open();
    clock = new ManualClock();
    repository = new EntityRepository(
      store,
      new ConflictResolver({ progress: { position: ['percent', 'positionSeconds'], rating: ['stars', 'comment'] } }),
      { staleAfterMs: HOUR, now: clock.now }
    );
  });

  afterEach(async () => {
    await store.close();
  });

  // ==========================================================================
  // Local changes
  // ==========================================================================

  describe('localChangeOps', () => {
    it('should create a dirty record stamped per field group', () => {
      const record = apply(
        repository.localChangeOps({ kind: 'create', targetKey: 'progress/l1', payload: { percent: 5, notes: 'x' } })
      );

      expect(record).toEqual({
        collection: 'progress',
        id: 'l1',
        data: { percent: 5, notes: 'x' },
        updatedAt: 0,
        lastSyncedAt: null,
        dirty: true,
        deleted: false,
        groupUpdatedAt: { position: 1_000_000, notes: 1_000_000 },
      });
    });

    it('should merge an update onto the existing data and keep sync metadata', () => {
      const offline = { localPath: '/media/l1.mp4', quality: '480p' as const, downloadedAt: 1 };
      store.put('progress', 'l1', createRecord({ offline }));
      clock.advance(10);

      const record = apply(
        repository.localChangeOps({ kind: 'update', targetKey: 'progress/l1', payload: { percent: 60 } })
      );

      expect(record).toEqual(
        createRecord({
          data: { percent: 60, stars: 4 },
          dirty: true,
          groupUpdatedAt: { position: 1_000_010 },
          offline,
        })
      );
    });

    it('should write a tombstone that keeps the last data', () => {
      store.put('progress', 'l1', createRecord());

      const record = apply(repository.localChangeOps({ kind: 'delete', targetKey: 'progress/l1' }));

      expect(record).toMatchObject({
        data: { percent: 20, stars: 4 },
        dirty: true,
        deleted: true,
        groupUpdatedAt: { [DELETED_GROUP]: 1_000_000 },
      });
    });

    it('should revive a tombstone with only the new data', () => {
      store.put('progress', 'l1', createRecord({ deleted: true, dirty: true, groupUpdatedAt: { [DELETED_GROUP]: 1 } }));

      const record = apply(
        repository.localChangeOps({ kind: 'update', targetKey: 'progress/l1', payload: { stars: 2 } })
      );

      expect(record?.data).toEqual({ stars: 2 });
      expect(record?.deleted).toBe(false);
      expect(record?.groupUpdatedAt).toEqual({ rating: 1_000_000 });
    });

    it('should reject a target key without an id', () => {
      expect(() => repository.localChangeOps({ kind: 'update', targetKey: 'progress/' })).toThrow(ValidationError);
    });
  });

  // ==========================================================================
  // Reads
  // ==========================================================================

  describe('reads', () => {
    it('should hide tombstones', () => {
      store.put('progress', 'l1', createRecord({ deleted: true }));
      store.put('progress', 'l2', createRecord({ id: 'l2' }));

      expect(repository.read('progress', 'l1')).toBeNull();
      expect(repository.getRecord('progress', 'l1')?.deleted).toBe(true);
      expect(repository.list('progress').map((view) => view.id)).toEqual(['l2']);
    });

    it('should build the view with offline availability', () => {
      store.put(
        'progress',
        'l1',
        createRecord({ offline: { localPath: '/media/l1.mp4', quality: '720p', downloadedAt: 5 } })
      );

      expect(repository.read('progress', 'l1')).toEqual({
        collection: 'progress',
        id: 'l1',
        data: { percent: 20, stars: 4 },
        dirty: false,
        stale: false,
        lastSyncedAt: 900_000,
        availableOffline: true,
        localPath: '/media/l1.mp4',
      });
    });

    it('should mark records stale once the window passes or when never synced', () => {
      store.put('progress', 'l1', createRecord());
      store.put('progress', 'l2', createRecord({ id: 'l2', lastSyncedAt: null }));

      expect(repository.read('progress', 'l2')?.stale).toBe(true);
      expect(repository.read('progress', 'l1')?.stale).toBe(false);

      clock.set(900_000 + HOUR);
      expect(repository.read('progress', 'l1')?.stale).toBe(false);

      clock.advance(1);
      expect(repository.read('progress', 'l1')?.stale).toBe(true);
    });

    it('should push updates to watchers of one entity', () => {
      const seen: (EntityView | null)[] = [];
      const unsubscribe = repository.watch('progress', 'l1').subscribe((view) => seen.push(view));

      store.put('progress', 'l1', createRecord());
      store.put('progress', 'l2', createRecord({ id: 'l2' }));
      store.delete('progress', 'l1');
      unsubscribe();
      store.put('progress', 'l1', createRecord());

      expect(seen.map((view) => view?.data ?? null)).toEqual([null, { percent: 20, stars: 4 }, null]);
    });

    it('should start a watch from the current value', () => {
      store.put('progress', 'l1', createRecord());

      expect(get(repository.watch('progress', 'l1'))?.data).toEqual({ percent: 20, stars: 4 });
    });
  });

  // ==========================================================================
  // Sync operations
  // ==========================================================================

  describe('sync operations', () => {
    it('should skip a remote delete of a record never seen locally', () => {
      expect(repository.remoteMergeOp('progress', { id: 'l1', data: {}, updatedAt: 5, deleted: true })).toEqual({
        op: null,
        conflict: false,
      });
    });

    it('should delete the local copy on a remote delete', () => {
      store.put('progress', 'l1', createRecord());

      expect(repository.remoteMergeOp('progress', { id: 'l1', data: {}, updatedAt: 5, deleted: true }).op).toEqual({
        type: 'delete',
        collection: 'progress',
        id: 'l1',
      });
    });

    it('should mark an acknowledged record as synced', () => {
      store.put('progress', 'l1', createRecord({ dirty: true, groupUpdatedAt: { position: 950_000 } }));

      const record = apply(repository.markSyncedOps('progress/l1', 990_000));

      expect(record).toEqual(
        createRecord({ updatedAt: 990_000, lastSyncedAt: 1_000_000, dirty: false, groupUpdatedAt: {} })
      );
    });

    it('should remove an acknowledged tombstone', () => {
      store.put('progress', 'l1', createRecord({ deleted: true, dirty: true }));

      expect(repository.markSyncedOps('progress/l1', 990_000)).toEqual([
        { type: 'delete', collection: 'progress', id: 'l1' },
      ]);
    });

    it('should produce nothing for unknown records or keys', () => {
      expect(repository.markSyncedOps('progress/missing', 1)).toEqual([]);
      expect(repository.markSyncedOps('no-slash', 1)).toEqual([]);
    });
  });
});
