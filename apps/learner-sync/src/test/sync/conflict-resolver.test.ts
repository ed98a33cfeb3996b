/**
 * Conflict Resolver Tests
 *
 * @see src/sync/conflict-resolver.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { EntityRecord, OfflineAction, RemoteRecord } from '@courseline/shared-types';
import { ConflictResolver, DELETED_GROUP } from '../../sync/conflict-resolver';

// ============================================================================
// Fixtures
// ============================================================================

const NOW = 5000;

const createLocal = (overrides: Partial<EntityRecord> = {}): EntityRecord => ({
  collection: 'progress',
  id: 'lesson-1',
  data: { percent: 80, positionSeconds: 300, stars: 4 },
  updatedAt: 1000,
  lastSyncedAt: 1000,
  dirty: true,
  deleted: false,
  groupUpdatedAt: { position: 2000 },
  ...overrides,
});

const createRemote = (overrides: Partial<RemoteRecord> = {}): RemoteRecord => ({
  id: 'lesson-1',
  data: { percent: 50, positionSeconds: 100, stars: 5, comment: 'great' },
  updatedAt: 1500,
  ...overrides,
});

const createAction = (overrides: Partial<OfflineAction> = {}): OfflineAction => ({
  id: 'action-1',
  kind: 'update',
  targetKey: 'progress/lesson-1',
  payload: { percent: 80 },
  createdAt: 2000,
  seq: 1,
  retryCount: 0,
  lastAttemptAt: null,
  lastError: null,
  nextAttemptAt: null,
  priority: 0,
  status: 'pending',
  ...overrides,
});

describe('ConflictResolver', () => {
  let resolver: ConflictResolver;

  beforeEach(() => {
    resolver = new ConflictResolver({
      progress: {
        position: ['percent', 'positionSeconds'],
        rating: ['stars', 'comment'],
      },
    });
  });

  // ==========================================================================
  // Field groups
  // ==========================================================================

  describe('groupOf', () => {
    it('should map grouped fields to their group and others to themselves', () => {
      expect(resolver.groupOf('progress', 'positionSeconds')).toBe('position');
      expect(resolver.groupOf('progress', 'notes')).toBe('notes');
      expect(resolver.groupOf('courses', 'percent')).toBe('percent');
    });

    it('should list each touched group once', () => {
      expect(resolver.groupsOf('progress', ['percent', 'positionSeconds', 'stars'])).toEqual(['position', 'rating']);
    });
  });

  // ==========================================================================
  // Clean local copies
  // ==========================================================================

  describe('mergeRemote without local edits', () => {
    it('should take a new remote record as synced', () => {
      const outcome = resolver.mergeRemote('progress', null, createRemote(), NOW);

      expect(outcome).toEqual({
        record: {
          collection: 'progress',
          id: 'lesson-1',
          data: { percent: 50, positionSeconds: 100, stars: 5, comment: 'great' },
          updatedAt: 1500,
          lastSyncedAt: NOW,
          dirty: false,
          deleted: false,
          groupUpdatedAt: {},
        },
        conflict: false,
        keptGroups: [],
      });
      expect(resolver.conflictCount).toBe(0);
    });

    it('should replace a clean local copy and keep its offline file', () => {
      const offline = { localPath: '/media/l1.mp4', quality: '720p' as const, downloadedAt: 900 };
      const local = createLocal({ dirty: false, groupUpdatedAt: {}, offline });

      const { record } = resolver.mergeRemote('progress', local, createRemote(), NOW);

      expect(record?.data).toEqual({ percent: 50, positionSeconds: 100, stars: 5, comment: 'great' });
      expect(record?.offline).toEqual(offline);
    });

    it('should remove the record when the remote copy is deleted', () => {
      const local = createLocal({ dirty: false });

      expect(resolver.mergeRemote('progress', local, createRemote({ deleted: true }), NOW).record).toBeNull();
    });
  });

  // ==========================================================================
  // Conflicts
  // ==========================================================================

  describe('mergeRemote with local edits', () => {
    it('should keep newer local groups and take the rest from the remote copy', () => {
      const outcome = resolver.mergeRemote('progress', createLocal(), createRemote(), NOW);

      expect(outcome).toEqual({
        record: {
          collection: 'progress',
          id: 'lesson-1',
          data: { percent: 80, positionSeconds: 300, stars: 5, comment: 'great' },
          updatedAt: 1500,
          lastSyncedAt: NOW,
          dirty: true,
          deleted: false,
          groupUpdatedAt: { position: 2000 },
        },
        conflict: true,
        keptGroups: ['position'],
      });
      expect(resolver.conflictCount).toBe(1);
    });

    it('should give ties to the remote copy', () => {
      const local = createLocal({ groupUpdatedAt: { position: 1500 } });

      const { record, keptGroups } = resolver.mergeRemote('progress', local, createRemote(), NOW);

      expect(keptGroups).toEqual([]);
      expect(record?.data).toEqual({ percent: 50, positionSeconds: 100, stars: 5, comment: 'great' });
      expect(record?.dirty).toBe(false);
    });

    it('should drop a field the local side removed from a winning group', () => {
      const local = createLocal({ data: { stars: 3 }, groupUpdatedAt: { rating: 2000 } });

      const { record } = resolver.mergeRemote('progress', local, createRemote(), NOW);

      expect(record?.data).toEqual({ percent: 50, positionSeconds: 100, stars: 3 });
    });

    it('should resolve ungrouped fields on their own', () => {
      const local = createLocal({ data: { notes: 'mine', percent: 10 }, groupUpdatedAt: { notes: 2000 } });
      const remote = createRemote({ data: { notes: 'theirs', percent: 60 } });

      const { record } = resolver.mergeRemote('progress', local, remote, NOW);

      expect(record?.data).toEqual({ notes: 'mine', percent: 60 });
    });

    it('should keep a local delete newer than the remote edit', () => {
      const local = createLocal({ deleted: true, groupUpdatedAt: { [DELETED_GROUP]: 3000 } });

      const { record, conflict } = resolver.mergeRemote('progress', local, createRemote(), NOW);

      expect(conflict).toBe(true);
      expect(record).toEqual({ ...local, updatedAt: 1500, lastSyncedAt: NOW });
    });

    it('should take a remote edit newer than the local delete', () => {
      const local = createLocal({ deleted: true, groupUpdatedAt: { [DELETED_GROUP]: 1200 } });

      const { record } = resolver.mergeRemote('progress', local, createRemote(), NOW);

      expect(record?.deleted).toBe(false);
      expect(record?.data).toEqual(createRemote().data);
    });

    it('should keep local edits newer than a remote delete', () => {
      const { record } = resolver.mergeRemote('progress', createLocal(), createRemote({ deleted: true }), NOW);

      expect(record?.data).toEqual({ percent: 80, positionSeconds: 300, stars: 4 });
      expect(record?.dirty).toBe(true);
    });

    it('should remove the record when the remote delete is newer', () => {
      const local = createLocal({ groupUpdatedAt: { position: 1000 } });

      expect(resolver.mergeRemote('progress', local, createRemote({ deleted: true }), NOW).record).toBeNull();
    });
  });

  // ==========================================================================
  // Push conflicts
  // ==========================================================================

  describe('shouldOverwrite', () => {
    it('should overwrite only when the local change is strictly newer', () => {
      expect(resolver.shouldOverwrite(createAction({ createdAt: 2000 }), 1999)).toBe(true);
      expect(resolver.shouldOverwrite(createAction({ createdAt: 2000 }), 2000)).toBe(false);
      expect(resolver.shouldOverwrite(createAction({ createdAt: 2000 }), 2500)).toBe(false);
      expect(resolver.conflictCount).toBe(3);
    });
  });
});
