/**
 * Conflict Resolver
 *
 * Last-writer-wins at field-group level. A field group is a set of fields
 * that only make sense together (playback position and completion, star
 * rating and comment); each group is resolved as one unit by comparing its
 * local change time with the remote record's `updatedAt`. Ties go to the
 * remote copy.
 */

import type { EntityRecord, OfflineAction, RemoteRecord } from '@courseline/shared-types';

/**
 * Per collection: group name → fields
 */
export type FieldGroups = Record<string, Record<string, string[]>>;

/**
 * `groupUpdatedAt` key recording when a local delete happened
 */
export const DELETED_GROUP = '$deleted';

export interface MergeOutcome {
  /** Resulting record; null when it should be removed */
  record: EntityRecord | null;
  /** Local unpushed changes met a remote change */
  conflict: boolean;
  /** Groups whose local values survived */
  keptGroups: string[];
}

export class ConflictResolver {
  private readonly fieldGroups: FieldGroups;
  private conflicts = 0;

  constructor(fieldGroups: FieldGroups = {}) {
    this.fieldGroups = fieldGroups;
  }

  /**
   * Conflicts resolved since creation
   */
  get conflictCount(): number {
    return this.conflicts;
  }

  groupOf(collection: string, field: string): string {
    const groups = this.fieldGroups[collection];
    if (groups) {
      for (const [group, fields] of Object.entries(groups)) {
        if (fields.includes(field)) return group;
      }
    }
    return field;
  }

  groupsOf(collection: string, fields: string[]): string[] {
    return [...new Set(fields.map((field) => this.groupOf(collection, field)))];
  }

  /**
   * Combine a pulled record with the local copy
   */
  mergeRemote(
    collection: string,
    local: EntityRecord | null,
    remote: RemoteRecord,
    now: number
  ): MergeOutcome {
    if (!local || !local.dirty) {
      return {
        record: remote.deleted ? null : this.synced(collection, remote, now, local),
        conflict: false,
        keptGroups: [],
      };
    }

    this.conflicts++;
    const newerGroups = Object.entries(local.groupUpdatedAt)
      .filter(([, changedAt]) => changedAt > remote.updatedAt)
      .map(([group]) => group);

    if (local.deleted || remote.deleted) {
      // Whole-record outcomes: the newer side of a delete wins outright
      const localWins = local.deleted
        ? newerGroups.includes(DELETED_GROUP)
        : newerGroups.length > 0;

      if (localWins) {
        this.log(collection, local.id, local.deleted ? 'kept local delete' : 'kept local edits over remote delete');
        return {
          record: { ...local, updatedAt: remote.updatedAt, lastSyncedAt: now },
          conflict: true,
          keptGroups: newerGroups,
        };
      }

      this.log(collection, local.id, 'took remote copy');
      return {
        record: remote.deleted ? null : this.synced(collection, remote, now, local),
        conflict: true,
        keptGroups: [],
      };
    }

    const data: Record<string, unknown> = { ...remote.data };
    const groupUpdatedAt: Record<string, number> = {};
    const fields = new Set([...Object.keys(local.data), ...Object.keys(remote.data)]);

    for (const group of newerGroups) {
      groupUpdatedAt[group] = local.groupUpdatedAt[group];
      for (const field of fields) {
        if (this.groupOf(collection, field) !== group) continue;
        if (field in local.data) {
          data[field] = local.data[field];
        } else {
          delete data[field];
        }
      }
    }

    this.log(
      collection,
      local.id,
      newerGroups.length > 0 ? `kept local ${newerGroups.join(', ')}` : 'took remote copy'
    );

    return {
      record: {
        collection,
        id: local.id,
        data,
        updatedAt: remote.updatedAt,
        lastSyncedAt: now,
        dirty: newerGroups.length > 0,
        deleted: false,
        groupUpdatedAt,
        ...(local.offline ? { offline: local.offline } : {}),
      },
      conflict: true,
      keptGroups: newerGroups,
    };
  }

  /**
   * A push rejected as conflicting is retried with overwrite only when the
   * local change is newer than the server copy
   */
  shouldOverwrite(action: OfflineAction, serverUpdatedAt: number): boolean {
    this.conflicts++;
    return action.createdAt > serverUpdatedAt;
  }

  private synced(
    collection: string,
    remote: RemoteRecord,
    now: number,
    local: EntityRecord | null
  ): EntityRecord {
    return {
      collection,
      id: remote.id,
      data: remote.data,
      updatedAt: remote.updatedAt,
      lastSyncedAt: now,
      dirty: false,
      deleted: false,
      groupUpdatedAt: {},
      ...(local?.offline ? { offline: local.offline } : {}),
    };
  }

  private log(collection: string, id: string, outcome: string): void {
    console.info(`[ConflictResolver] ${collection}/${id}: ${outcome}`);
  }
}
