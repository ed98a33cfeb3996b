/**
 * Local entity records as persisted by the local store
 */

import type { AssetQuality } from './course';

/**
 * Offline availability written back by the download manager
 */
export interface OfflineAvailability {
  localPath: string;
  quality: AssetQuality;
  downloadedAt: number;
}

export interface EntityRecord<T = Record<string, unknown>> {
  collection: string;
  id: string;
  data: T;
  /** Server-side modification time of the data we last merged */
  updatedAt: number;
  /** When this record last matched the remote store (null = never) */
  lastSyncedAt: number | null;
  /** Has local changes not yet confirmed by the remote store */
  dirty: boolean;
  /** Local tombstone, kept until the delete has been pushed */
  deleted: boolean;
  /** Per field group: when the group last changed locally */
  groupUpdatedAt: Record<string, number>;
  offline?: OfflineAvailability;
}

/**
 * Read model handed to UI code
 */
export interface EntityView<T = Record<string, unknown>> {
  collection: string;
  id: string;
  data: T;
  dirty: boolean;
  stale: boolean;
  lastSyncedAt: number | null;
  availableOffline: boolean;
  localPath: string | null;
}
