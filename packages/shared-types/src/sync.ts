/**
 * Sync protocol and status types
 */

export interface SyncCursor {
  collection: string;
  /** Opaque watermark returned by the remote store (null = from scratch) */
  cursor: string | null;
  pulledAt: number | null;
}

export interface RemoteRecord {
  id: string;
  data: Record<string, unknown>;
  updatedAt: number;
  deleted?: boolean;
}

export interface PullBatch {
  records: RemoteRecord[];
  cursor: string;
  hasMore: boolean;
}

export interface PushAck {
  serverUpdatedAt: number;
}

export type SyncState = 'idle' | 'syncing' | 'error';

export type SyncTrigger = 'manual' | 'reconnect' | 'periodic' | 'enqueue' | 'resync';

export type SyncOutcome = 'completed' | 'failed' | 'cancelled' | 'skipped';

/**
 * Summary of one sync run
 */
export interface SyncReport {
  trigger: SyncTrigger;
  outcome: SyncOutcome;
  /** Why a run was skipped */
  skipped?: 'offline';
  startedAt: number;
  finishedAt: number;
  /** Actions applied remotely (including superseded ones) */
  pushed: number;
  /** Actions dropped because the server copy was newer */
  superseded: number;
  /** Actions that failed and stay queued */
  retained: number;
  /** Actions given up on during this run */
  abandoned: number;
  /** Remote records written locally */
  pulled: number;
  conflicts: number;
  failedCollections: string[];
  errors: string[];
}

export interface SyncStatus {
  state: SyncState;
  online: boolean;
  pendingCount: number;
  abandonedCount: number;
  /** Finish time of the last completed run */
  lastSyncAt: number | null;
  lastError: string | null;
  /** Records quarantined by the local store */
  corruptRecords: number;
  lastReport: SyncReport | null;
}
