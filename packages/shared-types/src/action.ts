/**
 * Offline action log types
 */

export type ActionKind = 'create' | 'update' | 'delete';

export type ActionStatus = 'pending' | 'abandoned';

export interface OfflineAction {
  id: string;
  kind: ActionKind;
  /** `collection/id` of the entity the action mutates */
  targetKey: string;
  payload: Record<string, unknown>;
  createdAt: number;
  /** Monotonic creation sequence; orders actions with equal createdAt */
  seq: number;
  retryCount: number;
  lastAttemptAt: number | null;
  lastError: string | null;
  /** Not retried before this time */
  nextAttemptAt: number | null;
  /** Higher values are dispatched first */
  priority: number;
  status: ActionStatus;
  /** Set on an abandoned action once a later action on the same key has been applied */
  supersededBy?: string;
}

export interface NewOfflineAction {
  kind: ActionKind;
  targetKey: string;
  payload?: Record<string, unknown>;
  priority?: number;
}
