/**
 * Offline Action Queue
 *
 * Durable FIFO log of mutations recorded while offline (or speculatively)
 * and replayed against the remote store by the sync orchestrator.
 *
 * - Actions on the same target key are applied strictly in creation order
 * - Independent keys are applied concurrently up to a limit
 * - Failures are retried with exponential backoff; past the retry bound an
 *   action becomes `abandoned` and stays in the log for manual handling
 */

import { v4 as uuidv4 } from 'uuid';
import type { NewOfflineAction, OfflineAction } from '@courseline/shared-types';
import { SYSTEM_COLLECTIONS, type LocalStore, type StoreOp } from '../store/local-store';
import { AbandonedActionError, InvalidTransitionError, NotFoundError, RemoteRejectedError, errorMessage } from '../errors';
import { TypedEventEmitter } from '../utils/typed-emitter';
import { systemClock, type Clock } from '../utils/clock';
import { computeBackoff } from './backoff';

// ============================================================================
// Types
// ============================================================================

export type ApplyFn = (action: OfflineAction, signal?: AbortSignal) => Promise<void>;

export interface DrainOptions {
  signal?: AbortSignal;
}

export interface DrainResult {
  /** Applied and removed from the log */
  succeeded: OfflineAction[];
  /** Gave up on during this drain */
  abandoned: OfflineAction[];
  /** Failed, still pending, will be retried */
  retained: OfflineAction[];
  /** Not attempted: waiting for backoff, blocked behind a failure, or cancelled */
  skipped: number;
}

export interface ActionQueueEvents {
  'queue-change': { pending: number; abandoned: number };
  abandoned: { action: OfflineAction; error: AbandonedActionError };
}

export interface ActionQueueConfig {
  maxRetries: number;
  concurrency: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** 0 = no limit */
  maxActionAgeMs: number;
  now: Clock;
}

export const DEFAULT_QUEUE_CONFIG: ActionQueueConfig = {
  maxRetries: 3,
  concurrency: 4,
  backoffBaseMs: 1000,
  backoffMaxMs: 5 * 60 * 1000,
  maxActionAgeMs: 0,
  now: systemClock,
};

const COLLECTION = SYSTEM_COLLECTIONS.actions;

// ============================================================================
// Offline Action Queue
// ============================================================================

export class OfflineActionQueue {
  private readonly config: ActionQueueConfig;
  private readonly store: LocalStore;
  private readonly events = new TypedEventEmitter<ActionQueueEvents>('ActionQueue');
  private nextSeq: number;
  private draining: Promise<DrainResult> | null = null;

  constructor(store: LocalStore, config: Partial<ActionQueueConfig> = {}) {
    this.store = store;
    this.config = { ...DEFAULT_QUEUE_CONFIG, ...config };

    let maxSeq = 0;
    for (const action of store.scan<OfflineAction>(COLLECTION)) {
      maxSeq = Math.max(maxSeq, action.seq);
    }
    this.nextSeq = maxSeq + 1;
  }

  // ==========================================================================
  // Queue Management
  // ==========================================================================

  /**
   * Record an action. `extraOps` commit in the same transaction (typically
   * the optimistic local change the action describes). Resolves once the
   * action is durable.
   */
  async enqueue(input: NewOfflineAction, extraOps: StoreOp[] = []): Promise<string> {
    if (!input.targetKey) {
      throw new Error('Action targetKey is required');
    }

    const action: OfflineAction = {
      id: uuidv4(),
      kind: input.kind,
      targetKey: input.targetKey,
      payload: input.payload ?? {},
      createdAt: this.config.now(),
      seq: this.nextSeq++,
      retryCount: 0,
      lastAttemptAt: null,
      lastError: null,
      nextAttemptAt: null,
      priority: input.priority ?? 0,
      status: 'pending',
    };

    this.store.transact([...extraOps, { type: 'put', collection: COLLECTION, id: action.id, value: action }]);
    this.emitQueueChange();
    await this.store.flush();

    return action.id;
  }

  get(id: string): OfflineAction | null {
    return this.store.get<OfflineAction>(COLLECTION, id);
  }

  /**
   * Pending actions in creation order
   */
  listPending(): OfflineAction[] {
    return this.sorted((a) => a.status === 'pending');
  }

  listAbandoned(): OfflineAction[] {
    return this.sorted((a) => a.status === 'abandoned');
  }

  pendingCount(): number {
    return this.listPending().length;
  }

  abandonedCount(): number {
    return this.listAbandoned().length;
  }

  hasPending(targetKey: string): boolean {
    const matches = this.store.scan<OfflineAction>(
      COLLECTION,
      (a) => a.status === 'pending' && a.targetKey === targetKey
    );
    return matches.next().done !== true;
  }

  /**
   * Put an abandoned action back in line with a fresh retry budget. It keeps
   * its original position relative to other actions on the same key, so an
   * action superseded by a later applied one on its key cannot be retried.
   */
  retryAbandoned(id: string): OfflineAction {
    const action = this.requireAbandoned(id);
    if (action.supersededBy !== undefined) {
      throw new InvalidTransitionError('superseded', 'pending');
    }
    const revived: OfflineAction = {
      ...action,
      status: 'pending',
      retryCount: 0,
      nextAttemptAt: null,
    };
    this.store.put(COLLECTION, id, revived);
    this.emitQueueChange();
    return revived;
  }

  discardAbandoned(id: string): void {
    this.requireAbandoned(id);
    this.store.delete(COLLECTION, id);
    this.emitQueueChange();
  }

  // ==========================================================================
  // Drain
  // ==========================================================================

  /**
   * Apply pending actions through `apply`. A drain already in progress is
   * joined rather than started twice.
   */
  drain(apply: ApplyFn, options: DrainOptions = {}): Promise<DrainResult> {
    if (!this.draining) {
      this.draining = this.runDrain(apply, options.signal).finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  private async runDrain(apply: ApplyFn, signal?: AbortSignal): Promise<DrainResult> {
    const result: DrainResult = { succeeded: [], abandoned: [], retained: [], skipped: 0 };

    const pending = this.listPending();
    if (pending.length === 0) return result;

    // Bucket by target key; each bucket stays in creation order
    const groups = new Map<string, OfflineAction[]>();
    for (const action of pending) {
      const group = groups.get(action.targetKey);
      if (group) {
        group.push(action);
      } else {
        groups.set(action.targetKey, [action]);
      }
    }

    const queue = [...groups.values()].sort(
      (a, b) => maxPriority(b) - maxPriority(a) || a[0].seq - b[0].seq
    );
    const inProgress = new Set<Promise<void>>();
    let fatal: unknown = null;

    while (queue.length > 0 || inProgress.size > 0) {
      // Fill up to concurrency limit
      while (queue.length > 0 && inProgress.size < this.config.concurrency) {
        const group = queue.shift();
        if (!group) break;

        if (signal?.aborted || fatal !== null) {
          result.skipped += group.length;
          continue;
        }

        const run: Promise<void> = this.applyGroup(group, apply, result, signal)
          .catch((error: unknown) => {
            fatal ??= error;
          })
          .finally(() => {
            inProgress.delete(run);
          });
        inProgress.add(run);
      }

      if (inProgress.size > 0) {
        await Promise.race(inProgress);
      }
    }

    this.emitQueueChange();
    if (fatal !== null) throw fatal;
    return result;
  }

  /**
   * Apply one target key's actions in order. Stops at the first action that
   * fails and stays pending, so nothing behind it overtakes it.
   */
  private async applyGroup(
    group: OfflineAction[],
    apply: ApplyFn,
    result: DrainResult,
    signal?: AbortSignal
  ): Promise<void> {
    for (let i = 0; i < group.length; i++) {
      const action = group[i];
      const remaining = group.length - i;
      const now = this.config.now();

      if (signal?.aborted) {
        result.skipped += remaining;
        return;
      }

      if (this.config.maxActionAgeMs > 0 && now - action.createdAt > this.config.maxActionAgeMs) {
        result.abandoned.push(this.abandon(action, `Expired after ${this.config.maxActionAgeMs}ms in queue`, now));
        continue;
      }

      if (action.nextAttemptAt !== null && action.nextAttemptAt > now) {
        result.skipped += remaining;
        return;
      }

      try {
        await apply(action, signal);
      } catch (error) {
        if (signal?.aborted) {
          // Cancelled mid-request: not the action's fault
          result.skipped += remaining;
          return;
        }

        const updated = this.recordFailure(action, error);
        if (updated.status === 'abandoned') {
          result.abandoned.push(updated);
          continue;
        }
        result.retained.push(updated);
        result.skipped += remaining - 1;
        return;
      }

      this.store.transact(this.appliedOps(action));
      result.succeeded.push(action);
    }
  }

  /**
   * Remove an applied action and mark older abandoned actions on its key as
   * superseded by it
   */
  private appliedOps(action: OfflineAction): StoreOp[] {
    const ops: StoreOp[] = [{ type: 'delete', collection: COLLECTION, id: action.id }];
    const older = this.store.scan<OfflineAction>(
      COLLECTION,
      (a) =>
        a.status === 'abandoned' &&
        a.targetKey === action.targetKey &&
        a.seq < action.seq &&
        a.supersededBy === undefined
    );
    for (const abandoned of older) {
      ops.push({ type: 'put', collection: COLLECTION, id: abandoned.id, value: { ...abandoned, supersededBy: action.id } });
    }
    return ops;
  }

  private recordFailure(action: OfflineAction, error: unknown): OfflineAction {
    const now = this.config.now();
    const retryCount = action.retryCount + 1;
    const message = errorMessage(error);

    if (error instanceof RemoteRejectedError || retryCount > this.config.maxRetries) {
      return this.abandon({ ...action, retryCount }, message, now);
    }

    const updated: OfflineAction = {
      ...action,
      retryCount,
      lastError: message,
      lastAttemptAt: now,
      nextAttemptAt: now + computeBackoff(retryCount, this.config.backoffBaseMs, this.config.backoffMaxMs),
    };
    this.store.put(COLLECTION, action.id, updated);
    console.warn(
      `[ActionQueue] ${action.kind} on ${action.targetKey} failed (attempt ${retryCount}/${this.config.maxRetries + 1}): ${message}`
    );
    return updated;
  }

  private abandon(action: OfflineAction, reason: string, now: number): OfflineAction {
    const abandoned: OfflineAction = {
      ...action,
      status: 'abandoned',
      lastError: reason,
      lastAttemptAt: now,
      nextAttemptAt: null,
    };
    this.store.put(COLLECTION, action.id, abandoned);
    console.warn(`[ActionQueue] Abandoned ${action.kind} on ${action.targetKey}: ${reason}`);
    this.events.emit('abandoned', {
      action: abandoned,
      error: new AbandonedActionError(action.id, action.targetKey, reason),
    });
    return abandoned;
  }

  // ==========================================================================
  // Event System
  // ==========================================================================

  on<K extends keyof ActionQueueEvents>(
    event: K,
    listener: (data: ActionQueueEvents[K]) => void
  ): () => void {
    return this.events.on(event, listener);
  }

  private emitQueueChange(): void {
    this.events.emit('queue-change', {
      pending: this.pendingCount(),
      abandoned: this.abandonedCount(),
    });
  }

  // ==========================================================================
  // Utilities
  // ==========================================================================

  private sorted(predicate: (action: OfflineAction) => boolean): OfflineAction[] {
    return [...this.store.scan<OfflineAction>(COLLECTION, predicate)].sort((a, b) => a.seq - b.seq);
  }

  private requireAbandoned(id: string): OfflineAction {
    const action = this.get(id);
    if (!action || action.status !== 'abandoned') {
      throw new NotFoundError(`Abandoned action ${id}`);
    }
    return action;
  }
}

function maxPriority(group: OfflineAction[]): number {
  return group.reduce((max, action) => Math.max(max, action.priority), Number.NEGATIVE_INFINITY);
}
