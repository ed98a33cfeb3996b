/**
 * Sync Orchestrator
 *
 * Reconciles the local store with the remote store.
 *
 * Features:
 * - Push queued actions, then pull each collection from its cursor
 * - Pulled batches and their cursor commit in one transaction
 * - Field-group last-writer-wins for records with unpushed local edits
 * - Single-flight runs; requests during a run join it
 * - Sync on reconnect, on a timer and on demand
 * - Cooperative cancellation between batches
 * - Maintenance pass: cache TTL sweep, old download cleanup, store flush
 * - Reactive status as a Svelte readable store
 */

import { get, writable, type Readable, type Writable } from 'svelte/store';
import type {
  OfflineAction,
  SyncCursor,
  SyncReport,
  SyncStatus,
  SyncTrigger,
} from '@courseline/shared-types';
import { SYSTEM_COLLECTIONS, type LocalStore, type StoreOp } from '../store/local-store';
import type { OfflineActionQueue } from '../queue/action-queue';
import type { CacheEngine } from '../cache/cache-engine';
import type { DownloadManager } from '../downloads/download-manager';
import type { ConnectivityMonitor } from '../network/connectivity-monitor';
import type { EntityRepository } from '../entities/entity-repository';
import type { ConflictResolver } from './conflict-resolver';
import type { RemoteStore } from './remote-store';
import { ConflictError, errorMessage } from '../errors';
import { DisposableStore } from '../utils/disposable';
import { TypedEventEmitter } from '../utils/typed-emitter';
import { systemClock, type Clock } from '../utils/clock';
import { formatEntityKey } from '../utils/keys';

// ============================================================================
// Types
// ============================================================================

export interface SyncEvents {
  'sync-start': { trigger: SyncTrigger };
  'sync-complete': SyncReport;
  'sync-error': { error: string };
  conflict: { key: string };
}

export interface SyncOrchestratorConfig {
  /** Collections pulled on every run, in order */
  collections: string[];
  /** 0 = no periodic sync */
  syncIntervalMs: number;
  /** Sync on reconnect */
  autoSync: boolean;
  /** Completed downloads unused for longer are removed; 0 = keep */
  downloadRetentionMs: number;
  now: Clock;
}

export const DEFAULT_SYNC_CONFIG: SyncOrchestratorConfig = {
  collections: [],
  syncIntervalMs: 60000, // 1 minute
  autoSync: true,
  downloadRetentionMs: 0,
  now: systemClock,
};

export interface SyncDependencies {
  store: LocalStore;
  queue: OfflineActionQueue;
  remote: RemoteStore;
  repository: EntityRepository;
  resolver: ConflictResolver;
  cache?: CacheEngine;
  downloads?: DownloadManager;
  connectivity?: ConnectivityMonitor;
}

const CURSORS = SYSTEM_COLLECTIONS.cursors;

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private readonly config: SyncOrchestratorConfig;
  private readonly deps: SyncDependencies;
  private readonly events = new TypedEventEmitter<SyncEvents>('SyncOrchestrator');
  private readonly statusStore: Writable<SyncStatus>;
  private readonly disposables = new DisposableStore();

  private inflight: Promise<SyncReport> | null = null;
  private controller: AbortController | null = null;
  private syncIntervalId: ReturnType<typeof setInterval> | null = null;
  /** Collections whose cursor must be cleared once the running sync ends */
  private cursorResets: Set<string> = new Set();

  constructor(deps: SyncDependencies, config: Partial<SyncOrchestratorConfig> = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_SYNC_CONFIG, ...config };

    const lastPulls = this.config.collections
      .map((collection) => this.getCursor(collection)?.pulledAt ?? null)
      .filter((at): at is number => at !== null);

    this.statusStore = writable<SyncStatus>({
      state: 'idle',
      online: this.isOnline(),
      pendingCount: deps.queue.pendingCount(),
      abandonedCount: deps.queue.abandonedCount(),
      lastSyncAt: lastPulls.length > 0 ? Math.max(...lastPulls) : null,
      lastError: null,
      corruptRecords: deps.store.listQuarantined().length,
      lastReport: null,
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Subscribe to connectivity, queue and store events and start the timer
   */
  start(): void {
    const { store, queue, connectivity } = this.deps;

    this.disposables.addCallback(
      queue.on('queue-change', ({ pending, abandoned }) => {
        this.patchStatus({ pendingCount: pending, abandonedCount: abandoned });
      })
    );

    this.disposables.addCallback(
      store.on('corrupt', (error) => {
        if (this.config.collections.includes(error.collection)) {
          console.warn(`[SyncOrchestrator] Corrupt record in ${error.collection}, next sync re-pulls it`);
          store.delete(CURSORS, error.collection);
          // A batch committing later in this run would move the cursor again
          if (this.inflight) this.cursorResets.add(error.collection);
        }
        this.statusStore.update((status) => ({ ...status, corruptRecords: status.corruptRecords + 1 }));
      })
    );

    if (connectivity) {
      this.disposables.addCallback(
        connectivity.on('state-change', ({ online }) => {
          this.patchStatus({ online });
          if (!online) return;
          if (this.config.autoSync) {
            this.trigger('reconnect');
          }
        })
      );
    }

    if (this.config.syncIntervalMs > 0) {
      this.syncIntervalId = setInterval(() => {
        if (this.isOnline()) this.trigger('periodic');
      }, this.config.syncIntervalMs);
      this.syncIntervalId.unref();
      this.disposables.addCallback(() => {
        if (this.syncIntervalId) clearInterval(this.syncIntervalId);
        this.syncIntervalId = null;
      });
    }
  }

  /**
   * Stop reacting to events; a running sync is cancelled and awaited
   */
  async stop(): Promise<void> {
    this.disposables.dispose();
    const running = this.inflight;
    if (running) {
      this.cancel();
      await running;
    }
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get status(): Readable<SyncStatus> {
    return { subscribe: this.statusStore.subscribe };
  }

  getStatus(): SyncStatus {
    return get(this.statusStore);
  }

  isSyncing(): boolean {
    return this.inflight !== null;
  }

  getCursor(collection: string): SyncCursor | null {
    return this.deps.store.get<SyncCursor>(CURSORS, collection);
  }

  // ==========================================================================
  // Sync Operations
  // ==========================================================================

  /**
   * Run a sync, or join the one in progress. Skipped while offline.
   */
  requestSync(trigger: SyncTrigger = 'manual'): Promise<SyncReport> {
    if (this.inflight) return this.inflight;

    if (!this.isOnline()) {
      const now = this.config.now();
      const report: SyncReport = { ...emptyReport(trigger, now), outcome: 'skipped', skipped: 'offline', finishedAt: now };
      return Promise.resolve(report);
    }

    const controller = new AbortController();
    this.controller = controller;
    this.inflight = this.run(trigger, controller.signal).finally(() => {
      this.inflight = null;
      this.controller = null;
      this.applyCursorResets();
    });
    return this.inflight;
  }

  /**
   * Stop the running sync at the next batch boundary. Committed batches stay.
   */
  cancel(): void {
    this.controller?.abort();
  }

  /**
   * Forget every cursor and pull all collections again
   */
  async resyncFromScratch(): Promise<SyncReport> {
    const running = this.inflight;
    if (running) {
      this.cancel();
      await running;
    }

    const ops = this.config.collections.map((collection): StoreOp => ({
      type: 'delete',
      collection: CURSORS,
      id: collection,
    }));
    this.deps.store.transact(ops);
    console.info('[SyncOrchestrator] Cursors cleared, resyncing from scratch');

    return this.requestSync('resync');
  }

  private async run(trigger: SyncTrigger, signal: AbortSignal): Promise<SyncReport> {
    const report = emptyReport(trigger, this.config.now());
    this.patchStatus({ state: 'syncing' });
    this.events.emit('sync-start', { trigger });

    try {
      await this.push(report, signal);

      for (const collection of this.config.collections) {
        if (signal.aborted) break;
        await this.pullCollection(collection, report, signal);
      }

      if (!signal.aborted) {
        await this.maintenance(report);
      }

      if (signal.aborted) {
        report.outcome = 'cancelled';
      } else {
        report.outcome = report.failedCollections.length > 0 ? 'failed' : 'completed';
      }
    } catch (error) {
      if (signal.aborted) {
        report.outcome = 'cancelled';
      } else {
        report.outcome = 'failed';
        report.errors.push(errorMessage(error));
        console.error('[SyncOrchestrator] Sync failed:', error);
      }
    }

    report.finishedAt = this.config.now();
    const previous = this.getStatus();
    this.patchStatus({
      state: report.outcome === 'failed' ? 'error' : 'idle',
      lastSyncAt: report.outcome === 'completed' ? report.finishedAt : previous.lastSyncAt,
      lastError: lastErrorAfter(report, previous.lastError),
      lastReport: report,
      pendingCount: this.deps.queue.pendingCount(),
      abandonedCount: this.deps.queue.abandonedCount(),
    });

    if (report.outcome === 'failed') {
      this.events.emit('sync-error', { error: report.errors.join('; ') });
    }
    this.events.emit('sync-complete', report);
    return report;
  }

  /**
   * Drain the action queue against the remote store. Failures stay queued
   * and do not stop the pull.
   */
  private async push(report: SyncReport, signal: AbortSignal): Promise<void> {
    const { queue, remote, resolver, repository, store } = this.deps;
    const acknowledged = new Map<string, number>();

    const acknowledge = (action: OfflineAction, serverUpdatedAt: number) => {
      acknowledged.set(action.targetKey, Math.max(acknowledged.get(action.targetKey) ?? 0, serverUpdatedAt));
    };

    const result = await queue.drain(async (action, applySignal) => {
      try {
        const ack = await remote.push(action, { signal: applySignal });
        acknowledge(action, ack.serverUpdatedAt);
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;

        report.conflicts++;
        this.events.emit('conflict', { key: action.targetKey });
        if (resolver.shouldOverwrite(action, error.serverUpdatedAt)) {
          const ack = await remote.push(action, { overwrite: true, signal: applySignal });
          acknowledge(action, ack.serverUpdatedAt);
        } else {
          console.info(
            `[SyncOrchestrator] ${action.kind} on ${action.targetKey} superseded by a newer server copy`
          );
          report.superseded++;
          acknowledge(action, error.serverUpdatedAt);
        }
      }
    }, { signal });

    report.pushed = result.succeeded.length;
    report.retained = result.retained.length;
    report.abandoned = result.abandoned.length;

    // Entities with nothing left to push match the server again
    const ops: StoreOp[] = [];
    for (const [targetKey, serverUpdatedAt] of acknowledged) {
      if (!queue.hasPending(targetKey)) {
        ops.push(...repository.markSyncedOps(targetKey, serverUpdatedAt));
      }
    }
    store.transact(ops);
  }

  /**
   * Pull one collection batch by batch. A failure leaves its cursor where the
   * last committed batch put it.
   */
  private async pullCollection(collection: string, report: SyncReport, signal: AbortSignal): Promise<void> {
    const { remote, repository, store, cache } = this.deps;
    let cursor = this.getCursor(collection)?.cursor ?? null;

    try {
      while (!signal.aborted) {
        const batch = await remote.pull(collection, cursor, signal);
        signal.throwIfAborted();
        if (batch.hasMore && batch.cursor === cursor) {
          throw new Error(`Remote store did not advance the cursor for ${collection}`);
        }

        const ops: StoreOp[] = [];
        for (const record of batch.records) {
          const { op, conflict } = repository.remoteMergeOp(collection, record);
          if (op) ops.push(op);
          if (conflict) {
            report.conflicts++;
            this.events.emit('conflict', { key: formatEntityKey(collection, record.id) });
          }
        }

        const next: SyncCursor = { collection, cursor: batch.cursor, pulledAt: this.config.now() };
        ops.push({ type: 'put', collection: CURSORS, id: collection, value: next });
        store.transact(ops);

        report.pulled += batch.records.length;
        cursor = batch.cursor;

        if (cache) {
          for (const record of batch.records) {
            cache.invalidateEntity(formatEntityKey(collection, record.id));
          }
        }

        if (!batch.hasMore) break;
      }
    } catch (error) {
      if (signal.aborted) throw error;
      report.failedCollections.push(collection);
      report.errors.push(`${collection}: ${errorMessage(error)}`);
      console.warn(`[SyncOrchestrator] Pull of ${collection} failed:`, error);
    }
  }

  private async maintenance(report: SyncReport): Promise<void> {
    const { cache, downloads, store } = this.deps;

    try {
      cache?.sweepExpired();
      if (downloads && this.config.downloadRetentionMs > 0) {
        await downloads.cleanupOlderThan(this.config.downloadRetentionMs);
      }
      await store.flush();
    } catch (error) {
      // Maintenance never fails the sync itself
      report.errors.push(`maintenance: ${errorMessage(error)}`);
      console.error('[SyncOrchestrator] Maintenance failed:', error);
    }
  }

  // ==========================================================================
  // Event System
  // ==========================================================================

  on<K extends keyof SyncEvents>(event: K, listener: (data: SyncEvents[K]) => void): () => void {
    return this.events.on(event, listener);
  }

  // ==========================================================================
  // Utilities
  // ==========================================================================

  private applyCursorResets(): void {
    if (this.cursorResets.size === 0) return;
    const ops = [...this.cursorResets].map((collection): StoreOp => ({
      type: 'delete',
      collection: CURSORS,
      id: collection,
    }));
    this.cursorResets.clear();
    this.deps.store.transact(ops);
  }

  private trigger(trigger: SyncTrigger): void {
    this.requestSync(trigger).catch((error) => {
      console.error(`[SyncOrchestrator] ${trigger} sync failed:`, error);
    });
  }

  private isOnline(): boolean {
    return this.deps.connectivity?.isOnline() ?? true;
  }

  private patchStatus(patch: Partial<SyncStatus>): void {
    this.statusStore.update((status) => ({ ...status, ...patch }));
  }
}

function lastErrorAfter(report: SyncReport, previous: string | null): string | null {
  if (report.outcome === 'failed') return report.errors.join('; ');
  if (report.outcome === 'completed') return null;
  return previous;
}

function emptyReport(trigger: SyncTrigger, startedAt: number): SyncReport {
  return {
    trigger,
    outcome: 'completed',
    startedAt,
    finishedAt: startedAt,
    pushed: 0,
    superseded: 0,
    retained: 0,
    abandoned: 0,
    pulled: 0,
    conflicts: 0,
    failedCollections: [],
    errors: [],
  };
}

// ============================================================================
// Factory
// ============================================================================

export function createSyncOrchestrator(
  deps: SyncDependencies,
  config?: Partial<SyncOrchestratorConfig>
): SyncOrchestrator {
  return new SyncOrchestrator(deps, config);
}
