/**
 * Offline Engine
 *
 * Wires the local store, cache, download manager, action queue and sync
 * orchestrator together and exposes the surface UI code works against.
 */

import type { Readable } from 'svelte/store';
import type {
  AssetQuality,
  DownloadProgressSnapshot,
  DownloadStatus,
  DownloadTask,
  EntityView,
  NewOfflineAction,
  OfflineAction,
  SyncReport,
  SyncStatus,
} from '@courseline/shared-types';
import { LocalStore, SYSTEM_COLLECTIONS } from './store/local-store';
import {
  isCacheEntry,
  isDownloadTask,
  isEntityRecord,
  isOfflineAction,
  isSyncCursor,
} from './store/decoders';
import { CacheEngine, type FetchOptions } from './cache/cache-engine';
import { DownloadManager, type StartOptions } from './downloads/download-manager';
import { HttpAssetTransport, type AssetTransport } from './downloads/asset-transport';
import { OfflineActionQueue } from './queue/action-queue';
import { ConnectivityMonitor } from './network/connectivity-monitor';
import { ManualConnectivitySource, type ConnectivitySource } from './network/connectivity-source';
import { ConflictResolver } from './sync/conflict-resolver';
import { SyncOrchestrator } from './sync/sync-orchestrator';
import type { RemoteStore } from './sync/remote-store';
import { EntityRepository } from './entities/entity-repository';
import { resolveSettings, type EngineSettings, type EngineSettingsOverrides } from './settings/settings';
import { ValidationError } from './errors';
import { DisposableStore } from './utils/disposable';
import { systemClock, type Clock } from './utils/clock';

// ============================================================================
// Types
// ============================================================================

export interface OfflineEngineOptions {
  remote: RemoteStore;
  settings?: EngineSettingsOverrides;
  /** Defaults to plain HTTP(S) */
  transport?: AssetTransport;
  /** Defaults to a manual source reporting online */
  connectivity?: ConnectivitySource;
  now?: Clock;
  /** Free bytes on the volume holding a directory */
  freeSpace?: (dir: string) => Promise<number | null>;
}

export interface EngineStorageInfo {
  bytes: {
    database: number;
    cache: number;
    downloads: number;
  };
  counts: {
    entities: number;
    pendingActions: number;
    abandonedActions: number;
    cacheEntries: number;
    downloads: Record<DownloadStatus, number>;
  };
}

const ACTION_KINDS: ReadonlySet<string> = new Set(['create', 'update', 'delete']);

// ============================================================================
// Offline Engine
// ============================================================================

export class OfflineEngine {
  private readonly disposables = new DisposableStore();
  private disposed = false;

  constructor(
    readonly settings: EngineSettings,
    private readonly store: LocalStore,
    private readonly repository: EntityRepository,
    private readonly cache: CacheEngine,
    private readonly downloads: DownloadManager,
    private readonly queue: OfflineActionQueue,
    private readonly connectivity: ConnectivityMonitor,
    private readonly sync: SyncOrchestrator
  ) {}

  /**
   * Start timers and event wiring
   */
  start(): void {
    this.disposables.addCallback(
      this.connectivity.on('state-change', ({ online }) => {
        this.downloads.setOnline(online).catch((error) => {
          console.error('[OfflineEngine] Failed to update downloads for connectivity change:', error);
        });
      })
    );

    this.connectivity.start();
    this.downloads.setOnline(this.connectivity.isOnline()).catch((error) => {
      console.error('[OfflineEngine] Failed to apply initial connectivity to downloads:', error);
    });
    this.downloads.init();
    this.cache.startMaintenance(this.settings.cache.sweepIntervalMs);
    this.sync.start();
  }

  // ==========================================================================
  // Entities
  // ==========================================================================

  read<T = Record<string, unknown>>(collection: string, id: string): EntityView<T> | null {
    return this.repository.read<T>(collection, id);
  }

  list<T = Record<string, unknown>>(collection: string): EntityView<T>[] {
    return this.repository.list<T>(collection);
  }

  watch<T = Record<string, unknown>>(collection: string, id: string): Readable<EntityView<T> | null> {
    return this.repository.watch<T>(collection, id);
  }

  /**
   * Apply a change locally and queue it for the remote store. Both commit
   * together; a sync follows when online.
   */
  async enqueueAction(action: NewOfflineAction): Promise<string> {
    if (!ACTION_KINDS.has(action.kind)) {
      throw new ValidationError(`Unknown action kind: ${action.kind}`, [
        { path: ['kind'], message: 'Expected create, update or delete', code: 'invalid_kind' },
      ]);
    }

    const ops = this.repository.localChangeOps(action);
    const id = await this.queue.enqueue(action, ops);

    if (this.settings.sync.autoSync && this.connectivity.isOnline()) {
      this.sync.requestSync('enqueue').catch((error) => {
        console.error('[OfflineEngine] Sync after enqueue failed:', error);
      });
    }
    return id;
  }

  listPendingActions(): OfflineAction[] {
    return this.queue.listPending();
  }

  listAbandonedActions(): OfflineAction[] {
    return this.queue.listAbandoned();
  }

  retryAbandonedAction(id: string): OfflineAction {
    return this.queue.retryAbandoned(id);
  }

  discardAbandonedAction(id: string): void {
    this.queue.discardAbandoned(id);
  }

  // ==========================================================================
  // Downloads
  // ==========================================================================

  startDownload(
    resourceKey: string,
    sourceUrl: string,
    destination: string,
    quality: AssetQuality,
    options?: StartOptions
  ): Promise<string> {
    return this.downloads.start(resourceKey, sourceUrl, destination, quality, options);
  }

  pauseDownload(taskId: string): Promise<void> {
    return this.downloads.pause(taskId);
  }

  resumeDownload(taskId: string): Promise<void> {
    return this.downloads.resume(taskId);
  }

  cancelDownload(taskId: string): Promise<void> {
    return this.downloads.cancel(taskId);
  }

  downloadProgress(taskId: string): AsyncIterable<DownloadProgressSnapshot> {
    return this.downloads.progressOf(taskId);
  }

  getDownload(taskId: string): DownloadTask | null {
    return this.downloads.get(taskId);
  }

  listDownloads(): DownloadTask[] {
    return this.downloads.list();
  }

  /**
   * Record that the user opened a downloaded asset, keeping it from retention cleanup
   */
  markDownloadAccessed(taskId: string): void {
    this.downloads.markAccessed(taskId);
  }

  // ==========================================================================
  // Cache
  // ==========================================================================

  fetchCached<T>(key: string, priority: number, loader: () => Promise<T>, options?: FetchOptions): Promise<T> {
    return this.cache.fetchOrCompute(key, priority, loader, options);
  }

  invalidateCached(keyPrefix: string): number {
    return this.cache.invalidate(keyPrefix);
  }

  // ==========================================================================
  // Sync
  // ==========================================================================

  get syncStatus(): Readable<SyncStatus> {
    return this.sync.status;
  }

  get online(): Readable<boolean> {
    return this.connectivity.online;
  }

  requestSync(): Promise<SyncReport> {
    return this.sync.requestSync('manual');
  }

  cancelSync(): void {
    this.sync.cancel();
  }

  resyncFromScratch(): Promise<SyncReport> {
    return this.sync.resyncFromScratch();
  }

  // ==========================================================================
  // Storage
  // ==========================================================================

  storageInfo(): EngineStorageInfo {
    const cacheStats = this.cache.stats();
    const downloadInfo = this.downloads.storageInfo();
    const entities = this.settings.sync.collections.reduce(
      (sum, collection) => sum + this.store.count(collection),
      0
    );

    return {
      bytes: {
        database: this.store.sizeBytes(),
        cache: cacheStats.totalSize,
        downloads: downloadInfo.usedBytes,
      },
      counts: {
        entities,
        pendingActions: this.queue.pendingCount(),
        abandonedActions: this.queue.abandonedCount(),
        cacheEntries: cacheStats.entryCount,
        downloads: downloadInfo.counts,
      },
    };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Stop everything and close the store. Active downloads are paused so
   * they continue on the next start.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    this.disposables.dispose();
    await this.sync.stop();
    this.connectivity.stop();
    this.cache.stopMaintenance();
    await this.downloads.shutdown();
    await this.store.close();
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Open the local store and build an engine around it
 * @throws ValidationError when the settings are invalid
 */
export async function createOfflineEngine(options: OfflineEngineOptions): Promise<OfflineEngine> {
  const settings = resolveSettings(options.settings);
  const now = options.now ?? systemClock;

  const decoders = Object.fromEntries(settings.sync.collections.map((c) => [c, isEntityRecord]));
  const store = await LocalStore.open({
    filePath: settings.store.filePath,
    persistDelayMs: settings.store.persistDelayMs,
    decoders: {
      ...decoders,
      [SYSTEM_COLLECTIONS.actions]: isOfflineAction,
      [SYSTEM_COLLECTIONS.downloads]: isDownloadTask,
      [SYSTEM_COLLECTIONS.cacheEntries]: isCacheEntry,
      [SYSTEM_COLLECTIONS.cursors]: isSyncCursor,
    },
  });
  if (store.resetInfo) {
    console.warn(`[OfflineEngine] Local database was reset: ${store.resetInfo.reason}`);
  }

  const resolver = new ConflictResolver(settings.sync.fieldGroups);
  const repository = new EntityRepository(store, resolver, {
    staleAfterMs: settings.sync.staleAfterMs,
    now,
  });

  const cache = new CacheEngine(store, {
    capacity: settings.cache.capacityBytes,
    evictionTargetRatio: settings.cache.evictionTargetRatio,
    defaultTtlMs: settings.cache.defaultTtlMs,
    now,
  });

  const downloads = new DownloadManager(store, options.transport ?? new HttpAssetTransport(), {
    ...settings.downloads,
    now,
    ...(options.freeSpace ? { freeSpace: options.freeSpace } : {}),
  });

  const queue = new OfflineActionQueue(store, { ...settings.queue, now });

  const connectivity = new ConnectivityMonitor(options.connectivity ?? new ManualConnectivitySource(true), {
    debounceMs: settings.network.debounceMs,
  });

  const sync = new SyncOrchestrator(
    { store, queue, remote: options.remote, repository, resolver, cache, downloads, connectivity },
    {
      collections: settings.sync.collections,
      syncIntervalMs: settings.sync.syncIntervalMs,
      autoSync: settings.sync.autoSync,
      downloadRetentionMs: settings.downloads.retentionMs,
      now,
    }
  );

  const engine = new OfflineEngine(settings, store, repository, cache, downloads, queue, connectivity, sync);
  engine.start();
  return engine;
}
