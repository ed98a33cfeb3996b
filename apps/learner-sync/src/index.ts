/**
 * Offline sync engine for the learner client
 * @module learner-sync
 */

export { OfflineEngine, createOfflineEngine } from './engine';
export type { OfflineEngineOptions, EngineStorageInfo } from './engine';

// Settings
export { DEFAULT_ENGINE_SETTINGS, resolveSettings } from './settings/settings';
export type {
  EngineSettings,
  EngineSettingsOverrides,
  StoreSettings,
  CacheSettings,
  QueueSettings,
  DownloadSettings,
  SyncSettings,
  NetworkSettings,
} from './settings/settings';

// Components
export { LocalStore, SYSTEM_COLLECTIONS } from './store/local-store';
export type { StoreOp, StoreChange, QuarantinedRecord, StoreResetInfo } from './store/local-store';
export { CacheEngine } from './cache/cache-engine';
export type { FetchOptions, EvictionReason } from './cache/cache-engine';
export { DownloadManager, createDownloadManager } from './downloads/download-manager';
export type { StartOptions, DownloadStorageInfo } from './downloads/download-manager';
export { HttpAssetTransport } from './downloads/asset-transport';
export type { AssetTransport, ProbeResult, OpenOptions, TransferStream } from './downloads/asset-transport';
export { OfflineActionQueue } from './queue/action-queue';
export type { ApplyFn, DrainResult } from './queue/action-queue';
export { ConnectivityMonitor, createConnectivityMonitor } from './network/connectivity-monitor';
export {
  ManualConnectivitySource,
  HealthCheckSource,
  type ConnectivitySource,
} from './network/connectivity-source';
export { ConflictResolver } from './sync/conflict-resolver';
export { SyncOrchestrator, createSyncOrchestrator } from './sync/sync-orchestrator';
export { HttpRemoteStore } from './sync/remote-store';
export type { RemoteStore, PushOptions } from './sync/remote-store';
export { EntityRepository } from './entities/entity-repository';
export { formatEntityKey, parseEntityKey } from './utils/keys';

// Errors
export * from './errors';
