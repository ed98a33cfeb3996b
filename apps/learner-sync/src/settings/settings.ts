/**
 * Engine settings
 *
 * Every section has defaults; hosts override only what they need through
 * {@link resolveSettings}.
 */

import { validateSettings } from './validation';

export interface StoreSettings {
  /** SQLite snapshot file; null keeps everything in memory */
  filePath: string | null;
  persistDelayMs: number;
}

export interface CacheSettings {
  capacityBytes: number;
  /** Eviction frees space down to this share of capacity (0-1] */
  evictionTargetRatio: number;
  /** 0 = entries never expire */
  defaultTtlMs: number;
  /** 0 = no background TTL sweep */
  sweepIntervalMs: number;
}

export interface QueueSettings {
  /** Failures tolerated before an action is abandoned */
  maxRetries: number;
  /** Independent target keys applied in parallel */
  concurrency: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Actions older than this are abandoned unapplied; 0 = no limit */
  maxActionAgeMs: number;
}

export interface DownloadSettings {
  maxConcurrent: number;
  /** Local retries of transient transfer errors */
  retryCount: number;
  retryDelayMs: number;
  progressStepPercent: number;
  progressIntervalMs: number;
  /** Budget for downloaded assets; 0 = only free disk space counts */
  maxStorageBytes: number;
  /** Completed downloads unused for longer are removed by maintenance; 0 = keep */
  retentionMs: number;
}

export interface SyncSettings {
  /** Collections pulled on every sync, in order */
  collections: string[];
  /** 0 = no periodic sync */
  syncIntervalMs: number;
  /** Sync on reconnect and after enqueueing */
  autoSync: boolean;
  /** Records last synced longer ago read as stale */
  staleAfterMs: number;
  /**
   * Per collection, fields that change together and resolve conflicts as one
   * unit. Fields not listed form a group of their own.
   */
  fieldGroups: Record<string, Record<string, string[]>>;
}

export interface NetworkSettings {
  /** A connectivity change must hold this long before it counts */
  debounceMs: number;
}

export interface EngineSettings {
  store: StoreSettings;
  cache: CacheSettings;
  queue: QueueSettings;
  downloads: DownloadSettings;
  sync: SyncSettings;
  network: NetworkSettings;
}

export type EngineSettingsOverrides = {
  [K in keyof EngineSettings]?: Partial<EngineSettings[K]>;
};

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  store: {
    filePath: null,
    persistDelayMs: 50,
  },
  cache: {
    capacityBytes: 50 * 1024 * 1024, // 50MB
    evictionTargetRatio: 0.8,
    defaultTtlMs: 0,
    sweepIntervalMs: 5 * 60 * 1000,
  },
  queue: {
    maxRetries: 3,
    concurrency: 4,
    backoffBaseMs: 1000,
    backoffMaxMs: 5 * 60 * 1000,
    maxActionAgeMs: 0,
  },
  downloads: {
    maxConcurrent: 2,
    retryCount: 3,
    retryDelayMs: 1000,
    progressStepPercent: 1,
    progressIntervalMs: 250,
    maxStorageBytes: 0,
    retentionMs: 0,
  },
  sync: {
    collections: ['courses', 'lessons', 'progress'],
    syncIntervalMs: 60000, // 1 minute
    autoSync: true,
    staleAfterMs: 24 * 60 * 60 * 1000,
    fieldGroups: {
      progress: {
        position: ['percent', 'positionSeconds', 'page', 'completed'],
        rating: ['stars', 'comment'],
      },
    },
  },
  network: {
    debounceMs: 2000,
  },
};

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws ValidationError listing every invalid field
 */
export function resolveSettings(overrides: EngineSettingsOverrides = {}): EngineSettings {
  const settings: EngineSettings = {
    store: { ...DEFAULT_ENGINE_SETTINGS.store, ...overrides.store },
    cache: { ...DEFAULT_ENGINE_SETTINGS.cache, ...overrides.cache },
    queue: { ...DEFAULT_ENGINE_SETTINGS.queue, ...overrides.queue },
    downloads: { ...DEFAULT_ENGINE_SETTINGS.downloads, ...overrides.downloads },
    sync: { ...DEFAULT_ENGINE_SETTINGS.sync, ...overrides.sync },
    network: { ...DEFAULT_ENGINE_SETTINGS.network, ...overrides.network },
  };

  validateSettings(settings);
  return settings;
}
