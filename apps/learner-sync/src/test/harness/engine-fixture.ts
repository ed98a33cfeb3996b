/**
 * Engine fixture: a fully wired engine on in-process fakes
 */

import * as path from 'path';
import { createOfflineEngine, type OfflineEngine } from '../../engine';
import type { EngineSettingsOverrides } from '../../settings/settings';
import { ManualConnectivitySource } from '../../network/connectivity-source';
import { FakeRemoteStore } from './fake-remote-store';
import { MemoryAssetTransport } from './memory-transport';
import { ManualClock } from './manual-clock';
import { createTempDir, removeTempDir } from './temp-dir';

export interface EngineFixture {
  engine: OfflineEngine;
  remote: FakeRemoteStore;
  transport: MemoryAssetTransport;
  connectivity: ManualConnectivitySource;
  clock: ManualClock;
  dir: string;
  /** Dispose the engine and delete the temp directory */
  cleanup(): Promise<void>;
}

export interface EngineFixtureOptions {
  settings?: EngineSettingsOverrides;
  online?: boolean;
  /** Persist the store under the temp directory */
  persistent?: boolean;
}

export async function createEngineFixture(options: EngineFixtureOptions = {}): Promise<EngineFixture> {
  const clock = new ManualClock();
  const dir = await createTempDir();
  const remote = new FakeRemoteStore({ now: clock.now });
  const transport = new MemoryAssetTransport();
  const connectivity = new ManualConnectivitySource(options.online ?? true);

  const settings: EngineSettingsOverrides = {
    ...options.settings,
    store: {
      filePath: options.persistent ? path.join(dir, 'engine.db') : null,
      ...options.settings?.store,
    },
    network: { debounceMs: 0, ...options.settings?.network },
    sync: { syncIntervalMs: 0, autoSync: false, ...options.settings?.sync },
    cache: { sweepIntervalMs: 0, ...options.settings?.cache },
    downloads: { retryDelayMs: 1, ...options.settings?.downloads },
  };

  const engine = await createOfflineEngine({
    remote,
    transport,
    connectivity,
    settings,
    now: clock.now,
    freeSpace: async () => null,
  });

  return {
    engine,
    remote,
    transport,
    connectivity,
    clock,
    dir,
    cleanup: async () => {
      await engine.dispose();
      await removeTempDir(dir);
    },
  };
}
