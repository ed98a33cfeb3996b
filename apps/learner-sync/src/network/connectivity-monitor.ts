/**
 * Connectivity Monitor
 *
 * Turns a raw reachability signal into the debounced online/offline state
 * the engine acts on.
 *
 * Features:
 * - Debounced transitions; flapping shorter than the window is ignored
 * - Reactive state as a Svelte readable store
 * - Event-based notifications
 * - Waiting for the next online period
 */

import { writable, type Readable, type Writable } from 'svelte/store';
import { TypedEventEmitter } from '../utils/typed-emitter';
import type { ConnectivitySource } from './connectivity-source';

// ============================================================================
// Types
// ============================================================================

export interface ConnectivityEvents {
  online: { offlineForMs: number };
  offline: Record<string, never>;
  'state-change': { online: boolean };
}

export interface ConnectivityMonitorConfig {
  /** A change must hold this long before it is reported */
  debounceMs: number;
}

export const DEFAULT_CONNECTIVITY_CONFIG: ConnectivityMonitorConfig = {
  debounceMs: 2000,
};

// ============================================================================
// Connectivity Monitor
// ============================================================================

export class ConnectivityMonitor {
  private readonly config: ConnectivityMonitorConfig;
  private readonly source: ConnectivitySource;
  private readonly events = new TypedEventEmitter<ConnectivityEvents>('ConnectivityMonitor');
  private readonly state: Writable<boolean>;

  private committed: boolean;
  private lastChange = Date.now();
  private pendingTimer: ReturnType<typeof setTimeout> | null = null;
  private unsubscribeSource: (() => void) | null = null;

  constructor(source: ConnectivitySource, config: Partial<ConnectivityMonitorConfig> = {}) {
    this.source = source;
    this.config = { ...DEFAULT_CONNECTIVITY_CONFIG, ...config };
    this.committed = source.online;
    this.state = writable(this.committed);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.unsubscribeSource) return;
    this.unsubscribeSource = this.source.subscribe((online) => this.handleSignal(online));
    this.source.start?.();
    // The source may have moved before we subscribed
    this.handleSignal(this.source.online);
  }

  stop(): void {
    this.unsubscribeSource?.();
    this.unsubscribeSource = null;
    this.source.stop?.();
    this.clearPending();
  }

  // ==========================================================================
  // State
  // ==========================================================================

  isOnline(): boolean {
    return this.committed;
  }

  /**
   * Debounced online state
   */
  get online(): Readable<boolean> {
    return { subscribe: this.state.subscribe };
  }

  /**
   * Resolves on the next transition to online, or now if already online
   */
  waitForOnline(timeoutMs?: number): Promise<void> {
    if (this.committed) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;
      const cleanup = this.events.once('online', () => {
        if (timeoutId) clearTimeout(timeoutId);
        resolve();
      });

      if (timeoutMs) {
        timeoutId = setTimeout(() => {
          cleanup();
          reject(new Error('Timeout waiting for online status'));
        }, timeoutMs);
      }
    });
  }

  // ==========================================================================
  // Signal Handling
  // ==========================================================================

  private handleSignal(online: boolean): void {
    if (online === this.committed) {
      // Flapped back before the window closed
      this.clearPending();
      return;
    }

    if (this.config.debounceMs <= 0) {
      this.commit(online);
      return;
    }

    this.clearPending();
    this.pendingTimer = setTimeout(() => {
      this.pendingTimer = null;
      this.commit(online);
    }, this.config.debounceMs);
  }

  private commit(online: boolean): void {
    if (online === this.committed) return;

    const now = Date.now();
    const since = now - this.lastChange;
    this.committed = online;
    this.lastChange = now;
    this.state.set(online);

    console.info(`[ConnectivityMonitor] ${online ? 'Online' : 'Offline'}`);
    if (online) {
      this.events.emit('online', { offlineForMs: since });
    } else {
      this.events.emit('offline', {});
    }
    this.events.emit('state-change', { online });
  }

  private clearPending(): void {
    if (this.pendingTimer) {
      clearTimeout(this.pendingTimer);
      this.pendingTimer = null;
    }
  }

  // ==========================================================================
  // Event System
  // ==========================================================================

  on<K extends keyof ConnectivityEvents>(
    event: K,
    listener: (data: ConnectivityEvents[K]) => void
  ): () => void {
    return this.events.on(event, listener);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConnectivityMonitor(
  source: ConnectivitySource,
  config?: Partial<ConnectivityMonitorConfig>
): ConnectivityMonitor {
  return new ConnectivityMonitor(source, config);
}
