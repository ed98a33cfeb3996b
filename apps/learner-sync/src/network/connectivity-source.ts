/**
 * Connectivity sources
 *
 * Raw reachability signals fed to the {@link ConnectivityMonitor}. The host
 * app either reports platform events through {@link ManualConnectivitySource}
 * or lets {@link HealthCheckSource} poll the backend.
 */

import { errorMessage } from '../errors';

export type ConnectivityListener = (online: boolean) => void;

export interface ConnectivitySource {
  readonly online: boolean;
  subscribe(listener: ConnectivityListener): () => void;
  start?(): void;
  stop?(): void;
}

abstract class BaseConnectivitySource implements ConnectivitySource {
  private listeners: Set<ConnectivityListener> = new Set();
  protected current: boolean;

  constructor(initial: boolean) {
    this.current = initial;
  }

  get online(): boolean {
    return this.current;
  }

  subscribe(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected publish(online: boolean): void {
    if (online === this.current) return;
    this.current = online;
    for (const listener of [...this.listeners]) {
      try {
        listener(online);
      } catch (error) {
        console.error('[Connectivity] Error in listener:', error);
      }
    }
  }
}

// ============================================================================
// Manual
// ============================================================================

/**
 * Reachability reported by the host (OS network callbacks, tests)
 */
export class ManualConnectivitySource extends BaseConnectivitySource {
  constructor(initial = true) {
    super(initial);
  }

  set(online: boolean): void {
    this.publish(online);
  }
}

// ============================================================================
// Health Check
// ============================================================================

export interface HealthCheckConfig {
  /** Endpoint answering HEAD with 2xx while the backend is reachable */
  url: string;
  checkIntervalMs: number;
  checkTimeoutMs: number;
  /** Consecutive failures before reporting offline */
  failureThreshold: number;
  fetch: typeof fetch;
}

export const DEFAULT_HEALTH_CHECK_CONFIG: Omit<HealthCheckConfig, 'url'> = {
  checkIntervalMs: 30000, // 30 seconds
  checkTimeoutMs: 5000, // 5 seconds
  failureThreshold: 3,
  fetch: (input, init) => fetch(input, init),
};

export class HealthCheckSource extends BaseConnectivitySource {
  private readonly config: HealthCheckConfig;
  private checkIntervalId: ReturnType<typeof setInterval> | null = null;
  private consecutiveFailures = 0;

  constructor(config: Partial<HealthCheckConfig> & { url: string }, initial = true) {
    super(initial);
    this.config = { ...DEFAULT_HEALTH_CHECK_CONFIG, ...config };
  }

  start(): void {
    if (this.checkIntervalId) return;

    this.checkIntervalId = setInterval(() => {
      void this.check();
    }, this.config.checkIntervalMs);
    this.checkIntervalId.unref();

    void this.check();
  }

  stop(): void {
    if (this.checkIntervalId) {
      clearInterval(this.checkIntervalId);
      this.checkIntervalId = null;
    }
  }

  /**
   * Probe the backend once and update the reported state
   * @returns Whether the probe succeeded
   */
  async check(): Promise<boolean> {
    try {
      const response = await this.config.fetch(this.config.url, {
        method: 'HEAD',
        cache: 'no-store',
        signal: AbortSignal.timeout(this.config.checkTimeoutMs),
      });

      if (response.ok) {
        this.consecutiveFailures = 0;
        this.publish(true);
        return true;
      }
      this.handleFailure(`HTTP ${response.status}`);
    } catch (error) {
      this.handleFailure(errorMessage(error));
    }
    return false;
  }

  private handleFailure(reason: string): void {
    this.consecutiveFailures++;

    if (this.consecutiveFailures >= this.config.failureThreshold && this.current) {
      console.warn(
        `[Connectivity] ${this.config.url} unreachable after ${this.consecutiveFailures} checks: ${reason}`
      );
      this.publish(false);
    }
  }
}
