/**
 * Remote store client
 *
 * Contract the sync orchestrator pulls from and pushes to, and its HTTP
 * implementation against the learning backend's sync endpoints.
 */

import type { OfflineAction, PullBatch, PushAck, RemoteRecord } from '@courseline/shared-types';
import { ConflictError, RemoteRejectedError, TransientNetworkError } from '../errors';

// ============================================================================
// Contract
// ============================================================================

export interface PushOptions {
  /** Apply even though the server copy changed since the client saw it */
  overwrite?: boolean;
  signal?: AbortSignal;
}

/**
 * Both operations are safe to retry
 */
export interface RemoteStore {
  /** Changes to `collection` after `sinceCursor` (null = everything) */
  pull(collection: string, sinceCursor: string | null, signal?: AbortSignal): Promise<PullBatch>;
  /**
   * @throws ConflictError when the target changed remotely and `overwrite` is not set
   */
  push(action: OfflineAction, options?: PushOptions): Promise<PushAck>;
}

// ============================================================================
// HTTP
// ============================================================================

export interface HttpRemoteStoreConfig {
  /** Base URL of the server (e.g., 'https://api.example.com') */
  baseUrl: string;
  /** Sent as X-Device-ID so the server can attribute changes */
  deviceId?: string;
  /** Request timeout in milliseconds */
  timeout: number;
  headers: Record<string, string>;
  fetch: typeof fetch;
}

export class HttpRemoteStore implements RemoteStore {
  private readonly config: HttpRemoteStoreConfig;

  constructor(config: Partial<HttpRemoteStoreConfig> & { baseUrl: string }) {
    this.config = {
      timeout: 30000,
      headers: {},
      fetch: (input, init) => fetch(input, init),
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
    };
  }

  async pull(collection: string, sinceCursor: string | null, signal?: AbortSignal): Promise<PullBatch> {
    const query = sinceCursor === null ? '' : `?since=${encodeURIComponent(sinceCursor)}`;
    const body = await this.request('GET', `/sync/${encodeURIComponent(collection)}${query}`, undefined, signal);
    return parsePullBatch(body);
  }

  async push(action: OfflineAction, options: PushOptions = {}): Promise<PushAck> {
    const body = await this.request(
      'POST',
      '/sync/actions',
      {
        id: action.id,
        kind: action.kind,
        targetKey: action.targetKey,
        payload: action.payload,
        createdAt: action.createdAt,
        overwrite: options.overwrite ?? false,
      },
      options.signal
    );
    return parsePushAck(body);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    payload: unknown,
    signal?: AbortSignal
  ): Promise<unknown> {
    const timeout = AbortSignal.timeout(this.config.timeout);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.config.headers,
    };
    if (this.config.deviceId) {
      headers['X-Device-ID'] = this.config.deviceId;
    }
    if (payload !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.config.fetch(`${this.config.baseUrl}${path}`, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      // A caller's cancellation is not a network failure
      if (signal?.aborted) throw error;
      throw new TransientNetworkError(`Request to ${path} failed`, undefined, { cause: error });
    }

    const body = await readJson(response);

    if (!response.ok) {
      const message = errorMessageFrom(body) ?? `HTTP ${response.status}`;
      if (response.status === 409) {
        throw new ConflictError(message, serverUpdatedAtFrom(body));
      }
      if (response.status >= 500 || response.status === 408 || response.status === 429) {
        throw new TransientNetworkError(message, response.status);
      }
      throw new RemoteRejectedError(message, response.status);
    }

    // Some deployments wrap payloads as { data: ... }
    return isObject(body) && 'data' in body ? body.data : body;
  }
}

// ============================================================================
// Response parsing
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJson(response: Response): Promise<unknown> {
  const contentType = response.headers.get('content-type');
  if (!contentType?.includes('application/json')) return null;
  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    if (!response.ok) return null;
    throw new Error(`Malformed JSON from server (HTTP ${response.status})`, { cause: error });
  }
}

function errorMessageFrom(body: unknown): string | null {
  if (!isObject(body)) return null;
  if (isObject(body.error) && typeof body.error.message === 'string') return body.error.message;
  if (typeof body.message === 'string') return body.message;
  return null;
}

function serverUpdatedAtFrom(body: unknown): number {
  if (isObject(body) && typeof body.updatedAt === 'number') return body.updatedAt;
  if (isObject(body) && isObject(body.error) && typeof body.error.updatedAt === 'number') {
    return body.error.updatedAt;
  }
  return 0;
}

function parseRemoteRecord(value: unknown, index: number): RemoteRecord {
  if (
    !isObject(value) ||
    typeof value.id !== 'string' ||
    !isObject(value.data) ||
    typeof value.updatedAt !== 'number'
  ) {
    throw new Error(`Malformed record at index ${index} in pull response`);
  }
  return {
    id: value.id,
    data: value.data,
    updatedAt: value.updatedAt,
    deleted: value.deleted === true,
  };
}

export function parsePullBatch(body: unknown): PullBatch {
  if (
    !isObject(body) ||
    !Array.isArray(body.records) ||
    typeof body.cursor !== 'string' ||
    typeof body.hasMore !== 'boolean'
  ) {
    throw new Error('Malformed pull response');
  }
  return {
    records: body.records.map((record: unknown, index: number) => parseRemoteRecord(record, index)),
    cursor: body.cursor,
    hasMore: body.hasMore,
  };
}

export function parsePushAck(body: unknown): PushAck {
  if (!isObject(body) || typeof body.serverUpdatedAt !== 'number') {
    throw new Error('Malformed push response');
  }
  return { serverUpdatedAt: body.serverUpdatedAt };
}
