/**
 * Asset Transport
 *
 * Byte source for the download manager. The default implementation streams
 * over `fetch` and continues interrupted transfers with `Range` requests.
 */

import { RemoteRejectedError, TransientNetworkError } from '../errors';

// ============================================================================
// Types
// ============================================================================

export interface ProbeResult {
  totalBytes: number | null;
  acceptsRanges: boolean;
}

export interface OpenOptions {
  /** Byte offset to continue from; the source may ignore it */
  offset: number;
  signal?: AbortSignal;
}

export interface TransferStream {
  /** Size of the whole resource, when known */
  totalBytes: number | null;
  /** Offset of the first chunk; 0 when the source restarted from scratch */
  startOffset: number;
  acceptsRanges: boolean;
  chunks: AsyncIterable<Uint8Array>;
}

export interface AssetTransport {
  probe(url: string, signal?: AbortSignal): Promise<ProbeResult>;
  open(url: string, options: OpenOptions): Promise<TransferStream>;
}

export interface HttpAssetTransportConfig {
  /** Extra headers sent with every request (auth, user agent) */
  headers: Record<string, string>;
  fetch: typeof fetch;
}

// ============================================================================
// HTTP Transport
// ============================================================================

export class HttpAssetTransport implements AssetTransport {
  private readonly config: HttpAssetTransportConfig;

  constructor(config: Partial<HttpAssetTransportConfig> = {}) {
    this.config = {
      headers: {},
      fetch: (input, init) => fetch(input, init),
      ...config,
    };
  }

  async probe(url: string, signal?: AbortSignal): Promise<ProbeResult> {
    const response = await this.config.fetch(url, {
      method: 'HEAD',
      headers: this.config.headers,
      signal,
    });
    this.assertOk(response, url);

    return {
      totalBytes: parseLength(response.headers.get('content-length')),
      acceptsRanges: response.headers.get('accept-ranges')?.toLowerCase() === 'bytes',
    };
  }

  async open(url: string, options: OpenOptions): Promise<TransferStream> {
    const headers: Record<string, string> = { ...this.config.headers };
    if (options.offset > 0) {
      headers['Range'] = `bytes=${options.offset}-`;
    }

    const response = await this.config.fetch(url, {
      method: 'GET',
      headers,
      signal: options.signal,
    });
    this.assertOk(response, url);

    const contentRange = parseContentRange(response.headers.get('content-range'));
    const partial = response.status === 206 && contentRange !== null;
    const startOffset = partial ? contentRange.start : 0;
    const length = parseLength(response.headers.get('content-length'));

    let totalBytes: number | null;
    if (partial && contentRange.total !== null) {
      totalBytes = contentRange.total;
    } else if (length !== null) {
      totalBytes = startOffset + length;
    } else {
      totalBytes = null;
    }

    return {
      totalBytes,
      startOffset,
      acceptsRanges: partial || response.headers.get('accept-ranges')?.toLowerCase() === 'bytes',
      chunks: readBody(response),
    };
  }

  private assertOk(response: Response, url: string): void {
    if (response.ok) return;

    const message = `HTTP ${response.status} for ${url}`;
    if (response.status >= 500 || response.status === 408 || response.status === 429) {
      throw new TransientNetworkError(message, response.status);
    }
    throw new RemoteRejectedError(message, response.status);
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function* readBody(response: Response): AsyncGenerator<Uint8Array> {
  if (!response.body) return;

  const reader = response.body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) return;
      if (value && value.byteLength > 0) yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

function parseLength(header: string | null): number | null {
  if (header === null) return null;
  const value = Number(header);
  return Number.isInteger(value) && value >= 0 ? value : null;
}

/**
 * Parse `bytes start-end/total` (total may be `*`)
 */
export function parseContentRange(
  header: string | null
): { start: number; end: number; total: number | null } | null {
  if (!header) return null;
  const match = /^bytes (\d+)-(\d+)\/(\d+|\*)$/i.exec(header.trim());
  if (!match) return null;

  return {
    start: Number(match[1]),
    end: Number(match[2]),
    total: match[3] === '*' ? null : Number(match[3]),
  };
}
