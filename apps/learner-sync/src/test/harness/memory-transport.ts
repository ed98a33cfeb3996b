/**
 * Memory Asset Transport
 *
 * Serves assets from memory in fixed-size chunks. A stall point makes a
 * transfer hang mid-way until it is aborted, which is how tests pause or
 * disconnect a download at an exact byte.
 */

import type { AssetTransport, OpenOptions, ProbeResult, TransferStream } from '../../downloads/asset-transport';
import { RemoteRejectedError, TransientNetworkError } from '../../errors';

interface MemoryAsset {
  data: Uint8Array;
  acceptsRanges: boolean;
  /** Reported size; null hides it from probe and open */
  advertisedBytes: number | null;
}

export class MemoryAssetTransport implements AssetTransport {
  private readonly assets: Map<string, MemoryAsset> = new Map();
  private stallAt: number | null = null;
  private dropAt: number | null = null;
  private stallListeners: (() => void)[] = [];

  readonly opens: { url: string; offset: number }[] = [];
  probes = 0;

  constructor(private readonly chunkSize = 16) {}

  add(url: string, data: Uint8Array, options: { acceptsRanges?: boolean; advertisedBytes?: number | null } = {}): void {
    this.assets.set(url, {
      data,
      acceptsRanges: options.acceptsRanges ?? true,
      advertisedBytes: options.advertisedBytes === undefined ? data.byteLength : options.advertisedBytes,
    });
  }

  /**
   * Hang the next transfer once `position` bytes of the asset were sent
   */
  stallAfter(position: number): void {
    this.stallAt = position;
  }

  /**
   * Fail the next transfer with a transient error once `position` bytes were sent
   */
  dropAfter(position: number): void {
    this.dropAt = position;
  }

  /**
   * Resolves when a transfer reaches its stall point
   */
  waitForStall(): Promise<void> {
    return new Promise((resolve) => {
      this.stallListeners.push(resolve);
    });
  }

  async probe(url: string): Promise<ProbeResult> {
    this.probes++;
    const asset = this.require(url);
    return { totalBytes: asset.advertisedBytes, acceptsRanges: asset.acceptsRanges };
  }

  async open(url: string, options: OpenOptions): Promise<TransferStream> {
    this.opens.push({ url, offset: options.offset });
    const asset = this.require(url);
    const startOffset = asset.acceptsRanges ? options.offset : 0;

    const stallAt = this.stallAt;
    const dropAt = this.dropAt;
    this.stallAt = null;
    this.dropAt = null;

    return {
      totalBytes: asset.advertisedBytes,
      startOffset,
      acceptsRanges: asset.acceptsRanges,
      chunks: this.chunks(asset.data, startOffset, stallAt, dropAt, options.signal),
    };
  }

  private async *chunks(
    data: Uint8Array,
    start: number,
    stallAt: number | null,
    dropAt: number | null,
    signal?: AbortSignal
  ): AsyncGenerator<Uint8Array> {
    let position = start;
    while (position < data.byteLength) {
      if (stallAt !== null && position >= stallAt) {
        await this.stall(signal);
      }
      if (dropAt !== null && position >= dropAt) {
        throw new TransientNetworkError(`Connection dropped at byte ${position}`);
      }

      let end = Math.min(position + this.chunkSize, data.byteLength);
      if (stallAt !== null && position < stallAt) end = Math.min(end, stallAt);
      if (dropAt !== null && position < dropAt) end = Math.min(end, dropAt);

      yield data.subarray(position, end);
      position = end;
    }
  }

  private stall(signal?: AbortSignal): Promise<never> {
    for (const listener of this.stallListeners.splice(0)) {
      listener();
    }
    return new Promise<never>((_, reject) => {
      if (!signal) return;
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
  }

  private require(url: string): MemoryAsset {
    const asset = this.assets.get(url);
    if (!asset) {
      throw new RemoteRejectedError(`No asset at ${url}`, 404);
    }
    return asset;
  }
}
