/**
 * HTTP asset transport tests
 *
 * `fetch` is replaced with a stub returning canned responses.
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpAssetTransport, parseContentRange } from '../../downloads/asset-transport';
import { RemoteRejectedError, TransientNetworkError } from '../../errors';

const ASSET_URL = 'https://cdn.test/lessons/l1.mp4';

function stubFetch(response: () => Response) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
}

async function collect(chunks: AsyncIterable<Uint8Array>): Promise<number[]> {
  const bytes: number[] = [];
  for await (const chunk of chunks) {
    bytes.push(...chunk);
  }
  return bytes;
}

describe('HttpAssetTransport', () => {
  describe('probe', () => {
    it('should read size and range support from a HEAD request', async () => {
      const fetch = stubFetch(
        () => new Response(null, { status: 200, headers: { 'content-length': '500', 'accept-ranges': 'bytes' } })
      );
      const transport = new HttpAssetTransport({ fetch, headers: { Authorization: 'Bearer test-token' } });

      expect(await transport.probe(ASSET_URL)).toEqual({ totalBytes: 500, acceptsRanges: true });
      expect(fetch.mock.calls[0][1]).toMatchObject({
        method: 'HEAD',
        headers: { Authorization: 'Bearer test-token' },
      });
    });

    it('should report unknown size and no range support', async () => {
      const fetch = stubFetch(() => new Response(null, { status: 200 }));
      const transport = new HttpAssetTransport({ fetch });

      expect(await transport.probe(ASSET_URL)).toEqual({ totalBytes: null, acceptsRanges: false });
    });
  });

  describe('open', () => {
    it('should stream the whole body from the start', async () => {
      const fetch = stubFetch(
        () => new Response(new Uint8Array([1, 2, 3, 4]), { status: 200, headers: { 'content-length': '4' } })
      );
      const transport = new HttpAssetTransport({ fetch });

      const stream = await transport.open(ASSET_URL, { offset: 0 });

      expect(stream).toMatchObject({ totalBytes: 4, startOffset: 0, acceptsRanges: false });
      expect(await collect(stream.chunks)).toEqual([1, 2, 3, 4]);
      expect(fetch.mock.calls[0][1]?.headers).toEqual({});
    });

    it('should continue from the offset on a partial response', async () => {
      const fetch = stubFetch(
        () =>
          new Response(new Uint8Array([7, 8]), {
            status: 206,
            headers: { 'content-range': 'bytes 100-101/102', 'content-length': '2' },
          })
      );
      const transport = new HttpAssetTransport({ fetch });

      const stream = await transport.open(ASSET_URL, { offset: 100 });

      expect(stream).toMatchObject({ totalBytes: 102, startOffset: 100, acceptsRanges: true });
      expect(fetch.mock.calls[0][1]?.headers).toEqual({ Range: 'bytes=100-' });
      expect(await collect(stream.chunks)).toEqual([7, 8]);
    });

    it('should restart from zero when the server ignores the range', async () => {
      const fetch = stubFetch(
        () => new Response(new Uint8Array(10), { status: 200, headers: { 'content-length': '10' } })
      );
      const transport = new HttpAssetTransport({ fetch });

      const stream = await transport.open(ASSET_URL, { offset: 4 });

      expect(stream).toMatchObject({ totalBytes: 10, startOffset: 0, acceptsRanges: false });
    });

    it('should treat server errors and throttling as transient', async () => {
      for (const status of [503, 429, 408]) {
        const transport = new HttpAssetTransport({ fetch: stubFetch(() => new Response(null, { status })) });
        const error = await transport.open(ASSET_URL, { offset: 0 }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TransientNetworkError);
        expect(error).toMatchObject({ status, message: `HTTP ${status} for ${ASSET_URL}` });
      }
    });

    it('should reject other client errors', async () => {
      const transport = new HttpAssetTransport({ fetch: stubFetch(() => new Response(null, { status: 403 })) });

      await expect(transport.open(ASSET_URL, { offset: 0 })).rejects.toThrow(RemoteRejectedError);
    });
  });
});

describe('parseContentRange', () => {
  it('should parse a range with a known total', () => {
    expect(parseContentRange('bytes 0-99/1000')).toEqual({ start: 0, end: 99, total: 1000 });
  });

  it('should accept an unknown total', () => {
    expect(parseContentRange('bytes 500-999/*')).toEqual({ start: 500, end: 999, total: null });
  });

  it('should reject anything else', () => {
    expect(parseContentRange(null)).toBeNull();
    expect(parseContentRange('items 0-1/2')).toBeNull();
    expect(parseContentRange('bytes */1000')).toBeNull();
  });
});
