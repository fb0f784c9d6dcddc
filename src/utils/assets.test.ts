import { afterEach, describe, it, expect, vi } from 'vitest';
import { isPdf, loadAsset, readPngSize, toImageSource } from './assets';
import { tinyPng } from '../test-utils/fixtures';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('loadAsset', () => {
  it('returns the bytes of a found file', async () => {
    const body = new Uint8Array([1, 2, 3]);
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => ({ ok: true, status: 200, arrayBuffer: async () => body.buffer }))
    );

    expect(await loadAsset('/logo.png')).toEqual({ ok: true, bytes: new Uint8Array([1, 2, 3]) });
  });

  it('reports a missing file', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => ({ ok: false, status: 404 })));

    expect(await loadAsset('/missing.png')).toEqual({
      ok: false,
      reason: 'not-found',
      message: '/missing.png returned 404'
    });
  });

  it('reports a failed request', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('Failed to fetch');
      })
    );

    expect(await loadAsset('/logo.png')).toEqual({ ok: false, reason: 'unreachable', message: 'Failed to fetch' });
  });
});

describe('readPngSize', () => {
  it('reads the dimensions from the header', () => {
    expect(readPngSize(tinyPng())).toEqual({ width: 1, height: 1 });
  });

  it('rejects data that is not a PNG', () => {
    expect(readPngSize(new TextEncoder().encode('%PDF-1.4 not an image at all'))).toBeUndefined();
    expect(toImageSource(new Uint8Array(4))).toBeUndefined();
  });
});

describe('isPdf', () => {
  it('accepts data starting with the PDF header', () => {
    expect(isPdf(new TextEncoder().encode('%PDF-1.4\n'))).toBe(true);
  });

  it('rejects an HTML page and empty data', () => {
    expect(isPdf(new TextEncoder().encode('<!doctype html>'))).toBe(false);
    expect(isPdf(new Uint8Array(0))).toBe(false);
  });
});
