import type { ImageSource } from '../types/report';
import { getLogger } from './logger';

export type AssetResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; reason: 'not-found' | 'unreachable'; message: string };

const log = getLogger().child({ module: 'assets' });

/** Fetches a static asset. Missing files are reported, not thrown. */
export const loadAsset = async (url: string): Promise<AssetResult> => {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn('Asset request failed', { url, error: message });
    return { ok: false, reason: 'unreachable', message };
  }
  if (!response.ok) {
    log.warn('Asset not found', { url, status: response.status });
    return { ok: false, reason: 'not-found', message: `${url} returned ${response.status}` };
  }
  return { ok: true, bytes: new Uint8Array(await response.arrayBuffer()) };
};

// "%PDF-"
const PDF_SIGNATURE = [0x25, 0x50, 0x44, 0x46, 0x2d];

/** True when the data starts with the PDF header; an SPA fallback page does not. */
export const isPdf = (bytes: Uint8Array): boolean => PDF_SIGNATURE.every((b, i) => bytes[i] === b);

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** Reads width and height from the IHDR chunk of a PNG file. */
export const readPngSize = (bytes: Uint8Array): { width: number; height: number } | undefined => {
  if (bytes.length < 24) return undefined;
  if (!PNG_SIGNATURE.every((b, i) => bytes[i] === b)) return undefined;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const width = view.getUint32(16);
  const height = view.getUint32(20);
  if (width === 0 || height === 0) return undefined;
  return { width, height };
};

export const toImageSource = (bytes: Uint8Array): ImageSource | undefined => {
  const size = readPngSize(bytes);
  return size ? { bytes, aspectRatio: size.width / size.height } : undefined;
};
