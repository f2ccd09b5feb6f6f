// src/lib/upload-images.ts
/**
 * Turn uploaded files (base64 JSON bodies or files read from disk) into the
 * UploadedImage records the orchestrator consumes.
 */

import type { UploadedImage } from '../grouping/types.js';

const EXTENSION_MIME: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  heic: 'image/heic',
  heif: 'image/heif',
  bmp: 'image/bmp',
  tif: 'image/tiff',
  tiff: 'image/tiff',
};

export interface UploadInput {
  filename: string;
  /** Base64 payload, optionally as a data URL */
  data: string;
  mimeType?: string;
  id?: string;
}

/**
 * MIME type from the file extension; application/octet-stream when unknown.
 */
export function guessMime(filename: string): string {
  const dot = filename.lastIndexOf('.');
  const ext = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : '';
  return EXTENSION_MIME[ext] || 'application/octet-stream';
}

export function isImageMime(mime: string): boolean {
  return mime.trim().toLowerCase().startsWith('image/');
}

export function hasImageExtension(filename: string): boolean {
  return isImageMime(guessMime(filename));
}

/**
 * Keep letters, digits, dot, dash and underscore; drop path traversal.
 * Returns 'unnamed' when nothing usable is left.
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.trim().split(/[\\/]/).pop() || '';
  const cleaned = base
    .replace(/\.\./g, '')
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .replace(/__+/g, '_')
    .replace(/^[_.]+|_+$/g, '');
  return cleaned.slice(0, 120) || 'unnamed';
}

const DATA_URL = /^data:([^;,]+);base64,/i;

/**
 * Decode one upload. Returns null for anything that is not a non-empty image.
 */
export function toUploadedImage(input: UploadInput, index: number): UploadedImage | null {
  let payload = input.data.trim();
  let declared = input.mimeType?.trim();

  const match = DATA_URL.exec(payload);
  if (match) {
    declared = declared || match[1];
    payload = payload.slice(match[0].length);
  }

  const mimeType = (declared || guessMime(input.filename)).toLowerCase();
  if (!isImageMime(mimeType)) return null;

  const bytes = Buffer.from(payload, 'base64');
  if (!bytes.length) return null;

  return {
    imageId: input.id?.trim() || `img_${index}`,
    reference: sanitizeFilename(input.filename),
    bytes,
    mimeType,
  };
}

/**
 * Decode a batch, skipping non-images. Skipped file names are reported back.
 */
export function collectUploads(inputs: readonly UploadInput[]): { images: UploadedImage[]; skipped: string[] } {
  const images: UploadedImage[] = [];
  const skipped: string[] = [];
  inputs.forEach((input, index) => {
    const image = toUploadedImage(input, index);
    if (image) {
      images.push(image);
    } else {
      skipped.push(input.filename);
    }
  });
  return { images, skipped };
}
