#!/usr/bin/env node
import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { argv } from 'process';
import { request } from 'undici';
import { cfg } from './config.js';
import { guessMime, hasImageExtension, type UploadInput } from './lib/upload-images.js';

/**
 * Read every image file in `dir` (sorted by name) as a base64 upload.
 */
export async function readImageFolder(dir: string, maxImages = cfg.analysis.maxImages): Promise<UploadInput[]> {
  const names = (await readdir(dir)).filter(hasImageExtension).sort();
  if (names.length > maxImages) {
    console.warn(`[cli] ${names.length} images found, sending the first ${maxImages}`);
  }
  const uploads: UploadInput[] = [];
  for (const filename of names.slice(0, maxImages)) {
    const bytes = await readFile(path.join(dir, filename));
    uploads.push({ filename, data: bytes.toString('base64'), mimeType: guessMime(filename) });
  }
  return uploads;
}

export async function postImages(baseUrl: string, images: UploadInput[]): Promise<unknown> {
  const r = await request(`${baseUrl.replace(/\/+$/, '')}/api/auto-analyze-multiple`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ images }),
  });
  return r.body.json();
}

export async function main(args: string[] = argv.slice(2)): Promise<void> {
  const folder = args[0];
  if (!folder) {
    throw new Error('Usage: cli <image-folder> [server-url]');
  }
  const baseUrl = args[1] || process.env.API_URL || `http://localhost:${cfg.port}`;

  const images = await readImageFolder(folder);
  if (!images.length) {
    throw new Error(`No image files found in ${folder}`);
  }
  console.log(`[cli] Posting ${images.length} image(s) to ${baseUrl}`);
  const j = await postImages(baseUrl, images);
  console.log(JSON.stringify(j, null, 2));
}

if (require.main === module) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
