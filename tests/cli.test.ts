/**
 * Unit tests for cli.ts
 * Reads a temp folder of fake images and posts them through a mocked undici.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';

// Mock undici request
jest.mock('undici', () => ({
  request: jest.fn(),
}));

import { main, postImages, readImageFolder } from '../src/cli.js';

const mockRequest = jest.requireMock<{ request: jest.Mock }>('undici').request;

describe('CLI Module', () => {
  let dir: string;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    dir = mkdtempSync(path.join(tmpdir(), 'cli-test-'));
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    mockRequest.mockResolvedValue({ body: { json: async () => ({ status: 'success', totalFurnitureItems: 1 }) } });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  describe('readImageFolder', () => {
    it('reads image files sorted by name as base64 uploads', async () => {
      writeFileSync(path.join(dir, 'b.jpg'), 'bytes-b');
      writeFileSync(path.join(dir, 'a.png'), 'bytes-a');
      writeFileSync(path.join(dir, 'notes.txt'), 'ignore me');

      const uploads = await readImageFolder(dir);

      expect(uploads).toEqual([
        { filename: 'a.png', data: Buffer.from('bytes-a').toString('base64'), mimeType: 'image/png' },
        { filename: 'b.jpg', data: Buffer.from('bytes-b').toString('base64'), mimeType: 'image/jpeg' },
      ]);
    });

    it('truncates to the image limit with a warning', async () => {
      ['1.jpg', '2.jpg', '3.jpg'].forEach((name) => writeFileSync(path.join(dir, name), name));

      const uploads = await readImageFolder(dir, 2);

      expect(uploads.map((u) => u.filename)).toEqual(['1.jpg', '2.jpg']);
      expect(warnSpy).toHaveBeenCalledWith('[cli] 3 images found, sending the first 2');
    });
  });

  describe('postImages', () => {
    it('posts JSON to the analyze endpoint', async () => {
      const images = [{ filename: 'a.jpg', data: 'YQ==' }];
      const result = await postImages('http://localhost:4000/', images);

      expect(result).toEqual({ status: 'success', totalFurnitureItems: 1 });
      expect(mockRequest).toHaveBeenCalledWith('http://localhost:4000/api/auto-analyze-multiple', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ images }),
      });
    });
  });

  describe('main', () => {
    it('requires a folder argument', async () => {
      await expect(main([])).rejects.toThrow('Usage: cli <image-folder> [server-url]');
    });

    it('fails on a folder without images', async () => {
      await expect(main([dir])).rejects.toThrow(`No image files found in ${dir}`);
      expect(mockRequest).not.toHaveBeenCalled();
    });

    it('posts the folder to the given server and prints the response', async () => {
      writeFileSync(path.join(dir, 'sofa.jpg'), 'sofa');

      await main([dir, 'http://example.test']);

      expect(mockRequest.mock.calls[0][0]).toBe('http://example.test/api/auto-analyze-multiple');
      expect(logSpy).toHaveBeenCalledWith('[cli] Posting 1 image(s) to http://example.test');
      expect(logSpy).toHaveBeenCalledWith(JSON.stringify({ status: 'success', totalFurnitureItems: 1 }, null, 2));
    });
  });
});
