import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { extractAlbumName, TakeoutScanner } from './takeout-scanner.js';

describe('TakeoutScanner', () => {
  let tempDir: string;

  const touch = (...segments: string[]): string => {
    const filePath = path.join(tempDir, ...segments);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '');
    return filePath;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'takeout-scanner-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('finds the Google Photos folder of an export', () => {
    fs.mkdirSync(path.join(tempDir, 'Takeout', 'Google Photos'), { recursive: true });
    expect(TakeoutScanner.resolvePhotosRoot(tempDir)).toBe(path.join(tempDir, 'Takeout', 'Google Photos'));
  });

  it('uses the folder itself when it has no Google Photos folder', () => {
    expect(TakeoutScanner.resolvePhotosRoot(tempDir)).toBe(tempDir);
  });

  it('groups media and sidecars per folder in name order', () => {
    const root = path.join(tempDir, 'Takeout', 'Google Photos');
    const b = touch('Takeout', 'Google Photos', 'Summer', 'b.jpg');
    const a = touch('Takeout', 'Google Photos', 'Summer', 'a.mp4');
    const aJson = touch('Takeout', 'Google Photos', 'Summer', 'a.mp4.json');
    touch('Takeout', 'Google Photos', 'Summer', 'metadata.json');
    touch('Takeout', 'Google Photos', 'Summer', 'notes.txt');
    const old = touch('Takeout', 'Google Photos', 'Photos from 2019', 'IMG_0001.HEIC');

    const result = new TakeoutScanner().scan(tempDir);

    expect(result.root).toBe(root);
    expect(result.albums).toEqual([
      {
        directory: path.join(root, 'Photos from 2019'),
        albumName: undefined,
        mediaPaths: [old],
        sidecarPaths: [],
      },
      {
        directory: path.join(root, 'Summer'),
        albumName: 'Summer',
        mediaPaths: [a, b],
        sidecarPaths: [aJson],
      },
    ]);
    expect(result.totalPhotos).toBe(2);
    expect(result.totalVideos).toBe(1);
    expect(result.totalSidecars).toBe(1);
    expect(result.errors).toEqual([]);
  });

  it('skips folders with nothing to match', () => {
    touch('Empty', 'readme.txt');
    expect(new TakeoutScanner().scan(tempDir).albums).toEqual([]);
  });

  it('fails on a missing folder', () => {
    const missing = path.join(tempDir, 'missing');
    expect(() => new TakeoutScanner().scan(missing)).toThrow(`Takeout folder not found: ${missing}`);
  });
});

describe('extractAlbumName', () => {
  const root = path.join('/exports', 'Google Photos');

  it('names the first folder below the root', () => {
    expect(extractAlbumName(path.join(root, 'Wedding', 'Edits'), root)).toBe('Wedding');
  });

  it('ignores date folders and the root itself', () => {
    expect(extractAlbumName(path.join(root, 'Photos from 2021'), root)).toBeUndefined();
    expect(extractAlbumName(path.join(root, '2021-06'), root)).toBeUndefined();
    expect(extractAlbumName(root, root)).toBeUndefined();
  });
});
