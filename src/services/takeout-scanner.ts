import fs from 'fs';
import path from 'path';
import { DEFAULT_MATCH_RULES, type AlbumListing, type MatchRules } from '../models/media.js';
import { logger } from '../utils/logger.js';
import { getMediaKind, isSidecarFileName } from './naming.js';

export interface TakeoutScanResult {
  root: string;
  albums: AlbumListing[];
  totalPhotos: number;
  totalVideos: number;
  totalSidecars: number;
  errors: string[];
}

// Folders Google creates on its own; they are not albums.
const NON_ALBUM_PATTERNS = [
  /^Photos from \d{4}$/i,
  /^Untitled$/i,
  /^\d{4}$/,
  /^\d{4}-\d{2}$/,
  /^\d{4}-\d{2}-\d{2}$/,
  /^Archive$/i,
  /^Trash$/i,
  /^Edited$/i,
];

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export class TakeoutScanner {
  constructor(private readonly rules: MatchRules = DEFAULT_MATCH_RULES) {}

  /**
   * Finds the Google Photos folder inside an extracted export.
   */
  static resolvePhotosRoot(folderPath: string): string {
    const candidates = [
      path.join(folderPath, 'Takeout', 'Google Photos'),
      path.join(folderPath, 'Google Photos'),
    ];
    return candidates.find((candidate) => fs.existsSync(candidate)) ?? folderPath;
  }

  /**
   * Walks the tree and groups media and sidecar files per directory.
   * Names are sorted so the listing order does not depend on the file system.
   */
  scan(folderPath: string): TakeoutScanResult {
    if (!fs.existsSync(folderPath)) {
      throw new Error(`Takeout folder not found: ${folderPath}`);
    }

    const root = TakeoutScanner.resolvePhotosRoot(folderPath);
    logger.info(`Scanning Takeout folder: ${root}`);

    const result: TakeoutScanResult = {
      root,
      albums: [],
      totalPhotos: 0,
      totalVideos: 0,
      totalSidecars: 0,
      errors: [],
    };

    this.collect(root, root, result);

    logger.info(
      `Scan complete: ${result.totalPhotos} photos, ${result.totalVideos} videos, ` +
        `${result.totalSidecars} sidecars in ${result.albums.length} folders`,
    );
    return result;
  }

  private collect(dirPath: string, rootPath: string, result: TakeoutScanResult): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
      const message = `Error listing directory ${dirPath}: ${error}`;
      logger.warn(message);
      result.errors.push(message);
      return;
    }

    const mediaPaths: string[] = [];
    const sidecarPaths: string[] = [];
    const subdirectories: string[] = [];

    for (const entry of [...entries].sort((a, b) => byName(a.name, b.name))) {
      const fullPath = path.join(dirPath, entry.name);

      if (entry.isDirectory()) {
        subdirectories.push(fullPath);
      } else if (entry.isFile()) {
        const kind = getMediaKind(entry.name, this.rules);
        if (kind) {
          mediaPaths.push(fullPath);
          if (kind === 'image') result.totalPhotos++;
          else result.totalVideos++;
        } else if (isSidecarFileName(entry.name, this.rules)) {
          sidecarPaths.push(fullPath);
          result.totalSidecars++;
        }
      }
    }

    if (mediaPaths.length > 0 || sidecarPaths.length > 0) {
      result.albums.push({
        directory: dirPath,
        albumName: extractAlbumName(dirPath, rootPath),
        mediaPaths,
        sidecarPaths,
      });
    }

    for (const subdirectory of subdirectories) {
      this.collect(subdirectory, rootPath, result);
    }
  }
}

/**
 * Album name from the folder structure:
 * - Google Photos/Album Name/photo.jpg -> "Album Name"
 * - Google Photos/Photos from 2019/photo.jpg -> none (date folder)
 * - Google Photos/photo.jpg -> none
 */
export function extractAlbumName(dirPath: string, rootPath: string): string | undefined {
  const relativePath = path.relative(rootPath, dirPath);
  if (!relativePath || relativePath === '.') {
    return undefined;
  }

  const potentialAlbum = relativePath.split(path.sep)[0];
  if (NON_ALBUM_PATTERNS.some((pattern) => pattern.test(potentialAlbum))) {
    return undefined;
  }
  return potentialAlbum;
}
