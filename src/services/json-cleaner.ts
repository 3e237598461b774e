import fs from 'fs';
import path from 'path';
import { DEFAULT_MATCH_RULES, type MatchRules } from '../models/media.js';
import { logger } from '../utils/logger.js';
import { createLoggingSink, Matcher } from './matcher.js';
import { TakeoutScanner } from './takeout-scanner.js';

export interface CleanupResult {
  total: number;
  deleted: number;
  failed: number;
  skipped: number;
  deletedFiles: string[];
  failedFiles: Array<{ path: string; error: string }>;
}

export interface JsonCleanerOptions {
  dryRun?: boolean;
  /** Copy each sidecar here before deleting it. */
  backupDir?: string;
}

export interface OrphanedSidecars {
  directory: string;
  sidecarPaths: string[];
}

export class JsonCleaner {
  private readonly dryRun: boolean;
  private readonly backupDir?: string;

  constructor(options: JsonCleanerOptions = {}) {
    this.dryRun = options.dryRun ?? false;
    this.backupDir = options.backupDir;
  }

  private backup(filePath: string): string {
    const backupDir = this.backupDir ?? path.dirname(filePath);
    fs.mkdirSync(backupDir, { recursive: true });

    let backupPath = path.join(backupDir, path.basename(filePath));
    if (fs.existsSync(backupPath)) {
      backupPath = `${backupPath}.${Date.now()}`;
    }
    fs.copyFileSync(filePath, backupPath);
    return backupPath;
  }

  deleteSidecars(filePaths: string[]): CleanupResult {
    const result: CleanupResult = {
      total: filePaths.length,
      deleted: 0,
      failed: 0,
      skipped: 0,
      deletedFiles: [],
      failedFiles: [],
    };

    logger.info(`${this.dryRun ? 'Would delete' : 'Deleting'} ${filePaths.length} sidecar file(s)`);

    for (const filePath of filePaths) {
      if (path.extname(filePath).toLowerCase() !== '.json') {
        logger.warn(`Not a JSON file, skipping: ${filePath}`);
        result.skipped++;
        continue;
      }

      if (!fs.existsSync(filePath)) {
        logger.debug(`Already gone: ${filePath}`);
        result.deleted++;
        continue;
      }

      if (this.dryRun) {
        logger.debug(`[DRY RUN] Would delete: ${filePath}`);
        result.deleted++;
        result.deletedFiles.push(filePath);
        continue;
      }

      try {
        if (this.backupDir) {
          logger.debug(`Backed up to: ${this.backup(filePath)}`);
        }
        fs.unlinkSync(filePath);
        result.deleted++;
        result.deletedFiles.push(filePath);
      } catch (error) {
        logger.warn(`Error deleting ${filePath}: ${error}`);
        result.failed++;
        result.failedFiles.push({ path: filePath, error: String(error) });
      }
    }

    logger.info(`Cleanup complete: ${result.deleted} deleted, ${result.failed} failed, ${result.skipped} skipped`);
    return result;
  }

  /**
   * Sidecars that no media file of their folder claims.
   */
  static findOrphanedSidecars(folderPath: string, rules: MatchRules = DEFAULT_MATCH_RULES): OrphanedSidecars[] {
    const scan = new TakeoutScanner(rules).scan(folderPath);
    const matcher = new Matcher({ rules, sink: createLoggingSink(logger) });

    const orphans: OrphanedSidecars[] = [];
    for (const album of scan.albums) {
      const match = matcher.matchAlbum(album);
      const sidecarPaths = match.unconsumedSidecars.map((sidecar) => sidecar.path);
      if (sidecarPaths.length > 0) {
        orphans.push({ directory: album.directory, sidecarPaths });
      }
    }

    const count = orphans.reduce((sum, album) => sum + album.sidecarPaths.length, 0);
    logger.info(`Found ${count} orphaned sidecar files`);
    return orphans;
  }
}
