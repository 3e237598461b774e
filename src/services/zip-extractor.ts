import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger.js';

export interface ZipExtractorOptions {
  /** Drop everything up to and including `Google Photos/` from entry paths. */
  flatten?: boolean;
  /** Look for archives in subdirectories too. */
  recursive?: boolean;
}

export interface ExtractionResult {
  total: number;
  successful: number;
  failed: number;
  filesWritten: number;
  extractedArchives: string[];
  failedArchives: string[];
}

export interface ArchiveDeletionResult {
  deleted: number;
  failed: number;
}

const PHOTOS_FOLDER = 'Google Photos';

function isJunkEntry(entryName: string): boolean {
  const parts = entryName.split('/');
  return parts.includes('__MACOSX') || parts.some((part) => part.startsWith('._'));
}

export class ZipExtractor {
  private readonly flatten: boolean;
  private readonly recursive: boolean;

  constructor(options: ZipExtractorOptions = {}) {
    this.flatten = options.flatten ?? false;
    this.recursive = options.recursive ?? false;
  }

  /**
   * Returns the archive itself, or the `.zip` files of a directory in name order.
   */
  findZipFiles(inputPath: string): string[] {
    if (!fs.existsSync(inputPath)) {
      throw new Error(`Input path not found: ${inputPath}`);
    }

    if (fs.statSync(inputPath).isFile()) {
      return inputPath.toLowerCase().endsWith('.zip') ? [inputPath] : [];
    }

    const found: string[] = [];
    const visit = (dirPath: string): void => {
      const entries = fs.readdirSync(dirPath, { withFileTypes: true });
      for (const entry of entries) {
        const fullPath = path.join(dirPath, entry.name);
        if (entry.isFile() && entry.name.toLowerCase().endsWith('.zip')) {
          found.push(fullPath);
        } else if (entry.isDirectory() && this.recursive) {
          visit(fullPath);
        }
      }
    };
    visit(inputPath);

    return found.sort();
  }

  private targetPath(entryName: string, destPath: string): string | undefined {
    let relative = entryName.replace(/\\/g, '/');
    if (this.flatten) {
      const marker = relative.indexOf(`${PHOTOS_FOLDER}/`);
      if (marker >= 0) relative = relative.slice(marker + PHOTOS_FOLDER.length + 1);
    }
    if (!relative) return undefined;

    const root = path.resolve(destPath);
    const target = path.resolve(root, relative);
    return target.startsWith(root + path.sep) ? target : undefined;
  }

  /**
   * Extracts one archive and returns the number of files written.
   */
  async extractZip(zipPath: string, destPath: string): Promise<number> {
    const AdmZip = (await import('adm-zip')).default;

    if (!fs.existsSync(zipPath)) {
      throw new Error(`Zip file not found: ${zipPath}`);
    }

    logger.info(`Extracting ${path.basename(zipPath)} to ${destPath}...`);
    const zip = new AdmZip(zipPath);
    let written = 0;

    for (const entry of zip.getEntries()) {
      if (entry.isDirectory || isJunkEntry(entry.entryName)) continue;

      const target = this.targetPath(entry.entryName, destPath);
      if (!target) {
        logger.warn(`Skipping entry outside the output folder: ${entry.entryName}`);
        continue;
      }

      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, entry.getData());
      written++;
    }

    logger.info(`Extraction complete: ${written} files from ${path.basename(zipPath)}`);
    return written;
  }

  async extractAll(
    inputPath: string,
    destPath: string,
    onProgress?: (current: number, total: number, filename: string) => void,
  ): Promise<ExtractionResult> {
    const zipFiles = this.findZipFiles(inputPath);
    const result: ExtractionResult = {
      total: zipFiles.length,
      successful: 0,
      failed: 0,
      filesWritten: 0,
      extractedArchives: [],
      failedArchives: [],
    };

    if (zipFiles.length === 0) {
      logger.info(`No zip files found in ${inputPath}`);
      return result;
    }

    fs.mkdirSync(destPath, { recursive: true });

    for (let i = 0; i < zipFiles.length; i++) {
      const zipPath = zipFiles[i];
      if (onProgress) {
        onProgress(i + 1, zipFiles.length, path.basename(zipPath));
      }

      try {
        result.filesWritten += await this.extractZip(zipPath, destPath);
        result.successful++;
        result.extractedArchives.push(zipPath);
      } catch (error) {
        logger.error(`Failed to extract ${zipPath}: ${error}`);
        result.failed++;
        result.failedArchives.push(zipPath);
      }
    }

    return result;
  }

  deleteArchives(zipPaths: string[], dryRun = false): ArchiveDeletionResult {
    const result: ArchiveDeletionResult = { deleted: 0, failed: 0 };

    for (const zipPath of zipPaths) {
      if (dryRun) {
        logger.info(`[DRY RUN] Would delete ${zipPath}`);
        result.deleted++;
        continue;
      }
      try {
        fs.rmSync(zipPath, { force: true });
        logger.info(`Deleted archive: ${path.basename(zipPath)}`);
        result.deleted++;
      } catch (error) {
        logger.warn(`Could not delete ${zipPath}: ${error}`);
        result.failed++;
      }
    }

    return result;
  }
}
