import fs from 'fs';
import path from 'path';
import { DEFAULT_MATCH_RULES, type AlbumMatch, type MatchRules, type MediaEntry, type SidecarEntry } from '../models/media.js';
import { logger } from '../utils/logger.js';
import { JsonCleaner } from './json-cleaner.js';
import { createLoggingSink, Matcher } from './matcher.js';
import {
  createMetadataWriter,
  type MetadataWriteResult,
  type MetadataWriter,
  type MetadataWriterOptions,
} from './metadata-writer.js';
import { toRestorableMetadata } from './sidecar-parser.js';
import { TakeoutScanner } from './takeout-scanner.js';
import { ZipExtractor, type ExtractionResult } from './zip-extractor.js';

export interface RestoreOptions {
  inputPath: string;
  /** Where archives are extracted; defaults to the input folder. */
  outputPath?: string;
  extractZips?: boolean;
  /** Delete archives once every media file was matched and injected. */
  deleteZips?: boolean;
  deleteJson?: boolean;
  updateFileDates?: boolean;
  dryRun?: boolean;
  exiftoolPath?: string;
  concurrency?: number;
  jsonBackupDir?: string;
  rules?: MatchRules;
}

export interface RestoreDependencies {
  createWriter?: (options: MetadataWriterOptions) => Promise<MetadataWriter>;
}

export type RestorePhase = 'extract' | 'inject';

export type RestoreProgress = (phase: RestorePhase, current: number, total: number, filename: string) => void;

export interface RestoreStats {
  zipsExtracted: number;
  zipsDeleted: number;
  mediaFound: number;
  mediaMatched: number;
  injected: number;
  failed: number;
  skipped: number;
  /** Written only in part; the sidecar is kept. */
  incomplete: number;
  jsonDeleted: number;
  unconsumedSidecars: number;
  unreadableSidecars: number;
  durationMs: number;
}

export interface RestoreReport {
  stats: RestoreStats;
  extraction?: ExtractionResult;
  albums: AlbumMatch[];
  unmatchedMedia: string[];
  unconsumedSidecars: string[];
  unreadableSidecars: string[];
  failures: MetadataWriteResult[];
}

interface InjectionJob {
  media: MediaEntry;
  sidecar: SidecarEntry;
}

type ResolvedOptions = RestoreOptions &
  Required<Pick<RestoreOptions, 'extractZips' | 'deleteZips' | 'deleteJson' | 'updateFileDates' | 'dryRun' | 'concurrency'>>;

const DEFAULT_CONCURRENCY = 4;

/**
 * Runs the whole restore: extract, scan, match, inject, clean up.
 */
export class RestoreService {
  private readonly options: ResolvedOptions;
  private readonly rules: MatchRules;
  private readonly createWriter: (options: MetadataWriterOptions) => Promise<MetadataWriter>;

  constructor(options: RestoreOptions, deps: RestoreDependencies = {}) {
    this.options = {
      ...options,
      extractZips: options.extractZips ?? false,
      deleteZips: options.deleteZips ?? false,
      deleteJson: options.deleteJson ?? true,
      updateFileDates: options.updateFileDates ?? true,
      dryRun: options.dryRun ?? false,
      concurrency: Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY),
    };
    this.rules = options.rules ?? DEFAULT_MATCH_RULES;
    this.createWriter = deps.createWriter ?? createMetadataWriter;
  }

  /** Folder the scan starts from once extraction is done. */
  private photosFolder(): string {
    const { inputPath, outputPath, extractZips } = this.options;
    if (outputPath && extractZips) return outputPath;
    if (fs.existsSync(inputPath) && fs.statSync(inputPath).isFile()) return path.dirname(inputPath);
    return inputPath;
  }

  async run(onProgress?: RestoreProgress): Promise<RestoreReport> {
    const startedAt = Date.now();
    const { dryRun } = this.options;

    logger.info(`${dryRun ? '[DRY RUN] ' : ''}Restoring metadata from ${this.options.inputPath}`);

    const stats: RestoreStats = {
      zipsExtracted: 0,
      zipsDeleted: 0,
      mediaFound: 0,
      mediaMatched: 0,
      injected: 0,
      failed: 0,
      skipped: 0,
      incomplete: 0,
      jsonDeleted: 0,
      unconsumedSidecars: 0,
      unreadableSidecars: 0,
      durationMs: 0,
    };

    const extractor = new ZipExtractor({ recursive: false });
    let extraction: ExtractionResult | undefined;
    if (this.options.extractZips) {
      const destination = this.photosFolder();
      extraction = await extractor.extractAll(this.options.inputPath, destination, (current, total, filename) =>
        onProgress?.('extract', current, total, filename),
      );
      stats.zipsExtracted = extraction.successful;
      if (extraction.total > 0 && extraction.successful === 0) {
        throw new Error(`None of the ${extraction.total} archive(s) in ${this.options.inputPath} could be extracted`);
      }
    }

    const scan = new TakeoutScanner(this.rules).scan(this.photosFolder());
    const matcher = new Matcher({ rules: this.rules, sink: createLoggingSink(logger) });

    const albums: AlbumMatch[] = [];
    const jobs: InjectionJob[] = [];
    const unmatchedMedia: string[] = [];
    const unconsumedSidecars: string[] = [];
    const unreadableSidecars: string[] = [];

    for (const listing of scan.albums) {
      const album = matcher.matchAlbum(listing);
      albums.push(album);

      for (const result of album.results) {
        stats.mediaFound++;
        if (result.kind === 'matched') {
          stats.mediaMatched++;
          jobs.push({ media: result.media, sidecar: result.sidecar });
        } else {
          unmatchedMedia.push(result.media.path);
        }
      }
      unconsumedSidecars.push(...album.unconsumedSidecars.map((sidecar) => sidecar.path));
      unreadableSidecars.push(...album.unreadableSidecars);
    }

    stats.unconsumedSidecars = unconsumedSidecars.length;
    stats.unreadableSidecars = unreadableSidecars.length;
    logger.info(`Matched ${stats.mediaMatched} of ${stats.mediaFound} media files`);

    const failures: MetadataWriteResult[] = [];
    const processedSidecars: string[] = [];

    if (jobs.length > 0) {
      const writer = await this.createWriter({
        dryRun,
        updateFileDates: this.options.updateFileDates,
        exiftoolPath: this.options.exiftoolPath,
      });

      try {
        const concurrency = this.options.concurrency;
        let done = 0;

        // Process in chunks to control concurrency
        for (let i = 0; i < jobs.length; i += concurrency) {
          const batch = jobs.slice(i, i + concurrency);

          const batchResults = await Promise.all(
            batch.map(async (job) => {
              try {
                const result = await writer.write(
                  { path: job.media.path, kind: job.media.kind },
                  toRestorableMetadata(job.sidecar.metadata),
                );
                return { job, result };
              } catch (error) {
                const result: MetadataWriteResult = {
                  success: false,
                  filePath: job.media.path,
                  message: `Error processing ${job.media.path}: ${error}`,
                  errorType: 'write_failed',
                };
                return { job, result };
              }
            }),
          );

          for (const { job, result } of batchResults) {
            done++;
            onProgress?.('inject', done, jobs.length, job.media.fileName);

            if (result.success) {
              stats.injected++;
              processedSidecars.push(job.sidecar.path);
            } else if (result.errorType === 'no_metadata') {
              stats.skipped++;
              processedSidecars.push(job.sidecar.path);
            } else if (result.errorType === 'unsupported') {
              stats.incomplete++;
              logger.warn(`${result.message} (${job.media.path})`);
            } else {
              stats.failed++;
              failures.push(result);
              logger.warn(`${result.message} (${job.media.path})`);
            }
          }
        }
      } finally {
        await writer.close();
      }
    }

    if (this.options.deleteJson && processedSidecars.length > 0) {
      const cleaner = new JsonCleaner({ dryRun, backupDir: this.options.jsonBackupDir });
      stats.jsonDeleted = cleaner.deleteSidecars(processedSidecars).deleted;
    }

    if (this.options.deleteZips && extraction && extraction.extractedArchives.length > 0) {
      const complete =
        extraction.failed === 0 &&
        stats.failed === 0 &&
        stats.incomplete === 0 &&
        stats.mediaMatched === stats.mediaFound;
      if (complete) {
        stats.zipsDeleted = extractor.deleteArchives(extraction.extractedArchives, dryRun).deleted;
      } else {
        logger.warn(
          `Keeping ${extraction.extractedArchives.length} archive(s): ` +
            `${stats.mediaFound - stats.mediaMatched} unmatched media, ${stats.failed} failed writes, ` +
            `${stats.incomplete} incomplete writes, ` +
            `${extraction.failed} failed extractions`,
        );
      }
    }

    stats.durationMs = Date.now() - startedAt;

    logger.info(
      `Restore complete: ${stats.injected} injected, ${stats.failed} failed, ${stats.skipped} skipped, ` +
        `${stats.jsonDeleted} sidecars deleted`,
    );

    return { stats, extraction, albums, unmatchedMedia, unconsumedSidecars, unreadableSidecars, failures };
  }
}
