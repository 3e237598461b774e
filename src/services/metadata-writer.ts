import { ExifTool, exiftool } from 'exiftool-vendored';
import fs from 'fs';
import path from 'path';
import type { MediaKind } from '../models/media.js';
import type { RestorableMetadata } from '../models/takeout-metadata.js';
import { logger } from '../utils/logger.js';
import { formatExifDate, hasUsefulMetadata } from './sidecar-parser.js';

export type ExifTags = Record<string, string | number>;

/**
 * `unsupported`: the writer could not store everything the sidecar carries,
 * so the sidecar must stay for a later run.
 */
export type MetadataWriteErrorType = 'not_found' | 'no_metadata' | 'unsupported' | 'write_failed';

export interface MetadataWriteResult {
  success: boolean;
  filePath: string;
  message: string;
  errorType?: MetadataWriteErrorType;
  tags?: ExifTags;
}

export interface MediaTarget {
  path: string;
  kind: MediaKind;
}

export interface MetadataWriter {
  readonly name: string;
  write(target: MediaTarget, metadata: RestorableMetadata): Promise<MetadataWriteResult>;
  close(): Promise<void>;
}

/** The part of exiftool-vendored's ExifTool the writer relies on. */
export interface ExifToolClient {
  write(file: string, tags: ExifTags): Promise<unknown>;
  version(): Promise<string>;
  end(): Promise<void>;
}

export interface MetadataWriterOptions {
  dryRun?: boolean;
  updateFileDates?: boolean;
  /** Custom exiftool binary; the bundled one is used otherwise. */
  exiftoolPath?: string;
}

/**
 * Maps restorable metadata onto the tags exiftool should write.
 */
export function buildExifTags(kind: MediaKind, metadata: RestorableMetadata): ExifTags {
  const tags: ExifTags = {};

  if (metadata.takenAt) {
    const date = formatExifDate(metadata.takenAt);
    if (kind === 'video') {
      tags.CreateDate = date;
      tags.ModifyDate = date;
      tags.MediaCreateDate = date;
      tags.MediaModifyDate = date;
      tags.TrackCreateDate = date;
      tags.TrackModifyDate = date;
    } else {
      tags.DateTimeOriginal = date;
      tags.CreateDate = date;
      tags.ModifyDate = date;
    }
  }

  const location = metadata.location;
  if (location) {
    tags.GPSLatitude = Math.abs(location.latitude);
    tags.GPSLatitudeRef = location.latitude >= 0 ? 'N' : 'S';
    tags.GPSLongitude = Math.abs(location.longitude);
    tags.GPSLongitudeRef = location.longitude >= 0 ? 'E' : 'W';
    if (location.altitude !== 0) {
      tags.GPSAltitude = Math.abs(location.altitude);
      tags.GPSAltitudeRef = location.altitude >= 0 ? 'Above Sea Level' : 'Below Sea Level';
    }
  }

  if (metadata.description) {
    tags.ImageDescription = metadata.description;
    tags.Description = metadata.description;
    tags['Caption-Abstract'] = metadata.description;
    // Windows Explorer reads XPComment
    if (kind === 'image') tags.XPComment = metadata.description;
  }

  return tags;
}

async function setFileDates(filePath: string, date: Date): Promise<void> {
  try {
    await fs.promises.utimes(filePath, date, date);
    logger.debug(`Updated file dates for ${path.basename(filePath)}`);
  } catch (error) {
    logger.warn(`Could not update file dates for ${filePath}: ${error}`);
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Writes dates, GPS and captions into media files with exiftool.
 */
export class ExifMetadataWriter implements MetadataWriter {
  readonly name = 'exiftool';
  private readonly dryRun: boolean;
  private readonly updateFileDates: boolean;
  private readonly client: ExifToolClient;

  constructor(options: MetadataWriterOptions = {}, client?: ExifToolClient) {
    this.dryRun = options.dryRun ?? false;
    this.updateFileDates = options.updateFileDates ?? true;
    this.client = client ?? (options.exiftoolPath ? new ExifTool({ exiftoolPath: options.exiftoolPath }) : exiftool);
  }

  async write(target: MediaTarget, metadata: RestorableMetadata): Promise<MetadataWriteResult> {
    const filePath = target.path;

    if (!fs.existsSync(filePath)) {
      return { success: false, filePath, message: 'File not found', errorType: 'not_found' };
    }

    if (!hasUsefulMetadata(metadata)) {
      return { success: false, filePath, message: 'No useful metadata to write', errorType: 'no_metadata' };
    }

    const tags = buildExifTags(target.kind, metadata);

    if (this.dryRun) {
      logger.info(`[DRY RUN] Would write ${Object.keys(tags).join(', ')} to ${filePath}`);
      return { success: true, filePath, message: 'Dry run', tags };
    }

    try {
      await this.client.write(filePath, tags);
    } catch (error) {
      logger.warn(`Failed to write metadata to ${filePath}: ${error}`);
      if (isMissingFileError(error)) {
        return { success: false, filePath, message: 'File not found or was deleted', errorType: 'not_found' };
      }
      return { success: false, filePath, message: `Failed to write metadata: ${error}`, errorType: 'write_failed' };
    }

    // exiftool keeps the untouched file next to the new one
    const backupPath = `${filePath}_original`;
    try {
      if (fs.existsSync(backupPath)) {
        fs.unlinkSync(backupPath);
      }
    } catch (cleanupError) {
      logger.warn(`Could not clean up backup file ${backupPath}: ${cleanupError}`);
    }

    if (this.updateFileDates && metadata.takenAt) {
      await setFileDates(filePath, metadata.takenAt);
    }

    logger.debug(`Wrote metadata to ${path.basename(filePath)}`);
    return { success: true, filePath, message: 'Metadata written', tags };
  }

  async version(): Promise<string> {
    return this.client.version();
  }

  async close(): Promise<void> {
    try {
      await this.client.end();
    } catch (error) {
      logger.warn(`Error closing exiftool: ${error}`);
    }
  }
}

/**
 * Used when exiftool cannot be started: only the file-system dates are set.
 */
export class FileDateWriter implements MetadataWriter {
  readonly name = 'file-dates';
  private readonly dryRun: boolean;
  private readonly updateFileDates: boolean;

  constructor(options: MetadataWriterOptions = {}) {
    this.dryRun = options.dryRun ?? false;
    this.updateFileDates = options.updateFileDates ?? true;
  }

  async write(target: MediaTarget, metadata: RestorableMetadata): Promise<MetadataWriteResult> {
    const filePath = target.path;

    if (!fs.existsSync(filePath)) {
      return { success: false, filePath, message: 'File not found', errorType: 'not_found' };
    }
    if (!hasUsefulMetadata(metadata)) {
      return { success: false, filePath, message: 'No useful metadata to write', errorType: 'no_metadata' };
    }

    const takenAt = this.updateFileDates ? metadata.takenAt : undefined;
    if (takenAt) {
      if (this.dryRun) {
        logger.info(`[DRY RUN] Would set file dates of ${filePath} to ${takenAt.toISOString()}`);
      } else {
        await setFileDates(filePath, takenAt);
      }
    }

    const unwritten = [
      !takenAt && metadata.takenAt ? 'date' : undefined,
      metadata.location ? 'GPS' : undefined,
      metadata.description ? 'description' : undefined,
    ].filter((field): field is string => field !== undefined);

    if (unwritten.length > 0) {
      return {
        success: false,
        filePath,
        message: `exiftool unavailable, not written: ${unwritten.join(', ')}`,
        errorType: 'unsupported',
      };
    }
    return { success: true, filePath, message: 'File dates updated' };
  }

  async close(): Promise<void> {}
}

/**
 * Starts exiftool and falls back to {@link FileDateWriter} when it is unavailable.
 */
export async function createMetadataWriter(options: MetadataWriterOptions = {}): Promise<MetadataWriter> {
  const writer = new ExifMetadataWriter(options);
  try {
    const version = await writer.version();
    logger.info(`Using exiftool ${version}`);
    return writer;
  } catch (error) {
    logger.warn(`exiftool is not available (${error}); only file dates will be updated`);
    await writer.close();
    return new FileDateWriter(options);
  }
}
