#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs';
import path from 'path';
import { getSynologyVolume, loadConfig, type ConfigOverrides, type RestoreConfig } from './config.js';
import type { AlbumMatch } from './models/media.js';
import { logger, configureLogger } from './utils/logger.js';
import { JsonCleaner } from './services/json-cleaner.js';
import { buildMatchReport } from './services/match-report.js';
import { createLoggingSink, Matcher } from './services/matcher.js';
import { RestoreService } from './services/restore-service.js';
import { TakeoutScanner } from './services/takeout-scanner.js';
import { ZipExtractor } from './services/zip-extractor.js';

interface CommonOptions {
  config?: string;
  logLevel?: string;
  logFile?: string;
}

interface RestoreCommandOptions extends CommonOptions {
  output?: string;
  extract?: boolean;
  deleteZips?: boolean;
  keepJson?: boolean;
  fileDates: boolean;
  dryRun?: boolean;
  exiftool?: string;
  concurrency?: number;
}

interface MatchCommandOptions extends CommonOptions {
  json?: string;
}

interface ExtractCommandOptions extends CommonOptions {
  output?: string;
  flatten?: boolean;
}

interface OrphansCommandOptions extends CommonOptions {
  delete?: boolean;
  dryRun?: boolean;
}

const program = new Command();

program
  .name('takeout-restore')
  .description('Restore dates, GPS and captions from Google Takeout sidecar JSON files into your photos')
  .version('1.0.0');

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'YAML configuration file')
    .option('-l, --log-level <level>', 'Log level: fatal, error, warn, info, debug, trace')
    .option('--log-file <file>', 'Also write logs to this file');
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function prepare(options: CommonOptions, overrides: ConfigOverrides = {}): RestoreConfig {
  const config = loadConfig({
    configPath: options.config,
    overrides: { ...overrides, logLevel: options.logLevel, logFile: options.logFile },
  });
  configureLogger({ level: config.logLevel, logFile: config.logFile });
  return config;
}

function requireInput(config: RestoreConfig): string {
  if (!config.inputPath) {
    throw new Error('No input folder given: pass <input>, set input_folder in the config file or TAKEOUT_INPUT');
  }
  return config.inputPath;
}

function reportFailure(action: string, error: unknown): never {
  logger.error(`${action} failed: ${error}`);
  process.exit(1);
}

withCommonOptions(
  program
    .command('restore')
    .description('Extract, match and write Takeout metadata into media files')
    .argument('[input]', 'Takeout folder or folder of .zip archives (default: TAKEOUT_INPUT)')
    .option('-o, --output <folder>', 'Extract archives here instead of the input folder')
    .option('-e, --extract', 'Extract .zip archives first')
    .option('--delete-zips', 'Delete archives after a fully successful run')
    .option('-k, --keep-json', 'Keep sidecar JSON files after processing')
    .option('--no-file-dates', 'Do not set file modification dates')
    .option('-n, --dry-run', 'Show what would change without writing anything')
    .option('--exiftool <path>', 'Path to a custom exiftool binary')
    .option('--concurrency <n>', 'Files written in parallel', parsePositiveInt),
).action(async (input: string | undefined, options: RestoreCommandOptions, command: Command) => {
  try {
    const config = prepare(options, {
      inputPath: input,
      outputPath: options.output,
      extractZips: options.extract,
      deleteZips: options.deleteZips,
      deleteJson: options.keepJson ? false : undefined,
      updateFileDates: command.getOptionValueSource('fileDates') === 'cli' ? options.fileDates : undefined,
      dryRun: options.dryRun,
      exiftoolPath: options.exiftool,
      concurrency: options.concurrency,
    });
    const inputPath = requireInput(config);

    if (config.dryRun) {
      console.log('\n[DRY RUN] No files will be changed.\n');
    }

    const service = new RestoreService({
      inputPath,
      outputPath: config.outputPath,
      extractZips: config.extractZips,
      deleteZips: config.deleteZips,
      deleteJson: config.deleteJson,
      updateFileDates: config.updateFileDates,
      dryRun: config.dryRun,
      exiftoolPath: config.exiftoolPath,
      concurrency: config.concurrency,
      jsonBackupDir: config.jsonBackupDir,
      rules: config.matching,
    });

    const report = await service.run((phase, current, total, filename) => {
      const label = phase === 'extract' ? 'Extracting' : 'Writing';
      process.stdout.write(`\r${label} [${current}/${total}] ${filename}...`);
    });
    const { stats } = report;

    console.log('\n');
    console.log('========== RESTORE RESULTS ==========');
    if (config.extractZips) {
      console.log(`  Archives extracted: ${stats.zipsExtracted}`);
      console.log(`  Archives deleted: ${stats.zipsDeleted}`);
    }
    console.log(`  Media files found: ${stats.mediaFound}`);
    console.log(`  Matched to a sidecar: ${stats.mediaMatched}`);
    console.log(`  Metadata written: ${stats.injected}`);
    console.log(`  Nothing to write: ${stats.skipped}`);
    console.log(`  Written in part (sidecar kept): ${stats.incomplete}`);
    console.log(`  Failed: ${stats.failed}`);
    console.log(`  Sidecars deleted: ${stats.jsonDeleted}`);
    console.log(`  Unconsumed sidecars: ${stats.unconsumedSidecars}`);
    console.log(`  Unreadable sidecars: ${stats.unreadableSidecars}`);
    console.log(`  Duration: ${formatDuration(stats.durationMs)}`);

    printList('Unmatched media', report.unmatchedMedia);
    printList('Unconsumed sidecars', report.unconsumedSidecars);
    printList('Unreadable sidecars', report.unreadableSidecars);
    printList(
      'Failed writes',
      report.failures.map((failure) => `${failure.filePath}: ${failure.message}`),
    );
    console.log('\n=====================================\n');

    if (stats.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    reportFailure('Restore', error);
  }
});

withCommonOptions(
  program
    .command('match')
    .description('Show how media files pair with sidecars without changing anything')
    .argument('[input]', 'Extracted Takeout folder (default: TAKEOUT_INPUT)')
    .option('--json <file>', 'Save the full report as JSON'),
).action(async (input: string | undefined, options: MatchCommandOptions) => {
  try {
    const config = prepare(options, { inputPath: input });
    const inputPath = requireInput(config);

    const scan = new TakeoutScanner(config.matching).scan(inputPath);
    const matcher = new Matcher({ rules: config.matching, sink: createLoggingSink(logger) });

    const albums: AlbumMatch[] = [];
    for (let i = 0; i < scan.albums.length; i++) {
      const listing = scan.albums[i];
      process.stdout.write(`\r[${i + 1}/${scan.albums.length}] ${path.basename(listing.directory)}...`);
      albums.push(matcher.matchAlbum(listing));
    }

    const report = buildMatchReport(scan.root, albums);
    const { totals } = report;

    console.log('\n');
    console.log('========== MATCH REPORT ==========');
    console.log(`  Folder: ${report.root}`);
    console.log(`  Folders scanned: ${report.albums.length}`);
    console.log(`  Media files: ${totals.media}`);
    console.log(`  Matched: ${totals.matched}`);
    for (const [strategy, count] of Object.entries(report.byStrategy)) {
      if (count > 0) console.log(`    - ${strategy}: ${count}`);
    }
    console.log(`  Unmatched: ${totals.unmatched}`);
    console.log(`  Unconsumed sidecars: ${totals.unconsumedSidecars}`);
    console.log(`  Unreadable sidecars: ${totals.unreadableSidecars}`);

    printList(
      'Unmatched media',
      report.albums.flatMap((album) => album.unmatchedMedia),
    );
    printList(
      'Unconsumed sidecars',
      report.albums.flatMap((album) => album.unconsumedSidecars),
    );

    if (options.json) {
      fs.writeFileSync(options.json, JSON.stringify(report, null, 2));
      console.log(`\nReport saved to: ${options.json}`);
    }

    console.log('\n==================================\n');
  } catch (error) {
    reportFailure('Match', error);
  }
});

withCommonOptions(
  program
    .command('extract')
    .description('Extract Takeout .zip archives only')
    .argument('[input]', 'A .zip archive or a folder of archives (default: TAKEOUT_INPUT)')
    .option('-o, --output <folder>', 'Destination folder (default: next to the archives)')
    .option('--flatten', 'Drop the Takeout/Google Photos prefix from extracted paths'),
).action(async (input: string | undefined, options: ExtractCommandOptions) => {
  try {
    const config = prepare(options, { inputPath: input, outputPath: options.output });
    const inputPath = requireInput(config);
    const destination =
      config.outputPath ?? (fs.existsSync(inputPath) && fs.statSync(inputPath).isFile() ? path.dirname(inputPath) : inputPath);

    const extractor = new ZipExtractor({ flatten: options.flatten });
    const result = await extractor.extractAll(inputPath, destination, (current, total, filename) => {
      process.stdout.write(`\r[${current}/${total}] ${filename}...`);
    });

    console.log('\n');
    console.log('========== EXTRACTION RESULTS ==========');
    console.log(`  Archives found: ${result.total}`);
    console.log(`  Extracted: ${result.successful}`);
    console.log(`  Failed: ${result.failed}`);
    console.log(`  Files written: ${result.filesWritten}`);
    console.log(`  Destination: ${destination}`);
    printList('Failed archives', result.failedArchives);
    console.log('\n========================================\n');

    if (result.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    reportFailure('Extract', error);
  }
});

withCommonOptions(
  program
    .command('orphans')
    .description('List sidecar JSON files that no media file uses')
    .argument('[input]', 'Extracted Takeout folder (default: TAKEOUT_INPUT)')
    .option('--delete', 'Delete the orphaned sidecars')
    .option('-n, --dry-run', 'With --delete, only show what would be deleted'),
).action(async (input: string | undefined, options: OrphansCommandOptions) => {
  try {
    const config = prepare(options, { inputPath: input, dryRun: options.dryRun });
    const inputPath = requireInput(config);

    const orphans = JsonCleaner.findOrphanedSidecars(inputPath, config.matching);
    const sidecarPaths = orphans.flatMap((album) => album.sidecarPaths);

    console.log('\n========== ORPHANED SIDECARS ==========');
    if (sidecarPaths.length === 0) {
      console.log('  None found.');
    }
    for (const album of orphans) {
      console.log(`\n  ${album.directory}`);
      for (const sidecarPath of album.sidecarPaths) {
        console.log(`    - ${path.basename(sidecarPath)}`);
      }
    }

    if (options.delete && sidecarPaths.length > 0) {
      const cleaner = new JsonCleaner({ dryRun: config.dryRun, backupDir: config.jsonBackupDir });
      const result = cleaner.deleteSidecars(sidecarPaths);
      console.log(`\n  ${config.dryRun ? 'Would delete' : 'Deleted'}: ${result.deleted}`);
      console.log(`  Failed: ${result.failed}`);
    } else if (sidecarPaths.length > 0) {
      console.log(`\n  ${sidecarPaths.length} orphaned sidecar(s). Run with --delete to remove them.`);
    }
    console.log('\n=======================================\n');
  } catch (error) {
    reportFailure('Orphans', error);
  }
});

program
  .command('guide')
  .description('Show how to run restores as a scheduled task on a Synology NAS')
  .action(() => {
    const volume = getSynologyVolume() ?? '/volume1';
    console.log(`
╔══════════════════════════════════════════════════════════════════════════════╗
║           TAKEOUT-RESTORE: Synology Setup Guide                              ║
╚══════════════════════════════════════════════════════════════════════════════╝

Google Takeout strips dates and locations from your photos and stores them in
JSON files next to each picture. This tool writes them back into the files.

━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

STEP 1: EXPORT FROM GOOGLE
──────────────────────────
1. Go to https://takeout.google.com
2. Click "Deselect all", then select only "Google Photos"
3. Choose .zip archives and the largest archive size
4. Download the archives into a shared folder, e.g.
     ${volume}/takeout/downloads

━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

STEP 2: CHECK THE MATCHING FIRST
────────────────────────────────
  takeout-restore extract ${volume}/takeout/downloads -o ${volume}/takeout/photos
  takeout-restore match ${volume}/takeout/photos --json match-report.json

Unmatched media keep the dates they already have. Review the list before
deleting anything.

━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

STEP 3: DRY RUN
───────────────
  takeout-restore restore ${volume}/takeout/photos --dry-run

━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

STEP 4: SCHEDULE IT IN DSM
──────────────────────────
1. Control Panel > Task Scheduler > Create > Scheduled Task > User-defined script
2. User: root (exiftool needs write access to the photo share)
3. Run command:
     cd ${volume}/docker/takeout-restore && \\
       TAKEOUT_INPUT=${volume}/takeout/downloads \\
       TAKEOUT_OUTPUT=${volume}/photo/Takeout \\
       node dist/index.js restore --extract --delete-zips \\
       --log-file ${volume}/takeout/restore.log
4. Under Task Settings, tick "Send run details by email" to get the summary

Archives are only deleted when every media file was matched and written.

━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

OTHER USEFUL COMMANDS
─────────────────────
  takeout-restore orphans <folder>            # Sidecars nothing used
  takeout-restore orphans <folder> --delete   # ...and remove them
  takeout-restore restore <folder> -k         # Keep the JSON files

━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
`);
  });

// Helper functions
function printList(title: string, items: string[], limit = 20): void {
  if (items.length === 0) return;
  console.log(`\n  ${title} (${items.length}):`);
  for (const item of items.slice(0, limit)) {
    console.log(`    - ${item}`);
  }
  if (items.length > limit) {
    console.log(`    ... and ${items.length - limit} more`);
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms} ms`;
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

await program.parseAsync();
