import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { DEFAULT_MATCH_RULES, type MatchRules } from './models/media.js';

dotenv.config();

const DEFAULT_CONCURRENCY = 4;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly filePath?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface RestoreConfig {
  inputPath?: string;
  outputPath?: string;
  extractZips: boolean;
  deleteZips: boolean;
  deleteJson: boolean;
  updateFileDates: boolean;
  dryRun: boolean;
  exiftoolPath?: string;
  logLevel: string;
  logFile?: string;
  concurrency: number;
  jsonBackupDir?: string;
  matching: MatchRules;
}

/** Settings a single source (environment, file, command line) may provide. */
export type ConfigOverrides = Partial<Omit<RestoreConfig, 'matching'>>;

const extensionList = z
  .array(z.string().min(1))
  .transform((list) => list.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()));

const matchingSchema = z
  .object({
    edit_suffixes: z.array(z.string().min(1)).optional(),
    supplemental_marker: z.string().min(1).optional(),
    min_prefix_length: z.number().int().positive().optional(),
    image_extensions: extensionList.optional(),
    video_extensions: extensionList.optional(),
    ignored_json_names: z
      .array(z.string().min(1))
      .transform((list) => list.map((name) => name.toLowerCase()))
      .optional(),
  })
  .strict();

const fileSchema = z
  .object({
    input_folder: z.string().optional(),
    output_folder: z.string().optional(),
    extract_zips: z.boolean().optional(),
    delete_zips_after_extraction: z.boolean().optional(),
    delete_json_after_processing: z.boolean().optional(),
    update_file_dates: z.boolean().optional(),
    dry_run: z.boolean().optional(),
    exiftool_path: z.string().optional(),
    log_level: z.string().optional(),
    log_file: z.string().optional(),
    concurrency: z.number().int().positive().optional(),
    json_backup_dir: z.string().optional(),
    matching: matchingSchema.optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof fileSchema>;

function expandEnv(val: unknown): unknown {
  if (typeof val !== 'string') return val;
  return val.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? '');
}

function deepExpand(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(deepExpand);
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v);
    }
    return out;
  }
  return expandEnv(obj);
}

function parseBoolean(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`${name} must be true or false, got "${value}"`);
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  return {
    inputPath: emptyToUndefined(env.TAKEOUT_INPUT),
    outputPath: emptyToUndefined(env.TAKEOUT_OUTPUT),
    extractZips: parseBoolean('EXTRACT_ZIPS', env.EXTRACT_ZIPS),
    deleteZips: parseBoolean('DELETE_ZIPS', env.DELETE_ZIPS),
    deleteJson: parseBoolean('DELETE_JSON', env.DELETE_JSON),
    updateFileDates: parseBoolean('UPDATE_FILE_DATES', env.UPDATE_FILE_DATES),
    dryRun: parseBoolean('DRY_RUN', env.DRY_RUN),
    exiftoolPath: emptyToUndefined(env.EXIFTOOL_PATH),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
    logFile: emptyToUndefined(env.LOG_FILE),
    concurrency: parsePositiveInt('INJECT_CONCURRENCY', env.INJECT_CONCURRENCY),
  };
}

export interface LoadedConfigFile {
  filePath: string;
  overrides: ConfigOverrides;
  matching: Partial<MatchRules>;
}

export function loadConfigFile(filePath: string): LoadedConfigFile {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Configuration file not found: ${filePath}`, filePath);
  }

  let raw: unknown;
  try {
    raw = deepExpand(parse(fs.readFileSync(filePath, 'utf-8')) ?? {});
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in configuration file ${filePath}: ${message}`, filePath);
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigError(`Invalid configuration file ${filePath}: ${details}`, filePath);
  }

  return { filePath, ...fromConfigFile(parsed.data) };
}

function fromConfigFile(file: ConfigFile): Omit<LoadedConfigFile, 'filePath'> {
  const matching = file.matching ?? {};
  return {
    overrides: {
      inputPath: file.input_folder,
      outputPath: file.output_folder,
      extractZips: file.extract_zips,
      deleteZips: file.delete_zips_after_extraction,
      deleteJson: file.delete_json_after_processing,
      updateFileDates: file.update_file_dates,
      dryRun: file.dry_run,
      exiftoolPath: file.exiftool_path,
      logLevel: file.log_level,
      logFile: file.log_file,
      concurrency: file.concurrency,
      jsonBackupDir: file.json_backup_dir,
    },
    matching: {
      editSuffixes: matching.edit_suffixes,
      supplementalMarker: matching.supplemental_marker,
      minPrefixLength: matching.min_prefix_length,
      imageExtensions: matching.image_extensions,
      videoExtensions: matching.video_extensions,
      ignoredJsonNames: matching.ignored_json_names,
    },
  };
}

export interface LoadConfigOptions {
  /** Explicit YAML file, e.g. from `--config`. */
  configPath?: string;
  /** Command-line values; they win over everything else. */
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function findConfigFile(options: LoadConfigOptions, env: NodeJS.ProcessEnv): string | undefined {
  const explicit = options.configPath ?? emptyToUndefined(env.TAKEOUT_RESTORE_CONFIG);
  if (explicit) return explicit;

  const local = path.join(options.cwd ?? process.cwd(), 'config.yaml');
  return fs.existsSync(local) ? local : undefined;
}

/**
 * Resolves the effective configuration. Precedence, highest first: command
 * line, YAML file, environment (including `.env`), defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): RestoreConfig {
  const env = options.env ?? process.env;
  const configPath = findConfigFile(options, env);
  const file = configPath ? loadConfigFile(configPath) : undefined;

  // first source that sets a value wins
  const sources: ConfigOverrides[] = [options.overrides ?? {}, file?.overrides ?? {}, loadEnvConfig(env)];
  const setting = <K extends keyof ConfigOverrides>(key: K): ConfigOverrides[K] =>
    sources.map((source) => source[key]).find((value) => value !== undefined);
  const matching = file?.matching ?? {};

  return {
    inputPath: setting('inputPath'),
    outputPath: setting('outputPath'),
    extractZips: setting('extractZips') ?? false,
    deleteZips: setting('deleteZips') ?? false,
    deleteJson: setting('deleteJson') ?? true,
    updateFileDates: setting('updateFileDates') ?? true,
    dryRun: setting('dryRun') ?? false,
    exiftoolPath: setting('exiftoolPath'),
    logLevel: setting('logLevel') ?? 'info',
    logFile: setting('logFile'),
    concurrency: setting('concurrency') ?? DEFAULT_CONCURRENCY,
    jsonBackupDir: setting('jsonBackupDir'),
    matching: {
      editSuffixes: matching.editSuffixes ?? DEFAULT_MATCH_RULES.editSuffixes,
      supplementalMarker: matching.supplementalMarker ?? DEFAULT_MATCH_RULES.supplementalMarker,
      minPrefixLength: matching.minPrefixLength ?? DEFAULT_MATCH_RULES.minPrefixLength,
      imageExtensions: matching.imageExtensions ?? DEFAULT_MATCH_RULES.imageExtensions,
      videoExtensions: matching.videoExtensions ?? DEFAULT_MATCH_RULES.videoExtensions,
      ignoredJsonNames: matching.ignoredJsonNames ?? DEFAULT_MATCH_RULES.ignoredJsonNames,
    },
  };
}

export function isSynology(): boolean {
  return fs.existsSync('/etc/synoinfo.conf');
}

export function getSynologyVolume(): string | undefined {
  if (!isSynology()) return undefined;
  return ['/volume1', '/volume2', '/volume3', '/volume4'].find((volume) => fs.existsSync(volume));
}
