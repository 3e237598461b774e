import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, loadConfigFile, loadEnvConfig } from './config.js';
import { DEFAULT_MATCH_RULES } from './models/media.js';

describe('config', () => {
  let tempDir: string;

  const writeConfig = (content: string, name = 'config.yaml'): string => {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('falls back to defaults', () => {
    expect(loadConfig({ env: {}, cwd: tempDir })).toEqual({
      inputPath: undefined,
      outputPath: undefined,
      extractZips: false,
      deleteZips: false,
      deleteJson: true,
      updateFileDates: true,
      dryRun: false,
      exiftoolPath: undefined,
      logLevel: 'info',
      logFile: undefined,
      concurrency: 4,
      jsonBackupDir: undefined,
      matching: DEFAULT_MATCH_RULES,
    });
  });

  it('reads environment variables', () => {
    const overrides = loadEnvConfig({
      TAKEOUT_INPUT: '/volume1/takeout',
      EXTRACT_ZIPS: 'yes',
      DELETE_JSON: 'false',
      INJECT_CONCURRENCY: '8',
      LOG_LEVEL: '',
    });

    expect(overrides.inputPath).toBe('/volume1/takeout');
    expect(overrides.extractZips).toBe(true);
    expect(overrides.deleteJson).toBe(false);
    expect(overrides.concurrency).toBe(8);
    expect(overrides.logLevel).toBeUndefined();
  });

  it('rejects malformed environment values', () => {
    expect(() => loadEnvConfig({ DRY_RUN: 'maybe' })).toThrow('DRY_RUN must be true or false, got "maybe"');
    expect(() => loadEnvConfig({ INJECT_CONCURRENCY: '0' })).toThrow(ConfigError);
  });

  it('picks up config.yaml from the working directory', () => {
    writeConfig('input_folder: /data/takeout\ndry_run: true\n');

    const config = loadConfig({ env: {}, cwd: tempDir });

    expect(config.inputPath).toBe('/data/takeout');
    expect(config.dryRun).toBe(true);
  });

  it('layers command line over file over environment', () => {
    const configPath = writeConfig('concurrency: 2\nlog_level: debug\n', 'restore.yaml');

    const config = loadConfig({
      configPath,
      env: { INJECT_CONCURRENCY: '6', LOG_LEVEL: 'warn', DELETE_ZIPS: 'true' },
      overrides: { logLevel: 'error' },
      cwd: tempDir,
    });

    expect(config.concurrency).toBe(2);
    expect(config.logLevel).toBe('error');
    expect(config.deleteZips).toBe(true);
  });

  it('finds the file named by TAKEOUT_RESTORE_CONFIG', () => {
    const configPath = writeConfig('output_folder: /data/out\n', 'elsewhere.yaml');

    const config = loadConfig({ env: { TAKEOUT_RESTORE_CONFIG: configPath }, cwd: os.tmpdir() });

    expect(config.outputPath).toBe('/data/out');
  });

  it('overrides only the matching tables the file names', () => {
    const configPath = writeConfig(
      ['matching:', '  min_prefix_length: 8', '  image_extensions: [JPG, .png]', '  edit_suffixes: [-retouched]'].join('\n'),
    );

    const { matching } = loadConfig({ configPath, env: {} });

    expect(matching).toEqual({
      ...DEFAULT_MATCH_RULES,
      minPrefixLength: 8,
      imageExtensions: ['.jpg', '.png'],
      editSuffixes: ['-retouched'],
    });
  });

  it('expands ${VAR} references in the file', () => {
    process.env.RESTORE_TEST_ROOT = '/volume2';
    try {
      const { overrides } = loadConfigFile(writeConfig('input_folder: ${RESTORE_TEST_ROOT}/takeout\n'));
      expect(overrides.inputPath).toBe('/volume2/takeout');
    } finally {
      delete process.env.RESTORE_TEST_ROOT;
    }
  });

  it('reports a missing file', () => {
    const missing = path.join(tempDir, 'missing.yaml');
    expect(() => loadConfigFile(missing)).toThrow(`Configuration file not found: ${missing}`);
  });

  it('logs config errors under their own name with the file they came from', () => {
    const missing = path.join(tempDir, 'missing.yaml');
    let thrown: unknown;
    try {
      loadConfigFile(missing);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigError);
    expect(thrown).toMatchObject({ filePath: missing });
    expect(`${thrown}`).toBe(`ConfigError: Configuration file not found: ${missing}`);
  });

  it('reports unknown keys and wrong types', () => {
    const configPath = writeConfig('dry_run: sometimes\n');
    expect(() => loadConfigFile(configPath)).toThrow(
      `Invalid configuration file ${configPath}: dry_run: Expected boolean, received string`,
    );

    const unknownKey = writeConfig('colour: blue\n', 'unknown.yaml');
    expect(() => loadConfigFile(unknownKey)).toThrow(ConfigError);
  });

  it('reports invalid YAML', () => {
    const configPath = writeConfig('input_folder: [unclosed\n');
    expect(() => loadConfigFile(configPath)).toThrow(`Invalid YAML in configuration file ${configPath}`);
  });
});
