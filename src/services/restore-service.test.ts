import AdmZip from 'adm-zip';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileDateWriter, type MetadataWriter } from './metadata-writer.js';
import { RestoreService, type RestoreDependencies } from './restore-service.js';

function sidecar(title: string, timestamp?: string): string {
  return JSON.stringify(timestamp ? { title, photoTakenTime: { timestamp } } : { title });
}

function stubWriter() {
  return {
    name: 'stub',
    write: vi.fn<MetadataWriter['write']>(async (target, metadata) =>
      metadata.takenAt
        ? { success: true, filePath: target.path, message: 'Metadata written' }
        : { success: false, filePath: target.path, message: 'No useful metadata to write', errorType: 'no_metadata' },
    ),
    close: vi.fn<MetadataWriter['close']>(async () => undefined),
  };
}

type CreateWriter = NonNullable<RestoreDependencies['createWriter']>;

describe('RestoreService', () => {
  let tempDir: string;
  let album: string;

  const write = (name: string, content: string): string => {
    const filePath = path.join(album, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'restore-service-'));
    album = path.join(tempDir, 'Holiday');
    fs.mkdirSync(album);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('with an extracted folder', () => {
    let photo: string;
    let photoJson: string;
    let noteJson: string;
    let orphanJson: string;
    let brokenJson: string;

    beforeEach(() => {
      photo = write('photo.jpg', 'jpeg');
      photoJson = write('photo.jpg.json', sidecar('photo.jpg', '1600000000'));
      write('note.jpg', 'jpeg');
      noteJson = write('note.jpg.json', sidecar('note.jpg'));
      write('lonely.jpg', 'jpeg');
      orphanJson = write('orphan.png.json', sidecar('orphan.png', '1600000000'));
      brokenJson = write('broken.jpg.json', '{not json');
    });

    it('injects matched media and deletes the processed sidecars', async () => {
      const writer = stubWriter();
      const service = new RestoreService({ inputPath: tempDir }, { createWriter: async () => writer });

      const report = await service.run();

      expect(report.stats).toEqual({
        zipsExtracted: 0,
        zipsDeleted: 0,
        mediaFound: 3,
        mediaMatched: 2,
        injected: 1,
        failed: 0,
        skipped: 1,
        incomplete: 0,
        jsonDeleted: 2,
        unconsumedSidecars: 1,
        unreadableSidecars: 1,
        durationMs: report.stats.durationMs,
      });
      expect(report.unmatchedMedia).toEqual([path.join(album, 'lonely.jpg')]);
      expect(report.unconsumedSidecars).toEqual([orphanJson]);
      expect(report.unreadableSidecars).toEqual([brokenJson]);

      expect(writer.write).toHaveBeenCalledWith(
        { path: photo, kind: 'image' },
        { takenAt: new Date(1600000000 * 1000), location: undefined, description: undefined, people: [] },
      );
      expect(writer.close).toHaveBeenCalledTimes(1);

      expect(fs.existsSync(photoJson)).toBe(false);
      expect(fs.existsSync(noteJson)).toBe(false);
      expect(fs.existsSync(orphanJson)).toBe(true);
      expect(fs.existsSync(brokenJson)).toBe(true);
    });

    it('keeps sidecars when asked to', async () => {
      const service = new RestoreService({ inputPath: tempDir, deleteJson: false }, { createWriter: async () => stubWriter() });

      const report = await service.run();

      expect(report.stats.jsonDeleted).toBe(0);
      expect(fs.existsSync(photoJson)).toBe(true);
      expect(fs.existsSync(noteJson)).toBe(true);
    });

    it('keeps the sidecar of a failed write and reports the failure', async () => {
      const writer = stubWriter();
      writer.write.mockImplementation(async (target) => ({
        success: false,
        filePath: target.path,
        message: 'Failed to write metadata: Error: Not a valid JPG',
        errorType: 'write_failed',
      }));
      const service = new RestoreService({ inputPath: tempDir }, { createWriter: async () => writer });

      const report = await service.run();

      expect(report.stats.failed).toBe(2);
      expect(report.stats.injected).toBe(0);
      expect(report.failures.map((failure) => failure.filePath)).toEqual([path.join(album, 'note.jpg'), photo]);
      expect(fs.existsSync(photoJson)).toBe(true);
    });

    it('counts a thrown writer error as a failure', async () => {
      const writer = stubWriter();
      writer.write.mockRejectedValue(new Error('exiftool crashed'));
      const service = new RestoreService({ inputPath: tempDir, concurrency: 1 }, { createWriter: async () => writer });

      const report = await service.run();

      expect(report.stats.failed).toBe(2);
      expect(report.failures[0]).toEqual({
        success: false,
        filePath: path.join(album, 'note.jpg'),
        message: `Error processing ${path.join(album, 'note.jpg')}: Error: exiftool crashed`,
        errorType: 'write_failed',
      });
      expect(writer.close).toHaveBeenCalledTimes(1);
    });

    it('keeps sidecars whose GPS or caption the fallback writer cannot store', async () => {
      const placeJson = write(
        'place.jpg.json',
        JSON.stringify({
          title: 'place.jpg',
          photoTakenTime: { timestamp: '1600000000' },
          geoData: { latitude: 48.85, longitude: 2.35, altitude: 0 },
        }),
      );
      write('place.jpg', 'jpeg');
      const service = new RestoreService({ inputPath: tempDir }, { createWriter: async (options) => new FileDateWriter(options) });

      const report = await service.run();

      expect(report.stats.injected).toBe(1);
      expect(report.stats.incomplete).toBe(1);
      expect(report.stats.skipped).toBe(1);
      expect(report.stats.failed).toBe(0);
      expect(fs.existsSync(placeJson)).toBe(true);
      expect(fs.existsSync(photoJson)).toBe(false);
      expect(fs.statSync(photo).mtime.getTime()).toBe(1600000000 * 1000);
    });

    it('passes dry-run to the writer and leaves sidecars on disk', async () => {
      const createWriter = vi.fn<CreateWriter>(async () => stubWriter());
      const service = new RestoreService(
        { inputPath: tempDir, dryRun: true, updateFileDates: false, exiftoolPath: '/opt/exiftool' },
        { createWriter },
      );

      const report = await service.run();

      expect(createWriter).toHaveBeenCalledWith({ dryRun: true, updateFileDates: false, exiftoolPath: '/opt/exiftool' });
      expect(report.stats.jsonDeleted).toBe(2);
      expect(fs.existsSync(photoJson)).toBe(true);
      expect(fs.existsSync(noteJson)).toBe(true);
    });

    it('reports injection progress', async () => {
      const progress = vi.fn();
      const service = new RestoreService({ inputPath: tempDir }, { createWriter: async () => stubWriter() });

      await service.run(progress);

      expect(progress.mock.calls).toEqual([
        ['inject', 1, 2, 'note.jpg'],
        ['inject', 2, 2, 'photo.jpg'],
      ]);
    });
  });

  it('does not start a writer when nothing matched', async () => {
    write('lonely.jpg', 'jpeg');
    const createWriter = vi.fn<CreateWriter>(async () => stubWriter());

    const report = await new RestoreService({ inputPath: tempDir }, { createWriter }).run();

    expect(createWriter).not.toHaveBeenCalled();
    expect(report.stats.mediaFound).toBe(1);
    expect(report.stats.mediaMatched).toBe(0);
  });

  describe('with archives', () => {
    let inputDir: string;
    let outputDir: string;
    let archive: string;

    const makeArchive = (files: Record<string, string>): void => {
      const zip = new AdmZip();
      for (const [name, content] of Object.entries(files)) {
        zip.addFile(name, Buffer.from(content));
      }
      zip.writeZip(archive);
    };

    beforeEach(() => {
      inputDir = path.join(tempDir, 'downloads');
      outputDir = path.join(tempDir, 'extracted');
      fs.mkdirSync(inputDir);
      archive = path.join(inputDir, 'takeout-001.zip');
    });

    it('extracts, restores and then deletes the archives', async () => {
      makeArchive({
        'Takeout/Google Photos/Trip/beach.jpg': 'jpeg',
        'Takeout/Google Photos/Trip/beach.jpg.json': sidecar('beach.jpg', '1700000000'),
      });
      const writer = stubWriter();
      const service = new RestoreService(
        { inputPath: inputDir, outputPath: outputDir, extractZips: true, deleteZips: true },
        { createWriter: async () => writer },
      );

      const report = await service.run();

      const beach = path.join(outputDir, 'Takeout', 'Google Photos', 'Trip', 'beach.jpg');
      expect(report.stats.zipsExtracted).toBe(1);
      expect(report.stats.injected).toBe(1);
      expect(report.stats.zipsDeleted).toBe(1);
      expect(report.albums.map((a) => a.albumName)).toEqual(['Trip']);
      expect(writer.write).toHaveBeenCalledWith({ path: beach, kind: 'image' }, expect.anything());
      expect(fs.existsSync(beach)).toBe(true);
      expect(fs.existsSync(`${beach}.json`)).toBe(false);
      expect(fs.existsSync(archive)).toBe(false);
    });

    it('stops when no archive could be extracted', async () => {
      fs.writeFileSync(archive, 'not a zip');
      const createWriter = vi.fn<CreateWriter>(async () => stubWriter());
      const service = new RestoreService(
        { inputPath: inputDir, outputPath: outputDir, extractZips: true },
        { createWriter },
      );

      await expect(service.run()).rejects.toThrow(`None of the 1 archive(s) in ${inputDir} could be extracted`);
      expect(createWriter).not.toHaveBeenCalled();
    });

    it('keeps the archives while media is unmatched', async () => {
      makeArchive({
        'Takeout/Google Photos/Trip/beach.jpg': 'jpeg',
        'Takeout/Google Photos/Trip/beach.jpg.json': sidecar('beach.jpg', '1700000000'),
        'Takeout/Google Photos/Trip/sunset.jpg': 'jpeg',
      });
      const service = new RestoreService(
        { inputPath: inputDir, outputPath: outputDir, extractZips: true, deleteZips: true },
        { createWriter: async () => stubWriter() },
      );

      const report = await service.run();

      expect(report.stats.mediaFound).toBe(2);
      expect(report.stats.zipsDeleted).toBe(0);
      expect(fs.existsSync(archive)).toBe(true);
    });
  });
});
