import { describe, expect, it } from 'vitest';
import { Matcher } from './matcher.js';
import { buildMatchReport } from './match-report.js';

const files: Record<string, string> = {
  'photo.jpg.json': '{"title":"photo.jpg"}',
  'photo(1).json': '{"title":"photo.jpg"}',
  'extra.png.json': '{"title":"extra.png"}',
  'bad.jpg.json': '[]',
};

const matcher = new Matcher({
  reader: (filePath) => {
    const content = files[filePath.slice(filePath.lastIndexOf('/') + 1)];
    if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
    return content;
  },
});

describe('buildMatchReport', () => {
  it('counts matches per strategy and lists what is left over', () => {
    const album = matcher.matchAlbum({
      directory: '/takeout/Trip',
      albumName: 'Trip',
      mediaPaths: ['/takeout/Trip/photo.jpg', '/takeout/Trip/photo(1).jpg', '/takeout/Trip/video.mp4'],
      sidecarPaths: [
        '/takeout/Trip/bad.jpg.json',
        '/takeout/Trip/extra.png.json',
        '/takeout/Trip/photo(1).json',
        '/takeout/Trip/photo.jpg.json',
      ],
    });

    const report = buildMatchReport('/takeout', [album], new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));

    expect(report).toEqual({
      timestamp: '2024-01-02T03:04:05.000Z',
      root: '/takeout',
      totals: { media: 3, matched: 2, unmatched: 1, unconsumedSidecars: 1, unreadableSidecars: 1 },
      byStrategy: { exact: 1, supplemental: 0, truncated: 0, duplicate: 1, edited: 0, logical: 0 },
      albums: [
        {
          directory: '/takeout/Trip',
          albumName: 'Trip',
          matches: [
            { media: '/takeout/Trip/photo.jpg', sidecar: '/takeout/Trip/photo.jpg.json', strategy: 'exact', confidence: 1 },
            {
              media: '/takeout/Trip/photo(1).jpg',
              sidecar: '/takeout/Trip/photo(1).json',
              strategy: 'duplicate',
              confidence: 0.85,
            },
          ],
          unmatchedMedia: ['/takeout/Trip/video.mp4'],
          unconsumedSidecars: ['/takeout/Trip/extra.png.json'],
          unreadableSidecars: ['/takeout/Trip/bad.jpg.json'],
        },
      ],
    });
  });

  it('writes null for folders that are not albums', () => {
    const album = matcher.matchAlbum({ directory: '/takeout/Photos from 2020', mediaPaths: [], sidecarPaths: [] });
    expect(buildMatchReport('/takeout', [album]).albums[0].albumName).toBeNull();
  });
});
