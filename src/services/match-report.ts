import type { AlbumMatch, MatchStrategy } from '../models/media.js';

export interface MatchReport {
  timestamp: string;
  root: string;
  totals: {
    media: number;
    matched: number;
    unmatched: number;
    unconsumedSidecars: number;
    unreadableSidecars: number;
  };
  byStrategy: Record<MatchStrategy, number>;
  albums: Array<{
    directory: string;
    albumName: string | null;
    matches: Array<{ media: string; sidecar: string; strategy: MatchStrategy; confidence: number }>;
    unmatchedMedia: string[];
    unconsumedSidecars: string[];
    unreadableSidecars: string[];
  }>;
}

/**
 * Flattens matcher output into plain data for printing or `--json`.
 */
export function buildMatchReport(root: string, albums: AlbumMatch[], generatedAt: Date = new Date()): MatchReport {
  const report: MatchReport = {
    timestamp: generatedAt.toISOString(),
    root,
    totals: { media: 0, matched: 0, unmatched: 0, unconsumedSidecars: 0, unreadableSidecars: 0 },
    byStrategy: { exact: 0, supplemental: 0, truncated: 0, duplicate: 0, edited: 0, logical: 0 },
    albums: [],
  };

  for (const album of albums) {
    const entry: MatchReport['albums'][number] = {
      directory: album.directory,
      albumName: album.albumName ?? null,
      matches: [],
      unmatchedMedia: [],
      unconsumedSidecars: album.unconsumedSidecars.map((sidecar) => sidecar.path),
      unreadableSidecars: album.unreadableSidecars,
    };

    for (const result of album.results) {
      report.totals.media++;
      if (result.kind === 'matched') {
        report.totals.matched++;
        report.byStrategy[result.strategy]++;
        entry.matches.push({
          media: result.media.path,
          sidecar: result.sidecar.path,
          strategy: result.strategy,
          confidence: result.confidence,
        });
      } else {
        report.totals.unmatched++;
        entry.unmatchedMedia.push(result.media.path);
      }
    }

    report.totals.unconsumedSidecars += entry.unconsumedSidecars.length;
    report.totals.unreadableSidecars += entry.unreadableSidecars.length;
    report.albums.push(entry);
  }

  return report;
}
