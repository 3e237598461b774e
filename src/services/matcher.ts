import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import {
  DEFAULT_MATCH_RULES,
  type AlbumListing,
  type AlbumMatch,
  type MatchDiagnostic,
  type MatchDiagnosticsSink,
  type MatchResult,
  type MatchRules,
  type MediaEntry,
  type SidecarEntry,
} from '../models/media.js';
import { DEFAULT_STRATEGIES, type MatchingStrategy, type SidecarLookup } from './match-strategies.js';
import {
  getMediaKind,
  parseMediaName,
  parseSidecarName,
  sidecarLogicalNames,
  toLogicalName,
} from './naming.js';
import { parseSidecarJson } from './sidecar-parser.js';

export type SidecarReader = (filePath: string) => string;

export interface MatcherOptions {
  rules?: MatchRules;
  sink?: MatchDiagnosticsSink;
  reader?: SidecarReader;
  strategies?: readonly MatchingStrategy[];
}

export interface EntryMatch {
  results: MatchResult[];
  unconsumedSidecars: SidecarEntry[];
  diagnostics: MatchDiagnostic[];
}

const readUtf8: SidecarReader = (filePath) => fs.readFileSync(filePath, 'utf-8');

/** Routes matcher diagnostics onto the application logger. */
export function createLoggingSink(log: Logger): MatchDiagnosticsSink {
  return {
    report(diagnostic) {
      switch (diagnostic.kind) {
        case 'unreadable_sidecar':
          log.warn(`Unreadable sidecar (${diagnostic.reason}): ${diagnostic.sidecarPath}: ${diagnostic.message}`);
          break;
        case 'ambiguous_match':
          log.debug(
            `Ambiguous ${diagnostic.strategy} match for ${diagnostic.mediaPath}: chose ${path.basename(diagnostic.chosenPath)} over ${diagnostic.candidatePaths
              .map((p) => path.basename(p))
              .join(', ')}`,
          );
          break;
        case 'no_match':
          log.debug(`No sidecar found for: ${diagnostic.mediaPath}`);
          break;
      }
    },
  };
}

function nameKey(name: string, counter: number | undefined): string {
  return `${name}#${counter ?? 0}`;
}

function addTo<K>(index: Map<K, SidecarEntry[]>, key: K, sidecar: SidecarEntry): void {
  const bucket = index.get(key);
  if (bucket) bucket.push(sidecar);
  else index.set(key, [sidecar]);
}

/**
 * Unclaimed sidecars of one batch, indexed by the names strategies look up.
 *
 * A sidecar whose own name identifies a media file of the batch is reserved
 * for that file until it is matched. File names and counted names are
 * claimed first; a bare `IMG_1234.json` then goes to the file whose base or
 * core name is `IMG_1234`.
 */
class SidecarPool {
  private readonly claimed = new Set<number>();
  private readonly owners = new Map<string, number>();
  private readonly byFileName = new Map<string, SidecarEntry[]>();
  private readonly byDescribedName = new Map<string, SidecarEntry[]>();
  private readonly byStem = new Map<string, SidecarEntry[]>();
  private readonly byLogicalName = new Map<string, SidecarEntry[]>();

  constructor(
    private readonly sidecars: SidecarEntry[],
    media: MediaEntry[],
    private readonly isMatched: (mediaIndex: number) => boolean,
  ) {
    for (const sidecar of sidecars) {
      addTo(this.byFileName, sidecar.fileName, sidecar);
      addTo(this.byDescribedName, nameKey(sidecar.describedName, sidecar.counter), sidecar);
      if (sidecar.counter === undefined && sidecar.stem !== sidecar.describedName) {
        addTo(this.byStem, sidecar.stem, sidecar);
      }
      for (const logicalName of sidecar.logicalNames) addTo(this.byLogicalName, logicalName, sidecar);
    }

    const reserve = (key: string, owner: number): void => {
      if (!this.owners.has(key)) this.owners.set(key, owner);
    };
    for (const entry of media) {
      reserve(nameKey(entry.fileName, undefined), entry.index);
      if (entry.counter !== undefined) {
        reserve(nameKey(`${entry.uncountedName}${entry.extension}`, entry.counter), entry.index);
      }
    }
    for (const entry of media) {
      reserve(nameKey(entry.baseName, undefined), entry.index);
      reserve(nameKey(entry.coreName, undefined), entry.index);
    }
  }

  lookupFor(media: MediaEntry): SidecarLookup {
    const available = (bucket: SidecarEntry[] | undefined): SidecarEntry[] =>
      (bucket ?? []).filter((sidecar) => {
        if (this.claimed.has(sidecar.index)) return false;
        const owner = this.owners.get(nameKey(sidecar.describedName, sidecar.counter));
        return owner === undefined || owner === media.index || this.isMatched(owner);
      });

    return {
      withFileName: (fileName) => available(this.byFileName.get(fileName)),
      describing: (name, counter) => available(this.byDescribedName.get(nameKey(name, counter))),
      withStem: (stem) => available(this.byStem.get(stem)),
      withLogicalName: (name) => available(this.byLogicalName.get(name)),
    };
  }

  claim(sidecar: SidecarEntry): void {
    if (this.claimed.has(sidecar.index)) {
      throw new Error(`Sidecar claimed twice: ${sidecar.path}`);
    }
    this.claimed.add(sidecar.index);
  }

  unclaimed(): SidecarEntry[] {
    return this.sidecars.filter((sidecar) => !this.claimed.has(sidecar.index));
  }
}

/**
 * Pairs the media files of one album directory with their Takeout sidecars.
 *
 * Strategies run strategy-major: every media file is tried with the exact
 * strategy before any file is tried with the next one, so weaker heuristics
 * only see sidecars no stronger pairing wanted.
 */
export class Matcher {
  readonly rules: MatchRules;
  private readonly sink?: MatchDiagnosticsSink;
  private readonly reader: SidecarReader;
  private readonly strategies: readonly MatchingStrategy[];

  constructor(options: MatcherOptions = {}) {
    this.rules = options.rules ?? DEFAULT_MATCH_RULES;
    this.sink = options.sink;
    this.reader = options.reader ?? readUtf8;
    this.strategies = options.strategies ?? DEFAULT_STRATEGIES;
  }

  createMediaEntries(mediaPaths: string[]): MediaEntry[] {
    const entries: MediaEntry[] = [];
    for (const mediaPath of mediaPaths) {
      const kind = getMediaKind(mediaPath, this.rules);
      if (!kind) continue;
      const parsed = parseMediaName(path.basename(mediaPath), this.rules);
      entries.push({
        ...parsed,
        path: mediaPath,
        kind,
        logicalName: toLogicalName(parsed.fileName, this.rules),
        index: entries.length,
      });
    }
    return entries;
  }

  /**
   * Reads and validates sidecars. Unreadable ones are left out and reported.
   */
  loadSidecars(sidecarPaths: string[]): { sidecars: SidecarEntry[]; diagnostics: MatchDiagnostic[] } {
    const sidecars: SidecarEntry[] = [];
    const diagnostics: MatchDiagnostic[] = [];

    for (const sidecarPath of sidecarPaths) {
      let text: string;
      try {
        text = this.reader(sidecarPath);
      } catch (error) {
        diagnostics.push({
          kind: 'unreadable_sidecar',
          sidecarPath,
          reason: 'io',
          message: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      const parsed = parseSidecarJson(text);
      if (!parsed.ok) {
        diagnostics.push({ kind: 'unreadable_sidecar', sidecarPath, reason: parsed.reason, message: parsed.message });
        continue;
      }

      const name = parseSidecarName(path.basename(sidecarPath), this.rules);
      sidecars.push({
        ...name,
        path: sidecarPath,
        title: parsed.metadata.title,
        logicalNames: sidecarLogicalNames(name.describedName, parsed.metadata.title, this.rules),
        metadata: parsed.metadata,
        index: sidecars.length,
      });
    }

    return { sidecars, diagnostics };
  }

  matchEntries(media: MediaEntry[], sidecars: SidecarEntry[]): EntryMatch {
    const matches = new Map<number, MatchResult>();
    const diagnostics: MatchDiagnostic[] = [];
    const pool = new SidecarPool(sidecars, media, (index) => matches.has(index));

    for (const strategy of this.strategies) {
      for (const entry of media) {
        if (matches.has(entry.index)) continue;

        const pick = strategy.select(entry, pool.lookupFor(entry), this.rules);
        if (!pick) continue;

        pool.claim(pick.sidecar);
        matches.set(entry.index, {
          kind: 'matched',
          media: entry,
          sidecar: pick.sidecar,
          strategy: strategy.name,
          confidence: strategy.confidence,
        });

        if (pick.ties.length > 0) {
          diagnostics.push({
            kind: 'ambiguous_match',
            mediaPath: entry.path,
            strategy: strategy.name,
            chosenPath: pick.sidecar.path,
            candidatePaths: pick.ties.map((s) => s.path),
          });
        }
      }
    }

    const results = media.map((entry): MatchResult => {
      const match = matches.get(entry.index);
      if (match) return match;
      diagnostics.push({ kind: 'no_match', mediaPath: entry.path });
      return { kind: 'unmatched', media: entry };
    });

    return { results, unconsumedSidecars: pool.unclaimed(), diagnostics };
  }

  matchAlbum(listing: AlbumListing): AlbumMatch {
    const media = this.createMediaEntries(listing.mediaPaths);
    const loaded = this.loadSidecars(listing.sidecarPaths);
    const matched = this.matchEntries(media, loaded.sidecars);
    const diagnostics = [...loaded.diagnostics, ...matched.diagnostics];

    if (this.sink) {
      for (const diagnostic of diagnostics) this.sink.report(diagnostic);
    }

    return {
      directory: listing.directory,
      albumName: listing.albumName,
      results: matched.results,
      unconsumedSidecars: matched.unconsumedSidecars,
      unreadableSidecars: loaded.diagnostics.flatMap((d) => (d.kind === 'unreadable_sidecar' ? [d.sidecarPath] : [])),
      diagnostics,
    };
  }
}
