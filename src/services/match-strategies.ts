import type { MatchRules, MatchStrategy, MediaEntry, SidecarEntry } from '../models/media.js';

export interface StrategyPick {
  sidecar: SidecarEntry;
  /** Other candidates that ranked exactly as well as the chosen one. */
  ties: SidecarEntry[];
}

/**
 * Indexed view of the sidecars a media file may still take. Every lookup
 * returns unclaimed, unreserved sidecars in directory-listing order.
 */
export interface SidecarLookup {
  withFileName(fileName: string): SidecarEntry[];
  /** Sidecars whose own name describes `name`; no counter means un-numbered ones. */
  describing(name: string, counter?: number): SidecarEntry[];
  /** Un-numbered sidecars whose stem (marker still attached) is `stem`. */
  withStem(stem: string): SidecarEntry[];
  withLogicalName(name: string): SidecarEntry[];
}

export interface MatchingStrategy {
  name: MatchStrategy;
  confidence: number;
  select(media: MediaEntry, sidecars: SidecarLookup, rules: MatchRules): StrategyPick | undefined;
}

/** Candidates with their rank; lower is better. */
type Ranked = Array<[SidecarEntry, number]>;

/** Lowest rank wins; equal ranks keep listing order. */
function pickBest(ranked: Ranked): StrategyPick | undefined {
  const bestRanks = new Map<SidecarEntry, number>();
  for (const [sidecar, rank] of ranked) {
    const seen = bestRanks.get(sidecar);
    if (seen === undefined || rank < seen) bestRanks.set(sidecar, rank);
  }

  let bestRank = Number.POSITIVE_INFINITY;
  let best: SidecarEntry[] = [];
  for (const [sidecar, rank] of bestRanks) {
    if (rank < bestRank) {
      bestRank = rank;
      best = [sidecar];
    } else if (rank === bestRank) {
      best.push(sidecar);
    }
  }
  if (best.length === 0) return undefined;
  const [sidecar, ...ties] = best.sort((a, b) => a.index - b.index);
  return { sidecar, ties };
}

const rankAll = (sidecars: SidecarEntry[], rank: number): Ranked => sidecars.map((s) => [s, rank]);

export const exactStrategy: MatchingStrategy = {
  name: 'exact',
  confidence: 1.0,
  select(media, sidecars) {
    return pickBest(rankAll(sidecars.withFileName(`${media.fileName}.json`), 0));
  },
};

export const supplementalStrategy: MatchingStrategy = {
  name: 'supplemental',
  confidence: 1.0,
  select(media, sidecars) {
    const full = sidecars.describing(media.fileName).filter((s) => s.marker === 'full');
    return pickBest(rankAll(full, 0));
  },
};

export const truncatedStrategy: MatchingStrategy = {
  name: 'truncated',
  confidence: 0.8,
  select(media, sidecars, rules) {
    const fileName = media.fileName;
    // Shortened forms of the media's own name belong to the duplicate and
    // edited strategies.
    const reserved = new Set([
      media.baseName,
      media.coreName,
      `${media.coreName}${media.extension}`,
      media.uncountedName,
      `${media.uncountedName}${media.extension}`,
      media.uneditedName,
      `${media.uneditedName}${media.extension}`,
    ]);

    const ranked: Ranked = rankAll(
      sidecars.describing(fileName).filter((s) => s.marker === 'truncated'),
      0,
    );
    for (let length = rules.minPrefixLength; length < fileName.length; length++) {
      const prefix = fileName.slice(0, length);
      if (reserved.has(prefix)) continue;
      const rank = 1 + fileName.length - length;
      ranked.push(...rankAll(sidecars.describing(prefix), rank));
      // `photo.s.json` may be a cut `.srw` rather than a cut marker.
      ranked.push(...rankAll(sidecars.withStem(prefix).filter((s) => s.marker !== 'none'), rank));
    }
    return pickBest(ranked);
  },
};

export const duplicateStrategy: MatchingStrategy = {
  name: 'duplicate',
  confidence: 0.85,
  select(media, sidecars) {
    const counter = media.counter;
    if (counter === undefined) return undefined;
    const withExt = `${media.uncountedName}${media.extension}`;
    return pickBest([
      ...rankAll(sidecars.describing(withExt, counter), 0),
      ...rankAll(sidecars.describing(media.uncountedName, counter), 0),
      ...rankAll(sidecars.describing(withExt), 1),
    ]);
  },
};

export const editedStrategy: MatchingStrategy = {
  name: 'edited',
  confidence: 0.9,
  select(media, sidecars) {
    if (!media.editSuffix) return undefined;
    const original = media.uneditedName;
    const ranked: Ranked = [
      ...rankAll(sidecars.describing(`${original}${media.extension}`), 0),
      ...rankAll(sidecars.describing(original), 1),
    ];
    if (media.counter !== undefined) {
      ranked.push(
        ...rankAll(sidecars.describing(`${media.coreName}${media.extension}`, media.counter), 2),
        ...rankAll(sidecars.describing(media.coreName, media.counter), 2),
      );
    }
    return pickBest(ranked);
  },
};

export const logicalStrategy: MatchingStrategy = {
  name: 'logical',
  confidence: 0.6,
  select(media, sidecars) {
    return pickBest(rankAll(sidecars.withLogicalName(media.logicalName), 0));
  },
};

export const DEFAULT_STRATEGIES: readonly MatchingStrategy[] = [
  exactStrategy,
  supplementalStrategy,
  truncatedStrategy,
  duplicateStrategy,
  editedStrategy,
  logicalStrategy,
];
