import type { TakeoutMetadata } from './takeout-metadata.js';

export const IMAGE_EXTENSIONS = [
  '.jpg', '.jpeg', '.png', '.gif', '.bmp', '.tiff', '.tif',
  '.webp', '.heic', '.heif', '.raw', '.cr2', '.nef', '.arw',
  '.dng', '.orf', '.rw2', '.pef', '.srw',
];

export const VIDEO_EXTENSIONS = [
  '.mp4', '.mov', '.avi', '.mkv', '.wmv', '.flv', '.webm',
  '.m4v', '.3gp', '.3g2', '.mts', '.m2ts', '.mpg', '.mpeg',
];

export type MediaKind = 'image' | 'video';

/**
 * Naming conventions the matcher recognises. Google has changed these over
 * time, so every table is overridable from the config file.
 */
export interface MatchRules {
  /** Suffixes Google appends to edited or derived copies, compared case-insensitively. */
  editSuffixes: string[];
  /** Marker of newer sidecars (`photo.jpg.supplemental-metadata.json`); any truncation of it is recognised. */
  supplementalMarker: string;
  /** Shortest sidecar name accepted as a truncated prefix of a media file name. */
  minPrefixLength: number;
  imageExtensions: string[];
  videoExtensions: string[];
  /** Takeout JSON files that describe albums or the export rather than one media file. */
  ignoredJsonNames: string[];
}

export const DEFAULT_MATCH_RULES: MatchRules = {
  editSuffixes: [
    '-edited',
    '-bearbeitet',
    '-modifié',
    '-editado',
    '-modificato',
    '-編集済み',
    '-effects',
    '-animation',
    '-collage',
    '-pano',
    '-motion',
  ],
  supplementalMarker: 'supplemental-metadata',
  minPrefixLength: 5,
  imageExtensions: IMAGE_EXTENSIONS,
  videoExtensions: VIDEO_EXTENSIONS,
  ignoredJsonNames: [
    'metadata.json',
    'print-subscriptions.json',
    'shared_album_comments.json',
    'user-generated-memory-titles.json',
  ],
};

export interface MediaEntry {
  path: string;
  fileName: string;
  /** File name without its final extension. */
  baseName: string;
  /** Final extension including the dot, in its original case. */
  extension: string;
  kind: MediaKind;
  /** Duplicate counter, `photo(2).jpg` -> 2. */
  counter?: number;
  /** Edit suffix as written in the file name, `photo-edited.jpg` -> `-edited`. */
  editSuffix?: string;
  /** Base name with the counter removed. */
  uncountedName: string;
  /** Base name with the edit suffix removed. */
  uneditedName: string;
  /** Base name with both counter and edit suffix removed. */
  coreName: string;
  logicalName: string;
  /** Position in the album listing. */
  index: number;
}

export type SidecarMarker = 'none' | 'full' | 'truncated';

export interface SidecarEntry {
  path: string;
  fileName: string;
  /** File name minus `.json` and the counter. */
  stem: string;
  /** The media file name this sidecar's own name points at. */
  describedName: string;
  counter?: number;
  marker: SidecarMarker;
  /** Original file name as Google recorded it in the JSON. */
  title: string;
  logicalNames: string[];
  metadata: TakeoutMetadata;
  index: number;
}

export type MatchStrategy = 'exact' | 'supplemental' | 'truncated' | 'duplicate' | 'edited' | 'logical';

export type MatchResult =
  | {
      kind: 'matched';
      media: MediaEntry;
      sidecar: SidecarEntry;
      strategy: MatchStrategy;
      confidence: number;
    }
  | {
      kind: 'unmatched';
      media: MediaEntry;
    };

export type UnreadableReason = 'io' | 'parse' | 'schema';

export type MatchDiagnostic =
  | {
      kind: 'unreadable_sidecar';
      sidecarPath: string;
      reason: UnreadableReason;
      message: string;
    }
  | {
      kind: 'ambiguous_match';
      mediaPath: string;
      strategy: MatchStrategy;
      chosenPath: string;
      candidatePaths: string[];
    }
  | {
      kind: 'no_match';
      mediaPath: string;
    };

export interface MatchDiagnosticsSink {
  report(diagnostic: MatchDiagnostic): void;
}

/** Media and sidecar files found in one Takeout folder. */
export interface AlbumListing {
  directory: string;
  albumName?: string;
  mediaPaths: string[];
  sidecarPaths: string[];
}

export interface AlbumMatch {
  directory: string;
  albumName?: string;
  results: MatchResult[];
  unconsumedSidecars: SidecarEntry[];
  unreadableSidecars: string[];
  diagnostics: MatchDiagnostic[];
}
