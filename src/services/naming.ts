import path from 'path';
import type { MatchRules, MediaKind, SidecarMarker } from '../models/media.js';

const COUNTER_PATTERN = /^(.+)\((\d+)\)$/;

export interface ParsedMediaName {
  fileName: string;
  baseName: string;
  extension: string;
  counter?: number;
  editSuffix?: string;
  uncountedName: string;
  uneditedName: string;
  coreName: string;
}

export interface ParsedSidecarName {
  fileName: string;
  /** File name minus `.json` and the counter, marker still attached. */
  stem: string;
  describedName: string;
  counter?: number;
  marker: SidecarMarker;
}

export function normalizeName(name: string): string {
  return name.normalize('NFC');
}

export function getMediaKind(fileName: string, rules: MatchRules): MediaKind | undefined {
  const ext = path.extname(fileName).toLowerCase();
  if (!ext) return undefined;
  if (rules.imageExtensions.includes(ext)) return 'image';
  if (rules.videoExtensions.includes(ext)) return 'video';
  return undefined;
}

export function isSidecarFileName(fileName: string, rules: MatchRules): boolean {
  const lower = fileName.toLowerCase();
  return lower.endsWith('.json') && !rules.ignoredJsonNames.includes(lower);
}

function splitCounter(name: string): { name: string; counter?: number } {
  const match = COUNTER_PATTERN.exec(name);
  if (!match) return { name };
  return { name: match[1], counter: Number.parseInt(match[2], 10) };
}

function splitEditSuffix(name: string, rules: MatchRules): { name: string; suffix?: string } {
  const lower = name.toLowerCase();
  let best: string | undefined;
  for (const suffix of rules.editSuffixes) {
    const candidate = normalizeName(suffix).toLowerCase();
    if (candidate.length < lower.length && lower.endsWith(candidate)) {
      if (!best || candidate.length > best.length) best = candidate;
    }
  }
  if (!best) return { name };
  const cut = name.length - best.length;
  return { name: name.slice(0, cut), suffix: name.slice(cut) };
}

/**
 * Splits a media file name into the parts Google may have added:
 * `IMG_1234(1).jpg`, `IMG_1234-edited.jpg`, `IMG_1234-edited(1).jpg` and
 * `IMG_1234(1)-edited.jpg` all have the core name `IMG_1234`.
 */
export function parseMediaName(fileName: string, rules: MatchRules): ParsedMediaName {
  const normalized = normalizeName(fileName);
  const extension = path.extname(normalized);
  const baseName = normalized.slice(0, normalized.length - extension.length);

  const trailing = splitCounter(baseName);
  const edit = splitEditSuffix(trailing.name, rules);

  let counter = trailing.counter;
  let coreName = edit.name;
  let uncountedName = trailing.name;
  let uneditedName = edit.suffix ? `${edit.name}${trailing.counter !== undefined ? `(${trailing.counter})` : ''}` : baseName;

  if (counter === undefined && edit.suffix) {
    // IMG_1234(1)-edited.jpg
    const inner = splitCounter(edit.name);
    if (inner.counter !== undefined) {
      counter = inner.counter;
      coreName = inner.name;
      uncountedName = `${inner.name}${edit.suffix}`;
      uneditedName = edit.name;
    }
  }

  return {
    fileName: normalized,
    baseName,
    extension,
    counter,
    editSuffix: edit.suffix,
    uncountedName,
    uneditedName,
    coreName,
  };
}

function isMarkerPrefix(segment: string, marker: string): boolean {
  return segment.length > 0 && marker.toLowerCase().startsWith(segment.toLowerCase());
}

/**
 * Reads what a sidecar's own file name says about the media it describes.
 *
 * `photo.jpg.json`, `photo.jpg.supplemental-metadata.json`,
 * `photo.jpg.supplem.json` and `photo.jpg(1).json` all describe `photo.jpg`;
 * the last one carries counter 1.
 */
export function parseSidecarName(fileName: string, rules: MatchRules): ParsedSidecarName {
  const normalized = normalizeName(fileName);
  const withoutJson = normalized.slice(0, normalized.length - '.json'.length);
  const { name: stem, counter } = splitCounter(withoutJson);

  const dot = stem.lastIndexOf('.');
  if (dot > 0) {
    const segment = stem.slice(dot + 1);
    if (isMarkerPrefix(segment, rules.supplementalMarker)) {
      const marker: SidecarMarker =
        segment.toLowerCase() === rules.supplementalMarker.toLowerCase() ? 'full' : 'truncated';
      return { fileName: normalized, stem, describedName: stem.slice(0, dot), counter, marker };
    }
  }

  return { fileName: normalized, stem, describedName: stem, counter, marker: 'none' };
}

function stripMediaExtension(name: string, rules: MatchRules): string {
  const dot = name.lastIndexOf('.');
  if (dot <= 0) return name;
  const segment = `.${name.slice(dot + 1).toLowerCase()}`;
  if (segment.length < 2) return name;
  const known = [...rules.imageExtensions, ...rules.videoExtensions];
  return known.some((ext) => ext.startsWith(segment)) ? name.slice(0, dot) : name;
}

/**
 * Normalised form used by the logical fallback: extension (or a truncation of
 * it), counter and edit suffix removed, lower-cased.
 */
export function toLogicalName(name: string, rules: MatchRules): string {
  const stripped = stripMediaExtension(normalizeName(name), rules);
  const trailing = splitCounter(stripped);
  const edit = splitEditSuffix(trailing.name, rules);
  const inner = trailing.counter === undefined ? splitCounter(edit.name) : { name: edit.name };
  return inner.name.trim().toLowerCase();
}

export function sidecarLogicalNames(describedName: string, title: string, rules: MatchRules): string[] {
  const names = [toLogicalName(describedName, rules)];
  if (title.trim()) {
    const fromTitle = toLogicalName(title, rules);
    if (!names.includes(fromTitle)) names.push(fromTitle);
  }
  return names.filter((name) => name.length > 0);
}
