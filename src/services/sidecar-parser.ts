import {
  takeoutMetadataSchema,
  type GeoLocation,
  type RestorableMetadata,
  type TakeoutGeoData,
  type TakeoutMetadata,
  type TakeoutTimestamp,
} from '../models/takeout-metadata.js';

export type SidecarParseResult =
  | { ok: true; metadata: TakeoutMetadata }
  | { ok: false; reason: 'parse' | 'schema'; message: string };

export function parseSidecarJson(text: string): SidecarParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return { ok: false, reason: 'parse', message: error instanceof Error ? error.message : String(error) };
  }

  const parsed = takeoutMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, reason: 'schema', message: `${where}${issue ? issue.message : 'invalid sidecar'}` };
  }
  return { ok: true, metadata: parsed.data };
}

function parseTimestamp(value: TakeoutTimestamp | undefined): Date | undefined {
  if (!value) return undefined;

  if (value.timestamp !== undefined) {
    const seconds = typeof value.timestamp === 'number' ? value.timestamp : Number(value.timestamp.trim());
    // Takeout writes 0 for unknown dates
    if (Number.isFinite(seconds) && seconds > 0) {
      return new Date(seconds * 1000);
    }
  }

  if (value.formatted) {
    const millis = Date.parse(value.formatted);
    if (!Number.isNaN(millis)) return new Date(millis);
  }
  return undefined;
}

function toLocation(geo: TakeoutGeoData | undefined): GeoLocation | undefined {
  if (!geo || geo.latitude === undefined || geo.longitude === undefined) return undefined;
  const { latitude, longitude } = geo;
  if (latitude === 0 && longitude === 0) return undefined;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return undefined;
  return { latitude, longitude, altitude: geo.altitude ?? 0 };
}

export function getBestTimestamp(metadata: TakeoutMetadata): Date | undefined {
  return parseTimestamp(metadata.photoTakenTime) ?? parseTimestamp(metadata.creationTime);
}

export function getBestLocation(metadata: TakeoutMetadata): GeoLocation | undefined {
  return toLocation(metadata.geoDataExif) ?? toLocation(metadata.geoData);
}

export function toRestorableMetadata(metadata: TakeoutMetadata): RestorableMetadata {
  const description = metadata.description?.trim();
  return {
    takenAt: getBestTimestamp(metadata),
    location: getBestLocation(metadata),
    description: description ? description : undefined,
    people: (metadata.people ?? []).map((person) => person.name.trim()).filter((name) => name.length > 0),
  };
}

export function hasUsefulMetadata(metadata: RestorableMetadata): boolean {
  return metadata.takenAt !== undefined || metadata.location !== undefined || metadata.description !== undefined;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** ExifTool date format, always UTC: `2021:06:08 18:26:30`. */
export function formatExifDate(date: Date): string {
  return (
    `${date.getUTCFullYear()}:${pad(date.getUTCMonth() + 1)}:${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}
