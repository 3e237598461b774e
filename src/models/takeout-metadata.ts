import { z } from 'zod';

// Optional sub-records fall back to undefined when Google wrote something
// unexpected, so only a missing or non-string title disqualifies a sidecar.

const timestampSchema = z
  .object({
    timestamp: z.union([z.string(), z.number()]).optional(),
    formatted: z.string().optional(),
  })
  .passthrough();

const geoSchema = z
  .object({
    latitude: z.number().optional(),
    longitude: z.number().optional(),
    altitude: z.number().optional(),
    latitudeSpan: z.number().optional(),
    longitudeSpan: z.number().optional(),
  })
  .passthrough();

const personSchema = z.object({ name: z.string() }).passthrough();

export const takeoutMetadataSchema = z
  .object({
    title: z.string(),
    description: z.string().optional().catch(undefined),
    imageViews: z.string().optional().catch(undefined),
    url: z.string().optional().catch(undefined),
    creationTime: timestampSchema.optional().catch(undefined),
    photoTakenTime: timestampSchema.optional().catch(undefined),
    photoLastModifiedTime: timestampSchema.optional().catch(undefined),
    geoData: geoSchema.optional().catch(undefined),
    geoDataExif: geoSchema.optional().catch(undefined),
    people: z.array(personSchema).optional().catch(undefined),
    googlePhotosOrigin: z.record(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export type TakeoutTimestamp = z.infer<typeof timestampSchema>;
export type TakeoutGeoData = z.infer<typeof geoSchema>;
export type TakeoutMetadata = z.infer<typeof takeoutMetadataSchema>;

export interface GeoLocation {
  latitude: number;
  longitude: number;
  altitude: number;
}

/**
 * The subset of a sidecar that can be written back into a media file.
 */
export interface RestorableMetadata {
  takenAt?: Date;
  location?: GeoLocation;
  description?: string;
  people: string[];
}
