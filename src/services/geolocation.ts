import { parse as parseExif } from "exifr";
import { z } from "zod";
import { errorMessage } from "../errors";
import type { Location } from "./classificationRecord";

const DmsSchema = z.array(z.number().finite().nonnegative()).min(1).max(3);

// Accepts "N" as well as spelled-out values such as "North"
const refSchema = <T extends [string, ...string[]]>(values: T) =>
  z
    .string()
    .trim()
    .toUpperCase()
    .transform(value => value.charAt(0))
    .pipe(z.enum(values));

// Only the GPS tags we decode; anything else exifr returns is ignored
const GpsTagsSchema = z.object({
  GPSLatitude: DmsSchema,
  GPSLatitudeRef: refSchema(["N", "S"]),
  GPSLongitude: DmsSchema,
  GPSLongitudeRef: refSchema(["E", "W"]),
});

export function dmsToDecimal(dms: readonly number[]): number {
  const [degrees = 0, minutes = 0, seconds = 0] = dms;
  return degrees + minutes / 60 + seconds / 3600;
}

/**
 * Converts parsed EXIF GPS tags into signed decimal degrees.
 * North and east are positive; anything incomplete or out of range is `null`.
 */
export function gpsTagsToLocation(tags: unknown): Location | null {
  const parsed = GpsTagsSchema.safeParse(tags);
  if (!parsed.success) {
    return null;
  }

  const { GPSLatitude, GPSLatitudeRef, GPSLongitude, GPSLongitudeRef } = parsed.data;
  const latitude = dmsToDecimal(GPSLatitude) * (GPSLatitudeRef === "S" ? -1 : 1);
  const longitude = dmsToDecimal(GPSLongitude) * (GPSLongitudeRef === "W" ? -1 : 1);

  if (!isValidLocation({ latitude, longitude })) {
    return null;
  }
  return { latitude, longitude };
}

export function isValidLocation(location: Location): boolean {
  return (
    Number.isFinite(location.latitude) &&
    Number.isFinite(location.longitude) &&
    Math.abs(location.latitude) <= 90 &&
    Math.abs(location.longitude) <= 180
  );
}

/**
 * Reads the embedded GPS position of an image. Missing or unreadable
 * metadata degrades to `null`; this never rejects.
 */
export async function extractLocation(image: Uint8Array): Promise<Location | null> {
  try {
    const tags: unknown = await parseExif(image, { tiff: true, gps: true, translateValues: false });
    return gpsTagsToLocation(tags);
  } catch (error) {
    console.warn("Could not read EXIF GPS data:", errorMessage(error));
    return null;
  }
}

// Manual coordinates always win; extraction is skipped when they are given
export async function resolveLocation(image: Uint8Array, manual: Location | null): Promise<Location | null> {
  if (manual) {
    return { latitude: manual.latitude, longitude: manual.longitude };
  }
  return extractLocation(image);
}
