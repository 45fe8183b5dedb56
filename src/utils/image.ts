import sharp from "sharp";
import { InputError, errorMessage } from "../errors";

// Stored and served back as-is, so only raster formats are accepted (no SVG)
const RASTER_FORMATS = {
  jpeg: { contentType: "image/jpeg", extension: "jpg" },
  png: { contentType: "image/png", extension: "png" },
  webp: { contentType: "image/webp", extension: "webp" },
  heif: { contentType: "image/heif", extension: "heic" },
  tiff: { contentType: "image/tiff", extension: "tiff" },
  gif: { contentType: "image/gif", extension: "gif" },
} as const;

export type RasterFormat = keyof typeof RASTER_FORMATS;

export function isRasterFormat(format: string): format is RasterFormat {
  return Object.hasOwn(RASTER_FORMATS, format);
}

export interface ImageInfo {
  format: RasterFormat;
  // Derived from the decoded bytes, never from what the client declared
  contentType: string;
  extension: string;
  width: number;
  height: number;
  channels: number;
}

// Raw interleaved RGB (HWC), the layout every detection backend receives
export interface NormalizedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: 3;
}

/**
 * Decodes just enough of the upload to prove it is an image sharp can read.
 */
export async function inspectImage(bytes: Uint8Array): Promise<ImageInfo> {
  let meta: sharp.Metadata;
  try {
    meta = await sharp(bytes).metadata();
  } catch (error) {
    throw new InputError("Unsupported or corrupt image", [errorMessage(error)]);
  }

  const format = meta.format ?? "unknown";
  if (!isRasterFormat(format)) {
    throw new InputError("Invalid image", [`unsupported format ${format}`]);
  }

  const width = meta.width ?? 0;
  const height = meta.height ?? 0;
  if (width === 0 || height === 0) {
    throw new InputError(`Invalid image dimensions: ${width}x${height}`);
  }

  // sharp reports AVIF as heif
  const avif = format === "heif" && meta.compression === "av1";
  return {
    format,
    contentType: avif ? "image/avif" : RASTER_FORMATS[format].contentType,
    extension: avif ? "avif" : RASTER_FORMATS[format].extension,
    width,
    height,
    channels: meta.channels ?? 0,
  };
}

/**
 * Collapses grayscale, alpha and CMYK inputs to three sRGB channels.
 */
export async function normalizeImage(bytes: Uint8Array): Promise<NormalizedImage> {
  try {
    const { data, info } = await sharp(bytes)
      .toColourspace("srgb")
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3) {
      throw new Error(`expected 3 channels after normalization, got ${info.channels}`);
    }
    return { data, width: info.width, height: info.height, channels: 3 };
  } catch (error) {
    throw new InputError("Could not decode image for detection", [errorMessage(error)]);
  }
}
