import sharp from "sharp";
import type { NormalizedImage } from "../../utils/image";
import type { Letterbox } from "./yoloOutput";

export const LETTERBOX_FILL = 114;

export interface LetterboxGeometry extends Letterbox {
  // Size of the resized image inside the square canvas
  width: number;
  height: number;
}

export interface LetterboxedInput {
  // Planar float32 RGB, [1, 3, size, size], scaled to 0..1
  data: Float32Array;
  letterbox: Letterbox;
}

export function letterboxGeometry(sourceWidth: number, sourceHeight: number, size: number): LetterboxGeometry {
  const scale = Math.min(size / sourceWidth, size / sourceHeight);
  const width = Math.max(1, Math.floor(sourceWidth * scale));
  const height = Math.max(1, Math.floor(sourceHeight * scale));

  return {
    scale,
    padX: Math.floor((size - width) / 2),
    padY: Math.floor((size - height) / 2),
    sourceWidth,
    sourceHeight,
    width,
    height,
  };
}

/**
 * Places resized HWC pixels centered on a gray square canvas and converts
 * the result to CHW floats.
 */
export function packLetterboxedChw(resized: Uint8Array, geometry: LetterboxGeometry, size: number): Float32Array {
  const { width, height, padX, padY } = geometry;
  if (resized.length !== width * height * 3) {
    throw new Error(`Expected ${width * height * 3} bytes of RGB, got ${resized.length}`);
  }

  const canvas = new Uint8Array(size * size * 3).fill(LETTERBOX_FILL);
  for (let y = 0; y < height; y++) {
    const row = resized.subarray(y * width * 3, (y + 1) * width * 3);
    canvas.set(row, ((padY + y) * size + padX) * 3);
  }

  const area = size * size;
  const chw = new Float32Array(3 * area);
  for (let i = 0; i < area; i++) {
    chw[i] = canvas[i * 3] / 255;
    chw[area + i] = canvas[i * 3 + 1] / 255;
    chw[2 * area + i] = canvas[i * 3 + 2] / 255;
  }
  return chw;
}

export async function letterboxImage(image: NormalizedImage, size: number): Promise<LetterboxedInput> {
  const geometry = letterboxGeometry(image.width, image.height, size);

  const resized =
    geometry.width === image.width && geometry.height === image.height
      ? image.data
      : await sharp(image.data, { raw: { width: image.width, height: image.height, channels: 3 } })
          .resize(geometry.width, geometry.height, { fit: "fill" })
          .raw()
          .toBuffer();

  const { scale, padX, padY, sourceWidth, sourceHeight } = geometry;
  return {
    data: packLetterboxedChw(resized, geometry, size),
    letterbox: { scale, padX, padY, sourceWidth, sourceHeight },
  };
}
