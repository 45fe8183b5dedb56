import sharp from "sharp";
import { STAGE_LABELS, Stage, type Detection } from "../services/classificationRecord";

export const STAGE_COLORS: Record<Stage, string> = {
  [Stage.Bud]: "#22c55e",
  [Stage.Anthesis]: "#eab308",
  [Stage.PostAnthesis]: "#f97316",
};

const escapeXml = (s: string) => s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

export function buildOverlaySvg(width: number, height: number, detections: readonly Detection[]): string {
  const strokeWidth = Math.max(2, Math.floor(Math.min(width, height) * 0.003));
  const fontSize = Math.max(14, Math.floor(Math.min(width, height) * 0.025));
  const padX = Math.max(6, Math.floor(fontSize * 0.5));
  const padY = Math.max(4, Math.floor(fontSize * 0.35));

  let svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`;
  svg += `<style>.lbl{font-family:Helvetica,Arial,sans-serif;font-size:${fontSize}px;font-weight:600;}</style>`;

  for (const { boundingBox, stage, confidence } of detections) {
    const x1 = Math.max(0, Math.min(width, Math.round(boundingBox[0])));
    const y1 = Math.max(0, Math.min(height, Math.round(boundingBox[1])));
    const x2 = Math.max(0, Math.min(width, Math.round(boundingBox[2])));
    const y2 = Math.max(0, Math.min(height, Math.round(boundingBox[3])));
    if (x2 <= x1 || y2 <= y1) continue;

    const color = STAGE_COLORS[stage];
    const text = `${STAGE_LABELS[stage]} (${confidence.toFixed(2)})`;
    const bgW = Math.ceil(text.length * fontSize * 0.6) + padX * 2;
    const bgH = fontSize + padY * 2;
    const bgY = Math.max(0, y1 - bgH - Math.max(2, strokeWidth));

    svg += `<rect x="${x1}" y="${y1}" width="${x2 - x1}" height="${y2 - y1}" fill="none" stroke="${color}" stroke-width="${strokeWidth}"/>`;
    svg += `<rect x="${x1}" y="${bgY}" width="${Math.min(bgW, width - x1)}" height="${bgH}" fill="${color}" opacity="0.85" rx="${Math.floor(bgH * 0.2)}"/>`;
    svg += `<text x="${x1 + padX}" y="${bgY + padY + Math.floor(fontSize * 0.8)}" class="lbl" fill="#fff">${escapeXml(text)}</text>`;
  }

  return `${svg}</svg>`;
}

/**
 * Renders the detections onto the stored image and returns a JPEG.
 */
export async function drawDetections(image: Uint8Array, detections: readonly Detection[]): Promise<Buffer> {
  const meta = await sharp(image).metadata();
  const width = meta.width ?? 0;
  const height = meta.height ?? 0;
  if (!width || !height) {
    throw new Error("Could not determine image dimensions");
  }

  return sharp(image)
    .composite([{ input: Buffer.from(buildOverlaySvg(width, height, detections)), left: 0, top: 0 }])
    .jpeg()
    .toBuffer();
}
