import type { RawDetection } from "./interface";

export interface OutputTensor {
  data: Float32Array;
  dims: readonly number[];
}

// Scale and padding applied when the source image was letterboxed into the model input
export interface Letterbox {
  scale: number;
  padX: number;
  padY: number;
  sourceWidth: number;
  sourceHeight: number;
}

interface Candidate {
  cx: number;
  cy: number;
  w: number;
  h: number;
  classIndex: number;
  confidence: number;
}

export interface NamedOutput {
  readonly dims: readonly number[];
  readonly data: unknown;
}

/** Picks the first [1, a, b] float32 output of a session run. */
export function pickDetectionOutput(outputs: Readonly<Record<string, NamedOutput>>): OutputTensor {
  for (const [name, output] of Object.entries(outputs)) {
    const { data, dims } = output;
    if (dims.length === 3 && dims[0] === 1 && data instanceof Float32Array) {
      return { data, dims };
    }
    console.warn(`Skipping model output ${name} with shape ${dims.join("x")}`);
  }
  throw new Error("Model produced no float32 detection output");
}

export const DEFAULT_IOU_THRESHOLD = 0.45;
// Candidates below this never leave the backend; the adapter applies the request threshold
export const MIN_CANDIDATE_SCORE = 0.01;

/**
 * Decodes a YOLOv8-style detection head, either [1, 4+C, N] or [1, N, 4+C].
 * The class count is taken from the smaller of the two trailing axes.
 */
export function decodeYoloOutput(
  output: OutputTensor,
  letterbox: Letterbox,
  iouThreshold: number = DEFAULT_IOU_THRESHOLD
): RawDetection[] {
  const { data, dims } = output;
  if (dims.length !== 3 || dims[0] !== 1) {
    throw new Error(`Unexpected output shape: ${dims.join("x")}`);
  }

  const channelFirst = dims[1] < dims[2];
  const channels = channelFirst ? dims[1] : dims[2];
  const count = channelFirst ? dims[2] : dims[1];
  const numClasses = channels - 4;
  if (numClasses < 1) {
    throw new Error(`Output has no class channels: ${dims.join("x")}`);
  }

  const at = (i: number, channel: number) =>
    channelFirst ? data[channel * count + i] : data[i * channels + channel];

  const candidates: Candidate[] = [];
  for (let i = 0; i < count; i++) {
    const w = at(i, 2);
    const h = at(i, 3);
    if (w <= 0 || h <= 0) continue;

    let bestScore = -Infinity;
    let bestClass = -1;
    for (let c = 0; c < numClasses; c++) {
      const score = at(i, 4 + c);
      if (score > bestScore) {
        bestScore = score;
        bestClass = c;
      }
    }

    if (bestScore >= MIN_CANDIDATE_SCORE) {
      candidates.push({ cx: at(i, 0), cy: at(i, 1), w, h, classIndex: bestClass, confidence: Math.min(1, bestScore) });
    }
  }

  return applyNms(candidates, iouThreshold).map(candidate => toSourceCoordinates(candidate, letterbox));
}

// Class-wise NMS; output keeps descending confidence order
export function applyNms<T extends Candidate>(candidates: readonly T[], iouThreshold: number): T[] {
  let remaining = [...candidates].sort((a, b) => b.confidence - a.confidence);
  const selected: T[] = [];

  while (remaining.length > 0) {
    const [current, ...rest] = remaining;
    selected.push(current);
    remaining = rest.filter(box => box.classIndex !== current.classIndex || iou(current, box) < iouThreshold);
  }

  return selected;
}

export function iou(a: Candidate, b: Candidate): number {
  const left = Math.max(a.cx - a.w / 2, b.cx - b.w / 2);
  const top = Math.max(a.cy - a.h / 2, b.cy - b.h / 2);
  const right = Math.min(a.cx + a.w / 2, b.cx + b.w / 2);
  const bottom = Math.min(a.cy + a.h / 2, b.cy + b.h / 2);

  const intersection = Math.max(0, right - left) * Math.max(0, bottom - top);
  const union = a.w * a.h + b.w * b.h - intersection;
  return union > 0 ? intersection / union : 0;
}

function toSourceCoordinates(candidate: Candidate, letterbox: Letterbox): RawDetection {
  const { scale, padX, padY, sourceWidth, sourceHeight } = letterbox;
  const x1 = (candidate.cx - candidate.w / 2 - padX) / scale;
  const y1 = (candidate.cy - candidate.h / 2 - padY) / scale;
  const x2 = (candidate.cx + candidate.w / 2 - padX) / scale;
  const y2 = (candidate.cy + candidate.h / 2 - padY) / scale;

  return {
    boundingBox: [
      Math.max(0, Math.round(x1)),
      Math.max(0, Math.round(y1)),
      Math.min(sourceWidth, Math.round(x2)),
      Math.min(sourceHeight, Math.round(y2)),
    ],
    classIndex: candidate.classIndex,
    confidence: candidate.confidence,
  };
}
