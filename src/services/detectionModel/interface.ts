import type { BoundingBox } from "../classificationRecord";
import type { NormalizedImage } from "../../utils/image";

// What a backend reports before stage mapping and thresholding
export interface RawDetection {
  boundingBox: BoundingBox;
  classIndex: number;
  confidence: number;
}

export interface DetectionBackend {
  getName(): string;
  infer(image: NormalizedImage): Promise<RawDetection[]>;
}

export type AcquisitionResult =
  | { ok: true; backend: DetectionBackend }
  | { ok: false; reason: string };

/**
 * One way of obtaining a backend (download, local artifact, mock...).
 * Implementations report failure through the result, not by throwing.
 */
export interface AcquisitionStrategy {
  readonly name: string;
  acquire(): Promise<AcquisitionResult>;
}

export interface DetectOptions {
  confidenceThreshold?: number;
}

export type ModelStatus = "not_loaded" | "loading" | "ready";
