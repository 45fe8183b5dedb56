import type { NormalizedImage } from "../../utils/image";
import type { DetectionBackend, RawDetection } from "./interface";

// Boxes as fractions of the image, one per stage
const MOCK_FLOWERS = [
  { box: [0.1, 0.1, 0.3, 0.3], classIndex: 0, confidence: 0.91 },
  { box: [0.4, 0.35, 0.6, 0.55], classIndex: 1, confidence: 0.84 },
  { box: [0.65, 0.6, 0.9, 0.85], classIndex: 2, confidence: 0.72 },
  { box: [0.05, 0.7, 0.2, 0.9], classIndex: 1, confidence: 0.18 },
] as const;

/**
 * Deterministic stand-in used when no real model is deployed.
 */
export class MockDetectionBackend implements DetectionBackend {
  getName(): string {
    return "Mock flower detector";
  }

  async infer(image: NormalizedImage): Promise<RawDetection[]> {
    return MOCK_FLOWERS.map(({ box: [x1, y1, x2, y2], classIndex, confidence }): RawDetection => ({
      boundingBox: [
        Math.round(x1 * image.width),
        Math.round(y1 * image.height),
        Math.round(x2 * image.width),
        Math.round(y2 * image.height),
      ],
      classIndex,
      confidence,
    }));
  }
}
