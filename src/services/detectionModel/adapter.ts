import { InvalidStageError, ModelUnavailableError, errorMessage } from "../../errors";
import { isStage, type Detection } from "../classificationRecord";
import { normalizeImage } from "../../utils/image";
import type {
  AcquisitionResult,
  AcquisitionStrategy,
  DetectOptions,
  DetectionBackend,
  ModelStatus,
  RawDetection,
} from "./interface";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.25;
export const DEFAULT_INIT_TIMEOUT_MS = 60_000;

export interface DetectionModelAdapterOptions {
  defaultConfidenceThreshold?: number;
  initTimeoutMs?: number;
}

/**
 * Process-wide gateway to the detection backend.
 *
 * The backend is acquired lazily on first use by walking the strategies in
 * order. Concurrent first callers share the same in-flight attempt. A failed
 * attempt is not cached, so the next call tries the whole list again.
 */
export class DetectionModelAdapter {
  private readonly strategies: readonly AcquisitionStrategy[];
  private readonly defaultConfidenceThreshold: number;
  private readonly initTimeoutMs: number;
  private backend: DetectionBackend | null = null;
  private pending: Promise<DetectionBackend> | null = null;

  constructor(strategies: readonly AcquisitionStrategy[], options: DetectionModelAdapterOptions = {}) {
    this.strategies = strategies;
    this.defaultConfidenceThreshold = options.defaultConfidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.initTimeoutMs = options.initTimeoutMs ?? DEFAULT_INIT_TIMEOUT_MS;
  }

  status(): ModelStatus {
    if (this.backend) return "ready";
    return this.pending ? "loading" : "not_loaded";
  }

  getDefaultConfidenceThreshold(): number {
    return this.defaultConfidenceThreshold;
  }

  async getBackend(): Promise<DetectionBackend> {
    if (this.backend) {
      return this.backend;
    }
    if (!this.pending) {
      this.pending = this.acquire().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  async detect(image: Uint8Array, options: DetectOptions = {}): Promise<Detection[]> {
    const threshold = options.confidenceThreshold ?? this.defaultConfidenceThreshold;
    const backend = await this.getBackend();
    const normalized = await normalizeImage(image);

    let raw: RawDetection[];
    try {
      raw = await backend.infer(normalized);
    } catch (error) {
      console.error(`Inference failed on ${backend.getName()}:`, error);
      throw new ModelUnavailableError("Inference failed", [errorMessage(error)]);
    }

    return raw
      .filter(candidate => candidate.confidence >= threshold && candidate.confidence <= 1)
      .filter(candidate => hasExtent(candidate))
      .map(candidate => toDetection(candidate));
  }

  private async acquire(): Promise<DetectionBackend> {
    const reasons: string[] = [];

    for (const strategy of this.strategies) {
      console.log(`Trying model acquisition strategy: ${strategy.name}`);
      const result = await this.attempt(strategy);

      if (result.ok) {
        console.log(`Using ${result.backend.getName()} (via ${strategy.name}) for flower detection`);
        this.backend = result.backend;
        return result.backend;
      }

      console.warn(`Model strategy ${strategy.name} failed: ${result.reason}`);
      reasons.push(`${strategy.name}: ${result.reason}`);
    }

    if (this.strategies.length === 0) {
      reasons.push("no acquisition strategies configured");
    }
    throw new ModelUnavailableError("Detection model unavailable", reasons);
  }

  private async attempt(strategy: AcquisitionStrategy): Promise<AcquisitionResult> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<AcquisitionResult>(resolve => {
      timer = setTimeout(
        () => resolve({ ok: false, reason: `timed out after ${this.initTimeoutMs}ms` }),
        this.initTimeoutMs
      );
    });

    const acquisition = strategy
      .acquire()
      .catch((error: unknown): AcquisitionResult => ({ ok: false, reason: errorMessage(error) }));

    try {
      return await Promise.race([acquisition, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function hasExtent({ boundingBox: [xMin, yMin, xMax, yMax] }: RawDetection): boolean {
  return xMin < xMax && yMin < yMax;
}

export function toDetection(candidate: RawDetection): Detection {
  const { classIndex } = candidate;
  if (!isStage(classIndex)) {
    throw new InvalidStageError(classIndex);
  }
  return {
    boundingBox: candidate.boundingBox,
    stage: classIndex,
    confidence: candidate.confidence,
  };
}
