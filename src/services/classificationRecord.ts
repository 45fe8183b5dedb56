export const Stage = {
  Bud: 0,
  Anthesis: 1,
  PostAnthesis: 2,
} as const;

export type Stage = (typeof Stage)[keyof typeof Stage];

export const STAGES: readonly Stage[] = [Stage.Bud, Stage.Anthesis, Stage.PostAnthesis];

export const STAGE_LABELS: Record<Stage, string> = {
  [Stage.Bud]: "bud",
  [Stage.Anthesis]: "anthesis",
  [Stage.PostAnthesis]: "post-anthesis",
};

export function isStage(value: number): value is Stage {
  return STAGES.some(stage => stage === value);
}

export interface Location {
  latitude: number;
  longitude: number;
}

// [x_min, y_min, x_max, y_max] in source image pixels
export type BoundingBox = readonly [number, number, number, number];

export interface Detection {
  boundingBox: BoundingBox;
  stage: Stage;
  confidence: number;
}

export type StageSummary = Partial<Record<Stage, number>>;

export interface StoredImage {
  bytes: Uint8Array;
  contentType: string;
  filename: string;
}

export interface ClassificationRecord {
  readonly id: string;
  readonly image: StoredImage;
  readonly location: Location | null;
  readonly timestamp: Date;
  readonly detections: readonly Detection[];
  readonly flowerCount: number;
  readonly stageSummary: Readonly<StageSummary>;
}

export interface ClassificationInput {
  id: string;
  image: StoredImage;
  location: Location | null;
  detections: readonly Detection[];
  timestamp: Date;
}

export function countFlowers(detections: readonly Detection[]): number {
  return detections.length;
}

// Only stages that actually occur get a key
export function summarizeStages(detections: readonly Detection[]): StageSummary {
  const summary: StageSummary = {};
  for (const detection of detections) {
    summary[detection.stage] = (summary[detection.stage] ?? 0) + 1;
  }
  return summary;
}

/**
 * Assembles an immutable classification record from already-resolved inputs.
 * Performs no I/O and no validation beyond what its inputs guarantee.
 */
export function buildClassificationRecord(input: ClassificationInput): ClassificationRecord {
  const detections = Object.freeze(
    input.detections.map(({ boundingBox: [xMin, yMin, xMax, yMax], stage, confidence }) =>
      Object.freeze<Detection>({
        boundingBox: Object.freeze([xMin, yMin, xMax, yMax] as const),
        stage,
        confidence,
      })
    )
  );

  return Object.freeze({
    id: input.id,
    image: input.image,
    location: input.location ? Object.freeze({ ...input.location }) : null,
    timestamp: new Date(input.timestamp.getTime()),
    detections,
    flowerCount: countFlowers(detections),
    stageSummary: Object.freeze(summarizeStages(detections)),
  });
}

export function imageFilename(id: string, extension: string): string {
  return `${id}.${extension}`;
}
