import type { ClassificationRecord, Detection, StageSummary } from "../services/classificationRecord";
import type { HeatmapData } from "../services/heatmap";
import type { ClassificationResponse, FlowerDetectionResponse, HeatmapResponse } from "../types";

export function imagePath(id: string): string {
  return `/api/images/${id}`;
}

function toDetectionResponse(detection: Detection): FlowerDetectionResponse {
  const [xMin, yMin, xMax, yMax] = detection.boundingBox;
  return {
    bounding_box: [xMin, yMin, xMax, yMax],
    stage: detection.stage,
    confidence: detection.confidence,
  };
}

// Integer stages become string keys on the wire, e.g. { "0": 2, "2": 1 }
function toStageSummaryResponse(summary: Readonly<StageSummary>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [stage, count] of Object.entries(summary)) {
    if (count !== undefined) {
      out[stage] = count;
    }
  }
  return out;
}

export function toClassificationResponse(record: ClassificationRecord): ClassificationResponse {
  return {
    id: record.id,
    image_path: imagePath(record.id),
    location: record.location ? { latitude: record.location.latitude, longitude: record.location.longitude } : null,
    timestamp: record.timestamp.toISOString(),
    detections: record.detections.map(toDetectionResponse),
    flower_count: record.flowerCount,
    stage_summary: toStageSummaryResponse(record.stageSummary),
  };
}

export function toHeatmapResponse(data: HeatmapData): HeatmapResponse {
  return {
    total_records: data.totalRecords,
    data_points: data.points.map(point => ({
      id: point.id,
      latitude: point.location.latitude,
      longitude: point.location.longitude,
      timestamp: point.timestamp.toISOString(),
      detections: point.detections.map(toDetectionResponse),
      flower_count: point.flowerCount,
      stage_summary: toStageSummaryResponse(point.stageSummary),
    })),
  };
}
