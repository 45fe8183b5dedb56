import type { ClassificationRecord, Detection, Location, StageSummary } from "./classificationRecord";
import type { ClassificationStore } from "./classificationStore/interface";

export interface HeatmapPoint {
  id: string;
  location: Location;
  timestamp: Date;
  detections: readonly Detection[];
  flowerCount: number;
  stageSummary: Readonly<StageSummary>;
}

export interface HeatmapData {
  // Size of the whole store, geotagged or not
  totalRecords: number;
  points: HeatmapPoint[];
}

export function toHeatmapPoint(record: ClassificationRecord): HeatmapPoint | null {
  if (!record.location) {
    return null;
  }
  return {
    id: record.id,
    location: record.location,
    timestamp: record.timestamp,
    detections: record.detections,
    flowerCount: record.flowerCount,
    stageSummary: record.stageSummary,
  };
}

export function aggregateHeatmap(records: readonly ClassificationRecord[]): HeatmapData {
  const points: HeatmapPoint[] = [];
  for (const record of records) {
    const point = toHeatmapPoint(record);
    if (point) {
      points.push(point);
    }
  }
  return { totalRecords: records.length, points };
}

/**
 * Map view over every stored record. Records without a location are left
 * out of `points` but still counted in `totalRecords`.
 */
export async function buildHeatmapData(store: ClassificationStore): Promise<HeatmapData> {
  return aggregateHeatmap(await store.listAll());
}
