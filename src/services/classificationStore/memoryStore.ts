import { ClassificationNotFoundError } from "../../errors";
import { buildClassificationRecord, type ClassificationRecord } from "../classificationRecord";
import type { ClassificationStore } from "./interface";

// Copies image bytes on the way in and out so callers never share a buffer with the store
function copyRecord(record: ClassificationRecord): ClassificationRecord {
  return buildClassificationRecord({
    id: record.id,
    image: { ...record.image, bytes: new Uint8Array(record.image.bytes) },
    location: record.location,
    detections: record.detections,
    timestamp: record.timestamp,
  });
}

export class MemoryClassificationStore implements ClassificationStore {
  private readonly records = new Map<string, ClassificationRecord>();

  getName(): string {
    return "In-memory store";
  }

  async insert(record: ClassificationRecord): Promise<void> {
    this.records.set(record.id, copyRecord(record));
  }

  async get(id: string): Promise<ClassificationRecord> {
    const record = this.records.get(id);
    if (!record) {
      throw new ClassificationNotFoundError(id);
    }
    return copyRecord(record);
  }

  async listAll(): Promise<ClassificationRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
      .map(copyRecord);
  }

  async delete(id: string): Promise<void> {
    if (!this.records.delete(id)) {
      throw new ClassificationNotFoundError(id);
    }
  }

  async ping(): Promise<string> {
    return "connected";
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
