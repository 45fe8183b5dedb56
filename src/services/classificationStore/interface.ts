import type { ClassificationRecord } from "../classificationRecord";

/**
 * Durable storage of classification records, image bytes included.
 *
 * Implementations throw `ClassificationNotFoundError` for unknown ids and
 * `StoreUnavailableError` when the backing store cannot be reached.
 */
export interface ClassificationStore {
  insert(record: ClassificationRecord): Promise<void>;
  get(id: string): Promise<ClassificationRecord>;
  listAll(): Promise<ClassificationRecord[]>;
  delete(id: string): Promise<void>;
  ping(): Promise<string>;
  close(): Promise<void>;
  getName(): string;
}
