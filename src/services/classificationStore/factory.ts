import { errorMessage } from "../../errors";
import type { ClassificationStore } from "./interface";
import { MemoryClassificationStore } from "./memoryStore";
import { MongoClassificationStore } from "./mongoStore";

export type StoreType = "mongo" | "memory";

export interface ClassificationStoreConfig {
  type: StoreType;
  mongodbUrl?: string;
  mongodbDatabase: string;
}

/**
 * Creates the process-wide store. An unreachable MongoDB does not stop
 * startup; the store comes up degraded and keeps retrying per operation.
 */
export async function createClassificationStore(config: ClassificationStoreConfig): Promise<ClassificationStore> {
  if (config.type === "memory") {
    console.warn("Using in-memory classification store; records are lost on restart");
    return new MemoryClassificationStore();
  }

  const store = new MongoClassificationStore({ url: config.mongodbUrl, database: config.mongodbDatabase });
  try {
    await store.connect();
  } catch (error) {
    console.warn(`Failed to connect to MongoDB: ${errorMessage(error)}`);
    console.warn("API will still start, but database operations will fail until MongoDB is reachable.");
  }
  return store;
}
