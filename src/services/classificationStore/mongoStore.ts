import mongoose, { Schema, type Connection, type Model } from "mongoose";
import { z } from "zod";
import { ClassificationNotFoundError, StoreUnavailableError, errorMessage } from "../../errors";
import { STAGES, buildClassificationRecord, isStage, type ClassificationRecord } from "../classificationRecord";
import type { ClassificationStore } from "./interface";

const COLLECTION = "classifications";
const CONNECTED = 1;

interface DetectionDocument {
  bounding_box: number[];
  stage: number;
  confidence: number;
}

interface ClassificationDocument {
  id: string;
  image_base64: string;
  image_filename: string;
  image_content_type: string;
  latitude: number | null;
  longitude: number | null;
  timestamp: Date;
  detections: DetectionDocument[];
}

const DetectionSchema = new Schema<DetectionDocument>(
  {
    bounding_box: { type: [Number], required: true },
    stage: { type: Number, required: true, enum: [...STAGES] },
    confidence: { type: Number, required: true, min: 0, max: 1 },
  },
  { _id: false }
);

const ClassificationSchema = new Schema<ClassificationDocument>(
  {
    id: { type: String, required: true, unique: true },
    image_base64: { type: String, required: true },
    image_filename: { type: String, required: true },
    image_content_type: { type: String, required: true },
    latitude: { type: Number, default: null, min: -90, max: 90 },
    longitude: { type: Number, default: null, min: -180, max: 180 },
    timestamp: { type: Date, required: true, index: true },
    detections: { type: [DetectionSchema], default: [] },
  },
  {
    collection: COLLECTION,
    versionKey: false,
    // Fail fast instead of queueing while the store is unreachable
    bufferCommands: false,
    autoIndex: false,
    autoCreate: false,
  }
);

ClassificationSchema.index({ latitude: 1, longitude: 1 });

// Validates what comes back from the store before it becomes a domain record
const StoredClassificationSchema = z.object({
  id: z.string(),
  image_base64: z.string(),
  image_filename: z.string(),
  image_content_type: z.string(),
  latitude: z.number().nullable().optional(),
  longitude: z.number().nullable().optional(),
  timestamp: z.date(),
  detections: z.array(
    z.object({
      bounding_box: z.tuple([z.number(), z.number(), z.number(), z.number()]),
      stage: z.number().int().refine(isStage, "unknown stage"),
      confidence: z.number(),
    })
  ),
});

function toDocument(record: ClassificationRecord): ClassificationDocument {
  return {
    id: record.id,
    image_base64: Buffer.from(record.image.bytes).toString("base64"),
    image_filename: record.image.filename,
    image_content_type: record.image.contentType,
    latitude: record.location?.latitude ?? null,
    longitude: record.location?.longitude ?? null,
    timestamp: record.timestamp,
    detections: record.detections.map(detection => ({
      bounding_box: [...detection.boundingBox],
      stage: detection.stage,
      confidence: detection.confidence,
    })),
  };
}

export function fromDocument(raw: unknown): ClassificationRecord {
  const doc = StoredClassificationSchema.parse(raw);

  return buildClassificationRecord({
    id: doc.id,
    image: {
      bytes: new Uint8Array(Buffer.from(doc.image_base64, "base64")),
      contentType: doc.image_content_type,
      filename: doc.image_filename,
    },
    location:
      doc.latitude != null && doc.longitude != null ? { latitude: doc.latitude, longitude: doc.longitude } : null,
    timestamp: doc.timestamp,
    detections: doc.detections.map(detection => ({
      boundingBox: detection.bounding_box,
      stage: detection.stage,
      confidence: detection.confidence,
    })),
  });
}

/**
 * True when an operation failed because the database could not be reached.
 * Validation, duplicate-key and other server-side errors are not outages.
 */
export function isStoreOutage(error: unknown, readyState: number): boolean {
  if (
    error instanceof mongoose.mongo.MongoNetworkError ||
    error instanceof mongoose.mongo.MongoServerSelectionError ||
    error instanceof mongoose.Error.MongooseServerSelectionError
  ) {
    return true;
  }
  return readyState !== CONNECTED;
}

export interface MongoStoreConfig {
  url?: string;
  database: string;
  serverSelectionTimeoutMS?: number;
}

/**
 * MongoDB-backed store sharing one mongoose connection for the process.
 *
 * A failed initial connect leaves the store in degraded mode: every operation
 * makes a single connect attempt and throws `StoreUnavailableError` if it fails.
 * Once connected, reconnecting is left to the driver.
 */
export class MongoClassificationStore implements ClassificationStore {
  private readonly connection: Connection;
  private readonly model: Model<ClassificationDocument>;
  private readonly config: MongoStoreConfig;
  private connecting: Promise<void> | null = null;
  private opened = false;
  private ready = false;

  constructor(config: MongoStoreConfig) {
    this.config = config;
    this.connection = mongoose.createConnection();
    this.model = this.connection.model<ClassificationDocument>("Classification", ClassificationSchema);

    this.connection.on("disconnected", () => console.warn("MongoDB disconnected"));
    this.connection.on("reconnected", () => console.log("MongoDB reconnected"));
  }

  getName(): string {
    return `MongoDB (${this.config.database})`;
  }

  async connect(): Promise<void> {
    if (this.ready) {
      return;
    }
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<void> {
    const { url, database, serverSelectionTimeoutMS = 5000 } = this.config;
    if (!url) {
      throw new StoreUnavailableError("MONGODB_URL is not set");
    }

    try {
      if (!this.opened) {
        await this.connection.openUri(url, { dbName: database, serverSelectionTimeoutMS });
        this.opened = true;
      }
      await this.model.createIndexes();
      this.ready = true;
      console.log(`Connected to MongoDB database: ${database}`);
    } catch (error) {
      throw new StoreUnavailableError(errorMessage(error));
    }
  }

  async insert(record: ClassificationRecord): Promise<void> {
    await this.run(async () => {
      await this.model.create(toDocument(record));
    });
  }

  async get(id: string): Promise<ClassificationRecord> {
    const doc = await this.run(() => this.model.findOne({ id }).lean().exec());
    if (!doc) {
      throw new ClassificationNotFoundError(id);
    }
    return fromDocument(doc);
  }

  async listAll(): Promise<ClassificationRecord[]> {
    const docs = await this.run(() => this.model.find({}).sort({ timestamp: -1 }).lean().exec());
    return docs.map(doc => fromDocument(doc));
  }

  async delete(id: string): Promise<void> {
    const result = await this.run(() => this.model.deleteOne({ id }).exec());
    if (result.deletedCount === 0) {
      throw new ClassificationNotFoundError(id);
    }
  }

  async ping(): Promise<string> {
    try {
      await this.connect();
      await this.connection.db?.admin().ping();
      return "connected";
    } catch (error) {
      return `error: ${errorMessage(error)}`;
    }
  }

  async close(): Promise<void> {
    this.ready = false;
    this.opened = false;
    await this.connection.close();
    console.log("MongoDB connection closed");
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await operation();
    } catch (error) {
      if (isStoreOutage(error, this.connection.readyState)) {
        throw new StoreUnavailableError(errorMessage(error));
      }
      throw error;
    }
  }
}
