import type { Context } from "hono";
import { z } from "zod";
import type { ClassificationStore } from "./services/classificationStore/interface";
import type { DetectionModelAdapter } from "./services/detectionModel/adapter";

export interface AppServices {
  store: ClassificationStore;
  detector: DetectionModelAdapter;
  maxUploadBytes: number;
  corsOrigins: string[];
}

export type AppEnv = { Variables: { services: AppServices } };
export type AppContext = Context<AppEnv>;

// Flower Classification API Schema Definitions

export const StageSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]).describe("0=bud, 1=anthesis, 2=post-anthesis");

export const FlowerDetectionSchema = z.object({
  bounding_box: z.tuple([z.number(), z.number(), z.number(), z.number()]).describe("[x_min, y_min, x_max, y_max]"),
  stage: StageSchema,
  confidence: z.number().min(0).max(1),
});

export const LocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

// Keys are the string forms of the stage integers
export const StageSummarySchema = z.record(z.string().regex(/^[012]$/), z.number().int().nonnegative());

// Classification request (multipart/form-data)
export const ClassifyFormDataSchema = z
  .object({
    file: z.custom<File>(value => value instanceof Blob && "name" in value, {
      message: "An image file is required in the 'file' field",
    }),
    latitude: z.number().min(-90).max(90).optional(), // manual override
    longitude: z.number().min(-180).max(180).optional(), // manual override
    confidence_threshold: z.number().min(0).max(1).optional(),
  })
  .refine(data => (data.latitude === undefined) === (data.longitude === undefined), {
    message: "latitude and longitude must be provided together",
    path: ["latitude"],
  });

export const ClassificationResponseSchema = z.object({
  id: z.string(),
  image_path: z.string(),
  location: LocationSchema.nullable(),
  timestamp: z.string().datetime(),
  detections: z.array(FlowerDetectionSchema),
  flower_count: z.number().int().nonnegative(),
  stage_summary: StageSummarySchema,
});

const HeatmapDataPointSchema = z.object({
  id: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  timestamp: z.string().datetime(),
  detections: z.array(FlowerDetectionSchema),
  flower_count: z.number().int().nonnegative(),
  stage_summary: StageSummarySchema,
});

export const HeatmapResponseSchema = z.object({
  total_records: z.number().int().nonnegative(),
  data_points: z.array(HeatmapDataPointSchema),
});

export const DeleteResponseSchema = z.object({
  message: z.string(),
  id: z.string(),
});

export const HealthResponseSchema = z.object({
  status: z.literal("healthy"),
  database: z.string(),
  model: z.enum(["not_loaded", "loading", "ready"]),
  timestamp: z.string().datetime(),
});

export const ErrorResponseSchema = z.object({
  success: z.literal(false),
  errors: z.array(z.object({ code: z.number(), message: z.string() })),
});

export const IdParamsSchema = z.object({
  id: z.string().describe("Classification id returned by POST /api/classify"),
});

// Type exports
export type FlowerDetectionResponse = z.infer<typeof FlowerDetectionSchema>;
export type ClassificationResponse = z.infer<typeof ClassificationResponseSchema>;
export type HeatmapResponse = z.infer<typeof HeatmapResponseSchema>;
