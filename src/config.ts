import { z } from "zod";
import type { ClassificationStoreConfig } from "./services/classificationStore/factory";
import type { DetectionModelConfig } from "./services/detectionModel/factory";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const commaList = <T extends z.ZodTypeAny>(item: T) =>
  z
    .string()
    .transform(value => value.split(",").map(entry => entry.trim()).filter(Boolean))
    .pipe(z.array(item));

export const EnvSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(7860),
  CORS_ORIGINS: commaList(z.string()).default("*"),
  STORE: z.enum(["mongo", "memory"]).default("mongo"),
  MONGODB_URL: optionalString,
  MONGODB_DATABASE: z.string().min(1).default("flower_classifications"),
  MODEL_STRATEGIES: commaList(z.enum(["remote", "local", "mock"])).default("remote,local"),
  MODEL_URL: optionalString.pipe(z.string().url().optional()),
  MODEL_CACHE_PATH: z.string().default("./models/cache/flower-stage.onnx"),
  MODEL_PATH: z.string().default("./models/flower-stage.onnx"),
  MODEL_INPUT_SIZE: z.coerce.number().int().positive().default(640),
  MODEL_INIT_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.25),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export interface AppConfig {
  host: string;
  port: number;
  corsOrigins: string[];
  store: ClassificationStoreConfig;
  model: DetectionModelConfig & { initTimeoutMs: number };
  confidenceThreshold: number;
  maxUploadBytes: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    host: vars.HOST,
    port: vars.PORT,
    corsOrigins: vars.CORS_ORIGINS,
    store: {
      type: vars.STORE,
      mongodbUrl: vars.MONGODB_URL,
      mongodbDatabase: vars.MONGODB_DATABASE,
    },
    model: {
      strategies: vars.MODEL_STRATEGIES,
      modelUrl: vars.MODEL_URL,
      modelCachePath: vars.MODEL_CACHE_PATH,
      modelPath: vars.MODEL_PATH,
      inputSize: vars.MODEL_INPUT_SIZE,
      initTimeoutMs: vars.MODEL_INIT_TIMEOUT_MS,
    },
    confidenceThreshold: vars.CONFIDENCE_THRESHOLD,
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
  };
}
