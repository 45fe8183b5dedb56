import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../../errors";
import type { AcquisitionResult, AcquisitionStrategy, DetectionBackend } from "./interface";

export type StrategyType = "remote" | "local" | "mock";

export interface DetectionModelConfig {
  strategies: StrategyType[];
  modelUrl?: string;
  modelCachePath: string;
  modelPath: string;
  inputSize: number;
}

async function loadOnnxBackend(model: Uint8Array, inputSize: number, source: string): Promise<DetectionBackend> {
  // Keeps the WASM runtime out of processes that never load a model
  const { OnnxDetectionBackend } = await import("./onnxBackend");
  return OnnxDetectionBackend.fromBytes(model, { inputSize, source });
}

// Downloads the model and refreshes the on-disk cache copy
export class RemoteModelStrategy implements AcquisitionStrategy {
  readonly name = "remote";

  constructor(private readonly config: DetectionModelConfig) {}

  async acquire(): Promise<AcquisitionResult> {
    const { modelUrl, modelCachePath, inputSize } = this.config;
    if (!modelUrl) {
      return { ok: false, reason: "MODEL_URL not configured" };
    }

    try {
      const response = await fetch(modelUrl);
      if (!response.ok) {
        return { ok: false, reason: `download failed: ${response.status} ${response.statusText}` };
      }
      const model = new Uint8Array(await response.arrayBuffer());

      await mkdir(path.dirname(modelCachePath), { recursive: true });
      await writeFile(modelCachePath, model);

      return { ok: true, backend: await loadOnnxBackend(model, inputSize, modelUrl) };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }
}

export class LocalModelStrategy implements AcquisitionStrategy {
  readonly name = "local";

  constructor(private readonly config: DetectionModelConfig) {}

  async acquire(): Promise<AcquisitionResult> {
    const { modelPath, inputSize } = this.config;
    const exists = await access(modelPath).then(() => true, () => false);
    if (!exists) {
      return { ok: false, reason: `model file not found: ${modelPath}` };
    }

    try {
      const model = new Uint8Array(await readFile(modelPath));
      return { ok: true, backend: await loadOnnxBackend(model, inputSize, modelPath) };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }
}

export class MockModelStrategy implements AcquisitionStrategy {
  readonly name = "mock";

  async acquire(): Promise<AcquisitionResult> {
    const { MockDetectionBackend } = await import("./mockBackend");
    return { ok: true, backend: new MockDetectionBackend() };
  }
}

export function createAcquisitionStrategies(config: DetectionModelConfig): AcquisitionStrategy[] {
  return config.strategies.map((type): AcquisitionStrategy => {
    switch (type) {
      case "remote":
        return new RemoteModelStrategy(config);
      case "local":
        return new LocalModelStrategy(config);
      case "mock":
        return new MockModelStrategy();
    }
  });
}
