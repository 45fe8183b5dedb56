import * as ort from "onnxruntime-web";
import type { NormalizedImage } from "../../utils/image";
import type { DetectionBackend, RawDetection } from "./interface";
import { letterboxImage } from "./letterbox";
import { decodeYoloOutput, pickDetectionOutput } from "./yoloOutput";

/**
 * YOLOv8 flower-stage detector running on the ONNX Runtime WASM backend.
 * Class indices 0..2 are bud, anthesis and post-anthesis.
 */
export class OnnxDetectionBackend implements DetectionBackend {
  private readonly session: ort.InferenceSession;
  private readonly inputSize: number;
  private readonly source: string;

  private constructor(session: ort.InferenceSession, inputSize: number, source: string) {
    this.session = session;
    this.inputSize = inputSize;
    this.source = source;
  }

  static async fromBytes(model: Uint8Array, options: { inputSize: number; source: string }): Promise<OnnxDetectionBackend> {
    const session = await ort.InferenceSession.create(model);
    console.log(`ONNX session ready (${options.source}); inputs=${session.inputNames.join(",")} outputs=${session.outputNames.join(",")}`);
    return new OnnxDetectionBackend(session, options.inputSize, options.source);
  }

  getName(): string {
    return `ONNX flower-stage model (${this.source})`;
  }

  async infer(image: NormalizedImage): Promise<RawDetection[]> {
    const size = this.inputSize;
    const { data, letterbox } = await letterboxImage(image, size);
    const tensor = new ort.Tensor("float32", data, [1, 3, size, size]);
    const results = await this.session.run({ [this.session.inputNames[0]]: tensor });
    return decodeYoloOutput(pickDetectionOutput(results), letterbox);
  }
}
