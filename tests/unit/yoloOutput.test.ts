import { describe, expect, it, vi } from "vitest";
import { applyNms, decodeYoloOutput, iou, pickDetectionOutput, type Letterbox } from "../../src/services/detectionModel/yoloOutput";

const IDENTITY: Letterbox = { scale: 1, padX: 0, padY: 0, sourceWidth: 100, sourceHeight: 100 };

// [cx, cy, w, h, bud, anthesis, post-anthesis]
const ANCHORS = [
  [20, 20, 10, 10, 0.9, 0.1, 0],
  [21, 20, 10, 10, 0.8, 0, 0],
  [21, 20, 10, 10, 0, 0.7, 0],
  [70, 70, 0, 10, 0, 0, 0.95],
  [80, 80, 10, 10, 0.005, 0, 0],
  [0, 0, 0, 0, 0, 0, 0],
  [0, 0, 0, 0, 0, 0, 0],
  [0, 0, 0, 0, 0, 0, 0],
];

function channelFirst(rows: number[][]): { data: Float32Array; dims: number[] } {
  const channels = rows[0].length;
  const data = new Float32Array(channels * rows.length);
  rows.forEach((row, i) => row.forEach((value, c) => (data[c * rows.length + i] = value)));
  return { data, dims: [1, channels, rows.length] };
}

function anchorFirst(rows: number[][]): { data: Float32Array; dims: number[] } {
  return { data: Float32Array.from(rows.flat()), dims: [1, rows.length, rows[0].length] };
}

describe("decodeYoloOutput", () => {
  it("should decode a channel-first head with class-wise suppression", () => {
    const detections = decodeYoloOutput(channelFirst(ANCHORS), IDENTITY);

    expect(detections).toHaveLength(2);
    expect(detections[0]).toEqual({ boundingBox: [15, 15, 25, 25], classIndex: 0, confidence: expect.closeTo(0.9, 5) });
    expect(detections[1]).toEqual({ boundingBox: [16, 15, 26, 25], classIndex: 1, confidence: expect.closeTo(0.7, 5) });
  });

  it("should decode the same anchors laid out anchor-first", () => {
    const detections = decodeYoloOutput(anchorFirst(ANCHORS), IDENTITY);

    expect(detections.map(detection => detection.boundingBox)).toEqual([
      [15, 15, 25, 25],
      [16, 15, 26, 25],
    ]);
  });

  it("should undo letterbox scaling and clamp to the source image", () => {
    const rows = [[60, 40, 20, 20, 0, 0.8, 0], ...ANCHORS.slice(5), ...ANCHORS.slice(5), ...ANCHORS.slice(5)];
    const letterbox: Letterbox = { scale: 0.5, padX: 10, padY: 0, sourceWidth: 200, sourceHeight: 100 };

    const [detection] = decodeYoloOutput(channelFirst(rows), letterbox);

    expect(detection.boundingBox).toEqual([80, 60, 120, 100]);
    expect(detection.classIndex).toBe(1);
  });

  it("should reject tensors of the wrong rank", () => {
    expect(() => decodeYoloOutput({ data: new Float32Array(4), dims: [4] }, IDENTITY)).toThrow(
      "Unexpected output shape: 4"
    );
  });
});

describe("non-maximum suppression", () => {
  const box = (cx: number, classIndex: number, confidence: number) => ({ cx, cy: 50, w: 10, h: 10, classIndex, confidence });

  it("should compute intersection over union", () => {
    expect(iou(box(50, 0, 1), box(50, 0, 1))).toBe(1);
    expect(iou(box(50, 0, 1), box(55, 0, 1))).toBeCloseTo(50 / 150, 10);
    expect(iou(box(50, 0, 1), box(70, 0, 1))).toBe(0);
  });

  it("should keep the most confident of overlapping boxes per class", () => {
    const kept = applyNms([box(51, 0, 0.6), box(50, 0, 0.9), box(50, 1, 0.5), box(80, 0, 0.4)], 0.45);

    expect(kept.map(candidate => [candidate.classIndex, candidate.confidence])).toEqual([
      [0, 0.9],
      [1, 0.5],
      [0, 0.4],
    ]);
  });
});

describe("pickDetectionOutput", () => {
  it("should pick the first batched float32 output", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const head = new Float32Array(7 * 8);

    const picked = pickDetectionOutput({
      proto: { dims: [1, 10], data: new Float32Array(10) },
      ids: { dims: [1, 7, 8], data: new BigInt64Array(56) },
      output0: { dims: [1, 7, 8], data: head },
      extra: { dims: [1, 8, 7], data: new Float32Array(56) },
    });

    expect(picked.data).toBe(head);
    expect(picked.dims).toEqual([1, 7, 8]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith("Skipping model output proto with shape 1x10");
    warn.mockRestore();
  });

  it("should fail when no output looks like a detection head", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(() => pickDetectionOutput({ scores: { dims: [2, 7, 8], data: new Float32Array(112) } })).toThrow(
      "Model produced no float32 detection output"
    );
    warn.mockRestore();
  });
});
