import { describe, expect, it } from "vitest";
import {
  Stage,
  buildClassificationRecord,
  countFlowers,
  imageFilename,
  isStage,
  summarizeStages,
  type Detection,
} from "../../src/services/classificationRecord";

const detections: Detection[] = [
  { boundingBox: [0, 0, 10, 10], stage: Stage.Bud, confidence: 0.8 },
  { boundingBox: [5, 5, 15, 15], stage: Stage.Bud, confidence: 0.7 },
  { boundingBox: [20, 20, 40, 40], stage: Stage.PostAnthesis, confidence: 0.6 },
];

const image = { bytes: new Uint8Array([1, 2, 3]), contentType: "image/jpeg", filename: "rec-1.jpg" };

describe("classification records", () => {
  it("should count one flower per detection", () => {
    expect(countFlowers(detections)).toBe(3);
    expect(countFlowers([])).toBe(0);
  });

  it("should summarize only the stages that occur", () => {
    expect(summarizeStages(detections)).toEqual({ [Stage.Bud]: 2, [Stage.PostAnthesis]: 1 });
    expect(summarizeStages([])).toEqual({});
  });

  it("should recognize only the three stage indices", () => {
    expect([0, 1, 2].every(isStage)).toBe(true);
    expect(isStage(3)).toBe(false);
    expect(isStage(-1)).toBe(false);
    expect(isStage(0.5)).toBe(false);
  });

  it("should build a record whose count matches its summary", () => {
    const timestamp = new Date("2026-05-01T08:30:00.000Z");
    const record = buildClassificationRecord({
      id: "rec-1",
      image,
      location: { latitude: 10, longitude: 20 },
      detections,
      timestamp,
    });

    expect(record.flowerCount).toBe(3);
    expect(record.stageSummary).toEqual({ 0: 2, 2: 1 });
    const summed = Object.values(record.stageSummary).reduce((total, count) => total + (count ?? 0), 0);
    expect(summed).toBe(record.flowerCount);
    expect(record.location).toEqual({ latitude: 10, longitude: 20 });
    expect(record.timestamp.toISOString()).toBe("2026-05-01T08:30:00.000Z");
    expect(record.timestamp).not.toBe(timestamp);
  });

  it("should freeze the record and copy its detections", () => {
    const input = detections.map(detection => ({ ...detection }));
    const record = buildClassificationRecord({ id: "rec-2", image, location: null, detections: input, timestamp: new Date() });

    input[0].confidence = 0.1;

    expect(record.detections[0].confidence).toBe(0.8);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.detections)).toBe(true);
    expect(Object.isFrozen(record.detections[0].boundingBox)).toBe(true);
  });

  it("should keep a null location as null", () => {
    const record = buildClassificationRecord({ id: "rec-3", image, location: null, detections: [], timestamp: new Date() });

    expect(record.location).toBeNull();
    expect(record.flowerCount).toBe(0);
    expect(record.stageSummary).toEqual({});
  });

  it("should name stored images after the record id", () => {
    expect(imageFilename("abc", "png")).toBe("abc.png");
    expect(imageFilename("abc", "jpg")).toBe("abc.jpg");
  });
});
