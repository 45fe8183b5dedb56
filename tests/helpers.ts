import sharp from "sharp";
import { createApp } from "../src/index";
import type { ClassificationStore } from "../src/services/classificationStore/interface";
import { MemoryClassificationStore } from "../src/services/classificationStore/memoryStore";
import { DetectionModelAdapter } from "../src/services/detectionModel/adapter";
import type {
  AcquisitionResult,
  AcquisitionStrategy,
  DetectionBackend,
  RawDetection,
} from "../src/services/detectionModel/interface";
import type { NormalizedImage } from "../src/utils/image";

export const TEST_IMAGE_WIDTH = 64;
export const TEST_IMAGE_HEIGHT = 48;

export async function createJpeg(width = TEST_IMAGE_WIDTH, height = TEST_IMAGE_HEIGHT): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 40, g: 160, b: 60 } } })
    .jpeg()
    .toBuffer();
}

export async function createRgbaPng(width = TEST_IMAGE_WIDTH, height = TEST_IMAGE_HEIGHT): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 4, background: { r: 200, g: 30, b: 30, alpha: 0.5 } } })
    .png()
    .toBuffer();
}

export async function createGrayscalePng(width = TEST_IMAGE_WIDTH, height = TEST_IMAGE_HEIGHT): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 90, g: 90, b: 90 } } })
    .toColourspace("b-w")
    .png()
    .toBuffer();
}

type Rational = [numerator: number, denominator: number];

export interface GpsFixture {
  latitude: [Rational, Rational, Rational];
  latitudeRef: "N" | "S";
  longitude: [Rational, Rational, Rational];
  longitudeRef: "E" | "W";
}

const TIFF_LONG = 4;
const TIFF_RATIONAL = 5;
const TIFF_ASCII = 2;

/**
 * Builds a little-endian TIFF block holding only an IFD0 with a GPS pointer
 * and a four-entry GPS IFD, wrapped in a JPEG APP1 "Exif" segment.
 *
 *   0   header            8   IFD0 (1 entry)      26  GPS IFD (4 entries)
 *   80  latitude DMS      104 longitude DMS       128 end
 */
export function buildGpsExifSegment(gps: GpsFixture): Buffer {
  const tiff = Buffer.alloc(128);
  const entry = (offset: number, tag: number, type: number, count: number) => {
    tiff.writeUInt16LE(tag, offset);
    tiff.writeUInt16LE(type, offset + 2);
    tiff.writeUInt32LE(count, offset + 4);
  };
  const rationals = (offset: number, values: Rational[]) => {
    values.forEach(([numerator, denominator], i) => {
      tiff.writeUInt32LE(numerator, offset + i * 8);
      tiff.writeUInt32LE(denominator, offset + i * 8 + 4);
    });
  };

  tiff.write("II", 0, "latin1");
  tiff.writeUInt16LE(42, 2);
  tiff.writeUInt32LE(8, 4);

  tiff.writeUInt16LE(1, 8);
  entry(10, 0x8825, TIFF_LONG, 1);
  tiff.writeUInt32LE(26, 18);
  tiff.writeUInt32LE(0, 22);

  tiff.writeUInt16LE(4, 26);
  entry(28, 0x0001, TIFF_ASCII, 2);
  tiff.write(gps.latitudeRef, 36, "latin1");
  entry(40, 0x0002, TIFF_RATIONAL, 3);
  tiff.writeUInt32LE(80, 48);
  entry(52, 0x0003, TIFF_ASCII, 2);
  tiff.write(gps.longitudeRef, 60, "latin1");
  entry(64, 0x0004, TIFF_RATIONAL, 3);
  tiff.writeUInt32LE(104, 72);
  tiff.writeUInt32LE(0, 76);

  rationals(80, gps.latitude);
  rationals(104, gps.longitude);

  const header = Buffer.from("Exif\0\0", "latin1");
  const length = Buffer.alloc(2);
  length.writeUInt16BE(2 + header.length + tiff.length, 0);

  return Buffer.concat([Buffer.from([0xff, 0xe1]), length, header, tiff]);
}

// Inserts the APP1 segment right after the JPEG SOI marker
export function withGpsExif(jpeg: Buffer, gps: GpsFixture): Buffer {
  return Buffer.concat([jpeg.subarray(0, 2), buildGpsExifSegment(gps), jpeg.subarray(2)]);
}

// 37°46'29.64"N 122°25'9.84"W
export const SAN_FRANCISCO_GPS: GpsFixture = {
  latitude: [[37, 1], [46, 1], [2964, 100]],
  latitudeRef: "N",
  longitude: [[122, 1], [25, 1], [984, 100]],
  longitudeRef: "W",
};

export class FakeDetectionBackend implements DetectionBackend {
  calls = 0;
  lastImage: NormalizedImage | null = null;

  constructor(private readonly detections: RawDetection[] = []) {}

  getName(): string {
    return "Fake detector";
  }

  async infer(image: NormalizedImage): Promise<RawDetection[]> {
    this.calls++;
    this.lastImage = image;
    return this.detections;
  }
}

export class FakeStrategy implements AcquisitionStrategy {
  attempts = 0;

  constructor(
    readonly name: string,
    private readonly outcome: () => Promise<AcquisitionResult>
  ) {}

  async acquire(): Promise<AcquisitionResult> {
    this.attempts++;
    return this.outcome();
  }
}

export function succeedingStrategy(backend: DetectionBackend, name = "fake"): FakeStrategy {
  return new FakeStrategy(name, async () => ({ ok: true, backend }));
}

export function failingStrategy(name: string, reason: string): FakeStrategy {
  return new FakeStrategy(name, async () => ({ ok: false, reason }));
}

// Confidences 0.9, 0.3 and 0.6, one flower per stage
export const SAMPLE_DETECTIONS: RawDetection[] = [
  { boundingBox: [4, 4, 20, 20], classIndex: 0, confidence: 0.9 },
  { boundingBox: [10, 10, 30, 30], classIndex: 1, confidence: 0.3 },
  { boundingBox: [30, 5, 50, 25], classIndex: 2, confidence: 0.6 },
];

export interface TestAppOptions {
  detections?: RawDetection[];
  strategies?: AcquisitionStrategy[];
  store?: ClassificationStore;
  confidenceThreshold?: number;
}

export function createTestApp(options: TestAppOptions = {}) {
  const backend = new FakeDetectionBackend(options.detections ?? SAMPLE_DETECTIONS);
  const strategies = options.strategies ?? [succeedingStrategy(backend)];
  const store = options.store ?? new MemoryClassificationStore();
  const detector = new DetectionModelAdapter(strategies, {
    defaultConfidenceThreshold: options.confidenceThreshold,
    initTimeoutMs: 1000,
  });
  const app = createApp({ store, detector, maxUploadBytes: 1024 * 1024, corsOrigins: ["*"] });

  return { app, store, detector, backend, strategies };
}

export function classifyForm(
  image: Uint8Array,
  fields: Record<string, string> = {},
  file: { name?: string; type?: string } = {}
): FormData {
  const form = new FormData();
  form.append("file", new File([new Uint8Array(image)], file.name ?? "plant.jpg", { type: file.type ?? "image/jpeg" }));
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  return form;
}
