import { randomUUID } from "node:crypto";
import { OpenAPIRoute } from "chanfana";
import { InputError } from "../../errors";
import { buildClassificationRecord, imageFilename } from "../../services/classificationRecord";
import { resolveLocation } from "../../services/geolocation";
import type { AppContext } from "../../types";
import { ClassificationResponseSchema, ClassifyFormDataSchema, ErrorResponseSchema } from "../../types";
import { validateFile } from "../../utils/fileValidation";
import { inspectImage } from "../../utils/image";
import { toClassificationResponse } from "../../utils/serialize";

// Numeric form fields arrive as strings; blank ones are treated as absent
export function parseFormData(formData: FormData): Record<string, unknown> {
  const data: Record<string, unknown> = {};

  for (const [key, value] of formData.entries()) {
    if (typeof value !== "string") {
      data[key] = value;
    } else if (value.trim() === "") {
      continue;
    } else if (!isNaN(Number(value))) {
      data[key] = Number(value);
    } else {
      data[key] = value;
    }
  }

  return data;
}

export class ClassifyImage extends OpenAPIRoute {
  schema = {
    tags: ["Classification"],
    summary: "Detect flowers and classify their growth stage",
    description: `
Upload an image of a tomato plant. The service will:

1. Take the location from \`latitude\`/\`longitude\` if given, otherwise from the image's EXIF GPS tags
2. Detect flowers and classify each one as bud (0), anthesis (1) or post-anthesis (2)
3. Store the result together with the image
4. Return the stored classification

Detections below \`confidence_threshold\` (default 0.25) are dropped.
    `.trim(),
    request: {
      body: {
        content: {
          "multipart/form-data": {
            schema: ClassifyFormDataSchema,
          },
        },
      },
    },
    responses: {
      "200": {
        description: "Classification stored",
        content: { "application/json": { schema: ClassificationResponseSchema } },
      },
      "400": {
        description: "Invalid image or form fields",
        content: { "application/json": { schema: ErrorResponseSchema } },
      },
      "503": {
        description: "Detection model or store unavailable",
        content: { "application/json": { schema: ErrorResponseSchema } },
      },
    },
  };

  async handle(c: AppContext) {
    const { store, detector, maxUploadBytes } = c.get("services");

    const contentType = c.req.header("content-type") || "";
    if (!contentType.includes("multipart/form-data")) {
      throw new InputError("Content-Type must be multipart/form-data");
    }

    let formData: FormData;
    try {
      formData = await c.req.formData();
    } catch {
      throw new InputError("Malformed multipart body");
    }

    const validation = ClassifyFormDataSchema.safeParse(parseFormData(formData));
    if (!validation.success) {
      throw new InputError(
        "Invalid request parameters",
        validation.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
      );
    }
    const request = validation.data;

    const fileValidation = validateFile(request.file, maxUploadBytes);
    if (!fileValidation.isValid) {
      throw new InputError("Invalid image", fileValidation.errors);
    }

    const bytes = new Uint8Array(await request.file.arrayBuffer());
    const info = await inspectImage(bytes);

    const manual =
      request.latitude !== undefined && request.longitude !== undefined
        ? { latitude: request.latitude, longitude: request.longitude }
        : null;

    const [location, detections] = await Promise.all([
      resolveLocation(bytes, manual),
      detector.detect(bytes, { confidenceThreshold: request.confidence_threshold }),
    ]);

    const id = randomUUID();
    const record = buildClassificationRecord({
      id,
      image: {
        bytes,
        contentType: info.contentType,
        filename: imageFilename(id, info.extension),
      },
      location,
      detections,
      timestamp: new Date(),
    });

    await store.insert(record);
    console.log(`Stored classification ${id}: ${record.flowerCount} flowers, location=${location ? "yes" : "no"}`);

    return c.json(toClassificationResponse(record), 200);
  }
}
