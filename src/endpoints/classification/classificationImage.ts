import { OpenAPIRoute } from "chanfana";
import { z } from "zod";
import type { AppContext } from "../../types";
import { ErrorResponseSchema, IdParamsSchema } from "../../types";
import { drawDetections } from "../../utils/annotate";
import { requireId } from "./params";

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

const imageResponses = {
  "200": {
    description: "Image bytes",
    content: { "image/*": { schema: z.string().describe("binary") } },
  },
  "404": {
    description: "Classification not found",
    content: { "application/json": { schema: ErrorResponseSchema } },
  },
};

export class ClassificationImage extends OpenAPIRoute {
  schema = {
    tags: ["Images"],
    summary: "Get the uploaded image of a classification",
    request: {
      params: IdParamsSchema,
    },
    responses: imageResponses,
  };

  async handle(c: AppContext) {
    const { store } = c.get("services");
    const { image } = await store.get(requireId(c));

    return c.body(toArrayBuffer(image.bytes), 200, {
      "Content-Type": image.contentType,
      "Content-Disposition": `inline; filename="${image.filename}"`,
      "X-Content-Type-Options": "nosniff",
    });
  }
}

export class AnnotatedClassificationImage extends OpenAPIRoute {
  schema = {
    tags: ["Images"],
    summary: "Get the image with detections drawn on it",
    description: "Boxes are colored by stage and labelled with the stage name and confidence. Always returns JPEG.",
    request: {
      params: IdParamsSchema,
    },
    responses: imageResponses,
  };

  async handle(c: AppContext) {
    const { store } = c.get("services");
    const record = await store.get(requireId(c));
    const annotated = await drawDetections(record.image.bytes, record.detections);

    return c.body(toArrayBuffer(annotated), 200, {
      "Content-Type": "image/jpeg",
      "Content-Disposition": `inline; filename="${record.id}-annotated.jpg"`,
      "X-Content-Type-Options": "nosniff",
    });
  }
}
