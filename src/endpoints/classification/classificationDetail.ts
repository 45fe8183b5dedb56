import { OpenAPIRoute } from "chanfana";
import type { AppContext } from "../../types";
import { ClassificationResponseSchema, ErrorResponseSchema, IdParamsSchema } from "../../types";
import { toClassificationResponse } from "../../utils/serialize";
import { requireId } from "./params";

export class ClassificationDetail extends OpenAPIRoute {
  schema = {
    tags: ["Classification"],
    summary: "Get a stored classification",
    request: {
      params: IdParamsSchema,
    },
    responses: {
      "200": {
        description: "The classification",
        content: { "application/json": { schema: ClassificationResponseSchema } },
      },
      "404": {
        description: "Classification not found",
        content: { "application/json": { schema: ErrorResponseSchema } },
      },
    },
  };

  async handle(c: AppContext) {
    const { store } = c.get("services");
    const record = await store.get(requireId(c));
    return c.json(toClassificationResponse(record), 200);
  }
}
