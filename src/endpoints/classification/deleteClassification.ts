import { OpenAPIRoute } from "chanfana";
import type { AppContext } from "../../types";
import { DeleteResponseSchema, ErrorResponseSchema, IdParamsSchema } from "../../types";
import { requireId } from "./params";

export class DeleteClassification extends OpenAPIRoute {
  schema = {
    tags: ["Classification"],
    summary: "Delete a classification and its image",
    request: {
      params: IdParamsSchema,
    },
    responses: {
      "200": {
        description: "Deleted",
        content: { "application/json": { schema: DeleteResponseSchema } },
      },
      "404": {
        description: "Classification not found",
        content: { "application/json": { schema: ErrorResponseSchema } },
      },
    },
  };

  async handle(c: AppContext) {
    const { store } = c.get("services");
    const id = requireId(c);
    await store.delete(id);
    console.log(`Deleted classification ${id}`);
    return c.json({ message: "Classification deleted successfully", id }, 200);
  }
}
