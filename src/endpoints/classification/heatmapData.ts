import { OpenAPIRoute } from "chanfana";
import { buildHeatmapData } from "../../services/heatmap";
import type { AppContext } from "../../types";
import { ErrorResponseSchema, HeatmapResponseSchema } from "../../types";
import { toHeatmapResponse } from "../../utils/serialize";

export class HeatmapData extends OpenAPIRoute {
  schema = {
    tags: ["Map"],
    summary: "Geotagged classifications for the heatmap",
    description: `
Returns every classification that carries a location, with its detections and per-stage counts.
\`total_records\` counts all stored classifications, including those without a location.
    `.trim(),
    responses: {
      "200": {
        description: "Heatmap data",
        content: { "application/json": { schema: HeatmapResponseSchema } },
      },
      "503": {
        description: "Store unavailable",
        content: { "application/json": { schema: ErrorResponseSchema } },
      },
    },
  };

  async handle(c: AppContext) {
    const { store } = c.get("services");
    const data = await buildHeatmapData(store);
    return c.json(toHeatmapResponse(data), 200);
  }
}
