import { OpenAPIRoute } from "chanfana";
import type { AppContext } from "../../types";
import { HealthResponseSchema } from "../../types";

export class HealthCheck extends OpenAPIRoute {
  schema = {
    tags: ["Health"],
    summary: "Service health",
    description: "Always 200 while the process is up; `database` and `model` report the collaborators' state.",
    responses: {
      "200": {
        description: "Health report",
        content: { "application/json": { schema: HealthResponseSchema } },
      },
    },
  };

  async handle(c: AppContext) {
    const { store, detector } = c.get("services");

    return c.json({
      status: "healthy" as const,
      database: await store.ping(),
      model: detector.status(),
      timestamp: new Date().toISOString(),
    });
  }
}
