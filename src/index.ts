import { ApiException, fromHono } from "chanfana";
import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { classificationRouter } from "./endpoints/classification/router";
import type { AppEnv, AppServices } from "./types";

export function createApp(services: AppServices) {
  const app = new Hono<AppEnv>();

  app.use("*", cors({
    origin: services.corsOrigins.includes("*") ? "*" : services.corsOrigins,
    allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowHeaders: ["Content-Type"],
  }));

  // Collaborators are injected per app instance, never read from module state
  app.use("*", async (c, next) => {
    c.set("services", services);
    await next();
  });

  app.onError((err, c) => {
    if (err instanceof ApiException) {
      if (err.status >= 500) {
        console.error(`${c.req.method} ${c.req.path} failed:`, err.message);
      }
      return c.json(
        { success: false, errors: err.buildResponse() },
        err.status as ContentfulStatusCode,
      );
    }

    console.error("Global error handler caught:", err); // Log the error if it's not known

    // For other errors, return a generic 500 response
    return c.json(
      {
        success: false,
        errors: [{ code: 7000, message: "Internal Server Error" }],
      },
      500,
    );
  });

  // Setup OpenAPI registry
  const openapi = fromHono(app, {
    docs_url: "/docs",
    redoc_url: "/redoc",
    openapi_url: "/openapi.json",
    schema: {
      info: {
        title: "Flower Stage Classification API",
        version: "1.0.0",
        description: `
# Flower Stage Classification API

Detects tomato flowers in uploaded photos and classifies each one by growth stage.

## Stages

- **0**: Bud
- **1**: Anthesis (flowering)
- **2**: Post-anthesis

## Location

The location of a classification comes from the \`latitude\`/\`longitude\` form fields when given,
otherwise from the image's EXIF GPS tags. Images without either are stored without a location
and do not appear on the heatmap.
        `.trim(),
      },
      tags: [
        { name: "Classification", description: "Upload, retrieve and delete classifications" },
        { name: "Images", description: "Stored images, raw or annotated" },
        { name: "Map", description: "Aggregated data for map rendering" },
        { name: "Health", description: "Service status" },
      ],
    },
  });

  openapi.route("/", classificationRouter);

  return app;
}
