import "dotenv/config";
import { serve } from "@hono/node-server";
import { ConfigError, loadConfig } from "./config";
import { createApp } from "./index";
import { createClassificationStore } from "./services/classificationStore/factory";
import { DetectionModelAdapter } from "./services/detectionModel/adapter";
import { createAcquisitionStrategies } from "./services/detectionModel/factory";

async function main() {
  const config = loadConfig();

  const store = await createClassificationStore(config.store);
  const detector = new DetectionModelAdapter(createAcquisitionStrategies(config.model), {
    defaultConfidenceThreshold: config.confidenceThreshold,
    initTimeoutMs: config.model.initTimeoutMs,
  });

  const app = createApp({
    store,
    detector,
    maxUploadBytes: config.maxUploadBytes,
    corsOrigins: config.corsOrigins,
  });

  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, info => {
    console.log(`Flower stage API listening on http://${info.address}:${info.port} (store: ${store.getName()})`);
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    server.close();
    store.close().then(
      () => process.exit(0),
      error => {
        console.error("Error while closing store:", error);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch(error => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error("Failed to start server:", error);
  }
  process.exit(1);
});
