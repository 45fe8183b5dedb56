import { Hono } from "hono";
import { fromHono } from "chanfana";
import type { AppEnv } from "../../types";
import { ClassifyImage } from "./classify";
import { HeatmapData } from "./heatmapData";
import { ClassificationDetail } from "./classificationDetail";
import { AnnotatedClassificationImage, ClassificationImage } from "./classificationImage";
import { DeleteClassification } from "./deleteClassification";
import { HealthCheck } from "./health";

export const classificationRouter = fromHono(new Hono<AppEnv>());

classificationRouter.get("/", HealthCheck);
classificationRouter.post("/api/classify", ClassifyImage);
classificationRouter.get("/api/heatmap-data", HeatmapData);
classificationRouter.get("/api/classifications/:id", ClassificationDetail);
classificationRouter.delete("/api/classifications/:id", DeleteClassification);
classificationRouter.get("/api/images/:id", ClassificationImage);
classificationRouter.get("/api/images/:id/annotated", AnnotatedClassificationImage);
