import express, { type Express } from "express";
import bodyParser from "body-parser";
import type { AppConfig } from "./config";
import type { SpeechPipeline } from "./core/pipeline";
import { errorHandler, notFound } from "./middleware/errorHandler";
import { requestLog } from "./middleware/requestLog";
import type { PromptCatalog } from "./modules/summary/prompts";
import type { Transcoder } from "./modules/transcode/types";
import type { ServiceRegistry } from "./registry";
import { audioRoutes } from "./routes/audio";
import { statusRoutes } from "./routes/status";
import { summaryRoutes } from "./routes/summary";

export interface AppDeps {
  config: AppConfig;
  registry: ServiceRegistry;
  pipeline: SpeechPipeline;
  transcoder: Transcoder;
  prompts: PromptCatalog;
}

export const createApp = ({ config, registry, pipeline, transcoder, prompts }: AppDeps): Express => {
  const app = express();
  app.disable("x-powered-by");

  app.use(requestLog);
  app.use(bodyParser.json({ limit: "10mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", service: "speech-gateway" });
  });

  app.use("/api", audioRoutes(config, pipeline));
  app.use("/api", summaryRoutes(config, registry, prompts));
  app.use("/api", statusRoutes(config, registry, transcoder));

  app.use(notFound);
  app.use(errorHandler);
  return app;
};
