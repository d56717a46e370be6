import dotenv from "dotenv";
import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { SpeechPipeline } from "./core/pipeline";
import { PromptCatalog } from "./modules/summary/prompts";
import { FfmpegTranscoder } from "./modules/transcode/ffmpeg";
import { ServiceRegistry } from "./registry";
import { registerServices } from "./services";
import { configureLog, errMessage, log } from "./util/log";

dotenv.config();

const main = async () => {
  const config = loadConfig();
  configureLog({ level: config.logLevel, file: config.logFile });

  if (!config.wenxin.apiKey || !config.wenxin.secretKey) {
    log.warn("BAIDU_API_KEY / BAIDU_SECRET_KEY not set; summarization will report AuthError");
  }

  const prompts = await PromptCatalog.load(config.promptsPath);
  const registry = registerServices(new ServiceRegistry(), config, prompts);
  const transcoder = new FfmpegTranscoder(config.transcoder);
  const pipeline = new SpeechPipeline({ transcoder, registry });

  const transcoderReady = await transcoder.ready();
  if (!transcoderReady.ok) {
    log.warn("ffmpeg is not usable; uploads will fail until FFMPEG_BIN is fixed", { details: transcoderReady.details });
  }

  const app = createApp({ config, registry, pipeline, transcoder, prompts });
  const server = createServer(app);

  server.listen(config.port, () => {
    log.info("speech-gateway listening", {
      url: `http://localhost:${config.port}`,
      asr: registry.asr.names(),
      summary: registry.summary.names(),
      summaryTypes: prompts.keys(),
    });
  });

  const shutdown = (signal: string) => {
    log.info("shutting down", { signal });
    server.close((err) => {
      if (err) {
        log.error("server close failed", { err: err.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

main().catch((e) => {
  log.error("startup failed", { err: errMessage(e) });
  process.exit(1);
});
