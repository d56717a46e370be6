import { Router } from "express";
import type { AppConfig } from "../config";
import type { Transcoder, ReadyStatus } from "../modules/transcode/types";
import type { ServiceRegistry, ServiceTable } from "../registry";
import { errMessage } from "../util/log";
import { asyncRoute } from "./shared";

type Described = { describe(): Record<string, unknown>; ready(): Promise<ReadyStatus> };

const listing = async <S extends Described>(table: ServiceTable<S>, defaultName: string) => {
  const probes = await table.available();
  return {
    success: true,
    registered: table.names(),
    available: probes.filter((p) => p.available).map((p) => p.name),
    default_service: defaultName,
    services: Object.fromEntries(
      probes.map((p) => [p.name, { ...table.resolve(p.name).describe(), available: p.available }]),
    ),
  };
};

const probeTranscoder = async (transcoder: Transcoder): Promise<ReadyStatus> => {
  try {
    return await transcoder.ready();
  } catch (e) {
    return { ok: false, details: { error: errMessage(e) } };
  }
};

export const statusRoutes = (config: AppConfig, registry: ServiceRegistry, transcoder: Transcoder): Router => {
  const router = Router();

  router.get("/models", (_req, res) => {
    res.json({
      success: true,
      models: registry.asr.names(),
      default_model: config.defaultAsrService,
    });
  });

  router.get(
    "/asr-services",
    asyncRoute(async (_req, res) => {
      res.json(await listing(registry.asr, config.defaultAsrService));
    }),
  );

  router.get(
    "/summary-models",
    asyncRoute(async (_req, res) => {
      res.json(await listing(registry.summary, config.defaultSummaryService));
    }),
  );

  // 503 unless the transcoder and at least one service per category are up.
  router.get(
    "/services/health",
    asyncRoute(async (_req, res) => {
      const [transcoderStatus, asr, summary] = await Promise.all([
        probeTranscoder(transcoder),
        registry.asr.available(),
        registry.summary.available(),
      ]);
      const overall = transcoderStatus.ok && asr.some((s) => s.available) && summary.some((s) => s.available);
      res.status(overall ? 200 : 503).json({
        overall_health: overall,
        transcoder: transcoderStatus,
        asr_services: asr,
        summary_services: summary,
      });
    }),
  );

  return router;
};
