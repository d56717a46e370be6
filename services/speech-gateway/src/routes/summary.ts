import { Router } from "express";
import { z } from "zod";
import type { AppConfig } from "../config";
import { parseWith } from "../middleware/validation";
import { requestIdOf } from "../middleware/requestLog";
import { summarizeBatch } from "../modules/summary/batch";
import type { PromptCatalog } from "../modules/summary/prompts";
import type { ServiceRegistry } from "../registry";
import { DEFAULT_SUMMARY_TYPE, asyncRoute, summaryJson, type BatchItemJson } from "./shared";

const nonBlank = (field: string) =>
  z.string().refine((t) => t.trim().length > 0, { message: `${field} must not be empty` });

const summarizeSchema = z.object({
  text: nonBlank("text"),
  summary_type: z.string().trim().min(1).default(DEFAULT_SUMMARY_TYPE),
  max_length: z.number().int().positive().nullish(),
  service_name: z.string().trim().min(1).nullish(),
});

const batchSchema = z.object({
  texts: z.array(z.string()).min(1, "texts must contain at least one entry"),
  summary_type: z.string().trim().min(1).default(DEFAULT_SUMMARY_TYPE),
  max_length: z.number().int().positive().nullish(),
  service_name: z.string().trim().min(1).nullish(),
});

type SummarizeBody = z.infer<typeof summarizeSchema>;
type BatchBody = z.infer<typeof batchSchema>;

export const summaryRoutes = (config: AppConfig, registry: ServiceRegistry, prompts: PromptCatalog): Router => {
  const router = Router();

  router.post(
    "/summarize",
    asyncRoute(async (req, res) => {
      const body: SummarizeBody = parseWith(summarizeSchema, req.body);
      const service = registry.summary.resolve(body.service_name ?? config.defaultSummaryService);
      const result = await service.summarize({
        text: body.text,
        style: body.summary_type,
        maxLength: body.max_length ?? undefined,
      });
      res.json({ success: true, request_id: requestIdOf(res), ...summaryJson(result) });
    }),
  );

  // Per-item failures are reported inside `results`; the request itself succeeds.
  router.post(
    "/batch-summarize",
    asyncRoute(async (req, res) => {
      const body: BatchBody = parseWith(batchSchema, req.body);
      const service = registry.summary.resolve(body.service_name ?? config.defaultSummaryService);
      const batch = await summarizeBatch(service, body.texts, body.summary_type, body.max_length ?? undefined);
      const results = batch.items.map(
        (item): BatchItemJson =>
          item.success
            ? { index: item.index, success: true, ...summaryJson(item.result) }
            : { index: item.index, success: false, error: item.error },
      );
      res.json({
        success: true,
        request_id: requestIdOf(res),
        results,
        total_count: results.length,
        success_count: batch.successCount,
      });
    }),
  );

  router.get("/summary-types", (_req, res) => {
    res.json({ success: true, summary_types: prompts.types(), default_type: DEFAULT_SUMMARY_TYPE });
  });

  return router;
};
