import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import { parseBool, type AppConfig } from "../config";
import type { AudioSubmission, SpeechPipeline, SummaryOptions, SummaryOutcome } from "../core/pipeline";
import { ServiceError, errorBody, type ErrorBody } from "../errors";
import { requestIdOf } from "../middleware/requestLog";
import { parseWith } from "../middleware/validation";
import {
  DEFAULT_SUMMARY_TYPE,
  asyncRoute,
  blank,
  optionalPositiveInt,
  optionalText,
  parsedField,
  recognitionFields,
  summaryJson,
  transcriptJson,
  type RecognitionFields,
  type SummaryJson,
} from "./shared";

const summaryFields = recognitionFields.extend({
  summary_type: z.preprocess(blank, z.string().trim().min(1).default(DEFAULT_SUMMARY_TYPE)),
  max_length: optionalPositiveInt,
  summary_service: optionalText,
});

const uploadFields = summaryFields.extend({
  enable_summary: parsedField(parseBool, "a boolean"),
});

type SummaryFields = z.infer<typeof summaryFields>;

const summaryOptionsFrom = (fields: SummaryFields, defaultService: string): SummaryOptions => ({
  service: fields.summary_service ?? defaultService,
  style: fields.summary_type,
  maxLength: fields.max_length,
});

/** The summary half of a response: the result, or why there is none. */
const summaryPart = (
  outcome: SummaryOutcome,
): { result: SummaryJson | null; failed: boolean; error?: ErrorBody } =>
  outcome.status === "completed"
    ? { result: summaryJson(outcome.result), failed: false }
    : { result: null, failed: true, error: errorBody(outcome.error) };

const submissionFrom = (
  file: Express.Multer.File | undefined,
  fields: RecognitionFields,
  defaultAsr: string,
): AudioSubmission => {
  if (!file) throw new ServiceError("ValidationError", 'multipart field "file" is required');
  return {
    data: file.buffer,
    filename: file.originalname || undefined,
    mimeType: file.mimetype || undefined,
    asrService: fields.model ?? defaultAsr,
    recognition: {
      host: fields.host,
      port: fields.port,
      useSsl: fields.use_ssl,
      mode: fields.mode,
      chunkSize: fields.chunk_size,
      chunkInterval: fields.chunk_interval,
    },
  };
};

export const audioRoutes = (config: AppConfig, pipeline: SpeechPipeline): Router => {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: config.maxUploadBytes, files: 1 } });

  router.post(
    "/upload-audio",
    upload.single("file"),
    asyncRoute(async (req, res) => {
      const fields = parseWith(uploadFields, req.body, "upload fields");
      const submission = submissionFrom(req.file, fields, config.defaultAsrService);
      const requestId = requestIdOf(res);

      if (!fields.enable_summary) {
        const transcript = await pipeline.transcribe(submission, requestId);
        res.json({ success: true, request_id: requestId, ...transcriptJson(transcript), summary_enabled: false });
        return;
      }

      const outcome = await pipeline.transcribeAndSummarize(
        submission,
        summaryOptionsFrom(fields, config.defaultSummaryService),
        requestId,
      );
      const summary = summaryPart(outcome.summary);
      res.json({
        success: true,
        request_id: requestId,
        ...transcriptJson(outcome.transcript),
        summary_enabled: true,
        summary_result: summary.result,
        summary_failed: summary.failed,
        ...(summary.error ? { summary_error: summary.error } : {}),
      });
    }),
  );

  router.post(
    "/asr-and-summarize",
    upload.single("file"),
    asyncRoute(async (req, res) => {
      const fields = parseWith(summaryFields, req.body, "upload fields");
      const submission = submissionFrom(req.file, fields, config.defaultAsrService);
      const requestId = requestIdOf(res);

      const outcome = await pipeline.transcribeAndSummarize(
        submission,
        summaryOptionsFrom(fields, config.defaultSummaryService),
        requestId,
      );
      const summary = summaryPart(outcome.summary);
      res.json({
        success: true,
        request_id: requestId,
        transcript: transcriptJson(outcome.transcript),
        summary: summary.result,
        summary_failed: summary.failed,
        ...(summary.error ? { summary_error: summary.error } : {}),
      });
    }),
  );

  return router;
};
