import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z } from "zod";
import { isValidHost, parseBool, parseChunkSize, parseMode } from "../config";
import type { ErrorBody } from "../errors";
import type { TranscriptResult } from "../core/pipeline";
import type { SummaryResult } from "../modules/summary/types";

export const DEFAULT_SUMMARY_TYPE = "general";

/** Lets express 4 see rejections from async handlers. */
export const asyncRoute =
  (fn: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };

// Multipart fields arrive as strings; an empty field means "not given".
export const blank = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

export const optionalText = z.preprocess(blank, z.string().trim().optional());

export const optionalPositiveInt = z.preprocess(blank, z.coerce.number().int().positive().optional());

export const parsedField = <T>(parse: (raw: string) => T | undefined, expected: string) =>
  optionalText.transform((raw, ctx): T | undefined => {
    if (raw === undefined) return undefined;
    const value = parse(raw);
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected ${expected}` });
      return z.NEVER;
    }
    return value;
  });

export const recognitionFields = z.object({
  model: optionalText,
  host: optionalText.refine((h) => h === undefined || isValidHost(h), { message: "expected a host name or IP address" }),
  port: z.preprocess(blank, z.coerce.number().int().min(1).max(65535).optional()),
  use_ssl: parsedField(parseBool, "a boolean"),
  mode: parsedField(parseMode, "one of offline|online|2pass"),
  chunk_size: parsedField(parseChunkSize, "three comma-separated integers"),
  chunk_interval: optionalPositiveInt,
});

export type RecognitionFields = z.infer<typeof recognitionFields>;

export const transcriptJson = (t: TranscriptResult) => ({
  text: t.text,
  segments: t.segments,
  mode: t.mode,
  service: t.service,
  sample_rate: t.sampleRate,
  audio_ms: t.audioMs,
  uploaded_filename: t.submission.filename ?? null,
  content_type: t.submission.mimeType ?? null,
  file_size: t.submission.sizeBytes,
});

export const summaryJson = (s: SummaryResult) => ({
  summary: s.summary,
  summary_type: s.style,
  max_length: s.maxLength,
  truncated: s.truncated,
  model: s.model,
  original_length: s.originalLength,
  summary_length: s.summaryLength,
});

export type SummaryJson = ReturnType<typeof summaryJson>;

export type BatchItemJson =
  | ({ index: number; success: true } & SummaryJson)
  | { index: number; success: false; error: ErrorBody };
