import { v4 as uuid } from "uuid";
import type { RecognitionMode } from "../config";
import { ServiceError, toServiceError, type PipelineStageName } from "../errors";
import type { RecognitionParams } from "../modules/asr/types";
import type { SummaryModule, SummaryResult } from "../modules/summary/types";
import type { Transcoder } from "../modules/transcode/types";
import type { ServiceRegistry } from "../registry";
import { durationMs, extensionFor } from "../util/audio";
import { log } from "../util/log";

export type PipelineState = "received" | "transcoding" | "recognizing" | "summarizing" | "completed" | "failed";

export interface AudioSubmission {
  data: Buffer;
  filename?: string;
  mimeType?: string;
  asrService: string;
  /** Per-request overrides of the recognizer's configured connection and chunking. */
  recognition: Partial<RecognitionParams>;
}

export interface TranscriptResult {
  text: string;
  /** Recognizer fragments in the order they were received. */
  segments: string[];
  mode: RecognitionMode;
  service: string;
  sampleRate: number;
  audioMs: number;
  submission: {
    filename?: string;
    mimeType?: string;
    sizeBytes: number;
  };
}

export interface SummaryOptions {
  service: string;
  style: string;
  maxLength?: number;
}

export type SummaryOutcome =
  | { status: "completed"; result: SummaryResult }
  | { status: "failed"; error: ServiceError };

export interface PipelineOutcome {
  transcript: TranscriptResult;
  summary: SummaryOutcome;
}

export interface PipelineDeps {
  transcoder: Transcoder;
  registry: ServiceRegistry;
}

/** One submission's walk through the states, timing each state it leaves. */
class PipelineRun {
  state: PipelineState = "received";
  private readonly startedAt = Date.now();
  private enteredAt = this.startedAt;
  private readonly stageMs: Partial<Record<PipelineState, number>> = {};

  constructor(readonly requestId: string) {}

  enter(state: PipelineState, fields?: Record<string, unknown>) {
    const now = Date.now();
    this.stageMs[this.state] = now - this.enteredAt;
    this.state = state;
    this.enteredAt = now;
    const done = state === "completed" || state === "failed";
    log.info("pipeline stage", {
      requestId: this.requestId,
      stage: state,
      ms: now - this.startedAt,
      ...(done ? { stageMs: { ...this.stageMs } } : {}),
      ...fields,
    });
  }

  fail(e: unknown, stage: PipelineStageName): ServiceError {
    const err = toServiceError(e);
    if (!err.stage) err.stage = stage;
    this.enter("failed", { failedStage: err.stage, kind: err.kind, err: err.message });
    return err;
  }
}

/**
 * received → transcoding → recognizing → (summarizing) → completed | failed.
 * Each stage exhausts its own retries; nothing is retried across stages.
 */
export class SpeechPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async transcribe(submission: AudioSubmission, requestId: string = uuid()): Promise<TranscriptResult> {
    const run = new PipelineRun(requestId);
    const transcript = await this.runTranscription(run, submission);
    run.enter("completed");
    return transcript;
  }

  /**
   * Transcribes, then summarizes. A summarization failure does not fail the
   * request: the transcript comes back with the summary marked failed.
   */
  async transcribeAndSummarize(
    submission: AudioSubmission,
    options: SummaryOptions,
    requestId: string = uuid(),
  ): Promise<PipelineOutcome> {
    const run = new PipelineRun(requestId);

    let summarizer: SummaryModule;
    try {
      summarizer = this.deps.registry.summary.resolve(options.service);
    } catch (e) {
      throw run.fail(e, "summarization");
    }

    const transcript = await this.runTranscription(run, submission);

    run.enter("summarizing", { service: options.service, style: options.style });
    let summary: SummaryOutcome;
    try {
      if (!transcript.text.trim()) {
        throw new ServiceError("ValidationError", "transcript is empty; nothing to summarize");
      }
      const result = await summarizer.summarize({
        text: transcript.text,
        style: options.style,
        maxLength: options.maxLength,
      });
      summary = { status: "completed", result };
    } catch (e) {
      const error = toServiceError(e);
      error.stage = "summarization";
      log.warn("summarization failed; returning transcript only", {
        requestId,
        kind: error.kind,
        err: error.message,
      });
      summary = { status: "failed", error };
    }

    run.enter("completed", { summary: summary.status });
    return { transcript, summary };
  }

  private async runTranscription(run: PipelineRun, submission: AudioSubmission): Promise<TranscriptResult> {
    try {
      const asr = this.deps.registry.asr.resolve(submission.asrService);

      run.enter("transcoding", { bytes: submission.data.length, filename: submission.filename });
      const audio = await this.deps.transcoder.transcode(
        submission.data,
        extensionFor(submission.filename, submission.mimeType),
      );

      run.enter("recognizing", { service: asr.name, audioMs: durationMs(audio) });
      const result = await asr.recognize(audio, submission.recognition);

      return {
        text: result.text,
        segments: [...result.fragments],
        mode: result.mode,
        service: submission.asrService,
        sampleRate: audio.sampleRate,
        audioMs: durationMs(audio),
        submission: {
          filename: submission.filename,
          mimeType: submission.mimeType,
          sizeBytes: submission.data.length,
        },
      };
    } catch (e) {
      throw run.fail(e, "transcription");
    }
  }
}
