import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ServiceError } from "../errors";
import { ServiceRegistry } from "../registry";
import { log } from "../util/log";
import { FakeAsr, FakeSummarizer, FakeTranscoder } from "../testing/fakes";
import { SpeechPipeline, type AudioSubmission } from "./pipeline";

const TRANSCRIPT = "the quarterly numbers look good";

describe("SpeechPipeline", () => {
  let transcoder: FakeTranscoder;
  let asr: FakeAsr;
  let summarizer: FakeSummarizer;
  let pipeline: SpeechPipeline;

  const submission = (over: Partial<AudioSubmission> = {}): AudioSubmission => ({
    data: Buffer.from("fake-audio"),
    filename: "talk.mp3",
    mimeType: "audio/mpeg",
    asrService: "funasr",
    recognition: {},
    ...over,
  });

  beforeEach(() => {
    transcoder = new FakeTranscoder();
    asr = new FakeAsr("funasr", TRANSCRIPT);
    summarizer = new FakeSummarizer("wenxin");
    const registry = new ServiceRegistry();
    registry.asr.register("funasr", () => asr);
    registry.summary.register("wenxin", () => summarizer);
    registry.seal();
    pipeline = new SpeechPipeline({ transcoder, registry });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("transcribe", () => {
    it("transcodes, recognizes and describes the submission", async () => {
      const result = await pipeline.transcribe(submission({ recognition: { mode: "online", port: 10096 } }));

      expect(result).toEqual({
        text: TRANSCRIPT,
        segments: [TRANSCRIPT],
        mode: "online",
        service: "funasr",
        sampleRate: 16_000,
        audioMs: 1000,
        submission: { filename: "talk.mp3", mimeType: "audio/mpeg", sizeBytes: 10 },
      });
      expect(transcoder.calls).toEqual([{ bytes: 10, extension: "mp3" }]);
      expect(asr.calls).toEqual([{ mode: "online", port: 10096 }]);
    });

    it("keeps the recognizer's segments in order", async () => {
      asr.fragments = ["the quarterly ", "numbers ", "look good"];

      const result = await pipeline.transcribe(submission());

      expect(result.text).toBe(TRANSCRIPT);
      expect(result.segments).toEqual(["the quarterly ", "numbers ", "look good"]);
    });

    it("logs every state under the request id with the time spent in each", async () => {
      const info = vi.spyOn(log, "info").mockImplementation(() => undefined);

      await pipeline.transcribe(submission(), "req-7");

      const stages = info.mock.calls.filter(([msg]) => msg === "pipeline stage").map(([, fields]) => fields);
      expect(stages.map((f) => f?.stage)).toEqual(["transcoding", "recognizing", "completed"]);
      expect(stages.every((f) => f?.requestId === "req-7")).toBe(true);
      expect(stages[2]?.stageMs).toEqual({
        received: expect.any(Number),
        transcoding: expect.any(Number),
        recognizing: expect.any(Number),
      });
    });

    it("falls back to the MIME type for the container", async () => {
      await pipeline.transcribe(submission({ filename: "blob", mimeType: "audio/x-wav" }));

      expect(transcoder.calls[0]?.extension).toBe("wav");
    });

    it("fails on an unknown recognizer before touching the audio", async () => {
      await expect(pipeline.transcribe(submission({ asrService: "kaldi" }))).rejects.toMatchObject({
        kind: "NotFound",
        stage: "transcription",
      });
      expect(transcoder.calls).toEqual([]);
    });

    it("tags transcode failures with the transcription stage", async () => {
      transcoder.failWith = new ServiceError("TranscodeFailed", "ffmpeg failed (code 1)");

      await expect(pipeline.transcribe(submission())).rejects.toMatchObject({
        kind: "TranscodeFailed",
        stage: "transcription",
      });
      expect(asr.calls).toEqual([]);
    });
  });

  describe("transcribeAndSummarize", () => {
    const options = { service: "wenxin", style: "brief", maxLength: 80 };

    it("returns both results", async () => {
      const outcome = await pipeline.transcribeAndSummarize(submission(), options);

      expect(outcome.transcript.text).toBe(TRANSCRIPT);
      expect(outcome.summary.status).toBe("completed");
      if (outcome.summary.status !== "completed") return;
      expect(outcome.summary.result.summary).toBe(`summary of ${TRANSCRIPT}`);
      expect(summarizer.calls).toEqual([{ text: TRANSCRIPT, style: "brief", maxLength: 80 }]);
    });

    it("keeps the transcript when summarization fails", async () => {
      summarizer.failures.set(TRANSCRIPT, new ServiceError("AuthError", "bad credentials"));

      const outcome = await pipeline.transcribeAndSummarize(submission(), options);

      expect(outcome.transcript.text).toBe(TRANSCRIPT);
      expect(outcome.summary.status).toBe("failed");
      if (outcome.summary.status !== "failed") return;
      expect(outcome.summary.error).toMatchObject({
        kind: "AuthError",
        stage: "summarization",
        message: "bad credentials",
      });
    });

    it("does not summarize an empty transcript", async () => {
      asr.text = "   ";

      const outcome = await pipeline.transcribeAndSummarize(submission(), options);

      expect(outcome.summary.status).toBe("failed");
      if (outcome.summary.status !== "failed") return;
      expect(outcome.summary.error.kind).toBe("ValidationError");
      expect(summarizer.calls).toEqual([]);
    });

    it("rejects an unknown summary service before transcribing", async () => {
      await expect(
        pipeline.transcribeAndSummarize(submission(), { ...options, service: "gpt" }),
      ).rejects.toMatchObject({ kind: "NotFound", stage: "summarization" });
      expect(transcoder.calls).toEqual([]);
    });

    it("fails as a whole when recognition fails", async () => {
      asr.failWith = new ServiceError("ConnectionFailed", "cannot connect to ws://127.0.0.1:10095");

      await expect(pipeline.transcribeAndSummarize(submission(), options)).rejects.toMatchObject({
        kind: "ConnectionFailed",
        stage: "transcription",
      });
      expect(summarizer.calls).toEqual([]);
    });
  });
});
