import fs from "node:fs/promises";
import path from "node:path";
import { v4 as uuid } from "uuid";
import { ServiceError } from "../../errors";
import { execFile, type ExecFileFn, type ExecResult } from "../../util/exec";
import { errMessage, log } from "../../util/log";
import {
  SUPPORTED_EXTENSIONS,
  isSupportedExtension,
  normalizeExtension,
  type CanonicalAudio,
} from "../../util/audio";
import type { ReadyStatus, Transcoder } from "./types";

interface FfmpegOptions {
  ffmpegPath: string;
  timeoutMs: number;
  sampleRate: number;
  /** Parent of the per-call scratch directories. */
  workDir: string;
  exec?: ExecFileFn;
}

const isMissingBinary = (e: unknown) =>
  e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "EACCES");

export class FfmpegTranscoder implements Transcoder {
  private readonly exec: ExecFileFn;

  constructor(private readonly opts: FfmpegOptions) {
    this.exec = opts.exec ?? execFile;
  }

  async ready(): Promise<ReadyStatus> {
    try {
      const res = await this.exec(this.opts.ffmpegPath, ["-version"], { timeoutMs: 10_000 });
      return {
        ok: res.code === 0,
        details: { ffmpegPath: this.opts.ffmpegPath, version: res.stdout.split("\n")[0]?.trim() },
      };
    } catch (e) {
      return { ok: false, details: { ffmpegPath: this.opts.ffmpegPath, error: errMessage(e) } };
    }
  }

  private async run(args: string[]): Promise<ExecResult> {
    try {
      return await this.exec(this.opts.ffmpegPath, args, { timeoutMs: this.opts.timeoutMs });
    } catch (e) {
      if (isMissingBinary(e)) {
        throw new ServiceError("ServiceUnavailable", `ffmpeg is not available at ${this.opts.ffmpegPath}`, {
          cause: e,
        });
      }
      throw e;
    }
  }

  async transcode(input: Buffer, extension: string): Promise<CanonicalAudio> {
    const ext = normalizeExtension(extension);
    if (!isSupportedExtension(ext)) {
      throw new ServiceError("UnsupportedFormat", `unsupported audio format: ${ext ? `.${ext}` : "(none)"}`, {
        details: { supported: [...SUPPORTED_EXTENSIONS] },
      });
    }
    if (!input.length) {
      throw new ServiceError("ValidationError", "uploaded audio is empty");
    }

    await fs.mkdir(this.opts.workDir, { recursive: true });
    const tmpDir = await fs.mkdtemp(path.join(this.opts.workDir, "transcode-"));
    const id = uuid().slice(0, 8);
    const inPath = path.join(tmpDir, `in_${id}.${ext}`);
    const outPath = path.join(tmpDir, `out_${id}.s16le`);

    try {
      await fs.writeFile(inPath, input);

      const args = [
        "-y",
        "-i",
        inPath,
        "-ac",
        "1",
        "-ar",
        String(this.opts.sampleRate),
        "-f",
        "s16le",
        outPath,
      ];

      const started = Date.now();
      const res = await this.run(args);

      if (res.timedOut) {
        throw new ServiceError("Timeout", `ffmpeg did not finish within ${this.opts.timeoutMs}ms`, {
          retryable: false,
        });
      }
      if (res.code !== 0) {
        const stderrTail = res.stderr.slice(-800);
        log.warn("ffmpeg exited non-zero", { code: res.code, stderr: stderrTail });
        throw new ServiceError("TranscodeFailed", `ffmpeg failed (code ${res.code})`, {
          details: { code: res.code, stderr: stderrTail },
        });
      }

      const pcm16 = await fs.readFile(outPath).catch((e: unknown) => {
        throw new ServiceError("TranscodeFailed", "ffmpeg produced no output file", { cause: e });
      });
      if (!pcm16.length) {
        throw new ServiceError("TranscodeFailed", "ffmpeg produced no audio", {
          details: { stderr: res.stderr.slice(-800) },
        });
      }

      log.info("audio transcoded", {
        ext,
        inBytes: input.length,
        outBytes: pcm16.length,
        sampleRate: this.opts.sampleRate,
        elapsedMs: Date.now() - started,
      });
      return { pcm16, sampleRate: this.opts.sampleRate };
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true }).catch((e: unknown) => {
        log.warn("scratch cleanup failed", { dir: tmpDir, err: errMessage(e) });
      });
    }
  }
}
