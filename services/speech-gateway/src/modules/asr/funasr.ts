import WebSocket, { type RawData } from "ws";
import { v4 as uuid } from "uuid";
import { z } from "zod";
import type { FunAsrConfig } from "../../config";
import { ServiceError, isServiceError } from "../../errors";
import { chunkPcm16, durationMs, SUPPORTED_EXTENSIONS, type CanonicalAudio } from "../../util/audio";
import { errMessage, log } from "../../util/log";
import { withRetry } from "../../util/retry";
import type { ReadyStatus } from "../transcode/types";
import type { AsrModule, AsrResult, RecognitionParams } from "./types";

const SUPPORTED_SAMPLE_RATES = [8000, 16000, 22050, 44100];

const errorFrameSchema = z.object({ error: z.string() }).passthrough();

const resultFrameSchema = z
  .object({
    text: z.string(),
    mode: z.string().optional(),
    wav_name: z.string().optional(),
    is_final: z.boolean().optional(),
  })
  .passthrough();

type ResultFrame = z.infer<typeof resultFrameSchema>;

/** Parses one server frame; throws ProtocolError or RecognitionFailed. */
export const parseServerFrame = (raw: string): ResultFrame => {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new ServiceError("ProtocolError", "recognition server sent a non-JSON frame", {
      details: { preview: raw.slice(0, 200) },
    });
  }

  const asError = errorFrameSchema.safeParse(payload);
  if (asError.success) {
    throw new ServiceError("RecognitionFailed", `recognition server reported: ${asError.data.error}`);
  }

  const parsed = resultFrameSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ServiceError("ProtocolError", "recognition server frame has no text field", {
      details: { preview: raw.slice(0, 200) },
    });
  }
  return parsed.data;
};

/** Bytes per audio frame for a chunk-size/interval pair; always a whole sample. */
export const strideBytes = (chunkSize: RecognitionParams["chunkSize"], chunkInterval: number, sampleRate: number) => {
  // 60ms per chunk-size unit, split across chunkInterval sends, 2 bytes per sample
  const bytes = Math.floor((60 * chunkSize[1] * sampleRate * 2) / (chunkInterval * 1000));
  return Math.max(2, bytes - (bytes % 2));
};

const rawToString = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
};

export class FunAsrClient implements AsrModule {
  readonly name = "funasr";

  constructor(private readonly config: FunAsrConfig) {}

  describe(): Record<string, unknown> {
    return {
      service_name: "FunASR WebSocket",
      host: this.config.host,
      port: this.config.port,
      use_ssl: this.config.useSsl,
      mode: this.config.mode,
      chunk_size: this.config.chunkSize.join(","),
      chunk_interval: this.config.chunkInterval,
      supported_formats: [...SUPPORTED_EXTENSIONS],
      sample_rates: SUPPORTED_SAMPLE_RATES,
    };
  }

  private url(params: Pick<RecognitionParams, "host" | "port" | "useSsl">) {
    return `${params.useSsl ? "wss" : "ws"}://${params.host}:${params.port}`;
  }

  /** Opens the socket; an address `ws` cannot parse is a ValidationError. */
  private connect(params: Pick<RecognitionParams, "host" | "port" | "useSsl">, handshakeTimeout: number) {
    const target = this.url(params);
    try {
      // FunASR deployments ship self-signed certificates
      return new WebSocket(target, ["binary"], {
        handshakeTimeout,
        rejectUnauthorized: false,
      });
    } catch (e) {
      throw new ServiceError("ValidationError", `invalid recognition server address ${target}: ${errMessage(e)}`, {
        cause: e,
      });
    }
  }

  async ready(): Promise<ReadyStatus> {
    const details = { host: this.config.host, port: this.config.port, use_ssl: this.config.useSsl };
    return await new Promise<ReadyStatus>((resolve) => {
      let socket: WebSocket;
      try {
        socket = this.connect(this.config, this.config.pingTimeoutMs);
      } catch (e) {
        resolve({ ok: false, details: { ...details, error: errMessage(e) } });
        return;
      }
      let done = false;
      const settle = (status: ReadyStatus) => {
        if (done) return;
        done = true;
        resolve(status);
      };
      socket.on("open", () => {
        settle({ ok: true, details });
        socket.close(1000);
      });
      socket.on("unexpected-response", (_req, res) => {
        settle({ ok: false, details: { ...details, error: `unexpected handshake response ${res.statusCode}` } });
        socket.terminate();
      });
      socket.on("error", (err) => settle({ ok: false, details: { ...details, error: err.message } }));
      socket.on("close", () => settle({ ok: false, details: { ...details, error: "connection closed" } }));
    });
  }

  async recognize(audio: CanonicalAudio, overrides: Partial<RecognitionParams> = {}): Promise<AsrResult> {
    const params: RecognitionParams = {
      host: overrides.host ?? this.config.host,
      port: overrides.port ?? this.config.port,
      useSsl: overrides.useSsl ?? this.config.useSsl,
      mode: overrides.mode ?? this.config.mode,
      chunkSize: overrides.chunkSize ?? this.config.chunkSize,
      chunkInterval: overrides.chunkInterval ?? this.config.chunkInterval,
      wavName: overrides.wavName ?? `gateway_${uuid().slice(0, 8)}`,
    };

    return await withRetry(() => this.recognizeOnce(audio, params), {
      label: "funasr.recognize",
      retries: this.config.maxRetries,
      baseDelayMs: this.config.retryDelayMs,
      factor: 1,
      maxDelayMs: this.config.retryDelayMs,
      shouldRetry: (e) => isServiceError(e) && e.kind === "ConnectionFailed",
    });
  }

  private recognizeOnce(audio: CanonicalAudio, params: RecognitionParams): Promise<AsrResult> {
    const started = Date.now();
    const target = this.url(params);
    let socket: WebSocket;
    try {
      socket = this.connect(params, this.config.connectTimeoutMs);
    } catch (e) {
      return Promise.reject(e);
    }

    return new Promise<AsrResult>((resolve, reject) => {
      const fragments: string[] = [];
      let framesIn = 0;
      let opened = false;
      let settled = false;

      const finish = (err?: ServiceError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          socket.terminate();
          reject(err);
          return;
        }
        const text = fragments.join("");
        log.info("asr recognized", {
          target,
          mode: params.mode,
          audioMs: durationMs(audio),
          framesIn,
          elapsedMs: Date.now() - started,
          textPreview: text.slice(0, 80),
        });
        socket.close(1000);
        resolve({ text, mode: params.mode, fragments: [...fragments] });
      };

      const timer = setTimeout(() => {
        finish(
          new ServiceError("Timeout", `no recognition result within ${this.config.recognitionTimeoutMs}ms`, {
            retryable: false,
          }),
        );
      }, this.config.recognitionTimeoutMs);

      const handleFrame = (frame: ResultFrame) => {
        framesIn += 1;
        switch (params.mode) {
          case "offline":
            if (frame.mode === undefined || frame.mode === "offline") {
              fragments.push(frame.text);
              finish();
            }
            return;
          case "online":
            if (frame.mode === undefined || frame.mode === "online") fragments.push(frame.text);
            break;
          case "2pass":
            // partial 2pass-online hypotheses are superseded by the 2pass-offline pass
            if (frame.mode === "2pass-offline") fragments.push(frame.text);
            break;
        }
        if (frame.is_final) finish();
      };

      socket.on("unexpected-response", (_req, res) => {
        finish(
          new ServiceError("ProtocolError", `unexpected handshake response ${res.statusCode} from ${target}`, {
            details: { status: res.statusCode },
          }),
        );
      });

      socket.on("open", () => {
        opened = true;
        const [a, b, c] = params.chunkSize;
        socket.send(
          JSON.stringify({
            mode: params.mode,
            chunk_size: [a, b, c],
            chunk_interval: params.chunkInterval,
            encoder_chunk_look_back: 4,
            decoder_chunk_look_back: 0,
            audio_fs: audio.sampleRate,
            wav_name: params.wavName,
            wav_format: "pcm",
            is_speaking: true,
            hotwords: "",
            itn: true,
          }),
        );
        const stride = strideBytes(params.chunkSize, params.chunkInterval, audio.sampleRate);
        for (const chunk of chunkPcm16(audio.pcm16, stride)) {
          if (socket.readyState !== WebSocket.OPEN) return;
          socket.send(chunk);
        }
        socket.send(JSON.stringify({ is_speaking: false }));
        log.debug("asr audio sent", { target, bytes: audio.pcm16.length, stride });
      });

      socket.on("message", (data: RawData) => {
        if (settled) return;
        try {
          handleFrame(parseServerFrame(rawToString(data)));
        } catch (e) {
          finish(isServiceError(e) ? e : new ServiceError("ProtocolError", errMessage(e)));
        }
      });

      socket.on("error", (err: Error) => {
        finish(
          new ServiceError("ConnectionFailed", `${opened ? "connection to" : "cannot connect to"} ${target}: ${err.message}`, {
            cause: err,
          }),
        );
      });

      socket.on("close", (code: number) => {
        if (settled) return;
        if (fragments.length > 0) {
          finish();
          return;
        }
        if (framesIn > 0) {
          finish(
            new ServiceError(
              "ProtocolError",
              `${target} closed the connection (code ${code}) after ${framesIn} frame(s) without a result for mode ${params.mode}`,
              { details: { framesIn } },
            ),
          );
          return;
        }
        finish(new ServiceError("ConnectionFailed", `${target} closed the connection (code ${code}) before any result`));
      });
    });
  }
}
