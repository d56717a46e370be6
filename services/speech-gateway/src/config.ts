import path from "node:path";
import { fileURLToPath } from "node:url";
import { ServiceError } from "./errors";
import { isLevel, type Level } from "./util/log";

export const RECOGNITION_MODES = ["offline", "online", "2pass"] as const;
export type RecognitionMode = (typeof RECOGNITION_MODES)[number];

export const DEFAULT_PROMPTS_PATH = fileURLToPath(new URL("../config/prompts.json", import.meta.url));

export type TranscoderConfig = {
  ffmpegPath: string;
  timeoutMs: number;
  sampleRate: number;
  workDir: string;
};

export type FunAsrConfig = {
  host: string;
  port: number;
  useSsl: boolean;
  mode: RecognitionMode;
  chunkSize: [number, number, number];
  chunkInterval: number;
  connectTimeoutMs: number;
  recognitionTimeoutMs: number;
  pingTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
};

export type WenxinConfig = {
  apiKey?: string;
  secretKey?: string;
  model: string;
  temperature: number;
  topP: number;
  penaltyScore: number;
  maxLength: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  baseUrl: string;
};

export type AppConfig = {
  port: number;
  logLevel: Level;
  logFile?: string;
  maxUploadBytes: number;
  promptsPath: string;
  defaultAsrService: string;
  defaultSummaryService: string;
  transcoder: TranscoderConfig;
  funasr: FunAsrConfig;
  wenxin: WenxinConfig;
};

type Env = Record<string, string | undefined>;

const invalid = (name: string, raw: string, expected: string) =>
  new ServiceError("ValidationError", `${name}=${JSON.stringify(raw)} is not ${expected}`);

const str = (env: Env, name: string, fallback: string): string => {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
};

const optionalStr = (env: Env, name: string): string | undefined => {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
};

const num = (env: Env, name: string, fallback: number, opts: { integer?: boolean; min?: number } = {}): number => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || (opts.integer && !Number.isInteger(value))) {
    throw invalid(name, raw, opts.integer ? "an integer" : "a number");
  }
  if (opts.min !== undefined && value < opts.min) {
    throw invalid(name, raw, `>= ${opts.min}`);
  }
  return value;
};

export const parseBool = (raw: string): boolean | undefined => {
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
};

const bool = (env: Env, name: string, fallback: boolean): boolean => {
  const raw = env[name];
  if (!raw || !raw.trim()) return fallback;
  const value = parseBool(raw);
  if (value === undefined) throw invalid(name, raw, "a boolean");
  return value;
};

export const parseMode = (raw: string): RecognitionMode | undefined => {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "two-pass" || normalized === "two_pass") return "2pass";
  return RECOGNITION_MODES.find((m) => m === normalized);
};

export const parseChunkSize = (raw: string): [number, number, number] | undefined => {
  const parts = raw.split(",").map((p) => Number(p.trim()));
  if (parts.length !== 3 || parts.some((p) => !Number.isInteger(p) || p < 0)) return undefined;
  const [a, b, c] = parts;
  if (b <= 0) return undefined;
  return [a, b, c];
};

/** True when `raw` is a bare host name or IP address usable in a ws:// URL. */
export const isValidHost = (raw: string): boolean => {
  if (!raw || /[\s/@?#]/.test(raw)) return false;
  try {
    return new URL(`ws://${raw}:1`).host === `${raw.toLowerCase()}:1`;
  } catch {
    return false;
  }
};

/**
 * Builds the whole service configuration from environment variables. Each
 * component receives its slice at construction; nothing else reads the env.
 */
export const loadConfig = (env: Env = process.env): AppConfig => {
  const logLevelRaw = str(env, "LOG_LEVEL", "info").toLowerCase();
  if (!isLevel(logLevelRaw)) throw invalid("LOG_LEVEL", logLevelRaw, "one of debug|info|warn|error");

  const modeRaw = str(env, "FUNASR_MODE", "offline");
  const mode = parseMode(modeRaw);
  if (!mode) throw invalid("FUNASR_MODE", modeRaw, "one of offline|online|2pass");

  const chunkRaw = str(env, "FUNASR_CHUNK_SIZE", "5,10,5");
  const chunkSize = parseChunkSize(chunkRaw);
  if (!chunkSize) throw invalid("FUNASR_CHUNK_SIZE", chunkRaw, "three comma-separated integers");

  const host = str(env, "FUNASR_HOST", "127.0.0.1");
  if (!isValidHost(host)) throw invalid("FUNASR_HOST", host, "a host name or IP address");

  return {
    port: num(env, "PORT", 8000, { integer: true, min: 0 }),
    logLevel: logLevelRaw,
    logFile: optionalStr(env, "LOG_FILE"),
    maxUploadBytes: num(env, "MAX_UPLOAD_MB", 500, { min: 1 }) * 1024 * 1024,
    promptsPath: str(env, "PROMPTS_PATH", DEFAULT_PROMPTS_PATH),
    defaultAsrService: str(env, "DEFAULT_ASR_SERVICE", "funasr"),
    defaultSummaryService: str(env, "DEFAULT_SUMMARY_SERVICE", "wenxin"),
    transcoder: {
      ffmpegPath: str(env, "FFMPEG_BIN", "ffmpeg"),
      timeoutMs: num(env, "TRANSCODE_TIMEOUT_MS", 300_000, { integer: true, min: 1 }),
      sampleRate: num(env, "AUDIO_SAMPLE_RATE", 16_000, { integer: true, min: 8000 }),
      workDir: path.resolve(str(env, "OUTPUT_DIR", "output")),
    },
    funasr: {
      host,
      port: num(env, "FUNASR_PORT", 10095, { integer: true, min: 1 }),
      useSsl: bool(env, "FUNASR_USE_SSL", true),
      mode,
      chunkSize,
      chunkInterval: num(env, "FUNASR_CHUNK_INTERVAL", 10, { integer: true, min: 1 }),
      connectTimeoutMs: num(env, "FUNASR_CONNECT_TIMEOUT_MS", 10_000, { integer: true, min: 1 }),
      recognitionTimeoutMs: num(env, "FUNASR_RECOGNITION_TIMEOUT_MS", 300_000, { integer: true, min: 1 }),
      pingTimeoutMs: num(env, "FUNASR_PING_TIMEOUT_MS", 10_000, { integer: true, min: 1 }),
      maxRetries: num(env, "FUNASR_MAX_RETRIES", 2, { integer: true, min: 0 }),
      retryDelayMs: num(env, "FUNASR_RETRY_DELAY_MS", 500, { integer: true, min: 0 }),
    },
    wenxin: {
      apiKey: optionalStr(env, "BAIDU_API_KEY"),
      secretKey: optionalStr(env, "BAIDU_SECRET_KEY"),
      model: str(env, "BAIDU_MODEL_NAME", "ERNIE-Bot-turbo"),
      temperature: num(env, "BAIDU_TEMPERATURE", 0.1, { min: 0 }),
      topP: num(env, "BAIDU_TOP_P", 0.7, { min: 0 }),
      penaltyScore: num(env, "BAIDU_PENALTY_SCORE", 1.0, { min: 1 }),
      maxLength: num(env, "BAIDU_MAX_LENGTH", 500, { integer: true, min: 1 }),
      timeoutMs: num(env, "BAIDU_API_TIMEOUT", 30, { min: 1 }) * 1000,
      maxRetries: num(env, "BAIDU_MAX_RETRIES", 3, { integer: true, min: 0 }),
      retryBaseMs: num(env, "BAIDU_RETRY_BASE_MS", 500, { integer: true, min: 0 }),
      retryMaxMs: num(env, "BAIDU_RETRY_MAX_MS", 4000, { integer: true, min: 0 }),
      baseUrl: str(env, "BAIDU_BASE_URL", "https://aip.baidubce.com").replace(/\/+$/, ""),
    },
  };
};
