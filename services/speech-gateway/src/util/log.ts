import fs from "node:fs";

export type Level = "debug" | "info" | "warn" | "error";

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLevel = (value: string): value is Level => value in levelOrder;

const envLevel = process.env.LOG_LEVEL;
let minLevel = envLevel && isLevel(envLevel) ? levelOrder[envLevel] : levelOrder.info;
let fileSink: fs.WriteStream | null = null;

const nowIso = () => new Date().toISOString();

const shouldLog = (level: Level) => levelOrder[level] >= minLevel;

const redactString = (value: string): string =>
  // conservative: redact anything that looks like a bearer token / api key-ish
  value
    .replace(/Bearer\s+[A-Za-z0-9._-]+/g, "Bearer [REDACTED]")
    .replace(/(api[_-]?key\s*[:=]\s*)([^\s"'&]+)/gi, "$1[REDACTED]")
    .replace(/((?:access_)?token\s*[:=]\s*)([^\s"'&]+)/gi, "$1[REDACTED]")
    .replace(/(client_secret\s*[:=]\s*)([^\s"'&]+)/gi, "$1[REDACTED]");

const redact = (key: string, value: unknown): unknown => {
  if (["audio", "pcm", "pcm16", "buffer"].includes(key) && value !== undefined) {
    return "[REDACTED_AUDIO]";
  }
  if (typeof value !== "string") return value;
  return redactString(value);
};

const safeJson = (fields: Record<string, unknown>): Record<string, unknown> =>
  JSON.parse(
    JSON.stringify(fields, (k, v: unknown) => {
      if (!k) return v;
      return redact(k, v);
    }),
  );

export const formatLine = (level: Level, msg: string, fields?: Record<string, unknown>): string =>
  JSON.stringify({
    t: nowIso(),
    level,
    msg,
    ...(fields ? safeJson(fields) : {}),
  });

const baseLog = (level: Level, msg: string, fields?: Record<string, unknown>) => {
  if (!shouldLog(level)) return;
  const line = formatLine(level, msg, fields);
  // eslint-disable-next-line no-console
  console.log(line);
  fileSink?.write(`${line}\n`);
};

/**
 * Applies the process-wide log settings. Called once from startup; a file path
 * adds an append-only sink next to stdout.
 */
export const configureLog = (opts: { level: Level; file?: string }) => {
  minLevel = levelOrder[opts.level];
  if (fileSink) {
    fileSink.end();
    fileSink = null;
  }
  if (opts.file) {
    fileSink = fs.createWriteStream(opts.file, { flags: "a" });
    fileSink.on("error", (err) => {
      fileSink = null;
      // eslint-disable-next-line no-console
      console.error(formatLine("error", "log file sink failed", { file: opts.file, err: err.message }));
    });
  }
};

export const errMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

export const log = {
  debug: (msg: string, fields?: Record<string, unknown>) => baseLog("debug", msg, fields),
  info: (msg: string, fields?: Record<string, unknown>) => baseLog("info", msg, fields),
  warn: (msg: string, fields?: Record<string, unknown>) => baseLog("warn", msg, fields),
  error: (msg: string, fields?: Record<string, unknown>) => baseLog("error", msg, fields),
};
