export type ErrorKind =
  | "UnsupportedFormat"
  | "TranscodeFailed"
  | "Timeout"
  | "ConnectionFailed"
  | "ProtocolError"
  | "RecognitionFailed"
  | "AuthError"
  | "RateLimited"
  | "ParseError"
  | "UpstreamError"
  | "ServiceUnavailable"
  | "NotFound"
  | "Conflict"
  | "ValidationError"
  | "PayloadTooLarge"
  | "Internal";

export type PipelineStageName = "transcription" | "summarization";

const statusByKind: Record<ErrorKind, number> = {
  ValidationError: 400,
  AuthError: 401,
  NotFound: 404,
  Conflict: 409,
  PayloadTooLarge: 413,
  UnsupportedFormat: 415,
  TranscodeFailed: 422,
  RateLimited: 429,
  Internal: 500,
  ConnectionFailed: 502,
  ProtocolError: 502,
  RecognitionFailed: 502,
  ParseError: 502,
  UpstreamError: 502,
  ServiceUnavailable: 503,
  Timeout: 504,
};

const retryableKinds: ReadonlySet<ErrorKind> = new Set([
  "ConnectionFailed",
  "RateLimited",
  "UpstreamError",
  "Timeout",
]);

export interface ServiceErrorOptions {
  retryable?: boolean;
  stage?: PipelineStageName;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ServiceError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;
  stage?: PipelineStageName;

  constructor(kind: ErrorKind, message: string, opts: ServiceErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "ServiceError";
    this.kind = kind;
    this.retryable = opts.retryable ?? retryableKinds.has(kind);
    this.stage = opts.stage;
    this.details = opts.details;
  }

  get status(): number {
    return httpStatusFor(this.kind);
  }
}

export const isServiceError = (e: unknown): e is ServiceError => e instanceof ServiceError;

export const httpStatusFor = (kind: ErrorKind): number => statusByKind[kind];

/** Normalises anything thrown into a ServiceError; unknown errors become Internal. */
export const toServiceError = (e: unknown): ServiceError => {
  if (isServiceError(e)) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new ServiceError("Internal", message, { cause: e });
};

export type ErrorBody = {
  kind: ErrorKind;
  message: string;
  stage?: PipelineStageName;
};

export const errorBody = (err: ServiceError): ErrorBody => ({
  kind: err.kind,
  // internal failures keep their message in the logs only
  message: err.kind === "Internal" ? "Internal server error" : err.message,
  ...(err.stage ? { stage: err.stage } : {}),
});
