import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { ServiceError, errorBody, toServiceError } from "../errors";
import { log } from "../util/log";
import { requestIdOf } from "./requestLog";

const isBodyParseError = (e: unknown): boolean =>
  e instanceof Error && "type" in e && e.type === "entity.parse.failed";

const isBodyTooLarge = (e: unknown): boolean =>
  e instanceof Error && "type" in e && e.type === "entity.too.large";

/** Maps anything a route or middleware raised onto a ServiceError. */
const normalizeError = (e: unknown): ServiceError => {
  if (e instanceof multer.MulterError) {
    if (e.code === "LIMIT_FILE_SIZE") {
      return new ServiceError("PayloadTooLarge", "uploaded file exceeds the size limit", { cause: e });
    }
    return new ServiceError("ValidationError", `invalid upload: ${e.message}`, { cause: e });
  }
  if (isBodyParseError(e)) {
    return new ServiceError("ValidationError", "request body is not valid JSON", { cause: e });
  }
  if (isBodyTooLarge(e)) {
    return new ServiceError("PayloadTooLarge", "request body exceeds the size limit", { cause: e });
  }
  return toServiceError(e);
};

export const errorHandler = (e: unknown, _req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(e);
    return;
  }
  const err = normalizeError(e);
  const requestId = requestIdOf(res);
  const fields = { requestId, kind: err.kind, stage: err.stage, status: err.status, err: err.message };
  if (err.status >= 500) log.error("request failed", fields);
  else log.warn("request rejected", fields);

  res.status(err.status).json({ success: false, request_id: requestId, error: errorBody(err) });
};

export const notFound = (req: Request, _res: Response, next: NextFunction): void => {
  next(new ServiceError("NotFound", `no route for ${req.method} ${req.path}`));
};
