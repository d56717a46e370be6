import type { Request, Response, NextFunction } from "express";
import { v4 as uuid } from "uuid";
import { log } from "../util/log";

export const REQUEST_ID_HEADER = "X-Request-ID";

/** The id assigned to this request by {@link requestLog}. */
export const requestIdOf = (res: Response): string => {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : "";
};

/**
 * Tags each request with an id (echoing a caller-supplied X-Request-ID when
 * present) and logs its start and finish with the elapsed time.
 */
export const requestLog = (req: Request, res: Response, next: NextFunction): void => {
  const incoming = req.get(REQUEST_ID_HEADER)?.trim();
  const requestId = incoming ? incoming : uuid();
  const startedAt = Date.now();

  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  log.info("request started", { requestId, method: req.method, path: req.path });
  res.on("finish", () => {
    const fields = {
      requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      ms: Date.now() - startedAt,
    };
    if (res.statusCode >= 500) log.warn("request finished", fields);
    else log.info("request finished", fields);
  });
  next();
};
