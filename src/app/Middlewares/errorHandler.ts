import { Request, Response, NextFunction } from "express";

import { logger } from "../../observability/logging";
import { reportError } from "../../observability/sentry";
import { HttpError } from "../../utils/httpError";

export function notFound(_req: Request, res: Response) {
  res.status(404).type("text").send("Not found");
}

/**
 * Last handler in the chain. Known HTTP errors keep their status and message;
 * anything else is logged and answered with a generic 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }
  if (err instanceof HttpError && err.status < 500) {
    return res.status(err.status).type("text").send(err.message);
  }
  logger.error({ err, reqId: req.id, path: req.path }, "request failed");
  reportError(err, { requestId: String(req.id), path: req.path });
  const message = err instanceof HttpError ? err.message : "Something went wrong. Check the server logs.";
  return res.status(500).type("text").send(message);
}
