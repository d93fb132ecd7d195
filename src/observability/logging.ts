import { v4 as uuid } from "uuid";
import pino from "pino";
import pinoHttp from "pino-http";
import type { IncomingMessage, ServerResponse } from "http";
import type { Request, Response, NextFunction } from "express";

const REDACT = [
  "req.headers.cookie",
  "req.headers.authorization",
  'res.headers["set-cookie"]',
  "*.password",
];

export const logger = pino({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info"),
  redact: REDACT,
});

export function setLogLevel(level: string) {
  logger.level = level;
}

export function withRequestId(req: Request, _res: Response, next: NextFunction) {
  req.id = req.id || uuid();
  next();
}

export const httpLogger = pinoHttp({
  logger,
  genReqId: (req: IncomingMessage) => req.id || uuid(),
  autoLogging: { ignore: (req: IncomingMessage) => Boolean(req.url?.includes("/healthz")) },
  customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
    if (err || res.statusCode >= 500) return "error";
    if (res.statusCode >= 400) return "warn";
    return "info";
  },
});
