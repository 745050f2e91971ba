import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import { pinoHttp } from "pino-http";
import type { Logger } from "@clean-articles/logger";

const REQUEST_ID_HEADER = "x-request-id";
const IGNORED_PATHS: ReadonlySet<string> = new Set(["/health", "/favicon.ico"]);

/**
 * Access log: one line per finished request, level by status code.
 */
export function requestLogger(logger: Logger): RequestHandler {
  return pinoHttp({
    logger,
    genReqId: (req, res) => {
      const header = req.headers[REQUEST_ID_HEADER];
      const id = (Array.isArray(header) ? header[0] : header) || randomUUID();
      res.setHeader(REQUEST_ID_HEADER, id);
      return id;
    },
    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },
    autoLogging: {
      ignore: (req) => IGNORED_PATHS.has(req.url ?? ""),
    },
  });
}
