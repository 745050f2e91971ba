import { inspect } from "node:util";
import type { Request, Response } from "express";
import { classify, type Classification, type Severity } from "@clean-articles/errors";
import type { Logger } from "@clean-articles/logger";
import type { ErrorResponse } from "@clean-articles/types";
import { writeJSON } from "./context.js";

export interface ErrorLogRecord {
  method: string;
  uri: string;
  clientAddr: string;
  userAgent: string;
  error: string;
  recovered?: true;
}

export interface RespondOptions {
  /** Log at this level instead of the one the classifier picked. */
  severity?: Severity;
  /** Log message to use with an overridden severity. */
  label?: string;
  /** The failure was thrown rather than attached. */
  recovered?: boolean;
}

/** Log message for failures caught by the recovery stage. */
export const RECOVERED_LABEL = "Recovered error";

const MAX_CAUSE_DEPTH = 8;

/**
 * Log text for a failure, following its cause chain. Never sent to clients.
 */
export function describeFailure(failure: unknown): string {
  if (!(failure instanceof Error)) {
    return typeof failure === "string" ? failure : inspect(failure);
  }

  const parts: string[] = [];
  let current: unknown = failure;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current !== undefined; depth++) {
    parts.push(current instanceof Error ? current.message : inspect(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join(": ");
}

export function toErrorResponse(classification: Classification): ErrorResponse {
  const { code, message, details } = classification;
  return details ? { code, message, details } : { code, message };
}

function logRecord(req: Request, failure: unknown, recovered: boolean): ErrorLogRecord {
  return {
    method: req.method,
    uri: req.originalUrl,
    clientAddr: req.ip ?? req.socket.remoteAddress ?? "",
    userAgent: req.get("user-agent") ?? "",
    error: describeFailure(failure),
    ...(recovered ? { recovered: true as const } : {}),
  };
}

/**
 * Classify a failure, log it once and write the JSON error body. When the
 * handler already started a response only the log line and the end of the
 * response remain.
 *
 * @param req - Request being answered; supplies the log record fields.
 * @param res - Response to write the `ErrorResponse` to.
 * @param failure - Attached or thrown value, of any type.
 * @param logger - Logger receiving the single error record.
 * @param options - Severity and label overrides for recovered failures.
 * @returns The classification the response was written from.
 */
export function respondWithError(
  req: Request,
  res: Response,
  failure: unknown,
  logger: Logger,
  options: RespondOptions = {},
): Classification {
  const classification = classify(failure);
  const severity = options.severity ?? classification.severity;
  const label = options.label ?? classification.label;

  logger[severity](logRecord(req, failure, options.recovered ?? false), label);

  if (res.headersSent) {
    if (!res.writableEnded) {
      res.end();
    }
    return classification;
  }

  writeJSON(res, classification.code, toErrorResponse(classification));
  return classification;
}
