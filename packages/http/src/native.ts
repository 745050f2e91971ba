import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { ErrNotFound } from "@clean-articles/errors";
import type { Logger } from "@clean-articles/logger";
import { writeJSON } from "./context.js";
import { respondWithError } from "./dispatch.js";

/**
 * Wrap an async Express handler so rejections reach the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Terminal Express error handler. Everything passed to `next(err)` ends up
 * here, including body-parser failures raised before any route runs.
 *
 * @param logger - Logger for the failure, at its classified severity.
 * @returns An error handler to register after every route.
 */
export function errorMiddleware(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    respondWithError(req, res, err, logger);
  };
}

export function notFoundHandler(): RequestHandler {
  return (_req, res) => {
    writeJSON(res, 404, ErrNotFound.toResponse());
  };
}
