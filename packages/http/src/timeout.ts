import type { Request, RequestHandler } from "express";
import type { RequestContext } from "@clean-articles/types";
import "./context.js";

/**
 * Give every request an AbortSignal that fires after `ms`. The timer is
 * cleared as soon as the response finishes or the connection closes.
 */
export function requestTimeout(ms: number): RequestHandler {
  return (req, res, next) => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new Error(`request deadline of ${String(ms)}ms exceeded`));
    }, ms);
    const clear = (): void => {
      clearTimeout(timer);
    };
    res.once("finish", clear);
    res.once("close", clear);

    req.abortSignal = controller.signal;
    next();
  };
}

export function requestSignal(req: Request): AbortSignal | undefined {
  return req.abortSignal;
}

/** Context handed to the service layer for one request. */
export function requestContext(req: Request): RequestContext {
  const signal = requestSignal(req);
  return signal ? { signal } : {};
}
