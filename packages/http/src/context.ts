import type { Request, Response } from "express";

// Per-request pipeline state kept on the Express request.
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      attachedErrors?: Error[];
      chainAborted?: boolean;
      abortSignal?: AbortSignal;
    }
  }
}

/**
 * Record a failure without writing a response. The propagation stage picks
 * up the most recent one after the handler returns.
 */
export function attachError(req: Request, err: Error): void {
  (req.attachedErrors ??= []).push(err);
}

export function lastAttachedError(req: Request): Error | undefined {
  return req.attachedErrors?.at(-1);
}

/** Mark the request as answered so no later stage writes a second response. */
export function abortChain(req: Request): void {
  req.chainAborted = true;
}

export function isAborted(req: Request): boolean {
  return req.chainAborted === true;
}

export function writeJSON(res: Response, status: number, body: unknown): void {
  res.status(status).json(body);
}
