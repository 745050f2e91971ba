import { Router, type Request, type RequestHandler, type Response } from "express";
import type { Logger } from "@clean-articles/logger";
import { abortChain, isAborted, lastAttachedError } from "./context.js";
import { RECOVERED_LABEL, respondWithError } from "./dispatch.js";

export type StageNext = () => Promise<void>;

/** Onion-style middleware: code before `next()` runs on the way in, after it on the way out. */
export type Stage = (req: Request, res: Response, next: StageNext) => Promise<void>;

/** Handlers report failure with `attachError` or by throwing. */
export type StagedHandler = (req: Request, res: Response) => void | Promise<void>;

/**
 * Compose stages around a handler into one Express handler. A failure that
 * escapes every stage goes to Express's own error chain.
 */
export function pipeline(stages: readonly Stage[], handler: StagedHandler): RequestHandler {
  return (req, res, next) => {
    const dispatch = (index: number): Promise<void> => {
      const stage = stages[index];
      if (!stage) {
        return Promise.resolve().then(() => handler(req, res));
      }
      return stage(req, res, () => dispatch(index + 1));
    };

    dispatch(0).catch(next);
  };
}

/**
 * Outermost stage. Anything thrown below it, including from the propagation
 * stage, is answered with exactly one error response and logged at error
 * level under {@link RECOVERED_LABEL}, whatever status it maps to.
 *
 * @param logger - Logger for the recovered failure.
 * @returns A stage to place first in the list.
 */
export function recoveryStage(logger: Logger): Stage {
  return async (req, res, next) => {
    try {
      await next();
    } catch (raised: unknown) {
      respondWithError(req, res, raised, logger, {
        severity: "error",
        label: RECOVERED_LABEL,
        recovered: true,
      });
      abortChain(req);
    }
  };
}

/**
 * After the handler returns, answer with the last attached error unless the
 * chain already responded. Earlier attachments are ignored.
 *
 * @param logger - Logger for the attached failure, at its classified severity.
 * @returns A stage to place directly inside the recovery stage.
 */
export function propagationStage(logger: Logger): Stage {
  return async (req, res, next) => {
    await next();

    const attached = lastAttachedError(req);
    if (attached === undefined || isAborted(req)) {
      return;
    }

    respondWithError(req, res, attached, logger);
    abortChain(req);
  };
}

/**
 * The default stage list: recovery wrapping propagation.
 *
 * @param logger - Logger shared by both stages.
 * @returns Stages ready for {@link pipeline} or {@link StagedRouter}.
 */
export function dispatchStages(logger: Logger): Stage[] {
  return [recoveryStage(logger), propagationStage(logger)];
}

/**
 * Express router whose routes all run behind the same stages, the way a
 * router-level middleware list wraps every handler.
 */
export class StagedRouter {
  public readonly router = Router();

  constructor(private readonly stages: readonly Stage[]) {}

  get(path: string, handler: StagedHandler): this {
    this.router.get(path, pipeline(this.stages, handler));
    return this;
  }

  post(path: string, handler: StagedHandler): this {
    this.router.post(path, pipeline(this.stages, handler));
    return this;
  }

  put(path: string, handler: StagedHandler): this {
    this.router.put(path, pipeline(this.stages, handler));
    return this;
  }

  delete(path: string, handler: StagedHandler): this {
    this.router.delete(path, pipeline(this.stages, handler));
    return this;
  }
}
