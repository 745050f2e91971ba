import type { ErrorResponse } from "@clean-articles/types";
import { isErrorStatus, statusMessage } from "./status-messages.js";

export interface AppErrorOptions {
  code: number;
  message?: string;
  details?: string;
  cause?: unknown;
}

/**
 * Failure carrying the exact status code and public message a client sees.
 * Instances are frozen once built; `details` is only ever what the raising
 * site passed in, never text taken from `cause`.
 */
export class AppError extends Error {
  public readonly code: number;
  public readonly details?: string;

  constructor({ code, message, details, cause }: AppErrorOptions) {
    if (!isErrorStatus(code)) {
      throw new RangeError(`Invalid HTTP error status code: ${String(code)}`);
    }
    super(message || statusMessage(code), cause === undefined ? undefined : { cause });
    this.name = "AppError";
    this.code = code;
    if (details) {
      this.details = details;
    }

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
    Object.freeze(this);
  }

  static withDetails(code: number, message: string, details: string): AppError {
    return new AppError({ code, message, details });
  }

  static withCause(code: number, message: string, cause: unknown): AppError {
    return new AppError({ code, message, cause });
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }

  toResponse(): ErrorResponse {
    return this.details
      ? { code: this.code, message: this.message, details: this.details }
      : { code: this.code, message: this.message };
  }
}
