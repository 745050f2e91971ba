/**
 * Logger setup and the process-wide logger façade.
 *
 * Pretty-prints in development and emits structured JSON everywhere else.
 */

import { pino, type DestinationStream, type LoggerOptions, type TransportSingleOptions, type Logger as PinoLogger } from "pino";
import { REDACTED, REDACT_PATHS } from "./pii-redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service name attached to every log line. */
  service?: string;
  /** Write JSON lines here instead of stdout. Disables pretty printing. */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(): TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "clean-articles";

  const pinoOptions: LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(pinoOptions, options.destination);
  }

  const transport = buildTransport();
  return pino({ ...pinoOptions, ...(transport ? { transport } : {}) });
}

/**
 * Create a child logger that adds request-scoped bindings.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

let current: Logger | undefined;

/**
 * Process-wide logger. Created with defaults on first use unless
 * {@link setLogger} ran before.
 */
export function getLogger(): Logger {
  current ??= createLogger();
  return current;
}

export function setLogger(logger: Logger): void {
  current = logger;
}

export function resetLogger(): void {
  current = undefined;
}
