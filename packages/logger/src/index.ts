/**
 * Structured logging for the article service.
 */

export { createLogger, createChildLogger, getLogger, setLogger, resetLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, REDACTED } from "./pii-redactor.js";
export { createMemoryDestination } from "./memory-destination.js";
export type { MemoryDestination, LogLine } from "./memory-destination.js";
