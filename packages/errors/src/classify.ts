import { ZodError } from "zod";
import { AppError } from "./app-error.js";
import { BindingError, formatZodIssues } from "./binding-error.js";
import { domainStatus, isDomainSentinel } from "./domain-errors.js";
import { statusMessage } from "./status-messages.js";

export type Severity = "warn" | "error";

export type ClassificationLabel = "Client error" | "Server error" | "Binding error" | "Unknown error";

export type Failure =
  | { kind: "app"; error: AppError }
  | { kind: "binding"; detail: string }
  | { kind: "domain"; status: number }
  | { kind: "unclassified" };

export interface Classification {
  code: number;
  message: string;
  details?: string;
  severity: Severity;
  label: ClassificationLabel;
}

const MAX_CAUSE_DEPTH = 8;

// Request errors raised by express.json() before a handler runs.
const BODY_PARSER_ERROR_TYPES: ReadonlySet<string> = new Set([
  "entity.parse.failed",
  "entity.verify.failed",
  "encoding.unsupported",
  "charset.unsupported",
]);

export function severityFor(code: number): Severity {
  return code >= 500 ? "error" : "warn";
}

function findAppError(value: unknown): AppError | undefined {
  let current = value;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    if (AppError.isAppError(current)) {
      return current;
    }
    current = current.cause;
  }
  return undefined;
}

function isBodyParserError(value: unknown): value is Error & { type: string } {
  return (
    value instanceof Error &&
    "type" in value &&
    typeof value.type === "string" &&
    BODY_PARSER_ERROR_TYPES.has(value.type)
  );
}

function bindingDetail(value: unknown): string | undefined {
  if (value instanceof BindingError) {
    return value.detail;
  }
  if (value instanceof ZodError) {
    return formatZodIssues(value);
  }
  if (isBodyParserError(value)) {
    return value.message;
  }
  return undefined;
}

/**
 * Tag an arbitrary thrown or attached value. Order matters: an AppError
 * anywhere in the cause chain wins over every other inference.
 *
 * @param value - Failure of any type.
 * @returns The tagged failure {@link classify} switches over.
 */
export function toFailure(value: unknown): Failure {
  const appError = findAppError(value);
  if (appError) {
    return { kind: "app", error: appError };
  }

  const detail = bindingDetail(value);
  if (detail !== undefined) {
    return { kind: "binding", detail };
  }

  if (isDomainSentinel(value)) {
    return { kind: "domain", status: domainStatus(value) };
  }

  return { kind: "unclassified" };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled failure kind: ${JSON.stringify(value)}`);
}

/**
 * Map a failure to the response triple and the log severity. Unclassified
 * failures never expose their own text.
 *
 * @param value - Anything attached or thrown by a handler.
 * @returns Status code, public message, optional details, severity and the
 *   log label.
 */
export function classify(value: unknown): Classification {
  const failure = toFailure(value);

  switch (failure.kind) {
    case "app": {
      const { code, message, details } = failure.error;
      const severity = severityFor(code);
      return {
        code,
        message,
        ...(details ? { details } : {}),
        severity,
        label: severity === "error" ? "Server error" : "Client error",
      };
    }
    case "binding":
      return {
        code: 400,
        message: statusMessage(400),
        ...(failure.detail ? { details: failure.detail } : {}),
        severity: "warn",
        label: "Binding error",
      };
    case "domain": {
      const severity = severityFor(failure.status);
      return {
        code: failure.status,
        message: statusMessage(failure.status),
        severity,
        label: severity === "error" ? "Server error" : "Client error",
      };
    }
    case "unclassified":
      return {
        code: 500,
        message: statusMessage(500),
        severity: "error",
        label: "Unknown error",
      };
    default:
      return assertNever(failure);
  }
}
