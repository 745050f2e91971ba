export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  AppErrors,
  ErrBadRequest,
  ErrUnauthorized,
  ErrForbidden,
  ErrNotFound,
  ErrConflict,
  ErrInternalServerError,
} from "./errors.js";

export {
  DomainError,
  NotFound,
  Conflict,
  InternalServerError,
  BadParamInput,
  domainStatus,
  isDomainSentinel,
} from "./domain-errors.js";

export { BindingError, formatZodIssues } from "./binding-error.js";

export { classify, severityFor, toFailure } from "./classify.js";
export type { Classification, ClassificationLabel, Failure, Severity } from "./classify.js";

export { statusMessage, isErrorStatus, UNKNOWN_ERROR_MESSAGE } from "./status-messages.js";
