export { attachError, lastAttachedError, abortChain, isAborted, writeJSON } from "./context.js";
export { respondWithError, describeFailure, toErrorResponse, RECOVERED_LABEL } from "./dispatch.js";
export type { ErrorLogRecord, RespondOptions } from "./dispatch.js";
export {
  pipeline,
  recoveryStage,
  propagationStage,
  dispatchStages,
  StagedRouter,
} from "./pipeline.js";
export type { Stage, StageNext, StagedHandler } from "./pipeline.js";
export { asyncHandler, errorMiddleware, notFoundHandler } from "./native.js";
export { bindJson, safeBindJson, parseId } from "./binding.js";
export type { BindResult } from "./binding.js";
export { corsMiddleware, CORS_ALLOWED_HEADERS, CORS_ALLOWED_METHODS } from "./cors.js";
export type { CorsMiddlewareOptions } from "./cors.js";
export { requestTimeout, requestSignal, requestContext } from "./timeout.js";
export { requestLogger } from "./request-logger.js";
