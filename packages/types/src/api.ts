/**
 * Body written for every classified failure. `details` is omitted when empty.
 */
export interface ErrorResponse {
  code: number;
  message: string;
  details?: string;
}

export interface HealthResponse {
  status: "ok";
  time: string;
}

/** Per-request values threaded from the HTTP layer down to the repositories. */
export interface RequestContext {
  signal?: AbortSignal;
}
