import cors from "cors";
import type { RequestHandler } from "express";

export const CORS_ALLOWED_METHODS = "GET, POST, PUT, DELETE, OPTIONS";
export const CORS_ALLOWED_HEADERS = "Content-Type, Authorization";

export interface CorsMiddlewareOptions {
  /** Allowed origin. Defaults to any origin. */
  origin?: string;
}

/**
 * Preflight requests are answered with 204 and never reach a route.
 */
export function corsMiddleware(options: CorsMiddlewareOptions = {}): RequestHandler {
  return cors({
    origin: options.origin ?? "*",
    methods: CORS_ALLOWED_METHODS,
    allowedHeaders: CORS_ALLOWED_HEADERS,
    optionsSuccessStatus: 204,
  });
}
