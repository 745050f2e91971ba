import express from "express";
import type { Express } from "express";
import type { ArticleService } from "@clean-articles/core";
import { getConfig } from "@clean-articles/config";
import { getLogger, type Logger } from "@clean-articles/logger";
import type { AppConfig, HealthResponse } from "@clean-articles/types";
import {
  corsMiddleware,
  errorMiddleware,
  notFoundHandler,
  requestLogger,
  requestTimeout,
} from "@clean-articles/http";
import { nativeArticleRouter } from "./adapters/native/article-handler.js";
import { stagedArticleRouter } from "./adapters/staged/article-handler.js";

export const API_PREFIX = "/api/v1";

export interface AppDependencies {
  service: ArticleService;
  /** Defaults to the process-wide logger. */
  logger?: Logger;
  /** Defaults to the config loaded by `initConfig`. */
  config?: AppConfig;
}

/**
 * Build the Express application around an article service.
 *
 * @param deps - The service plus optional logger and config overrides.
 * @returns An app ready to be passed to `http.createServer`.
 */
export function createApp(deps: AppDependencies): Express {
  const { service } = deps;
  const logger = deps.logger ?? getLogger();
  const config = deps.config ?? getConfig();
  const app = express();
  app.disable("x-powered-by");

  app.use(requestLogger(logger));
  app.use(corsMiddleware({ origin: config.cors.origin }));
  app.use(requestTimeout(config.context.timeout * 1000));
  app.use(express.json());

  app.get("/health", (_req, res) => {
    const body: HealthResponse = { status: "ok", time: new Date().toISOString() };
    res.status(200).json(body);
  });

  app.use(
    API_PREFIX,
    config.server.adapter === "native"
      ? nativeArticleRouter(service)
      : stagedArticleRouter(service, logger),
  );

  app.use(notFoundHandler());
  // Body parser failures and anything the native adapter throws.
  app.use(errorMiddleware(logger));

  return app;
}
