export type { Article, ArticleJson, ArticlePage, Author, AuthorJson } from "./article.js";
export type {
  AppConfig,
  ContextConfig,
  CorsConfig,
  DatabaseConfig,
  LogConfig,
  LogLevel,
  RouterAdapter,
  ServerConfig,
} from "./config.js";
export type { ErrorResponse, HealthResponse, RequestContext } from "./api.js";
