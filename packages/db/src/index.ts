export * from "./schema/index.js";
export {
  createDbClient,
  buildDatabaseUrl,
  pingDatabase,
  closeDbClient,
  type DbClient,
  type DbClientOptions,
} from "./client.js";
export { PgArticleRepository, toArticle } from "./repositories/article-repository.js";
export { PgAuthorRepository } from "./repositories/author-repository.js";
