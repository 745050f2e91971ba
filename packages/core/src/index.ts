export { ArticleService } from "./article-service.js";
export type { ArticleServiceDependencies } from "./article-service.js";
export type { IArticleRepository, IAuthorRepository } from "./repository.interface.js";
export { encodeCursor, decodeCursor } from "./cursor.js";
export { abortable } from "./abortable.js";
export { InMemoryArticleRepository, InMemoryAuthorRepository } from "./memory-repository.js";
