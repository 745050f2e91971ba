import type { Article, ArticlePage, Author, RequestContext } from "@clean-articles/types";

/**
 * Storage port for articles. Implementations raise the domain sentinels
 * (`NotFound`, `BadParamInput`, ...) from @clean-articles/errors.
 */
export interface IArticleRepository {
  fetch(ctx: RequestContext, cursor: string, num: number): Promise<ArticlePage>;
  getById(ctx: RequestContext, id: number): Promise<Article>;
  getByTitle(ctx: RequestContext, title: string): Promise<Article>;
  update(ctx: RequestContext, article: Article): Promise<void>;
  /** Persists the article and returns the id assigned by the store. */
  store(ctx: RequestContext, article: Article): Promise<number>;
  delete(ctx: RequestContext, id: number): Promise<void>;
}

export interface IAuthorRepository {
  getById(ctx: RequestContext, id: number): Promise<Author>;
}
