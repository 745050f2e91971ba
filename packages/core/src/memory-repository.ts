import type { Article, ArticlePage, Author, RequestContext } from "@clean-articles/types";
import { NotFound } from "@clean-articles/errors";
import { decodeCursor, encodeCursor } from "./cursor.js";
import type { IArticleRepository, IAuthorRepository } from "./repository.interface.js";

/**
 * Process-local article store with the same paging and not-found behaviour
 * as the SQL repository. Backs tests and local experiments.
 */
export class InMemoryArticleRepository implements IArticleRepository {
  private readonly rows = new Map<number, Article>();
  private nextId = 1;

  constructor(seed: Article[] = []) {
    for (const article of seed) {
      this.rows.set(article.id, article);
      this.nextId = Math.max(this.nextId, article.id + 1);
    }
  }

  async fetch(_ctx: RequestContext, cursor: string, num: number): Promise<ArticlePage> {
    const after = decodeCursor(cursor).getTime();
    const articles = [...this.rows.values()]
      .filter((article) => article.createdAt.getTime() > after)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, num);

    const last = articles.at(-1);
    const nextCursor = last && articles.length === num ? encodeCursor(last.createdAt) : "";
    return { articles, nextCursor };
  }

  async getById(_ctx: RequestContext, id: number): Promise<Article> {
    const article = this.rows.get(id);
    if (!article) {
      throw NotFound;
    }
    return article;
  }

  async getByTitle(_ctx: RequestContext, title: string): Promise<Article> {
    for (const article of this.rows.values()) {
      if (article.title === title) {
        return article;
      }
    }
    throw NotFound;
  }

  async update(_ctx: RequestContext, article: Article): Promise<void> {
    if (!this.rows.has(article.id)) {
      throw NotFound;
    }
    this.rows.set(article.id, article);
  }

  async store(_ctx: RequestContext, article: Article): Promise<number> {
    const id = this.nextId++;
    this.rows.set(id, { ...article, id });
    return id;
  }

  async delete(_ctx: RequestContext, id: number): Promise<void> {
    if (!this.rows.delete(id)) {
      throw NotFound;
    }
  }
}

export class InMemoryAuthorRepository implements IAuthorRepository {
  private readonly rows: Map<number, Author>;

  constructor(seed: Author[] = []) {
    this.rows = new Map(seed.map((author) => [author.id, author]));
  }

  async getById(_ctx: RequestContext, id: number): Promise<Author> {
    const author = this.rows.get(id);
    if (!author) {
      throw NotFound;
    }
    return author;
  }
}
