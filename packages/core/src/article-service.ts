import type { Article, ArticlePage, Author, RequestContext } from "@clean-articles/types";
import { BadParamInput, Conflict, NotFound } from "@clean-articles/errors";
import { abortable } from "./abortable.js";
import type { IArticleRepository, IAuthorRepository } from "./repository.interface.js";

export interface ArticleServiceDependencies {
  articleRepo: IArticleRepository;
  authorRepo: IAuthorRepository;
  now?: () => Date;
}

function throwIfAborted(ctx: RequestContext): void {
  ctx.signal?.throwIfAborted();
}

/**
 * Article use cases. Errors from the repositories propagate unchanged so the
 * HTTP layer can map the domain sentinels. Every repository call is raced
 * against the request deadline, so an expired request rejects with the
 * signal's reason instead of waiting on the store.
 */
export class ArticleService {
  private readonly articleRepo: IArticleRepository;
  private readonly authorRepo: IAuthorRepository;
  private readonly now: () => Date;

  constructor(deps: ArticleServiceDependencies) {
    this.articleRepo = deps.articleRepo;
    this.authorRepo = deps.authorRepo;
    this.now = deps.now ?? (() => new Date());
  }

  async fetch(ctx: RequestContext, cursor: string, num: number): Promise<ArticlePage> {
    throwIfAborted(ctx);
    const page = await abortable(ctx, this.articleRepo.fetch(ctx, cursor, num));
    const articles = await this.fillAuthorDetails(ctx, page.articles);
    return { articles, nextCursor: page.nextCursor };
  }

  async getById(ctx: RequestContext, id: number): Promise<Article> {
    throwIfAborted(ctx);
    const article = await abortable(ctx, this.articleRepo.getById(ctx, id));
    throwIfAborted(ctx);
    const author = await abortable(ctx, this.authorRepo.getById(ctx, article.author.id));
    return { ...article, author };
  }

  async update(ctx: RequestContext, article: Article): Promise<Article> {
    throwIfAborted(ctx);
    const updated = { ...article, updatedAt: this.now() };
    await abortable(ctx, this.articleRepo.update(ctx, updated));
    return updated;
  }

  async getByTitle(ctx: RequestContext, title: string): Promise<Article> {
    throwIfAborted(ctx);
    const article = await abortable(ctx, this.articleRepo.getByTitle(ctx, title));
    throwIfAborted(ctx);
    const author = await abortable(ctx, this.authorRepo.getById(ctx, article.author.id));
    return { ...article, author };
  }

  /**
   * Insert a new article. The author must exist, otherwise the article could
   * never be read back; an unknown author raises `BadParamInput`.
   */
  async store(ctx: RequestContext, article: Article): Promise<Article> {
    throwIfAborted(ctx);
    if (await this.titleExists(ctx, article.title)) {
      throw Conflict;
    }
    const author = await this.requireAuthor(ctx, article.author.id);

    const stamp = this.now();
    const stored = { ...article, author, createdAt: stamp, updatedAt: stamp };
    const id = await abortable(ctx, this.articleRepo.store(ctx, stored));
    return { ...stored, id };
  }

  async delete(ctx: RequestContext, id: number): Promise<void> {
    throwIfAborted(ctx);
    // getById raises NotFound for a missing article
    await abortable(ctx, this.articleRepo.getById(ctx, id));
    throwIfAborted(ctx);
    await abortable(ctx, this.articleRepo.delete(ctx, id));
  }

  private async requireAuthor(ctx: RequestContext, id: number): Promise<Author> {
    try {
      return await abortable(ctx, this.authorRepo.getById(ctx, id));
    } catch (err: unknown) {
      if (err === NotFound) {
        throw BadParamInput;
      }
      throw err;
    }
  }

  private async titleExists(ctx: RequestContext, title: string): Promise<boolean> {
    try {
      await abortable(ctx, this.articleRepo.getByTitle(ctx, title));
      return true;
    } catch (err: unknown) {
      if (err === NotFound) {
        return false;
      }
      throw err;
    }
  }

  /**
   * Resolve each distinct author once, concurrently, and attach the result
   * to every article written by them.
   */
  private async fillAuthorDetails(ctx: RequestContext, articles: Article[]): Promise<Article[]> {
    const ids = [...new Set(articles.map((article) => article.author.id))];
    throwIfAborted(ctx);
    const authors = await abortable(
      ctx,
      Promise.all(ids.map((id) => this.authorRepo.getById(ctx, id))),
    );

    const byId = new Map<number, Author>();
    authors.forEach((author, index) => {
      const id = ids[index];
      if (id !== undefined) {
        byId.set(id, author);
      }
    });

    return articles.map((article) => ({
      ...article,
      author: byId.get(article.author.id) ?? article.author,
    }));
  }
}
