import { asc, eq, gt } from "drizzle-orm";
import type { Article, ArticlePage, RequestContext } from "@clean-articles/types";
import type { IArticleRepository } from "@clean-articles/core";
import { decodeCursor, encodeCursor } from "@clean-articles/core";
import { NotFound } from "@clean-articles/errors";
import type { DbClient } from "../client.js";
import { articles, type ArticleRow } from "../schema/articles.js";

export function toArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    // Only the id is stored with the article; the service resolves the rest.
    author: { id: row.authorId, name: "", createdAt: new Date(0), updatedAt: new Date(0) },
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function assertSingleRow(affected: number): void {
  if (affected !== 1) {
    throw new Error(`unexpected number of affected rows: ${String(affected)}`);
  }
}

export class PgArticleRepository implements IArticleRepository {
  constructor(private readonly db: DbClient) {}

  async fetch(_ctx: RequestContext, cursor: string, num: number): Promise<ArticlePage> {
    const after = decodeCursor(cursor);
    const rows = await this.db
      .select()
      .from(articles)
      .where(gt(articles.createdAt, after))
      .orderBy(asc(articles.createdAt))
      .limit(num);

    const list = rows.map(toArticle);
    const last = list.at(-1);
    const nextCursor = last && list.length === num ? encodeCursor(last.createdAt) : "";
    return { articles: list, nextCursor };
  }

  async getById(_ctx: RequestContext, id: number): Promise<Article> {
    const [row] = await this.db.select().from(articles).where(eq(articles.id, id)).limit(1);
    if (!row) {
      throw NotFound;
    }
    return toArticle(row);
  }

  async getByTitle(_ctx: RequestContext, title: string): Promise<Article> {
    const [row] = await this.db.select().from(articles).where(eq(articles.title, title)).limit(1);
    if (!row) {
      throw NotFound;
    }
    return toArticle(row);
  }

  async update(_ctx: RequestContext, article: Article): Promise<void> {
    const updated = await this.db
      .update(articles)
      .set({
        title: article.title,
        content: article.content,
        authorId: article.author.id,
        updatedAt: article.updatedAt,
      })
      .where(eq(articles.id, article.id))
      .returning({ id: articles.id });
    assertSingleRow(updated.length);
  }

  async store(_ctx: RequestContext, article: Article): Promise<number> {
    const [inserted] = await this.db
      .insert(articles)
      .values({
        title: article.title,
        content: article.content,
        authorId: article.author.id,
        createdAt: article.createdAt,
        updatedAt: article.updatedAt,
      })
      .returning({ id: articles.id });
    if (!inserted) {
      throw new Error("insert returned no row");
    }
    return inserted.id;
  }

  async delete(_ctx: RequestContext, id: number): Promise<void> {
    const deleted = await this.db
      .delete(articles)
      .where(eq(articles.id, id))
      .returning({ id: articles.id });
    assertSingleRow(deleted.length);
  }
}
