import { z } from "zod";
import type { Article, ArticleJson, Author, AuthorJson } from "@clean-articles/types";

export const DEFAULT_PAGE_SIZE = 10;

/** Body accepted by the create and update routes. */
export const articleBodySchema = z.object({
  title: z.string().min(1),
  content: z.string().min(1),
  author: z.object({ id: z.number().int().nonnegative() }).optional(),
});

export type ArticleBody = z.infer<typeof articleBodySchema>;

export function toAuthorJson(author: Author): AuthorJson {
  return {
    id: author.id,
    name: author.name,
    created_at: author.createdAt.toISOString(),
    updated_at: author.updatedAt.toISOString(),
  };
}

export function toArticleJson(article: Article): ArticleJson {
  return {
    id: article.id,
    title: article.title,
    content: article.content,
    author: toAuthorJson(article.author),
    updated_at: article.updatedAt.toISOString(),
    created_at: article.createdAt.toISOString(),
  };
}

/**
 * New article from a request body. Ids and timestamps are assigned on store.
 */
export function fromArticleBody(body: ArticleBody): Article {
  const epoch = new Date(0);
  return {
    id: 0,
    title: body.title,
    content: body.content,
    author: { id: body.author?.id ?? 0, name: "", createdAt: epoch, updatedAt: epoch },
    createdAt: epoch,
    updatedAt: epoch,
  };
}

const PAGE_SIZE_PATTERN = /^\d+$/;

/**
 * Page size from the `num` query value. Missing, malformed or zero values
 * fall back to the default.
 */
export function parsePageSize(raw: string): number {
  if (!PAGE_SIZE_PATTERN.test(raw)) {
    return DEFAULT_PAGE_SIZE;
  }
  const num = Number(raw);
  return Number.isSafeInteger(num) && num > 0 ? num : DEFAULT_PAGE_SIZE;
}

export function queryString(value: unknown): string {
  return typeof value === "string" ? value : "";
}
