import type { Request, Response, Router } from "express";
import type { ArticleService } from "@clean-articles/core";
import { ErrBadRequest } from "@clean-articles/errors";
import type { Logger } from "@clean-articles/logger";
import {
  StagedRouter,
  attachError,
  dispatchStages,
  parseId,
  requestContext,
  safeBindJson,
} from "@clean-articles/http";
import {
  articleBodySchema,
  fromArticleBody,
  parsePageSize,
  queryString,
  toArticleJson,
} from "../../article-mapper.js";
import {
  CREATE_FAILED,
  DELETE_FAILED,
  FETCH_FAILED,
  GET_FAILED,
  UPDATE_FAILED,
  serviceFailure,
} from "../service-failure.js";

/**
 * Article routes for the staged adapter. Handlers attach failures to the
 * request and return; the dispatch stages write the error response.
 */
export class ArticleHandler {
  constructor(private readonly service: ArticleService) {}

  async fetch(req: Request, res: Response): Promise<void> {
    const num = parsePageSize(queryString(req.query["num"]));
    const cursor = queryString(req.query["cursor"]);

    try {
      const page = await this.service.fetch(requestContext(req), cursor, num);
      res.setHeader("X-Cursor", page.nextCursor);
      res.status(200).json(page.articles.map(toArticleJson));
    } catch (err: unknown) {
      attachError(req, serviceFailure(err, FETCH_FAILED));
    }
  }

  async getById(req: Request, res: Response): Promise<void> {
    const id = parseId(req.params["id"]);
    if (id === undefined) {
      attachError(req, ErrBadRequest);
      return;
    }

    try {
      const article = await this.service.getById(requestContext(req), id);
      res.status(200).json(toArticleJson(article));
    } catch (err: unknown) {
      attachError(req, serviceFailure(err, GET_FAILED));
    }
  }

  async store(req: Request, res: Response): Promise<void> {
    const bound = safeBindJson(articleBodySchema, req.body);
    if (!bound.ok) {
      attachError(req, bound.error);
      return;
    }

    try {
      const article = await this.service.store(requestContext(req), fromArticleBody(bound.value));
      res.status(201).json(toArticleJson(article));
    } catch (err: unknown) {
      attachError(req, serviceFailure(err, CREATE_FAILED));
    }
  }

  async update(req: Request, res: Response): Promise<void> {
    const id = parseId(req.params["id"]);
    if (id === undefined) {
      attachError(req, ErrBadRequest);
      return;
    }
    const bound = safeBindJson(articleBodySchema, req.body);
    if (!bound.ok) {
      attachError(req, bound.error);
      return;
    }

    try {
      const ctx = requestContext(req);
      const current = await this.service.getById(ctx, id);
      const article = await this.service.update(ctx, {
        ...current,
        title: bound.value.title,
        content: bound.value.content,
      });
      res.status(200).json(toArticleJson(article));
    } catch (err: unknown) {
      attachError(req, serviceFailure(err, UPDATE_FAILED));
    }
  }

  async delete(req: Request, res: Response): Promise<void> {
    const id = parseId(req.params["id"]);
    if (id === undefined) {
      attachError(req, ErrBadRequest);
      return;
    }

    try {
      await this.service.delete(requestContext(req), id);
      res.status(204).end();
    } catch (err: unknown) {
      attachError(req, serviceFailure(err, DELETE_FAILED));
    }
  }
}

export function stagedArticleRouter(service: ArticleService, logger: Logger): Router {
  const handler = new ArticleHandler(service);

  return new StagedRouter(dispatchStages(logger))
    .get("/articles", (req, res) => handler.fetch(req, res))
    .post("/articles", (req, res) => handler.store(req, res))
    .get("/articles/:id", (req, res) => handler.getById(req, res))
    .put("/articles/:id", (req, res) => handler.update(req, res))
    .delete("/articles/:id", (req, res) => handler.delete(req, res)).router;
}
