import { Router } from "express";
import type { Request, Response } from "express";
import type { ArticleService } from "@clean-articles/core";
import { ErrBadRequest } from "@clean-articles/errors";
import { asyncHandler, bindJson, parseId, requestContext } from "@clean-articles/http";
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

function requireId(req: Request): number {
  const id = parseId(req.params["id"]);
  if (id === undefined) {
    throw ErrBadRequest;
  }
  return id;
}

async function orFail<T>(message: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err: unknown) {
    throw serviceFailure(err, message);
  }
}

/**
 * Article routes for the native adapter. Handlers throw and the app-level
 * error middleware writes the response.
 */
export function nativeArticleRouter(service: ArticleService): Router {
  const router = Router();

  router.get(
    "/articles",
    asyncHandler(async (req: Request, res: Response) => {
      const num = parsePageSize(queryString(req.query["num"]));
      const cursor = queryString(req.query["cursor"]);

      const page = await orFail(FETCH_FAILED, () =>
        service.fetch(requestContext(req), cursor, num),
      );
      res.setHeader("X-Cursor", page.nextCursor);
      res.status(200).json(page.articles.map(toArticleJson));
    }),
  );

  router.post(
    "/articles",
    asyncHandler(async (req: Request, res: Response) => {
      const body = bindJson(articleBodySchema, req.body);
      const article = await orFail(CREATE_FAILED, () =>
        service.store(requestContext(req), fromArticleBody(body)),
      );
      res.status(201).json(toArticleJson(article));
    }),
  );

  router.get(
    "/articles/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const id = requireId(req);
      const article = await orFail(GET_FAILED, () => service.getById(requestContext(req), id));
      res.status(200).json(toArticleJson(article));
    }),
  );

  router.put(
    "/articles/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const id = requireId(req);
      const body = bindJson(articleBodySchema, req.body);
      const ctx = requestContext(req);

      const article = await orFail(UPDATE_FAILED, async () => {
        const current = await service.getById(ctx, id);
        return service.update(ctx, { ...current, title: body.title, content: body.content });
      });
      res.status(200).json(toArticleJson(article));
    }),
  );

  router.delete(
    "/articles/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const id = requireId(req);
      await orFail(DELETE_FAILED, () => service.delete(requestContext(req), id));
      res.status(204).end();
    }),
  );

  return router;
}
