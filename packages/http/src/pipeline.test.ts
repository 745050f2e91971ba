import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { z } from "zod";
import { AppError, ErrBadRequest, ErrNotFound, NotFound } from "@clean-articles/errors";
import { createLogger, createMemoryDestination } from "@clean-articles/logger";
import { attachError } from "./context.js";
import { errorMiddleware } from "./native.js";
import { safeBindJson } from "./binding.js";
import {
  StagedRouter,
  dispatchStages,
  propagationStage,
  recoveryStage,
  type Stage,
  type StagedHandler,
} from "./pipeline.js";

function setup(handler: StagedHandler, stages?: (logger: ReturnType<typeof createLogger>) => Stage[]) {
  const destination = createMemoryDestination();
  const logger = createLogger({ level: "debug", destination });
  const app = express();
  app.use(express.json());
  const router = new StagedRouter(stages ? stages(logger) : dispatchStages(logger))
    .get("/test", handler)
    .post("/test", handler);
  app.use(router.router);
  app.use(errorMiddleware(logger));
  return { app, lines: destination.lines };
}

describe("dispatch pipeline", () => {
  it("answers an attached domain NotFound with 404 and a warn log", async () => {
    const { app, lines } = setup((req) => {
      attachError(req, NotFound);
    });

    const res = await request(app).get("/test").set("User-Agent", "vitest-agent");

    expect(res.status).toBe(404);
    expect(res.headers["content-type"]).toMatch(/^application\/json/);
    expect(res.text).toBe('{"code":404,"message":"资源不存在"}');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 40,
      msg: "Client error",
      method: "GET",
      uri: "/test",
      userAgent: "vitest-agent",
      error: "your requested item is not found",
    });
    expect(typeof lines[0]?.["clientAddr"]).toBe("string");
  });

  it("recovers a thrown plain string as a generic 500 at error level", async () => {
    const { app, lines } = setup(() => {
      throw "boom";
    });

    const res = await request(app).get("/test");

    expect(res.status).toBe(500);
    expect(res.text).toBe('{"code":500,"message":"服务器内部错误"}');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 50,
      msg: "Recovered error",
      error: "boom",
      recovered: true,
    });
  });

  it("recovers rejected async handlers", async () => {
    const { app } = setup(async () => {
      await Promise.resolve();
      throw new Error("SELECT * FROM articles failed");
    });

    const res = await request(app).get("/test");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ code: 500, message: "服务器内部错误" });
  });

  it("logs a thrown AppError at error level but keeps its status", async () => {
    const { app, lines } = setup(() => {
      throw ErrNotFound;
    });

    const res = await request(app).get("/test");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ code: 404, message: "资源不存在" });
    expect(lines[0]).toMatchObject({ level: 50, msg: "Recovered error" });
  });

  it("lets a throw after an attachment win", async () => {
    const { app, lines } = setup((req) => {
      attachError(req, ErrBadRequest);
      throw new Error("kaboom");
    });

    const res = await request(app).get("/test");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ code: 500, message: "服务器内部错误" });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 50, error: "kaboom" });
  });

  it("uses only the last attached error", async () => {
    const { app, lines } = setup((req) => {
      attachError(req, ErrBadRequest);
      attachError(req, AppError.withDetails(422, "unprocessable", "title too long"));
    });

    const res = await request(app).get("/test");

    expect(res.status).toBe(422);
    expect(res.body).toEqual({ code: 422, message: "unprocessable", details: "title too long" });
    expect(lines).toHaveLength(1);
  });

  it("writes one response when the propagation stage runs twice", async () => {
    const { app, lines } = setup(
      (req) => {
        attachError(req, ErrNotFound);
        attachError(req, ErrNotFound);
      },
      (logger) => [recoveryStage(logger), propagationStage(logger), propagationStage(logger)],
    );

    const res = await request(app).get("/test");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ code: 404, message: "资源不存在" });
    expect(lines).toHaveLength(1);
  });

  it("logs attached server errors at error level", async () => {
    const { app, lines } = setup((req) => {
      attachError(req, AppError.withCause(500, "获取文章失败", new Error("connection refused")));
    });

    const res = await request(app).get("/test");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ code: 500, message: "获取文章失败" });
    expect(lines[0]).toMatchObject({
      level: 50,
      msg: "Server error",
      error: "获取文章失败: connection refused",
    });
  });

  it("leaves a successful response untouched", async () => {
    const { app, lines } = setup((_req, res) => {
      res.status(200).json({ ok: true });
    });

    const res = await request(app).get("/test");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
    expect(lines).toHaveLength(0);
  });

  it("does not write twice when the handler already responded", async () => {
    const { app, lines } = setup((_req, res) => {
      res.status(200).json({ ok: true });
      throw new Error("late failure");
    });

    const res = await request(app).get("/test");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 50, error: "late failure" });
  });

  it("returns binding diagnostics for an invalid body", async () => {
    const schema = z.object({ title: z.string(), content: z.string() });
    const { app, lines } = setup((req, res) => {
      const bound = safeBindJson(schema, req.body);
      if (!bound.ok) {
        attachError(req, bound.error);
        return;
      }
      res.status(201).json(bound.value);
    });

    const res = await request(app).post("/test").send({ content: "body" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ code: 400, message: "请求参数错误", details: "title: Required" });
    expect(lines[0]).toMatchObject({ level: 40, msg: "Binding error" });
  });

  it("routes malformed JSON through the error middleware as a binding failure", async () => {
    const { app, lines } = setup((_req, res) => {
      res.status(201).end();
    });

    const res = await request(app)
      .post("/test")
      .set("Content-Type", "application/json")
      .send("invalid json");

    expect(res.status).toBe(400);
    expect(res.body.code).toBe(400);
    expect(res.body.message).toBe("请求参数错误");
    expect(res.body.details).toMatch(/^Unexpected token/);
    expect(lines[0]).toMatchObject({ level: 40, msg: "Binding error" });
  });
});
