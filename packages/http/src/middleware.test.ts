import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { createLogger, createMemoryDestination } from "@clean-articles/logger";
import { corsMiddleware } from "./cors.js";
import { requestTimeout, requestSignal } from "./timeout.js";
import { requestLogger } from "./request-logger.js";
import { StagedRouter, dispatchStages } from "./pipeline.js";

describe("corsMiddleware", () => {
  function setup(origin?: string) {
    const app = express();
    app.use(corsMiddleware(origin ? { origin } : {}));
    app.get("/test", (_req, res) => {
      res.status(200).end();
    });
    return app;
  }

  it("allows any origin by default", async () => {
    const res = await request(setup()).get("/test");

    expect(res.status).toBe(200);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });

  it("answers preflight requests with 204", async () => {
    const res = await request(setup()).options("/test");

    expect(res.status).toBe(204);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.headers["access-control-allow-methods"]).toBe("GET, POST, PUT, DELETE, OPTIONS");
    expect(res.headers["access-control-allow-headers"]).toBe("Content-Type, Authorization");
  });

  it("echoes a configured origin", async () => {
    const res = await request(setup("https://app.example.com")).get("/test");

    expect(res.headers["access-control-allow-origin"]).toBe("https://app.example.com");
    expect(res.headers["vary"]).toBe("Origin");
  });
});

describe("requestTimeout", () => {
  it("aborts slow requests and reports them as opaque failures", async () => {
    const destination = createMemoryDestination();
    const logger = createLogger({ destination });
    const app = express();
    app.use(requestTimeout(10));
    const router = new StagedRouter(dispatchStages(logger)).get("/slow", async (req) => {
      const signal = requestSignal(req);
      if (!signal) {
        throw new Error("missing signal");
      }
      await new Promise((resolve) => {
        signal.addEventListener("abort", resolve, { once: true });
      });
      signal.throwIfAborted();
    });
    app.use(router.router);

    const res = await request(app).get("/slow");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ code: 500, message: "服务器内部错误" });
    expect(destination.lines[0]).toMatchObject({
      level: 50,
      error: "request deadline of 10ms exceeded",
    });
  });

  it("clears the deadline once the response finished", async () => {
    const signals: AbortSignal[] = [];
    const app = express();
    app.use(requestTimeout(20));
    app.get("/fast", (req, res) => {
      const signal = requestSignal(req);
      if (signal) signals.push(signal);
      res.status(204).end();
    });

    await request(app).get("/fast").expect(204);
    await new Promise((resolve) => setTimeout(resolve, 40));

    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(false);
  });
});

describe("requestLogger", () => {
  it("logs finished requests and echoes the request id", async () => {
    const destination = createMemoryDestination();
    const app = express();
    app.use(requestLogger(createLogger({ destination })));
    app.get("/missing-thing", (_req, res) => {
      res.status(404).end();
    });
    app.get("/health", (_req, res) => {
      res.status(200).end();
    });

    const res = await request(app).get("/missing-thing").set("X-Request-Id", "req-42");
    await request(app).get("/health");

    expect(res.headers["x-request-id"]).toBe("req-42");
    expect(destination.lines).toHaveLength(1);
    expect(destination.lines[0]).toMatchObject({
      level: 40,
      req: { id: "req-42", method: "GET", url: "/missing-thing" },
      res: { statusCode: 404 },
    });
  });
});
