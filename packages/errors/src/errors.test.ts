import { describe, it, expect } from "vitest";
import { AppError } from "./app-error.js";
import {
  AppErrors,
  ErrBadRequest,
  ErrConflict,
  ErrForbidden,
  ErrInternalServerError,
  ErrNotFound,
  ErrUnauthorized,
} from "./errors.js";
import {
  BadParamInput,
  Conflict,
  DomainError,
  InternalServerError,
  NotFound,
  domainStatus,
} from "./domain-errors.js";
import { statusMessage } from "./status-messages.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("connection reset");
    const err = new AppError({ code: 502, message: "upstream failed", details: "db", cause });

    expect(err.code).toBe(502);
    expect(err.message).toBe("upstream failed");
    expect(err.details).toBe("db");
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("falls back to the canonical status message when message is empty", () => {
    const err = new AppError({ code: 429, message: "" });
    expect(err.message).toBe("请求过于频繁");
  });

  it("rejects codes that are not HTTP error statuses", () => {
    expect(() => new AppError({ code: 42 })).toThrow(RangeError);
    expect(() => new AppError({ code: 404.5 })).toThrow("Invalid HTTP error status code: 404.5");
  });

  it.each([101, 200, 204, 304, 399, 600])("rejects non-error status %d", (code) => {
    expect(() => new AppError({ code })).toThrow(`Invalid HTTP error status code: ${String(code)}`);
  });

  it.each([400, 451, 599])("accepts error status %d", (code) => {
    expect(new AppError({ code }).code).toBe(code);
  });

  it("withDetails keeps details verbatim", () => {
    const err = AppError.withDetails(404, "not found", "id=7");
    expect(err.toResponse()).toEqual({ code: 404, message: "not found", details: "id=7" });
  });

  it("withCause never copies the cause into details", () => {
    const err = AppError.withCause(500, "获取文章失败", new Error("SELECT failed: syntax error"));
    expect(err.details).toBeUndefined();
    expect(err.toResponse()).toEqual({ code: 500, message: "获取文章失败" });
    expect(Object.keys(err.toResponse())).toEqual(["code", "message"]);
  });

  it("is frozen after construction", () => {
    const err = AppError.withDetails(400, "bad", "x");
    expect(Object.isFrozen(err)).toBe(true);
    expect(() => {
      Object.assign(err, { code: 500 });
    }).toThrow(TypeError);
  });

  it("isAppError detects AppError instances", () => {
    expect(AppError.isAppError(ErrNotFound)).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });
});

describe("sentinels", () => {
  it.each([
    [ErrBadRequest, 400, "请求参数错误"],
    [ErrUnauthorized, 401, "未授权访问"],
    [ErrForbidden, 403, "禁止访问"],
    [ErrNotFound, 404, "资源不存在"],
    [ErrConflict, 409, "资源冲突"],
    [ErrInternalServerError, 500, "服务器内部错误"],
  ])("%s carries status %i", (sentinel, code, message) => {
    expect(sentinel.code).toBe(code);
    expect(sentinel.message).toBe(message);
    expect(sentinel.details).toBeUndefined();
  });

  it("exposes a frozen registry of the same instances", () => {
    expect(Object.isFrozen(AppErrors)).toBe(true);
    expect(AppErrors.NotFound).toBe(ErrNotFound);
    expect(AppErrors.InternalServerError).toBe(ErrInternalServerError);
  });
});

describe("domain errors", () => {
  it("maps sentinels by identity", () => {
    expect(domainStatus(NotFound)).toBe(404);
    expect(domainStatus(Conflict)).toBe(409);
    expect(domainStatus(InternalServerError)).toBe(500);
    expect(domainStatus(BadParamInput)).toBe(400);
  });

  it("treats look-alikes and unknown errors as 500", () => {
    expect(domainStatus(new DomainError(NotFound.message))).toBe(500);
    expect(domainStatus(new Error("boom"))).toBe(500);
    expect(domainStatus(undefined)).toBe(500);
  });
});

describe("statusMessage", () => {
  it("covers the canonical table", () => {
    expect(statusMessage(405)).toBe("请求方法不允许");
    expect(statusMessage(422)).toBe("请求数据格式错误");
    expect(statusMessage(502)).toBe("网关错误");
    expect(statusMessage(503)).toBe("服务暂不可用");
    expect(statusMessage(504)).toBe("网关超时");
  });

  it("returns the generic message for anything else", () => {
    expect(statusMessage(418)).toBe("未知错误");
    expect(statusMessage(200)).toBe("未知错误");
  });
});
