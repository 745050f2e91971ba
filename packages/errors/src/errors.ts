import { AppError } from "./app-error.js";

export const ErrBadRequest = new AppError({ code: 400, message: "请求参数错误" });
export const ErrUnauthorized = new AppError({ code: 401, message: "未授权访问" });
export const ErrForbidden = new AppError({ code: 403, message: "禁止访问" });
export const ErrNotFound = new AppError({ code: 404, message: "资源不存在" });
export const ErrConflict = new AppError({ code: 409, message: "资源冲突" });
export const ErrInternalServerError = new AppError({ code: 500, message: "服务器内部错误" });

export const AppErrors = Object.freeze({
  BadRequest: ErrBadRequest,
  Unauthorized: ErrUnauthorized,
  Forbidden: ErrForbidden,
  NotFound: ErrNotFound,
  Conflict: ErrConflict,
  InternalServerError: ErrInternalServerError,
});
