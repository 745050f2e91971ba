import { AppError, domainStatus } from "@clean-articles/errors";

export const FETCH_FAILED = "获取文章列表失败";
export const GET_FAILED = "获取文章失败";
export const CREATE_FAILED = "创建文章失败";
export const UPDATE_FAILED = "更新文章失败";
export const DELETE_FAILED = "删除文章失败";

/**
 * Wrap a service failure in the handler's public message, keeping the
 * status its domain error maps to and the original as cause.
 */
export function serviceFailure(err: unknown, message: string): AppError {
  return AppError.withCause(domainStatus(err), message, err);
}
