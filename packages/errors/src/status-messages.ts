const STATUS_MESSAGES: Readonly<Record<number, string>> = {
  400: "请求参数错误",
  401: "未授权访问",
  403: "禁止访问",
  404: "资源不存在",
  405: "请求方法不允许",
  409: "资源冲突",
  422: "请求数据格式错误",
  429: "请求过于频繁",
  500: "服务器内部错误",
  502: "网关错误",
  503: "服务暂不可用",
  504: "网关超时",
};

export const UNKNOWN_ERROR_MESSAGE = "未知错误";

/**
 * Canonical public message for a bare HTTP status code.
 */
export function statusMessage(code: number): string {
  return STATUS_MESSAGES[code] ?? UNKNOWN_ERROR_MESSAGE;
}

/**
 * Whether `code` is a 4xx or 5xx status. Other statuses cannot carry an
 * error body (1xx, 204, 304) or do not describe a failure.
 *
 * @param code - Candidate HTTP status.
 * @returns True for integers in 400-599.
 */
export function isErrorStatus(code: number): boolean {
  return Number.isInteger(code) && code >= 400 && code <= 599;
}
