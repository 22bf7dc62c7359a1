/**
 * SLS Error Classification
 *
 * Maps SDK and network failures onto QueryError, separating transient failures
 * (safe to retry) from permanent ones.
 */

import { QueryError } from "@faultline/shared";

/** Backend codes worth retrying */
const TRANSIENT_CODES = new Set([
  "RequestTimeout",
  "ServerBusy",
  "InternalServerError",
  "ReadQuotaExceed",
  "ExceedQuota",
  "QpsLimit",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
]);

/** Backend codes meaning the temporary token is no longer accepted */
export const EXPIRED_TOKEN_CODES = new Set([
  "SecurityTokenExpired",
  "InvalidSecurityToken.Expired",
]);

function readString(source: unknown, key: string): string | undefined {
  if (typeof source !== "object" || source === null || !(key in source)) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

function readNumber(source: unknown, key: string): number | undefined {
  if (typeof source !== "object" || source === null || !(key in source)) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  const num = typeof value === "string" ? Number(value) : value;
  return typeof num === "number" && Number.isFinite(num) ? num : undefined;
}

/**
 * Status code from either the error itself or its `data` payload.
 */
function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  return (
    readNumber(error, "statusCode") ??
    readNumber(Reflect.get(error, "data"), "statusCode")
  );
}

export function isExpiredTokenError(error: QueryError): boolean {
  return error.backendCode !== undefined && EXPIRED_TOKEN_CODES.has(error.backendCode);
}

/**
 * Classify a thrown SDK error.
 */
export function toQueryError(error: unknown, expression: string): QueryError {
  if (error instanceof QueryError) return error;

  const backendCode = readString(error, "code");
  const statusCode = statusCodeOf(error);
  const message = error instanceof Error ? error.message : String(error);

  const transient =
    (backendCode !== undefined &&
      (TRANSIENT_CODES.has(backendCode) || EXPIRED_TOKEN_CODES.has(backendCode))) ||
    statusCode === 429 ||
    (statusCode !== undefined && statusCode >= 500);

  const detail = [backendCode, statusCode].filter((v) => v !== undefined).join("/");

  return new QueryError(
    `SLS query failed${detail ? ` (${detail})` : ""}: ${message} [query: ${truncate(expression, 120)}]`,
    { transient, backendCode, statusCode, cause: error }
  );
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
