import { randomUUID } from "node:crypto";
import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { AppEnv } from "../types";
import type { ApiErrorResponse, ApiSuccessResponse, ResponseMeta } from "../types/response";

/**
 * Standard API response utilities
 */

/**
 * Request id set by the request-context middleware, falling back to the
 * incoming header when a response is built outside it.
 */
export function requestIdOf(c: Context<AppEnv>): string {
  const fromContext: string | undefined = c.get("requestId");
  return fromContext ?? c.req.header("X-Request-Id") ?? randomUUID();
}

function buildMeta(c: Context<AppEnv>, extra?: Record<string, unknown>): ResponseMeta {
  return {
    timestamp: new Date().toISOString(),
    request_id: requestIdOf(c),
    ...extra,
  };
}

/**
 * Send success response
 */
export function success<T>(
  c: Context<AppEnv>,
  data: T,
  meta?: Record<string, unknown>,
  statusCode: ContentfulStatusCode = 200
) {
  const body: ApiSuccessResponse<T> = {
    success: true,
    data,
    meta: buildMeta(c, meta),
  };
  return c.json(body, statusCode);
}

/**
 * Send error response
 */
export function error(
  c: Context<AppEnv>,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 500,
  details?: unknown
) {
  const body: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details === undefined ? {} : { details }),
    },
    meta: buildMeta(c),
  };
  return c.json(body, statusCode);
}
