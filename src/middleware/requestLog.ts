/**
 * Request Logging Middleware
 *
 * Assigns the request id, echoes it on the response, and writes one
 * structured line per request with status and timing.
 */

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { AppEnv } from "../types";
import { structuredLog } from "../utils/structured-logger";

/**
 * Generate or extract request ID
 */
function getRequestId(c: Context<AppEnv>): string {
  return c.req.header("X-Request-Id") || randomUUID();
}

/**
 * Extract client IP address from proxy headers
 */
function getClientIp(c: Context<AppEnv>): string {
  return c.req.header("X-Forwarded-For")?.split(",")[0].trim() ||
    c.req.header("X-Real-IP") ||
    "unknown";
}

export async function requestLogMiddleware(c: Context<AppEnv>, next: Next) {
  const startTime = Date.now();
  const requestId = getRequestId(c);
  const method = c.req.method;
  const path = new URL(c.req.url).pathname;

  // Set request ID in context for downstream use
  c.set("requestId", requestId);

  await next();

  c.header("X-Request-Id", requestId);

  const status = c.res.status;
  structuredLog(status >= 500 ? "ERROR" : status >= 400 ? "WARN" : "INFO", "Request completed", {
    request_id: requestId,
    endpoint: path,
    method,
    status,
    response_time_ms: Date.now() - startTime,
    ip_address: getClientIp(c),
    user_agent: c.req.header("User-Agent") || "unknown",
  });
}
