import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { ConfigurationError, SchemaRejectedError } from "../services/errors";
import type { AppEnv } from "../types";
import { error as errorResponse, requestIdOf } from "../utils/response";
import { errorContext, structuredLog } from "../utils/structured-logger";

export class ApiError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: ContentfulStatusCode = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/**
 * Translate engine errors into the API's error vocabulary.
 */
export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) {
    return err;
  }

  if (err instanceof SchemaRejectedError) {
    return new ApiError(err.code, err.message, 422, err.violations);
  }

  if (err instanceof ConfigurationError) {
    return new ApiError(err.code, err.message, 400, err.details);
  }

  // Request validation errors from zod, including chanfana's own zod copy
  if (err instanceof ZodError) {
    return new ApiError("VALIDATION_ERROR", "Invalid request data", 400, err.issues);
  }
  if (err instanceof Error && err.name === "ZodError") {
    return new ApiError("VALIDATION_ERROR", "Invalid request data", 400, "issues" in err ? err.issues : undefined);
  }

  if (err instanceof HTTPException && err.status < 500) {
    return new ApiError("HTTP_ERROR", err.message, err.status);
  }

  return new ApiError(
    "INTERNAL_ERROR",
    "An unexpected error occurred",
    500,
    process.env.NODE_ENV === "development" && err instanceof Error ? err.message : undefined
  );
}

/**
 * Global error handler
 */
export function errorHandler(err: unknown, c: Context<AppEnv>): Response {
  const apiError = toApiError(err);
  const endpoint = new URL(c.req.url).pathname;
  const request_id = requestIdOf(c);

  if (apiError.statusCode >= 500) {
    structuredLog("ERROR", "Unhandled error", { request_id, endpoint, ...errorContext(err) });
  } else {
    structuredLog("WARN", "Request rejected", { request_id, endpoint, code: apiError.code, status: apiError.statusCode });
  }

  return errorResponse(c, apiError.code, apiError.message, apiError.statusCode, apiError.details);
}
