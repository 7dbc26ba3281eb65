/**
 * Security Headers Middleware
 *
 * Response headers for a JSON-only API. The docs page at `/` loads its
 * assets from a CDN, so the default policy leaves script and style
 * sources open to https.
 */

import type { Context, Next } from "hono";
import type { AppEnv } from "../types";
import { error } from "../utils/response";

/**
 * Security headers configuration. `false` drops a header.
 */
export interface SecurityHeadersConfig {
  contentSecurityPolicy?: string | false;
  crossOriginOpenerPolicy?: string | false;
  crossOriginResourcePolicy?: string | false;
  referrerPolicy?: string | false;
  strictTransportSecurity?: string | false;
  xContentTypeOptions?: string | false;
  xFrameOptions?: string | false;
}

const defaultConfig: Required<SecurityHeadersConfig> = {
  contentSecurityPolicy: "default-src 'self'; script-src 'self' 'unsafe-inline' https:; style-src 'self' 'unsafe-inline' https:; img-src 'self' data: https:; font-src 'self' data: https:",
  crossOriginOpenerPolicy: "same-origin",
  crossOriginResourcePolicy: "same-origin",
  referrerPolicy: "strict-origin-when-cross-origin",
  strictTransportSecurity: "max-age=31536000; includeSubDomains",
  xContentTypeOptions: "nosniff",
  xFrameOptions: "DENY",
};

const HEADER_NAMES: ReadonlyArray<readonly [keyof SecurityHeadersConfig, string]> = [
  ["contentSecurityPolicy", "Content-Security-Policy"],
  ["crossOriginOpenerPolicy", "Cross-Origin-Opener-Policy"],
  ["crossOriginResourcePolicy", "Cross-Origin-Resource-Policy"],
  ["referrerPolicy", "Referrer-Policy"],
  ["strictTransportSecurity", "Strict-Transport-Security"],
  ["xContentTypeOptions", "X-Content-Type-Options"],
  ["xFrameOptions", "X-Frame-Options"],
];

/**
 * Security headers middleware
 */
export function securityHeaders(config: SecurityHeadersConfig = {}) {
  const merged: Required<SecurityHeadersConfig> = { ...defaultConfig, ...config };
  const headers = HEADER_NAMES.flatMap(([key, header]) => {
    const value = merged[key];
    return value === false ? [] : [[header, value] as const];
  });

  return async function(c: Context, next: Next) {
    await next();
    for (const [header, value] of headers) {
      c.header(header, value);
    }
  };
}

/**
 * Content type validation middleware
 */
export function validateContentType(allowedTypes: string[] = ["application/json"]) {
  return async function(c: Context<AppEnv>, next: Next) {
    // Only validate for requests with body
    if (["POST", "PUT", "PATCH"].includes(c.req.method)) {
      const contentType = c.req.header("Content-Type");

      if (!contentType) {
        return error(c, "INVALID_CONTENT_TYPE", "Content-Type header is required", 400);
      }

      // Extract main content type (before semicolon)
      const mainContentType = contentType.split(";")[0].trim();

      if (!allowedTypes.includes(mainContentType)) {
        return error(c, "INVALID_CONTENT_TYPE", `Content-Type must be one of: ${allowedTypes.join(", ")}`, 415);
      }
    }

    await next();
  };
}
