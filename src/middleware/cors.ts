import { cors as honoCors } from "hono/cors";

/**
 * CORS configuration for the API.
 * Origins come from CORS_ORIGINS; requests without an Origin header are
 * same-origin or server-to-server and pass through.
 */
export function corsMiddleware(allowedOrigins: readonly string[]) {
  return honoCors({
    origin: (origin) => {
      if (!origin) return "*";
      return allowedOrigins.includes(origin) ? origin : null;
    },
    allowHeaders: [
      "Content-Type",
      "X-Requested-With",
      "X-Request-Id",
      "Accept",
      "Origin"
    ],
    allowMethods: ["GET", "POST", "OPTIONS"],
    exposeHeaders: ["Content-Length", "X-Request-Id"],
    maxAge: 86400 // 24 hours
  });
}
