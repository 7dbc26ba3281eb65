/**
 * Process Settings
 *
 * Read once from the environment and validated with zod. A bad value stops
 * the server at startup instead of surfacing on the first request.
 */

import { z } from "zod";

const DEFAULT_CORS_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:5173",
  "http://127.0.0.1:3000",
  "http://127.0.0.1:5173",
];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["INFO", "WARN", "ERROR", "CRITICAL"]).default("INFO"),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  CORS_ORIGINS: z.string()
    .optional()
    .transform(value =>
      value === undefined
        ? DEFAULT_CORS_ORIGINS
        : value.split(",").map(origin => origin.trim()).filter(origin => origin.length > 0)
    ),
  MAX_BODY_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return parsed.data;
}
