import { fromHono } from "chanfana";
import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import type { AppConfig } from "./config/env";
import type { AppEnv } from "./types";
import { error } from "./utils/response";

// Middleware
import { corsMiddleware } from "./middleware/cors";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogMiddleware } from "./middleware/requestLog";
import { securityHeaders, validateContentType } from "./middleware/security";

// V1 Endpoints
import { HealthEndpoint } from "./endpoints/v1/health";
import { ValidateDataset } from "./endpoints/v1/datasets";
import { GetUnifiedView } from "./endpoints/v1/analytics/unified-view";
import { GetAttribution } from "./endpoints/v1/analytics/attribution";
import { GetInfluencerScores } from "./endpoints/v1/analytics/scores";
import { GetCampaignOverview } from "./endpoints/v1/analytics/overview";

export function createApp(config: AppConfig) {
  const app = new Hono<AppEnv>();

  // Global error handler
  app.onError(errorHandler);

  // Request id and access log first, so every later failure is tagged
  app.use("*", requestLogMiddleware);

  app.use("*", securityHeaders());

  app.use("*", corsMiddleware(config.CORS_ORIGINS));

  // Datasets travel in the body; cap its size
  app.use("*", bodyLimit({
    maxSize: config.MAX_BODY_BYTES,
    onError: (c) => error(c, "PAYLOAD_TOO_LARGE", `Request body exceeds ${config.MAX_BODY_BYTES} bytes`, 413)
  }));

  // Content type validation for routes with body
  app.use("*", validateContentType());

  // Setup OpenAPI registry
  // Request validation failures go through errorHandler like every other error
  const openapi = fromHono(app, {
    raiseOnError: true,
    docs_url: "/",
    schema: {
      info: {
        title: "Influencer Campaign Analytics API",
        version: "1.0.0",
        description: "Validation, joining, multi-touch attribution, ROI/ROAS and scoring for influencer campaign datasets. Stateless: every request carries its datasets."
      },
      servers: [
        {
          url: `http://localhost:${config.PORT}`,
          description: "Development"
        }
      ]
    }
  });

  // Health check
  openapi.get("/v1/health", HealthEndpoint);

  // Datasets
  openapi.post("/v1/datasets/validate", ValidateDataset);

  // Analytics
  openapi.post("/v1/analytics/unified-view", GetUnifiedView);
  openapi.post("/v1/analytics/attribution", GetAttribution);
  openapi.post("/v1/analytics/scores", GetInfluencerScores);
  openapi.post("/v1/analytics/overview", GetCampaignOverview);

  app.notFound((c) => error(c, "NOT_FOUND", `No route for ${c.req.method} ${new URL(c.req.url).pathname}`, 404));

  return app;
}
