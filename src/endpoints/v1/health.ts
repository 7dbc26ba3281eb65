import { OpenAPIRoute } from "chanfana";
import { z } from "zod";
import { ATTRIBUTION_MODELS } from "../../services/attribution-models";
import type { AppContext } from "../../types";
import { success } from "../../utils/response";
import { envelope } from "../../schemas/analytics";

export class HealthEndpoint extends OpenAPIRoute {
  public schema = {
    tags: ["System"],
    summary: "Health check endpoint",
    operationId: "health-check",
    responses: {
      "200": {
        description: "Service is healthy",
        content: {
          "application/json": {
            schema: envelope(z.object({
              status: z.string(),
              service: z.string(),
              timestamp: z.string(),
              uptime_seconds: z.number(),
              attribution_models: z.array(z.string())
            }))
          }
        }
      }
    }
  };

  public async handle(c: AppContext) {
    // Stateless service: no dependencies to check beyond the process itself
    return success(c, {
      status: "healthy",
      service: "influencer-campaign-analytics",
      timestamp: new Date().toISOString(),
      uptime_seconds: Math.round(process.uptime()),
      attribution_models: [...ATTRIBUTION_MODELS]
    });
  }
}
