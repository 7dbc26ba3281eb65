/**
 * Attribution & ROI Endpoint
 *
 * Multi-touch attribution of tracked revenue to influencers, with ROI,
 * ROAS and incremental ROAS per influencer.
 * Supports: first_touch, last_touch, linear, time_decay
 */

import { OpenAPIRoute, contentJson } from "chanfana";
import { z } from "zod";
import { computeAttributionAndROI } from "../../../services/engine";
import type { AppContext } from "../../../types";
import { success } from "../../../utils/response";
import { AttributionRequestSchema, ErrorEnvelopeSchema, envelope } from "../../../schemas/analytics";
import { loadView, viewMeta } from "./view";

const RollupSchema = z.object({
  key: z.string(),
  influencerCount: z.number(),
  totalPayout: z.number(),
  attributedRevenue: z.number(),
  attributedOrders: z.number(),
  roi: z.number().nullable(),
  roas: z.number().nullable()
});

/**
 * POST /v1/analytics/attribution
 */
export class GetAttribution extends OpenAPIRoute {
  public schema = {
    tags: ["Analytics"],
    summary: "Attribute revenue and compute ROI/ROAS",
    description: `
Weight the influencer touchpoints in each customer journey and credit every touchpoint with its own revenue times its weight.

**Attribution Models:**
- **first_touch**: 100% credit to the first touchpoint
- **last_touch**: 100% credit to the last touchpoint
- **linear**: Equal credit to all touchpoints
- **time_decay**: More credit to recent touchpoints (configurable half-life, default 7 days)

**Incremental baseline** (optional, always an estimate):
- **none**: baseline 0
- **fixed**: caller-supplied revenue per influencer or a default
- **organic_rate**: reach × organic conversion rate × average order value
    `.trim(),
    operationId: "attribution-roi",
    request: {
      body: contentJson(AttributionRequestSchema)
    },
    responses: {
      "200": {
        description: "ROI report with platform and campaign rollups",
        content: {
          "application/json": {
            schema: envelope(z.object({
              model: z.string(),
              results: z.array(z.object({
                influencerId: z.string(),
                attributedRevenue: z.number(),
                roi: z.number().nullable(),
                roas: z.number().nullable(),
                incrementalRoas: z.number().nullable(),
                tier: z.string()
              }).passthrough()),
              byPlatform: z.array(RollupSchema),
              byCategory: z.array(RollupSchema),
              byCampaign: z.array(RollupSchema),
              tiers: z.record(z.string(), z.number()),
              summary: z.object({}).passthrough()
            }))
          }
        }
      },
      "400": {
        description: "Unknown model or invalid half-life, baseline or filters",
        content: { "application/json": { schema: ErrorEnvelopeSchema } }
      }
    }
  };

  public async handle(c: AppContext) {
    const data = await this.getValidatedData<typeof this.schema>();
    const { model, halfLifeDays, baseline } = data.body;

    const loaded = loadView(data.body);
    const report = computeAttributionAndROI(loaded.view, model, baseline, { halfLifeDays });

    return success(c, report, viewMeta(loaded));
  }
}
