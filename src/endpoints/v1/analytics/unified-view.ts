import { OpenAPIRoute, contentJson } from "chanfana";
import { z } from "zod";
import { aggregateRecords, computeMetrics } from "../../../services/metrics";
import type { AppContext } from "../../../types";
import { success } from "../../../utils/response";
import { ErrorEnvelopeSchema, UnifiedViewRequestSchema, envelope } from "../../../schemas/analytics";
import { loadView, viewMeta } from "./view";

/**
 * POST /v1/analytics/unified-view
 *
 * One row per influencer with post, tracking and payout aggregates and
 * the derived performance metrics.
 */
export class GetUnifiedView extends OpenAPIRoute {
  public schema = {
    tags: ["Analytics"],
    summary: "Join datasets into the unified influencer view",
    operationId: "unified-view",
    request: {
      body: contentJson(UnifiedViewRequestSchema)
    },
    responses: {
      "200": {
        description: "Unified records with metrics and portfolio totals",
        content: {
          "application/json": {
            schema: envelope(z.object({
              records: z.array(z.object({
                influencerId: z.string(),
                metrics: z.record(z.string(), z.number().nullable())
              }).passthrough()),
              totals: z.object({
                metrics: z.record(z.string(), z.number().nullable())
              }).passthrough()
            }))
          }
        }
      },
      "400": {
        description: "Invalid filters",
        content: { "application/json": { schema: ErrorEnvelopeSchema } }
      }
    }
  };

  public async handle(c: AppContext) {
    const data = await this.getValidatedData<typeof this.schema>();
    const loaded = loadView(data.body);

    const totals = aggregateRecords(loaded.view.records);

    return success(c, {
      records: loaded.view.records.map(record => ({
        ...record,
        metrics: computeMetrics(record)
      })),
      totals: {
        influencers: loaded.view.records.length,
        ...totals,
        metrics: computeMetrics(totals)
      }
    }, viewMeta(loaded));
  }
}
