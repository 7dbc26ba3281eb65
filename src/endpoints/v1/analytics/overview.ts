/**
 * Campaign Overview Endpoint
 *
 * Dashboard summary: dataset totals, integrity findings, portfolio
 * metrics, platform breakdown, revenue over time and payout basis
 * comparison.
 */

import { OpenAPIRoute, contentJson } from "chanfana";
import { z } from "zod";
import {
  checkDataIntegrity,
  payoutBasisSummary,
  platformPerformance,
  summarizeDatasets,
  timeSeries
} from "../../../services/campaign-insights";
import { aggregateRecords, computeMetrics } from "../../../services/metrics";
import type { AppContext } from "../../../types";
import { success } from "../../../utils/response";
import { ErrorEnvelopeSchema, OverviewRequestSchema, envelope } from "../../../schemas/analytics";
import { loadView, viewMeta } from "./view";

/**
 * POST /v1/analytics/overview
 */
export class GetCampaignOverview extends OpenAPIRoute {
  public schema = {
    tags: ["Analytics"],
    summary: "Campaign overview for the dashboard",
    operationId: "campaign-overview",
    request: {
      body: contentJson(OverviewRequestSchema)
    },
    responses: {
      "200": {
        description: "Overview sections",
        content: {
          "application/json": {
            schema: envelope(z.object({
              summary: z.object({}).passthrough(),
              integrity: z.object({
                issues: z.array(z.string()),
                warnings: z.array(z.string())
              }),
              metrics: z.record(z.string(), z.number().nullable()),
              platforms: z.array(z.object({ platform: z.string() }).passthrough()),
              timeSeries: z.array(z.object({ period: z.string() }).passthrough()),
              payoutBasis: z.array(z.object({ basis: z.string() }).passthrough())
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
    const { view } = loaded;

    return success(c, {
      // Summary and integrity describe the uploads as loaded, before filters
      summary: summarizeDatasets(loaded.datasets),
      integrity: checkDataIntegrity(loaded.datasets),
      metrics: computeMetrics(aggregateRecords(view.records)),
      platforms: platformPerformance(view.posts, view.events),
      timeSeries: timeSeries(view.events, data.body.period),
      payoutBasis: payoutBasisSummary(view.payouts, view.records)
    }, { ...viewMeta(loaded), period: data.body.period });
  }
}
