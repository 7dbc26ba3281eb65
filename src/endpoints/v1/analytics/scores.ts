import { OpenAPIRoute, contentJson } from "chanfana";
import { z } from "zod";
import { resolveHalfLife } from "../../../services/attribution-models";
import { computeAttributionAndROI, scoreInfluencers } from "../../../services/engine";
import { resolveScoreWeights } from "../../../services/influencer-scorer";
import type { AppContext } from "../../../types";
import { success } from "../../../utils/response";
import { ErrorEnvelopeSchema, ScoresRequestSchema, envelope } from "../../../schemas/analytics";
import { loadView, viewMeta } from "./view";

/**
 * POST /v1/analytics/scores
 *
 * Composite influencer scores and leaderboard. When a model is given,
 * ROAS is taken from revenue attributed under it.
 */
export class GetInfluencerScores extends OpenAPIRoute {
  public schema = {
    tags: ["Analytics"],
    summary: "Score and rank influencers",
    operationId: "influencer-scores",
    request: {
      body: contentJson(ScoresRequestSchema)
    },
    responses: {
      "200": {
        description: "Ranked score results",
        content: {
          "application/json": {
            schema: envelope(z.object({
              model: z.string().nullable(),
              weights: z.record(z.string(), z.number()),
              results: z.array(z.object({
                rank: z.number(),
                influencerId: z.string(),
                score: z.number().nullable(),
                segment: z.string()
              }).passthrough())
            }))
          }
        }
      },
      "400": {
        description: "Invalid weights, model, half-life or filters",
        content: { "application/json": { schema: ErrorEnvelopeSchema } }
      }
    }
  };

  public async handle(c: AppContext) {
    const data = await this.getValidatedData<typeof this.schema>();
    const { weights, model, halfLifeDays } = data.body;

    if (halfLifeDays !== undefined) resolveHalfLife(halfLifeDays);

    const loaded = loadView(data.body);
    const report = model === undefined
      ? undefined
      : computeAttributionAndROI(loaded.view, model, undefined, { halfLifeDays });
    const results = scoreInfluencers(loaded.view, weights, report);

    return success(c, {
      model: model ?? null,
      weights: resolveScoreWeights(weights),
      results
    }, viewMeta(loaded));
  }
}
