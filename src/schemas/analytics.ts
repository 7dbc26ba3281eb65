import { z } from "zod";
import { ATTRIBUTION_MODELS } from "../services/attribution-models";
import { UnifiedFiltersSchema } from "../services/engine";

/**
 * Request Schemas for the Analytics API
 *
 * Bodies are checked for shape here. Values with engine-level rules
 * (model names, weights, half-life, baseline parameters) are passed through
 * as given and checked by the engine, so every configuration problem comes
 * back as CONFIGURATION_ERROR.
 */

// ============================================================================
// Datasets
// ============================================================================

/**
 * One uploaded table: an array of rows keyed by column header. Cells are
 * strings or numbers as a CSV/Excel parser produced them.
 */
export const RawTableSchema = z.array(z.record(z.string(), z.unknown()))
  .describe("Rows keyed by column header");

export const DatasetBundleSchema = z.object({
  influencers: RawTableSchema.optional(),
  posts: RawTableSchema.optional(),
  tracking: RawTableSchema.optional(),
  payouts: RawTableSchema.optional(),
});

// ============================================================================
// Requests
// ============================================================================

export const ValidateDatasetRequestSchema = z.object({
  kind: z.string().describe("influencers | posts | tracking | payouts"),
  rows: RawTableSchema,
  strict: z.boolean().optional().describe("Reject the whole table on any violation"),
});

export const UnifiedViewRequestSchema = z.object({
  datasets: DatasetBundleSchema,
  filters: UnifiedFiltersSchema.optional(),
});

const ModelField = z.string().describe(`Attribution model: ${ATTRIBUTION_MODELS.join(" | ")}`);

const HalfLifeField = z.number().optional().describe("Half-life in days for time_decay (default 7)");

export const AttributionRequestSchema = UnifiedViewRequestSchema.extend({
  model: ModelField,
  halfLifeDays: HalfLifeField,
  baseline: z.object({ method: z.string() }).passthrough().optional()
    .describe("Incremental baseline: none | fixed | organic_rate"),
});

export const ScoresRequestSchema = UnifiedViewRequestSchema.extend({
  weights: z.record(z.string(), z.number()).optional()
    .describe("Partial weights for engagementRate, conversionRate, roas, revenuePerRupee"),
  model: ModelField.optional().describe("When set, ROAS is computed on revenue attributed under this model"),
  halfLifeDays: HalfLifeField,
});

export const OverviewRequestSchema = UnifiedViewRequestSchema.extend({
  period: z.enum(["daily", "weekly", "monthly"]).optional().default("daily"),
});

// ============================================================================
// Responses
// ============================================================================

export const ResponseMetaSchema = z.object({
  timestamp: z.string(),
  request_id: z.string(),
}).passthrough();

/**
 * Success envelope around `data`. The payloads themselves are documented
 * loosely; the engine's TypeScript types are the source of truth.
 */
export function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    success: z.literal(true),
    data,
    meta: ResponseMetaSchema,
  });
}

export const ErrorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
  meta: ResponseMetaSchema,
});
