/**
 * Influencer Scorer
 *
 * Composite 0-100 score from min-max normalised metrics, and a stable
 * leaderboard. Normalisation is relative to the record set passed in, so
 * scores move when filters change.
 */

import { z } from "zod";
import {
  DEFAULT_SCORE_WEIGHTS,
  FLAT_METRIC_NORMALIZED_VALUE,
  SCORE_METRICS,
  SCORE_SEGMENT_THRESHOLDS,
  type ScoreMetric,
} from "../config/analytics";
import type { UnifiedRecord } from "./data-joiner";
import { ConfigurationError } from "./errors";
import { conversionRate, engagementRate, revenuePerRupee, type MetricValue } from "./metrics";
import { calculateROAS } from "./roi";

// =============================================================================
// Types
// =============================================================================

export type ScoreWeights = Record<ScoreMetric, number>;

export type ScoreSegment = 'High' | 'Medium' | 'Low' | 'Insufficient data';

export interface ScoreComponent {
  value: MetricValue;
  normalized: MetricValue;
  weight: number;
}

export interface ScoreResult {
  rank: number;
  influencerId: string;
  name: string;
  category: string;
  platform: string;
  revenue: number;
  score: MetricValue;
  segment: ScoreSegment;
  components: Record<ScoreMetric, ScoreComponent>;
}

const WeightSchema = z.number().finite().nonnegative();

export const ScoreWeightsSchema = z.object({
  engagementRate: WeightSchema,
  conversionRate: WeightSchema,
  roas: WeightSchema,
  revenuePerRupee: WeightSchema,
}).partial().strict();

// =============================================================================
// Weights
// =============================================================================

/**
 * Merge caller weights over the equal-weight default. Negative, non-finite
 * or unknown weights, and an all-zero set, are rejected.
 */
export function resolveScoreWeights(input: unknown): ScoreWeights {
  const parsed = ScoreWeightsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationError('Invalid score weights', parsed.error.issues);
  }
  const weights: ScoreWeights = { ...DEFAULT_SCORE_WEIGHTS, ...parsed.data };
  const total = SCORE_METRICS.reduce((sum, m) => sum + weights[m], 0);
  if (total <= 0) {
    throw new ConfigurationError('At least one score weight must be greater than zero');
  }
  return weights;
}

// =============================================================================
// Scoring
// =============================================================================

export function scoreSegment(score: MetricValue): ScoreSegment {
  if (score === null) return 'Insufficient data';
  if (score >= SCORE_SEGMENT_THRESHOLDS.high) return 'High';
  if (score >= SCORE_SEGMENT_THRESHOLDS.medium) return 'Medium';
  return 'Low';
}

function minMaxNormalizer(values: readonly MetricValue[]): (value: MetricValue) => MetricValue {
  const defined = values.filter((v): v is number => v !== null);
  if (defined.length === 0) return () => null;
  const min = defined.reduce((m, v) => Math.min(m, v), defined[0]);
  const max = defined.reduce((m, v) => Math.max(m, v), defined[0]);
  const span = max - min;
  return value => {
    if (value === null) return null;
    return span > 0 ? (value - min) / span : FLAT_METRIC_NORMALIZED_VALUE;
  };
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Score and rank influencers.
 *
 * @param roasByInfluencer - ROAS on attributed revenue from the ROI stage.
 *   When absent, ROAS falls back to tracked revenue over payout.
 */
export function score(
  records: readonly UnifiedRecord[],
  weights: Partial<ScoreWeights> = {},
  roasByInfluencer?: ReadonlyMap<string, MetricValue>
): ScoreResult[] {
  const resolved = resolveScoreWeights(weights);

  const raw = records.map(record => ({
    record,
    values: {
      engagementRate: engagementRate(record),
      conversionRate: conversionRate(record),
      roas: roasByInfluencer
        ? roasByInfluencer.get(record.influencerId) ?? null
        : calculateROAS(record.revenue, record.totalPayout),
      revenuePerRupee: revenuePerRupee(record),
    } satisfies Record<ScoreMetric, MetricValue>,
  }));

  const normalizerFor = (metric: ScoreMetric) => minMaxNormalizer(raw.map(r => r.values[metric]));
  const normalizers: Record<ScoreMetric, (value: MetricValue) => MetricValue> = {
    engagementRate: normalizerFor('engagementRate'),
    conversionRate: normalizerFor('conversionRate'),
    roas: normalizerFor('roas'),
    revenuePerRupee: normalizerFor('revenuePerRupee'),
  };

  const scored = raw.map(({ record, values }) => {
    const component = (metric: ScoreMetric): ScoreComponent => ({
      value: values[metric],
      normalized: normalizers[metric](values[metric]),
      weight: resolved[metric],
    });
    const components: Record<ScoreMetric, ScoreComponent> = {
      engagementRate: component('engagementRate'),
      conversionRate: component('conversionRate'),
      roas: component('roas'),
      revenuePerRupee: component('revenuePerRupee'),
    };

    let weighted = 0;
    let weightTotal = 0;
    for (const metric of SCORE_METRICS) {
      const { normalized, weight } = components[metric];
      if (normalized !== null) {
        weighted += weight * normalized;
        weightTotal += weight;
      }
    }

    // Undefined metrics drop out and the remaining weights are renormalised
    const composite = weightTotal > 0 ? (weighted / weightTotal) * 100 : null;

    return {
      rank: 0,
      influencerId: record.influencerId,
      name: record.name,
      category: record.category,
      platform: record.platform,
      revenue: record.revenue,
      score: composite,
      segment: scoreSegment(composite),
      components,
    };
  });

  scored.sort((a, b) => {
    if (a.score !== b.score) {
      if (a.score === null) return 1;
      if (b.score === null) return -1;
      return b.score - a.score;
    }
    return b.revenue - a.revenue || compareIds(a.influencerId, b.influencerId);
  });

  return scored.map((s, i) => ({ ...s, rank: i + 1 }));
}
