/**
 * Analytics Engine Defaults
 *
 * Fixed thresholds and defaults used across the pipeline. Callers override
 * the tunable ones (half-life, score weights, baseline) per call; the tier
 * thresholds are part of the reporting contract and are not overridable.
 */

// =============================================================================
// Dataset kinds
// =============================================================================

export const DATASET_KINDS = [
  'influencers',
  'posts',
  'tracking',
  'payouts',
] as const;

export type DatasetKind = typeof DATASET_KINDS[number];

/**
 * Alternate upload names accepted for a dataset kind.
 */
export const DATASET_KIND_ALIASES: Readonly<Record<string, DatasetKind>> = {
  tracking_data: 'tracking',
};

/**
 * Violation reports list at most this many offending row indices per
 * (column, problem) pair. The full count is still reported.
 */
export const MAX_REPORTED_ROWS = 20;

// =============================================================================
// Attribution
// =============================================================================

export const DEFAULT_TIME_DECAY_HALF_LIFE_DAYS = 7;

export const MS_PER_DAY = 1000 * 60 * 60 * 24;

// =============================================================================
// ROI tiers
// =============================================================================

export const ROI_TIER_THRESHOLDS = {
  high: 2.0,   // roi >= 2.0
  medium: 0,   // 0 <= roi < 2.0
} as const;

// =============================================================================
// Influencer scoring
// =============================================================================

export const SCORE_METRICS = [
  'engagementRate',
  'conversionRate',
  'roas',
  'revenuePerRupee',
] as const;

export type ScoreMetric = typeof SCORE_METRICS[number];

export const DEFAULT_SCORE_WEIGHTS: Readonly<Record<ScoreMetric, number>> = Object.freeze({
  engagementRate: 0.25,
  conversionRate: 0.25,
  roas: 0.25,
  revenuePerRupee: 0.25,
});

export const SCORE_SEGMENT_THRESHOLDS = {
  high: 70,
  medium: 40,
} as const;

/**
 * Normalised value given to every influencer when a metric has no spread.
 */
export const FLAT_METRIC_NORMALIZED_VALUE = 0.5;
