/**
 * Analytics Engine
 *
 * The four entry points the presentation layer calls: load a dataset,
 * build the filtered unified view, run attribution with ROI, and score
 * influencers. Every call recomputes from its inputs.
 */

import { z } from "zod";
import type { DatasetKind } from "../config/analytics";
import type { Influencer, Payout, Post, RawTable, TrackingEvent } from "../schemas/datasets";
import {
  attribute,
  buildJourneys,
  parseAttributionModel,
  resolveHalfLife,
  type AttributionOptions,
} from "./attribution-models";
import type { DatasetBundle } from "./campaign-insights";
import { join, type JoinResult } from "./data-joiner";
import { ConfigurationError, SchemaRejectedError } from "./errors";
import { resolveScoreWeights, score, type ScoreResult } from "./influencer-scorer";
import type { MetricValue } from "./metrics";
import { computeROIReport, parseBaselineConfig, type ROIReport } from "./roi";
import {
  resolveDatasetKind,
  validate,
  type ValidationOptions,
  type ValidationResult,
  type Violation,
} from "./schema-validator";

// =============================================================================
// Loading
// =============================================================================

export function validateAndLoad(
  kind: string,
  rawTable: RawTable,
  options: ValidationOptions = {}
): ValidationResult {
  return validate(resolveDatasetKind(kind), rawTable, options);
}

/**
 * Throws when a strict load rejected the table. Tolerant results pass
 * through untouched.
 */
export function assertLoaded<T extends ValidationResult>(result: T): T {
  if (result.strict && !result.ok) {
    throw new SchemaRejectedError(result.kind, result.violations);
  }
  return result;
}

export interface ValidationReport {
  kind: DatasetKind;
  ok: boolean;
  rowCount: number;
  validRowCount: number;
  rejectedRowCount: number;
  violations: Violation[];
}

export function toValidationReport(result: ValidationResult): ValidationReport {
  return {
    kind: result.kind,
    ok: result.ok,
    rowCount: result.rowCount,
    validRowCount: result.validRowCount,
    rejectedRowCount: result.rejectedRowCount,
    violations: result.violations,
  };
}

export type RawDatasetBundle = Partial<Record<DatasetKind, RawTable>>;

export interface LoadedBundle {
  datasets: DatasetBundle;
  validation: Record<DatasetKind, ValidationReport>;
}

/**
 * Validate all four tables in tolerant mode. A missing table loads as
 * empty.
 */
export function loadDatasetBundle(raw: RawDatasetBundle): LoadedBundle {
  const influencers = validate('influencers', raw.influencers ?? []);
  const posts = validate('posts', raw.posts ?? []);
  const tracking = validate('tracking', raw.tracking ?? []);
  const payouts = validate('payouts', raw.payouts ?? []);

  return {
    datasets: {
      influencers: influencers.rows,
      posts: posts.rows,
      tracking: tracking.rows,
      payouts: payouts.rows,
    },
    validation: {
      influencers: toValidationReport(influencers),
      posts: toValidationReport(posts),
      tracking: toValidationReport(tracking),
      payouts: toValidationReport(payouts),
    },
  };
}

// =============================================================================
// Filters
// =============================================================================

const DayString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const UnifiedFiltersSchema = z.object({
  dateRange: z.object({
    start: DayString.optional(),
    end: DayString.optional(),
  }).strict().optional(),
  platforms: z.array(z.string().min(1)).optional(),
  categories: z.array(z.string().min(1)).optional(),
  campaigns: z.array(z.string().min(1)).optional(),
}).strict();

export type UnifiedFilters = z.infer<typeof UnifiedFiltersSchema>;

export function parseFilters(input: unknown): UnifiedFilters {
  const parsed = UnifiedFiltersSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationError('Invalid filters', parsed.error.issues);
  }
  const { start, end } = parsed.data.dateRange ?? {};
  if (start !== undefined && end !== undefined && start > end) {
    throw new ConfigurationError(`dateRange start ${start} is after end ${end}`);
  }
  return parsed.data;
}

/** Case-insensitive membership test; an absent list admits everything. */
function matcher(allowed: readonly string[] | undefined): (value: string) => boolean {
  if (allowed === undefined) return () => true;
  const set = new Set(allowed.map(v => v.trim().toLowerCase()));
  return value => set.has(value.trim().toLowerCase());
}

function dateMatcher(range: UnifiedFilters['dateRange']): (date: string) => boolean {
  const start = range?.start;
  const end = range?.end;
  return date => {
    const day = date.slice(0, 10);
    return (start === undefined || day >= start) && (end === undefined || day <= end);
  };
}

// =============================================================================
// Unified view
// =============================================================================

export interface UnifiedView extends JoinResult {
  posts: Post[];
  payouts: Payout[];
  filters: UnifiedFilters;
}

/**
 * Join the datasets under the given filters.
 *
 * Post and event filters run before the join; influencer filters run
 * after it, so orphans are always resolved against the full influencer
 * set. Events, posts and payouts of filtered-out influencers are dropped
 * from the view.
 */
export function buildUnifiedView(
  influencers: readonly Influencer[],
  posts: readonly Post[],
  tracking: readonly TrackingEvent[],
  payouts: readonly Payout[],
  filters: UnifiedFilters = {}
): UnifiedView {
  const resolved = parseFilters(filters);
  const inRange = dateMatcher(resolved.dateRange);
  const onPlatform = matcher(resolved.platforms);
  const inCategory = matcher(resolved.categories);
  const inCampaign = matcher(resolved.campaigns);

  const scopedPosts = posts.filter(p => inRange(p.date) && onPlatform(p.platform));
  const scopedEvents = tracking.filter(e =>
    inRange(e.date) && onPlatform(e.source) && inCampaign(e.campaign)
  );

  const joined = join(influencers, scopedPosts, scopedEvents, payouts);

  const records = joined.records.filter(r => inCategory(r.category) && onPlatform(r.platform));
  const kept = new Set(records.map(r => r.influencerId));

  return {
    records,
    events: joined.events.filter(e => kept.has(e.influencerId)),
    posts: scopedPosts.filter(p => kept.has(p.influencerId)),
    payouts: payouts.filter(p => kept.has(p.influencerId)),
    orphans: joined.orphans,
    duplicateInfluencerIds: joined.duplicateInfluencerIds,
    filters: resolved,
  };
}

// =============================================================================
// Attribution, ROI & scoring
// =============================================================================

/**
 * Attribute the view's events under `model` and compute ROI per
 * influencer. Model, half-life and baseline are all checked before any
 * journey is built.
 */
export function computeAttributionAndROI(
  view: Pick<UnifiedView, 'records' | 'events'>,
  model: string,
  baselineConfig?: unknown,
  options: AttributionOptions = {}
): ROIReport {
  const resolvedModel = parseAttributionModel(model);
  const halfLifeDays = resolveHalfLife(options.halfLifeDays);
  const baseline = parseBaselineConfig(baselineConfig);

  const attribution = attribute(buildJourneys(view.events), resolvedModel, { halfLifeDays });
  return computeROIReport(view.records, attribution, resolvedModel, baseline);
}

/**
 * Score the view's influencers. With an ROI report, ROAS is taken from
 * attributed revenue; without one, from tracked revenue.
 */
export function scoreInfluencers(
  view: Pick<UnifiedView, 'records'>,
  weights?: unknown,
  roiReport?: ROIReport
): ScoreResult[] {
  const resolved = resolveScoreWeights(weights);
  const roas = roiReport
    ? new Map<string, MetricValue>(roiReport.results.map(r => [r.influencerId, r.roas]))
    : undefined;
  return score(view.records, resolved, roas);
}
