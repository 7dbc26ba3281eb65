/**
 * ROI / ROAS Calculator
 *
 * Compares attributed revenue with payout cost per influencer, and rolls
 * the results up by platform and by campaign.
 *
 * Incremental ROAS nets out a baseline revenue estimate. The baseline is a
 * heuristic supplied or configured by the caller (a fixed figure, or an
 * organic conversion rate applied to reach), not a measured causal effect,
 * and every result says which method produced it.
 */

import { z } from "zod";
import { ROI_TIER_THRESHOLDS } from "../config/analytics";
import {
  aggregateAttributionByCampaign,
  aggregateAttributionByInfluencer,
  type AttributionModel,
  type AttributionResult,
} from "./attribution-models";
import type { UnifiedRecord } from "./data-joiner";
import { ConfigurationError } from "./errors";
import type { MetricValue } from "./metrics";

// =============================================================================
// Types
// =============================================================================

export type RoiTier = 'High' | 'Medium' | 'Low' | 'Insufficient data';

export const ROI_TIERS: readonly RoiTier[] = ['High', 'Medium', 'Low', 'Insufficient data'];

export const IncrementalBaselineConfigSchema = z.discriminatedUnion('method', [
  z.object({
    method: z.literal('none'),
  }),
  z.object({
    method: z.literal('fixed'),
    revenueByInfluencer: z.record(z.string(), z.number().finite().nonnegative()).optional(),
    defaultRevenue: z.number().finite().nonnegative().optional(),
  }),
  z.object({
    method: z.literal('organic_rate'),
    organicConversionRate: z.number().finite().min(0).max(1),
    averageOrderValue: z.number().finite().nonnegative(),
  }),
]);

export type IncrementalBaselineConfig = z.infer<typeof IncrementalBaselineConfigSchema>;
export type BaselineMethod = IncrementalBaselineConfig['method'];

export interface ROIResult {
  influencerId: string;
  name: string;
  category: string;
  platform: string;
  campaigns: string[];
  payoutBasis: UnifiedRecord['payoutBasis'];
  totalPayout: number;
  trackedRevenue: number;
  attributedRevenue: number;
  attributedOrders: number;
  baselineRevenue: number;
  baselineMethod: BaselineMethod;
  baselineIsEstimate: boolean;
  roi: MetricValue;
  roas: MetricValue;
  incrementalRoas: MetricValue;
  tier: RoiTier;
}

export interface RollupRow {
  key: string;
  influencerCount: number;
  totalPayout: number;
  attributedRevenue: number;
  attributedOrders: number;
  roi: MetricValue;
  roas: MetricValue;
}

export interface PortfolioSummary {
  totalRevenue: number;
  totalCost: number;
  profit: number;
  roi: MetricValue;
  roas: MetricValue;
  estimatedBaselineRevenue: number;
  incrementalRevenue: number;
  incrementalRoas: MetricValue;
  incrementalShare: MetricValue;
  baselineMethod: BaselineMethod;
}

export interface ROIReport {
  model: AttributionModel;
  results: ROIResult[];
  byPlatform: RollupRow[];
  byCategory: RollupRow[];
  byCampaign: RollupRow[];
  tiers: Record<RoiTier, number>;
  summary: PortfolioSummary;
}

// =============================================================================
// Core formulas
// =============================================================================

function perCost(value: number, cost: number): MetricValue {
  if (cost <= 0) return null;
  const result = value / cost;
  return Number.isFinite(result) ? result : null;
}

export function calculateROI(revenue: number, cost: number): MetricValue {
  return perCost(revenue - cost, cost);
}

export function calculateROAS(revenue: number, cost: number): MetricValue {
  return perCost(revenue, cost);
}

export function roiTier(roi: MetricValue): RoiTier {
  if (roi === null) return 'Insufficient data';
  if (roi >= ROI_TIER_THRESHOLDS.high) return 'High';
  if (roi >= ROI_TIER_THRESHOLDS.medium) return 'Medium';
  return 'Low';
}

export interface ComputeROIExtras {
  attributedOrders?: number;
  baselineMethod?: BaselineMethod;
}

export function computeROI(
  record: UnifiedRecord,
  attributedRevenue: number,
  incrementalBaselineRevenue: number = 0,
  extras: ComputeROIExtras = {}
): ROIResult {
  const cost = record.totalPayout;
  const roi = calculateROI(attributedRevenue, cost);
  const baselineMethod = extras.baselineMethod ?? (incrementalBaselineRevenue > 0 ? 'fixed' : 'none');

  return {
    influencerId: record.influencerId,
    name: record.name,
    category: record.category,
    platform: record.platform,
    campaigns: record.campaigns,
    payoutBasis: record.payoutBasis,
    totalPayout: cost,
    trackedRevenue: record.revenue,
    attributedRevenue,
    attributedOrders: extras.attributedOrders ?? 0,
    baselineRevenue: incrementalBaselineRevenue,
    baselineMethod,
    baselineIsEstimate: baselineMethod !== 'none',
    roi,
    roas: calculateROAS(attributedRevenue, cost),
    incrementalRoas: perCost(attributedRevenue - incrementalBaselineRevenue, cost),
    tier: roiTier(roi),
  };
}

// =============================================================================
// Baseline
// =============================================================================

export function parseBaselineConfig(input: unknown): IncrementalBaselineConfig {
  if (input === undefined) return { method: 'none' };
  const parsed = IncrementalBaselineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid incremental baseline configuration', parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Revenue the influencer's audience is estimated to have produced anyway.
 */
export function estimateBaselineRevenue(
  record: UnifiedRecord,
  config: IncrementalBaselineConfig
): number {
  switch (config.method) {
    case 'none':
      return 0;
    case 'fixed':
      return config.revenueByInfluencer?.[record.influencerId] ?? config.defaultRevenue ?? 0;
    case 'organic_rate':
      return record.reach * config.organicConversionRate * config.averageOrderValue;
  }
}

// =============================================================================
// Report
// =============================================================================

interface RollupAccumulator {
  influencers: Set<string>;
  totalPayout: number;
  attributedRevenue: number;
  attributedOrders: number;
}

function accumulate(
  map: Map<string, RollupAccumulator>,
  key: string,
  influencerId: string,
  payout: number,
  revenue: number,
  orders: number
): void {
  let acc = map.get(key);
  if (!acc) {
    acc = { influencers: new Set(), totalPayout: 0, attributedRevenue: 0, attributedOrders: 0 };
    map.set(key, acc);
  }
  acc.influencers.add(influencerId);
  acc.totalPayout += payout;
  acc.attributedRevenue += revenue;
  acc.attributedOrders += orders;
}

function toRollupRows(map: Map<string, RollupAccumulator>): RollupRow[] {
  return Array.from(map.entries())
    .map(([key, acc]) => ({
      key,
      influencerCount: acc.influencers.size,
      totalPayout: acc.totalPayout,
      attributedRevenue: acc.attributedRevenue,
      attributedOrders: acc.attributedOrders,
      roi: calculateROI(acc.attributedRevenue, acc.totalPayout),
      roas: calculateROAS(acc.attributedRevenue, acc.totalPayout),
    }))
    .sort((a, b) => b.attributedRevenue - a.attributedRevenue || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/**
 * Per-influencer ROI plus platform, category and campaign rollups.
 *
 * Payouts have no campaign key, so an influencer's payout is split across
 * the campaigns they touched in proportion to the revenue attributed to
 * each, or equally when none was attributed.
 */
export function computeROIReport(
  records: readonly UnifiedRecord[],
  attribution: readonly AttributionResult[],
  model: AttributionModel,
  baselineConfig: IncrementalBaselineConfig = { method: 'none' }
): ROIReport {
  const creditByInfluencer = new Map(
    aggregateAttributionByInfluencer(attribution).map(a => [a.influencerId, a])
  );
  const creditByCampaign = new Map<string, { revenue: number; orders: number }>();
  for (const c of aggregateAttributionByCampaign(attribution)) {
    creditByCampaign.set(`${c.influencerId}|${c.campaign}`, {
      revenue: c.attributedRevenue,
      orders: c.attributedOrders,
    });
  }

  const results: ROIResult[] = [];
  const byPlatform = new Map<string, RollupAccumulator>();
  const byCategory = new Map<string, RollupAccumulator>();
  const byCampaign = new Map<string, RollupAccumulator>();

  for (const record of records) {
    const credit = creditByInfluencer.get(record.influencerId);
    const revenue = credit?.attributedRevenue ?? 0;
    const orders = credit?.attributedOrders ?? 0;

    results.push(computeROI(record, revenue, estimateBaselineRevenue(record, baselineConfig), {
      attributedOrders: orders,
      baselineMethod: baselineConfig.method,
    }));

    accumulate(byPlatform, record.platform, record.influencerId, record.totalPayout, revenue, orders);
    accumulate(byCategory, record.category, record.influencerId, record.totalPayout, revenue, orders);

    for (const campaign of record.campaigns) {
      const share = creditByCampaign.get(`${record.influencerId}|${campaign}`) ?? { revenue: 0, orders: 0 };
      const costShare = revenue > 0
        ? record.totalPayout * (share.revenue / revenue)
        : record.totalPayout / record.campaigns.length;
      accumulate(byCampaign, campaign, record.influencerId, costShare, share.revenue, share.orders);
    }
  }

  const tiers: Record<RoiTier, number> = { 'High': 0, 'Medium': 0, 'Low': 0, 'Insufficient data': 0 };
  for (const r of results) tiers[r.tier]++;

  return {
    model,
    results,
    byPlatform: toRollupRows(byPlatform),
    byCategory: toRollupRows(byCategory),
    byCampaign: toRollupRows(byCampaign),
    tiers,
    summary: summarizePortfolio(results, baselineConfig.method),
  };
}

/**
 * Portfolio totals. Incremental revenue is floored at zero here; the
 * per-influencer incremental ROAS is not.
 */
export function summarizePortfolio(
  results: readonly ROIResult[],
  baselineMethod: BaselineMethod
): PortfolioSummary {
  const totalRevenue = results.reduce((sum, r) => sum + r.attributedRevenue, 0);
  const totalCost = results.reduce((sum, r) => sum + r.totalPayout, 0);
  const baseline = results.reduce((sum, r) => sum + r.baselineRevenue, 0);
  const incrementalRevenue = Math.max(0, totalRevenue - baseline);

  return {
    totalRevenue,
    totalCost,
    profit: totalRevenue - totalCost,
    roi: calculateROI(totalRevenue, totalCost),
    roas: calculateROAS(totalRevenue, totalCost),
    estimatedBaselineRevenue: baseline,
    incrementalRevenue,
    incrementalRoas: perCost(incrementalRevenue, totalCost),
    incrementalShare: totalRevenue > 0 ? incrementalRevenue / totalRevenue : null,
    baselineMethod,
  };
}
