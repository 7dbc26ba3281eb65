/**
 * Metrics Calculator
 *
 * Ratio metrics over a unified record. A metric whose denominator is zero
 * is `null`, never 0.
 */

import type { UnifiedRecord } from "./data-joiner";

export type MetricValue = number | null;

export interface PerformanceMetrics {
  engagementRate: MetricValue;
  /** orders / reach. Click data is not collected, so reach stands in for the funnel top. */
  conversionRate: MetricValue;
  cpa: MetricValue;
  cpm: MetricValue;
  revenuePerRupee: MetricValue;
  averageOrderValue: MetricValue;
}

/** The fields the ratio metrics read. */
export type MetricInputs = Pick<
  UnifiedRecord,
  'reach' | 'likes' | 'comments' | 'orders' | 'revenue' | 'totalPayout'
>;

function ratio(numerator: number, denominator: number): MetricValue {
  if (denominator <= 0) return null;
  const value = numerator / denominator;
  return Number.isFinite(value) ? value : null;
}

export function engagementRate(r: MetricInputs): MetricValue {
  return ratio(r.likes + r.comments, r.reach);
}

export function conversionRate(r: MetricInputs): MetricValue {
  return ratio(r.orders, r.reach);
}

export function costPerAcquisition(r: MetricInputs): MetricValue {
  return ratio(r.totalPayout, r.orders);
}

export function costPerMille(r: MetricInputs): MetricValue {
  const perImpression = ratio(r.totalPayout, r.reach);
  return perImpression === null ? null : perImpression * 1000;
}

export function revenuePerRupee(r: MetricInputs): MetricValue {
  return ratio(r.revenue, r.totalPayout);
}

export function averageOrderValue(r: MetricInputs): MetricValue {
  return ratio(r.revenue, r.orders);
}

export function computeMetrics(r: MetricInputs): PerformanceMetrics {
  return {
    engagementRate: engagementRate(r),
    conversionRate: conversionRate(r),
    cpa: costPerAcquisition(r),
    cpm: costPerMille(r),
    revenuePerRupee: revenuePerRupee(r),
    averageOrderValue: averageOrderValue(r),
  };
}

/**
 * Sum a set of records into one totals row, so the ratio functions above
 * give portfolio-level figures (ratio of sums, not mean of ratios).
 */
export function aggregateRecords(records: readonly MetricInputs[]): MetricInputs {
  return records.reduce<MetricInputs>(
    (acc, r) => ({
      reach: acc.reach + r.reach,
      likes: acc.likes + r.likes,
      comments: acc.comments + r.comments,
      orders: acc.orders + r.orders,
      revenue: acc.revenue + r.revenue,
      totalPayout: acc.totalPayout + r.totalPayout,
    }),
    { reach: 0, likes: 0, comments: 0, orders: 0, revenue: 0, totalPayout: 0 }
  );
}
