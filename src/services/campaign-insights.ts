/**
 * Campaign Insights
 *
 * Dataset-level views the dashboard shows next to the ROI figures: upload
 * totals, cross-dataset integrity checks, per-platform efficiency, revenue
 * over time and payout-basis comparison.
 */

import type { Influencer, Payout, Post, TrackingEvent } from "../schemas/datasets";
import type { UnifiedRecord } from "./data-joiner";
import { calculateROI } from "./roi";
import { averageOrderValue, type MetricValue } from "./metrics";

// =============================================================================
// Types
// =============================================================================

export interface DatasetBundle {
  influencers: Influencer[];
  posts: Post[];
  tracking: TrackingEvent[];
  payouts: Payout[];
}

export interface DatasetSummary {
  influencers: number;
  posts: number;
  events: number;
  payouts: number;
  totalReach: number;
  totalOrders: number;
  totalRevenue: number;
  totalPayout: number;
}

export interface IntegrityReport {
  issues: string[];
  warnings: string[];
}

export interface PlatformPerformance {
  platform: string;
  reach: number;
  likes: number;
  comments: number;
  orders: number;
  revenue: number;
  engagementRate: MetricValue;
  conversionRate: MetricValue;
  revenuePerImpression: MetricValue;
}

export type TimeSeriesPeriod = 'daily' | 'weekly' | 'monthly';

export interface TimeSeriesPoint {
  period: string;
  orders: number;
  revenue: number;
  averageOrderValue: MetricValue;
}

export interface PayoutBasisRow {
  basis: string;
  influencers: number;
  totalPayout: number;
  payoutOrders: number;
  revenue: number;
  roi: MetricValue;
}

// =============================================================================
// Summary & integrity
// =============================================================================

export function summarizeDatasets(data: DatasetBundle): DatasetSummary {
  return {
    influencers: data.influencers.length,
    posts: data.posts.length,
    events: data.tracking.length,
    payouts: data.payouts.length,
    totalReach: data.posts.reduce((sum, p) => sum + p.reach, 0),
    totalOrders: data.tracking.reduce((sum, e) => sum + e.orders, 0),
    totalRevenue: data.tracking.reduce((sum, e) => sum + e.revenue, 0),
    totalPayout: data.payouts.reduce((sum, p) => sum + p.totalPayout, 0),
  };
}

function sortedIds(ids: Iterable<string>): string[] {
  return Array.from(ids).sort();
}

export function checkDataIntegrity(data: DatasetBundle): IntegrityReport {
  const known = new Set(data.influencers.map(i => i.id));
  const postIds = new Set(data.posts.map(p => p.influencerId));
  const trackingIds = new Set(data.tracking.map(e => e.influencerId));
  const payoutIds = new Set(data.payouts.map(p => p.influencerId));

  const unknown = (ids: Set<string>) => sortedIds(Array.from(ids).filter(id => !known.has(id)));

  const issues: string[] = [];
  const missingInPosts = unknown(postIds);
  const missingInTracking = unknown(trackingIds);
  const missingInPayouts = unknown(payoutIds);

  if (missingInPosts.length > 0) {
    issues.push(`Posts reference non-existent influencer IDs: ${missingInPosts.join(', ')}`);
  }
  if (missingInTracking.length > 0) {
    issues.push(`Tracking data references non-existent influencer IDs: ${missingInTracking.join(', ')}`);
  }
  if (missingInPayouts.length > 0) {
    issues.push(`Payouts reference non-existent influencer IDs: ${missingInPayouts.join(', ')}`);
  }

  const warnings: string[] = [];
  const postsWithoutTracking = sortedIds(Array.from(postIds).filter(id => known.has(id) && !trackingIds.has(id)));
  const trackingWithoutPayout = sortedIds(Array.from(trackingIds).filter(id => known.has(id) && !payoutIds.has(id)));

  if (postsWithoutTracking.length > 0) {
    warnings.push(`Influencers with posts but no tracking data: ${postsWithoutTracking.join(', ')}`);
  }
  if (trackingWithoutPayout.length > 0) {
    warnings.push(`Influencers with tracking data but no payout information: ${trackingWithoutPayout.join(', ')}`);
  }

  return { issues, warnings };
}

// =============================================================================
// Platform performance
// =============================================================================

/**
 * Post metrics grouped by post platform, merged with tracking metrics
 * grouped by event source. Platform names match case-insensitively and
 * keep the spelling seen first.
 */
export function platformPerformance(
  posts: readonly Post[],
  events: readonly TrackingEvent[]
): PlatformPerformance[] {
  const byPlatform = new Map<string, { platform: string; reach: number; likes: number; comments: number; orders: number; revenue: number }>();

  const entry = (platform: string) => {
    const key = platform.toLowerCase();
    let row = byPlatform.get(key);
    if (!row) {
      row = { platform, reach: 0, likes: 0, comments: 0, orders: 0, revenue: 0 };
      byPlatform.set(key, row);
    }
    return row;
  };

  for (const post of posts) {
    const row = entry(post.platform);
    row.reach += post.reach;
    row.likes += post.likes;
    row.comments += post.comments;
  }
  for (const event of events) {
    const row = entry(event.source);
    row.orders += event.orders;
    row.revenue += event.revenue;
  }

  return Array.from(byPlatform.values())
    .map(row => ({
      ...row,
      engagementRate: row.reach > 0 ? (row.likes + row.comments) / row.reach : null,
      conversionRate: row.reach > 0 ? row.orders / row.reach : null,
      revenuePerImpression: row.reach > 0 ? row.revenue / row.reach : null,
    }))
    .sort((a, b) => b.revenue - a.revenue || (a.platform < b.platform ? -1 : a.platform > b.platform ? 1 : 0));
}

// =============================================================================
// Time series
// =============================================================================

/**
 * Bucket label for a date: `YYYY-MM-DD` (daily), the Monday starting the
 * ISO week (weekly), or `YYYY-MM` (monthly). Computed in UTC.
 */
export function periodKey(date: string, period: TimeSeriesPeriod): string {
  const day = new Date(Date.parse(date));
  const iso = day.toISOString();
  switch (period) {
    case 'daily':
      return iso.slice(0, 10);
    case 'monthly':
      return iso.slice(0, 7);
    case 'weekly': {
      const offset = (day.getUTCDay() + 6) % 7;  // days since Monday
      const monday = new Date(Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate() - offset));
      return monday.toISOString().slice(0, 10);
    }
  }
}

export function timeSeries(
  events: readonly TrackingEvent[],
  period: TimeSeriesPeriod = 'daily'
): TimeSeriesPoint[] {
  const buckets = new Map<string, { orders: number; revenue: number }>();

  for (const event of events) {
    const key = periodKey(event.date, period);
    const bucket = buckets.get(key) ?? { orders: 0, revenue: 0 };
    bucket.orders += event.orders;
    bucket.revenue += event.revenue;
    buckets.set(key, bucket);
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, bucket]) => ({
      period: key,
      orders: bucket.orders,
      revenue: bucket.revenue,
      averageOrderValue: averageOrderValue({ ...bucket, reach: 0, likes: 0, comments: 0, totalPayout: 0 }),
    }));
}

// =============================================================================
// Payout basis
// =============================================================================

/**
 * Per-post against per-order payouts. Revenue comes from the joined
 * records, so only influencers in the current view contribute.
 */
export function payoutBasisSummary(
  payouts: readonly Payout[],
  records: readonly UnifiedRecord[]
): PayoutBasisRow[] {
  const inView = new Map(records.map(r => [r.influencerId, r]));
  const byBasis = new Map<string, { influencers: Set<string>; totalPayout: number; payoutOrders: number; revenue: number }>();

  for (const payout of payouts) {
    const record = inView.get(payout.influencerId);
    if (!record) continue;

    let row = byBasis.get(payout.basis);
    if (!row) {
      row = { influencers: new Set(), totalPayout: 0, payoutOrders: 0, revenue: 0 };
      byBasis.set(payout.basis, row);
    }
    row.totalPayout += payout.totalPayout;
    row.payoutOrders += payout.orders ?? 0;
    if (!row.influencers.has(record.influencerId)) {
      row.influencers.add(record.influencerId);
      row.revenue += record.revenue;
    }
  }

  return Array.from(byBasis.entries())
    .map(([basis, row]) => ({
      basis,
      influencers: row.influencers.size,
      totalPayout: row.totalPayout,
      payoutOrders: row.payoutOrders,
      revenue: row.revenue,
      roi: calculateROI(row.revenue, row.totalPayout),
    }))
    .sort((a, b) => (a.basis < b.basis ? -1 : a.basis > b.basis ? 1 : 0));
}
