/**
 * Data Joiner
 *
 * Joins the four datasets into one analysis-ready record per influencer.
 * Posts and payouts carry no campaign key, so campaign activity is kept as
 * a per-record breakdown rather than as separate rows.
 *
 * Rows pointing at an unknown influencer are dropped and counted as
 * orphans. Real exports routinely carry stale IDs, so this is never fatal.
 */

import type { Influencer, Payout, PayoutBasis, Post, TrackingEvent } from "../schemas/datasets";

// =============================================================================
// Types
// =============================================================================

export interface CampaignActivity {
  campaign: string;
  events: number;
  orders: number;
  revenue: number;
}

export interface UnifiedRecord {
  influencerId: string;
  name: string;
  category: string;
  gender: string;
  platform: string;
  followerCount: number;

  // Post aggregates
  postCount: number;
  reach: number;
  likes: number;
  comments: number;

  // Tracking aggregates
  eventCount: number;
  orders: number;
  revenue: number;
  campaigns: string[];
  campaignCount: number;
  campaignBreakdown: CampaignActivity[];

  // Payout
  payoutCount: number;
  totalPayout: number;
  payoutBasis: PayoutBasis | 'mixed' | null;
}

export interface OrphanReport {
  posts: number;
  tracking: number;
  payouts: number;
  total: number;
  influencerIds: string[];  // distinct unknown IDs, sorted
}

export interface JoinResult {
  records: UnifiedRecord[];
  events: TrackingEvent[];  // resolved events, upload order
  orphans: OrphanReport;
  duplicateInfluencerIds: string[];
}

// =============================================================================
// Join
// =============================================================================

function emptyRecord(influencer: Influencer): UnifiedRecord {
  return {
    influencerId: influencer.id,
    name: influencer.name,
    category: influencer.category,
    gender: influencer.gender,
    platform: influencer.platform,
    followerCount: influencer.followerCount,
    postCount: 0,
    reach: 0,
    likes: 0,
    comments: 0,
    eventCount: 0,
    orders: 0,
    revenue: 0,
    campaigns: [],
    campaignCount: 0,
    campaignBreakdown: [],
    payoutCount: 0,
    totalPayout: 0,
    payoutBasis: null,
  };
}

export function join(
  influencers: readonly Influencer[],
  posts: readonly Post[],
  tracking: readonly TrackingEvent[],
  payouts: readonly Payout[]
): JoinResult {
  const byId = new Map<string, UnifiedRecord>();
  const duplicates = new Set<string>();

  for (const influencer of influencers) {
    if (byId.has(influencer.id)) {
      duplicates.add(influencer.id);
      continue;
    }
    byId.set(influencer.id, emptyRecord(influencer));
  }

  const orphanIds = new Set<string>();
  const orphans = { posts: 0, tracking: 0, payouts: 0 };

  for (const post of posts) {
    const record = byId.get(post.influencerId);
    if (!record) {
      orphans.posts++;
      orphanIds.add(post.influencerId);
      continue;
    }
    record.postCount++;
    record.reach += post.reach;
    record.likes += post.likes;
    record.comments += post.comments;
  }

  const campaignsById = new Map<string, Map<string, CampaignActivity>>();
  const events: TrackingEvent[] = [];

  for (const event of tracking) {
    const record = byId.get(event.influencerId);
    if (!record) {
      orphans.tracking++;
      orphanIds.add(event.influencerId);
      continue;
    }
    events.push(event);
    record.eventCount++;
    record.orders += event.orders;
    record.revenue += event.revenue;

    let campaigns = campaignsById.get(record.influencerId);
    if (!campaigns) {
      campaigns = new Map();
      campaignsById.set(record.influencerId, campaigns);
    }
    let activity = campaigns.get(event.campaign);
    if (!activity) {
      activity = { campaign: event.campaign, events: 0, orders: 0, revenue: 0 };
      campaigns.set(event.campaign, activity);
    }
    activity.events++;
    activity.orders += event.orders;
    activity.revenue += event.revenue;
  }

  for (const [influencerId, campaigns] of campaignsById) {
    const record = byId.get(influencerId);
    if (!record) continue;
    record.campaignBreakdown = Array.from(campaigns.values())
      .sort((a, b) => (a.campaign < b.campaign ? -1 : a.campaign > b.campaign ? 1 : 0));
    record.campaigns = record.campaignBreakdown.map(a => a.campaign);
    record.campaignCount = record.campaigns.length;
  }

  for (const payout of payouts) {
    const record = byId.get(payout.influencerId);
    if (!record) {
      orphans.payouts++;
      orphanIds.add(payout.influencerId);
      continue;
    }
    record.payoutCount++;
    record.totalPayout += payout.totalPayout;
    record.payoutBasis = record.payoutBasis === null || record.payoutBasis === payout.basis
      ? payout.basis
      : 'mixed';
  }

  return {
    records: Array.from(byId.values()),
    events,
    orphans: {
      ...orphans,
      total: orphans.posts + orphans.tracking + orphans.payouts,
      influencerIds: Array.from(orphanIds).sort(),
    },
    duplicateInfluencerIds: Array.from(duplicates).sort(),
  };
}
