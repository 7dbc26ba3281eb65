/**
 * Typed record builders shared by the engine tests.
 */

import type { Influencer, Payout, Post, TrackingEvent } from '../src/schemas/datasets';
import type { UnifiedRecord } from '../src/services/data-joiner';

export function influencer(id: string, overrides: Partial<Influencer> = {}): Influencer {
  return {
    id,
    name: `Creator ${id}`,
    category: 'Fitness',
    gender: 'F',
    followerCount: 10000,
    platform: 'Instagram',
    rowIndex: 0,
    ...overrides,
  };
}

export function post(influencerId: string, overrides: Partial<Post> = {}): Post {
  return {
    influencerId,
    platform: 'Instagram',
    date: '2025-01-10',
    url: `https://example.test/p/${influencerId}`,
    caption: 'New drop',
    reach: 1000,
    likes: 50,
    comments: 10,
    rowIndex: 0,
    ...overrides,
  };
}

export function event(influencerId: string, overrides: Partial<TrackingEvent> = {}): TrackingEvent {
  return {
    source: 'Instagram',
    campaign: 'spring',
    influencerId,
    userId: 'u1',
    product: 'Whey',
    date: '2025-01-10',
    orders: 1,
    revenue: 100,
    rowIndex: 0,
    ...overrides,
  };
}

export function payout(influencerId: string, overrides: Partial<Payout> = {}): Payout {
  return {
    influencerId,
    basis: 'post',
    totalPayout: 500,
    rate: undefined,
    orders: undefined,
    rowIndex: 0,
    ...overrides,
  };
}

export function record(influencerId: string, overrides: Partial<UnifiedRecord> = {}): UnifiedRecord {
  return {
    influencerId,
    name: `Creator ${influencerId}`,
    category: 'Fitness',
    gender: 'F',
    platform: 'Instagram',
    followerCount: 10000,
    postCount: 1,
    reach: 1000,
    likes: 50,
    comments: 10,
    eventCount: 1,
    orders: 10,
    revenue: 1500,
    campaigns: ['spring'],
    campaignCount: 1,
    campaignBreakdown: [{ campaign: 'spring', events: 1, orders: 10, revenue: 1500 }],
    payoutCount: 1,
    totalPayout: 500,
    payoutBasis: 'post',
    ...overrides,
  };
}
