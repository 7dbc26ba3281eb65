import { describe, it, expect } from 'vitest';
import {
  aggregateRecords,
  averageOrderValue,
  computeMetrics,
  conversionRate,
  costPerAcquisition,
  costPerMille,
  engagementRate,
  revenuePerRupee,
} from '../src/services/metrics';
import { record } from './fixtures';

describe('metrics', () => {
  it('computes engagement as (likes + comments) / reach', () => {
    expect(engagementRate(record('a', { reach: 1000, likes: 50, comments: 10 }))).toBeCloseTo(0.06, 12);
  });

  it('computes every ratio for a populated record', () => {
    const metrics = computeMetrics(record('a', { reach: 2000, likes: 100, comments: 20, orders: 10, revenue: 1500, totalPayout: 500 }));
    expect(metrics.engagementRate).toBeCloseTo(0.06, 12);
    expect(metrics.conversionRate).toBeCloseTo(0.005, 12);
    expect(metrics.cpa).toBe(50);
    expect(metrics.cpm).toBe(250);
    expect(metrics.revenuePerRupee).toBe(3);
    expect(metrics.averageOrderValue).toBe(150);
  });

  it('returns null rather than 0 for zero denominators', () => {
    const empty = record('a', { reach: 0, likes: 0, comments: 0, orders: 0, revenue: 0, totalPayout: 0 });
    expect(engagementRate(empty)).toBeNull();
    expect(conversionRate(empty)).toBeNull();
    expect(costPerAcquisition(empty)).toBeNull();
    expect(costPerMille(empty)).toBeNull();
    expect(revenuePerRupee(empty)).toBeNull();
    expect(averageOrderValue(empty)).toBeNull();
  });

  it('keeps a zero numerator as 0', () => {
    expect(revenuePerRupee(record('a', { revenue: 0, totalPayout: 500 }))).toBe(0);
  });

  it('aggregates as a ratio of sums', () => {
    const totals = aggregateRecords([
      record('a', { reach: 1000, likes: 100, comments: 0 }),
      record('b', { reach: 3000, likes: 20, comments: 0 }),
    ]);
    expect(totals.reach).toBe(4000);
    expect(engagementRate(totals)).toBeCloseTo(0.03, 12);
  });

  it('aggregates an empty set to zeros', () => {
    expect(aggregateRecords([])).toEqual({ reach: 0, likes: 0, comments: 0, orders: 0, revenue: 0, totalPayout: 0 });
  });
});
