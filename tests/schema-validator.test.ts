/**
 * Schema Validator Tests
 *
 * Column contracts, cell coercion, violation reporting, tolerant and
 * strict modes.
 */

import { describe, it, expect } from 'vitest';
import { resolveDatasetKind, validate } from '../src/services/schema-validator';
import { ConfigurationError } from '../src/services/errors';

function influencerRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'inf-1',
    name: 'Asha',
    category: 'Fitness',
    gender: 'F',
    follower_count: 12000,
    platform: 'Instagram',
    ...overrides,
  };
}

function postRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    influencer_id: 'inf-1',
    platform: 'Instagram',
    date: '2025-01-10',
    url: 'https://example.test/p/1',
    caption: 'Leg day',
    reach: 1000,
    likes: 50,
    comments: 10,
    ...overrides,
  };
}

// =============================================================================
// Dataset kinds
// =============================================================================

describe('resolveDatasetKind', () => {
  it('accepts canonical names case-insensitively', () => {
    expect(resolveDatasetKind('Posts ')).toBe('posts');
    expect(resolveDatasetKind('payouts')).toBe('payouts');
  });

  it('maps the tracking_data upload name to tracking', () => {
    expect(resolveDatasetKind('tracking_data')).toBe('tracking');
  });

  it('rejects unknown kinds', () => {
    expect(() => resolveDatasetKind('clicks')).toThrow(ConfigurationError);
  });
});

// =============================================================================
// Conforming tables
// =============================================================================

describe('validate: conforming rows', () => {
  it('normalises headers, ids and numeric strings', () => {
    const result = validate('influencers', [
      { ID: 1, ' Name ': 'Asha', category: 'Fitness', gender: 'F', follower_count: '1200', platform: 'Instagram' },
    ]);

    expect(result.ok).toBe(true);
    expect(result.rows).toEqual([
      { id: '1', name: 'Asha', category: 'Fitness', gender: 'F', followerCount: 1200, platform: 'Instagram', rowIndex: 0 },
    ]);
    expect(result.violations).toEqual([]);
  });

  it('drops columns outside the contract', () => {
    const result = validate('influencers', [influencerRow({ notes: 'vip' })]);
    expect(Object.keys(result.rows[0]).sort()).toEqual(
      ['category', 'followerCount', 'gender', 'id', 'name', 'platform', 'rowIndex']
    );
  });

  it('treats an empty table as valid', () => {
    const result = validate('tracking', []);
    expect(result).toMatchObject({ ok: true, rows: [], rowCount: 0, validRowCount: 0, rejectedRowCount: 0, violations: [] });
  });

  it('normalises timestamps to ISO and keeps plain dates', () => {
    const result = validate('posts', [
      postRow({ date: '2025-03-05T10:00:00Z' }),
      postRow({ date: '2025-03-06' }),
    ]);
    expect(result.rows.map(r => r.date)).toEqual(['2025-03-05T10:00:00.000Z', '2025-03-06']);
  });

  it('parses decimal revenue from strings', () => {
    const result = validate('tracking', [{
      source: 'Instagram',
      campaign: 'spring',
      influencer_id: 'inf-1',
      user_id: 42,
      product: 'Whey',
      date: '2025-01-10',
      orders: '2',
      revenue: '1499.50',
    }]);
    expect(result.rows[0]).toMatchObject({ userId: '42', orders: 2, revenue: 1499.5 });
  });

  it('accepts per-post / per_order basis spellings and optional columns', () => {
    const result = validate('payouts', [
      { influencer_id: 'inf-1', basis: 'per-post', total_payout: 500 },
      { influencer_id: 'inf-2', basis: 'Per_Order', total_payout: '750.25', rate: '25', orders: '30' },
    ]);
    expect(result.ok).toBe(true);
    expect(result.rows).toEqual([
      { influencerId: 'inf-1', basis: 'post', totalPayout: 500, rate: undefined, orders: undefined, rowIndex: 0 },
      { influencerId: 'inf-2', basis: 'order', totalPayout: 750.25, rate: 25, orders: 30, rowIndex: 1 },
    ]);
  });
});

// =============================================================================
// Violations
// =============================================================================

describe('validate: violations in tolerant mode', () => {
  it('drops a negative count and reports it as out_of_range', () => {
    const result = validate('influencers', [
      influencerRow(),
      influencerRow({ id: 'inf-2', follower_count: '-5' }),
    ]);

    expect(result.ok).toBe(false);
    expect(result.rows.map(r => r.id)).toEqual(['inf-1']);
    expect(result.validRowCount).toBe(1);
    expect(result.rejectedRowCount).toBe(1);
    expect(result.violations).toEqual([{
      column: 'follower_count',
      problem: 'out_of_range',
      message: 'Value is out of range in follower_count (expected non-negative integer)',
      rowIndices: [1],
      totalRows: 1,
    }]);
  });

  it('reports a fractional integer as invalid_type', () => {
    const result = validate('posts', [postRow({ reach: 2.5 })]);
    expect(result.violations[0]).toMatchObject({ column: 'reach', problem: 'invalid_type', rowIndices: [0] });
  });

  it('reports empty required values as missing_value', () => {
    const result = validate('posts', [postRow({ likes: '' }), postRow({ likes: null })]);
    expect(result.violations).toHaveLength(1);
    expect(result.violations[0]).toMatchObject({ column: 'likes', problem: 'missing_value', rowIndices: [0, 1], totalRows: 2 });
  });

  it('reports impossible and unparseable dates as invalid_date', () => {
    const result = validate('posts', [postRow({ date: '2025-02-30' }), postRow({ date: 'last tuesday' })]);
    expect(result.violations).toEqual([expect.objectContaining({
      column: 'date',
      problem: 'invalid_date',
      rowIndices: [0, 1],
    })]);
  });

  it('reports an unknown payout basis as invalid_enum', () => {
    const result = validate('payouts', [{ influencer_id: 'inf-1', basis: 'per-click', total_payout: 100 }]);
    expect(result.violations[0]).toMatchObject({ column: 'basis', problem: 'invalid_enum' });
  });

  it('rejects every row when a required column is absent', () => {
    const rows = [influencerRow(), influencerRow({ id: 'inf-2' })].map(({ platform: _platform, ...rest }) => rest);
    const result = validate('influencers', rows);

    expect(result.rows).toEqual([]);
    expect(result.violations).toEqual([{
      column: 'platform',
      problem: 'missing_column',
      message: 'Required column is missing: platform',
      rowIndices: [0, 1],
      totalRows: 2,
    }]);
  });

  it('caps reported row indices but keeps the full count', () => {
    const rows = Array.from({ length: 25 }, (_, i) => influencerRow({ id: `inf-${i}`, follower_count: 'lots' }));
    const result = validate('influencers', rows);

    expect(result.violations[0].rowIndices).toHaveLength(20);
    expect(result.violations[0].rowIndices[19]).toBe(19);
    expect(result.violations[0].totalRows).toBe(25);
  });
});

describe('validate: strict mode', () => {
  it('rejects the whole table on any violation', () => {
    const result = validate('influencers', [influencerRow(), influencerRow({ follower_count: -1 })], { strict: true });

    expect(result.ok).toBe(false);
    expect(result.strict).toBe(true);
    expect(result.rows).toEqual([]);
    expect(result.rejectedRowCount).toBe(2);
  });

  it('keeps every row of a clean table', () => {
    const result = validate('influencers', [influencerRow()], { strict: true });
    expect(result.ok).toBe(true);
    expect(result.rows).toHaveLength(1);
  });
});
