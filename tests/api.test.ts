/**
 * API Endpoint Tests
 *
 * Tests cover:
 * - Health endpoint and OpenAPI document
 * - Dataset validation (tolerant and strict)
 * - Analytics endpoints on a small campaign
 * - Error envelope, content type, body limit, request id and CORS
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { createApp } from '../src/index';
import { loadConfig } from '../src/config/env';
import { setLogLevel } from '../src/utils/structured-logger';

const app = createApp(loadConfig({ NODE_ENV: 'test' }));

beforeAll(() => {
  setLogLevel('CRITICAL');
});

function post(path: string, body: unknown, headers: Record<string, string> = {}) {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

// Two creators; u1 sees both before buying, u2 only the second
const datasets = {
  influencers: [
    { id: 'inf1', name: 'Asha', category: 'Fitness', gender: 'F', follower_count: 12000, platform: 'Instagram' },
    { id: 'inf2', name: 'Ravi', category: 'Tech', gender: 'M', follower_count: '50000', platform: 'YouTube' },
  ],
  posts: [
    { influencer_id: 'inf1', platform: 'Instagram', date: '2025-01-05', url: 'https://example.test/p/1', caption: 'Launch', reach: 1000, likes: 80, comments: 20 },
    { influencer_id: 'inf2', platform: 'YouTube', date: '2025-01-06', url: '', caption: '', reach: 4000, likes: 100, comments: 20 },
  ],
  tracking: [
    { source: 'Instagram', campaign: 'launch', influencer_id: 'inf1', user_id: 'u1', product: 'Whey', date: '2025-01-06', orders: 1, revenue: 600 },
    { source: 'YouTube', campaign: 'launch', influencer_id: 'inf2', user_id: 'u1', product: 'Whey', date: '2025-01-08', orders: 1, revenue: 400 },
    { source: 'YouTube', campaign: 'launch', influencer_id: 'inf2', user_id: 'u2', product: 'Bar', date: '2025-01-09', orders: 2, revenue: 500 },
  ],
  payouts: [
    { influencer_id: 'inf1', basis: 'post', total_payout: 500 },
    { influencer_id: 'inf2', basis: 'order', total_payout: 300, rate: 100, orders: 3 },
  ],
};

describe('Health Endpoint', () => {
  it('should return healthy status', async () => {
    const response = await app.request('/v1/health');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      success: true,
      data: {
        status: 'healthy',
        service: 'influencer-campaign-analytics',
        attribution_models: ['first_touch', 'last_touch', 'linear', 'time_decay'],
      },
    });
  });

  it('should set security headers', async () => {
    const response = await app.request('/v1/health');
    expect(response.headers.get('X-Content-Type-Options')).toBe('nosniff');
    expect(response.headers.get('X-Frame-Options')).toBe('DENY');
  });
});

describe('OpenAPI', () => {
  it('should serve the OpenAPI document', async () => {
    const response = await app.request('/openapi.json');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      info: { title: 'Influencer Campaign Analytics API' },
      paths: {
        '/v1/health': expect.anything(),
        '/v1/datasets/validate': expect.anything(),
        '/v1/analytics/attribution': expect.anything(),
        '/v1/analytics/scores': expect.anything(),
      },
    });
  });
});

describe('Dataset validation', () => {
  const rows = [
    { influencer_id: 'inf1', basis: 'Post', total_payout: '500' },
    { influencer_id: 'inf2', basis: 'hourly', total_payout: 10 },
  ];

  it('should drop and report invalid rows in tolerant mode', async () => {
    const response = await post('/v1/datasets/validate', { kind: 'payouts', rows });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      success: true,
      data: {
        kind: 'payouts',
        ok: false,
        rowCount: 2,
        validRowCount: 1,
        rejectedRowCount: 1,
        violations: [{ column: 'basis', problem: 'invalid_enum', rowIndices: [1], totalRows: 1 }],
        rows: [{ influencerId: 'inf1', basis: 'post', totalPayout: 500, rowIndex: 0 }],
      },
    });
  });

  it('should reject the table in strict mode', async () => {
    const response = await post('/v1/datasets/validate', { kind: 'payouts', rows, strict: true });

    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({
      success: false,
      error: {
        code: 'SCHEMA_VIOLATION',
        message: 'payouts dataset rejected: 1 schema violation(s)',
      },
    });
  });

  it('should reject an unknown dataset kind', async () => {
    const response = await post('/v1/datasets/validate', { kind: 'clicks', rows: [] });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ success: false, error: { code: 'CONFIGURATION_ERROR' } });
  });

  it('should reject a body without rows with the error envelope', async () => {
    const response = await post('/v1/datasets/validate', { kind: 'payouts' });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Invalid request data' },
      meta: { request_id: expect.any(String) },
    });
  });

  it('should reject a malformed filter set with the error envelope', async () => {
    const response = await post('/v1/analytics/unified-view', { datasets, filters: { region: ['EU'] } });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ success: false, error: { code: 'VALIDATION_ERROR' } });
  });
});

describe('Analytics', () => {
  it('should build the unified view under filters', async () => {
    const response = await post('/v1/analytics/unified-view', { datasets, filters: { platforms: ['youtube'] } });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      success: true,
      data: {
        records: [{ influencerId: 'inf2', reach: 4000, orders: 3, revenue: 900, totalPayout: 300, payoutBasis: 'order' }],
        totals: { influencers: 1, revenue: 900 },
      },
      meta: { orphans: { total: 0 } },
    });
  });

  it('should report dropped rows in meta', async () => {
    const response = await post('/v1/analytics/unified-view', {
      datasets: { ...datasets, posts: [...datasets.posts, { ...datasets.posts[0], reach: -5 }] },
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      meta: { validation: { posts: { ok: false, rowCount: 3, rejectedRowCount: 1 } } },
    });
  });

  it('should attribute revenue and compute ROI', async () => {
    const response = await post('/v1/analytics/attribution', { datasets, model: 'last_touch' });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      success: true,
      data: {
        model: 'last_touch',
        results: expect.arrayContaining([
          expect.objectContaining({ influencerId: 'inf1', attributedRevenue: 0, roi: -1, roas: 0, tier: 'Low' }),
          expect.objectContaining({ influencerId: 'inf2', attributedRevenue: 900, roi: 2, roas: 3, tier: 'High' }),
        ]),
        summary: { totalRevenue: 900, totalCost: 800, baselineMethod: 'none' },
      },
    });
  });

  it('should reject an unknown attribution model', async () => {
    const response = await post('/v1/analytics/attribution', { datasets, model: 'position_based' });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ success: false, error: { code: 'CONFIGURATION_ERROR' } });
  });

  it('should reject a reversed date range', async () => {
    const response = await post('/v1/analytics/attribution', {
      datasets,
      model: 'linear',
      filters: { dateRange: { start: '2025-02-01', end: '2025-01-01' } },
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { code: 'CONFIGURATION_ERROR' } });
  });

  it('should score and rank influencers', async () => {
    const response = await post('/v1/analytics/scores', {
      datasets,
      weights: { engagementRate: 1, conversionRate: 0, roas: 0, revenuePerRupee: 0 },
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      data: {
        model: null,
        weights: { engagementRate: 1, conversionRate: 0, roas: 0, revenuePerRupee: 0 },
        results: [
          { rank: 1, influencerId: 'inf1', score: 100, segment: 'High' },
          { rank: 2, influencerId: 'inf2', score: 0, segment: 'Low' },
        ],
      },
    });
  });

  it('should reject negative score weights', async () => {
    const response = await post('/v1/analytics/scores', { datasets, weights: { roas: -1 } });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { code: 'CONFIGURATION_ERROR' } });
  });

  it('should reject a bad half-life on scores even without a model', async () => {
    const response = await post('/v1/analytics/scores', { datasets, halfLifeDays: -1 });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ success: false, error: { code: 'CONFIGURATION_ERROR' } });
  });

  it('should build the campaign overview', async () => {
    const response = await post('/v1/analytics/overview', { datasets, period: 'monthly' });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      data: {
        summary: { influencers: 2, posts: 2, events: 3, payouts: 2, totalReach: 5000, totalOrders: 4, totalRevenue: 1500, totalPayout: 800 },
        integrity: { issues: [], warnings: [] },
        timeSeries: [{ period: '2025-01', orders: 4, revenue: 1500, averageOrderValue: 375 }],
        payoutBasis: [
          { basis: 'order', influencers: 1, totalPayout: 300, payoutOrders: 3, revenue: 900, roi: 2 },
          { basis: 'post', influencers: 1, totalPayout: 500, payoutOrders: 0, revenue: 600, roi: 0.2 },
        ],
      },
      meta: { period: 'monthly' },
    });
  });
});

describe('Request handling', () => {
  it('should require a Content-Type on POST', async () => {
    const response = await app.request('/v1/analytics/overview', { method: 'POST' });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { code: 'INVALID_CONTENT_TYPE' } });
  });

  it('should reject non-JSON bodies', async () => {
    const response = await app.request('/v1/analytics/overview', {
      method: 'POST',
      headers: { 'Content-Type': 'text/csv' },
      body: 'id,name',
    });
    expect(response.status).toBe(415);
  });

  it('should reject bodies over the configured limit', async () => {
    const small = createApp(loadConfig({ NODE_ENV: 'test', MAX_BODY_BYTES: '64' }));
    const body = JSON.stringify({ datasets });
    const response = await small.request('/v1/analytics/overview', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'Content-Length': String(Buffer.byteLength(body)) },
      body,
    });

    expect(response.status).toBe(413);
    expect(await response.json()).toMatchObject({ error: { code: 'PAYLOAD_TOO_LARGE' } });
  });

  it('should return the error envelope for unknown routes', async () => {
    const response = await app.request('/v1/unknown');

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({
      success: false,
      error: { code: 'NOT_FOUND', message: 'No route for GET /v1/unknown' },
    });
  });

  it('should echo the caller request id', async () => {
    const response = await app.request('/v1/health', { headers: { 'X-Request-Id': 'req-test-1' } });

    expect(response.headers.get('X-Request-Id')).toBe('req-test-1');
    expect(await response.json()).toMatchObject({ meta: { request_id: 'req-test-1' } });
  });

  it('should allow configured CORS origins only', async () => {
    const allowed = await app.request('/v1/health', { headers: { Origin: 'http://localhost:5173' } });
    const denied = await app.request('/v1/health', { headers: { Origin: 'https://elsewhere.test' } });

    expect(allowed.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
    expect(denied.headers.get('Access-Control-Allow-Origin')).toBeNull();
  });
});
