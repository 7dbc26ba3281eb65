/**
 * Multi-Touch Attribution Models
 *
 * Pure functions for splitting conversion credit across the tracked events
 * in a user's journey. Each model produces one weight per event; weights in
 * a journey sum to 1. An event is credited with its own revenue and orders
 * scaled by its weight.
 */

import { z } from "zod";
import { DEFAULT_TIME_DECAY_HALF_LIFE_DAYS, MS_PER_DAY } from "../config/analytics";
import type { TrackingEvent } from "../schemas/datasets";
import { ConfigurationError } from "./errors";

// ===== Types =====

export const ATTRIBUTION_MODELS = [
  'first_touch',
  'last_touch',
  'linear',
  'time_decay',
] as const;

export type AttributionModel = typeof ATTRIBUTION_MODELS[number];

export const AttributionModelSchema = z.enum(ATTRIBUTION_MODELS);

export interface Journey {
  userId: string;
  events: TrackingEvent[];  // time-ordered, ties by upload order
}

export interface AttributionOptions {
  halfLifeDays?: number;
}

export interface AttributionResult {
  userId: string;
  influencerId: string;
  campaign: string;
  source: string;
  date: string;
  rowIndex: number;
  position: number;    // 1-based position in the journey
  pathLength: number;
  weight: number;      // 0-1, sums to 1 across the journey
  attributedRevenue: number;
  attributedOrders: number;
}

export interface InfluencerAttribution {
  influencerId: string;
  touchpoints: number;
  journeys: number;
  attributedRevenue: number;
  attributedOrders: number;
}

export interface CampaignAttribution {
  influencerId: string;
  campaign: string;
  touchpoints: number;
  attributedRevenue: number;
  attributedOrders: number;
}

// ===== Configuration =====

/**
 * Resolve a model name supplied by a caller. Unknown names are a
 * configuration error, not a silent fallback to another model.
 */
export function parseAttributionModel(name: string): AttributionModel {
  const parsed = AttributionModelSchema.safeParse(name);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Unknown attribution model "${name}". Expected one of: ${ATTRIBUTION_MODELS.join(', ')}`
    );
  }
  return parsed.data;
}

export function resolveHalfLife(halfLifeDays: number | undefined): number {
  const value = halfLifeDays ?? DEFAULT_TIME_DECAY_HALF_LIFE_DAYS;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`halfLifeDays must be a positive number, got ${value}`);
  }
  return value;
}

// ===== Journeys =====

function eventTime(event: TrackingEvent): number {
  return Date.parse(event.date);
}

/**
 * Group events by user and order each journey by time. Events with the
 * same timestamp keep their upload order so results are reproducible.
 * Journeys come back in order of each user's first appearance.
 */
export function buildJourneys(events: readonly TrackingEvent[]): Map<string, Journey> {
  const journeys = new Map<string, Journey>();

  for (const event of events) {
    let journey = journeys.get(event.userId);
    if (!journey) {
      journey = { userId: event.userId, events: [] };
      journeys.set(event.userId, journey);
    }
    journey.events.push(event);
  }

  for (const journey of journeys.values()) {
    journey.events.sort((a, b) => eventTime(a) - eventTime(b) || a.rowIndex - b.rowIndex);
  }

  return journeys;
}

// ===== Attribution Model Functions =====

/**
 * First-Touch Attribution
 * 100% credit to the earliest event
 */
export function firstTouchWeights(count: number): number[] {
  return Array.from({ length: count }, (_, i) => (i === 0 ? 1 : 0));
}

/**
 * Last-Touch Attribution
 * 100% credit to the latest event
 */
export function lastTouchWeights(count: number): number[] {
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? 1 : 0));
}

/**
 * Linear Attribution
 * Equal credit to all events
 */
export function linearWeights(count: number): number[] {
  return Array.from({ length: count }, () => 1 / count);
}

/**
 * Time-Decay Attribution
 * More credit to events closer to the end of the journey.
 * Raw weight is 2^(-days/halfLife), days counted back from the journey's
 * last event, then normalised to sum to 1.
 *
 * @param ordered - Journey events, already time-ordered
 * @param halfLifeDays - Days for weight to decay by 50% (default: 7)
 */
export function timeDecayWeights(
  ordered: readonly TrackingEvent[],
  halfLifeDays: number = DEFAULT_TIME_DECAY_HALF_LIFE_DAYS
): number[] {
  if (ordered.length === 0) return [];

  const lastTime = eventTime(ordered[ordered.length - 1]);

  // At 0 days weight = 1, at halfLife days weight = 0.5
  const raw = ordered.map(event => {
    const daysBeforeLast = (lastTime - eventTime(event)) / MS_PER_DAY;
    return Math.pow(2, -daysBeforeLast / halfLifeDays);
  });

  const total = raw.reduce((sum, w) => sum + w, 0);
  return raw.map(w => w / total);
}

export function journeyWeights(
  journey: Journey,
  model: AttributionModel,
  halfLifeDays: number = DEFAULT_TIME_DECAY_HALF_LIFE_DAYS
): number[] {
  const n = journey.events.length;
  if (n === 0) return [];
  // Every model degenerates to full credit for a single event
  if (n === 1) return [1];

  switch (model) {
    case 'first_touch':
      return firstTouchWeights(n);
    case 'last_touch':
      return lastTouchWeights(n);
    case 'linear':
      return linearWeights(n);
    case 'time_decay':
      return timeDecayWeights(journey.events, halfLifeDays);
  }
}

/**
 * Attribute every journey under the chosen model.
 *
 * Model and half-life are checked before any journey is touched.
 */
export function attribute(
  journeysByUser: ReadonlyMap<string, Journey>,
  model: AttributionModel,
  options: AttributionOptions = {}
): AttributionResult[] {
  const resolvedModel = parseAttributionModel(model);
  const halfLifeDays = resolveHalfLife(options.halfLifeDays);

  const results: AttributionResult[] = [];

  for (const journey of journeysByUser.values()) {
    const weights = journeyWeights(journey, resolvedModel, halfLifeDays);
    journey.events.forEach((event, i) => {
      results.push({
        userId: journey.userId,
        influencerId: event.influencerId,
        campaign: event.campaign,
        source: event.source,
        date: event.date,
        rowIndex: event.rowIndex,
        position: i + 1,
        pathLength: journey.events.length,
        weight: weights[i],
        attributedRevenue: weights[i] * event.revenue,
        attributedOrders: weights[i] * event.orders,
      });
    });
  }

  return results;
}

// ===== Aggregation =====

/**
 * Sum touchpoint credit per influencer, sorted by attributed revenue
 * (highest first), then influencer id.
 */
export function aggregateAttributionByInfluencer(
  results: readonly AttributionResult[]
): InfluencerAttribution[] {
  const byInfluencer = new Map<string, {
    touchpoints: number;
    users: Set<string>;
    attributedRevenue: number;
    attributedOrders: number;
  }>();

  for (const r of results) {
    let entry = byInfluencer.get(r.influencerId);
    if (!entry) {
      entry = { touchpoints: 0, users: new Set(), attributedRevenue: 0, attributedOrders: 0 };
      byInfluencer.set(r.influencerId, entry);
    }
    entry.touchpoints++;
    entry.users.add(r.userId);
    entry.attributedRevenue += r.attributedRevenue;
    entry.attributedOrders += r.attributedOrders;
  }

  return Array.from(byInfluencer.entries())
    .map(([influencerId, e]) => ({
      influencerId,
      touchpoints: e.touchpoints,
      journeys: e.users.size,
      attributedRevenue: e.attributedRevenue,
      attributedOrders: e.attributedOrders,
    }))
    .sort((a, b) =>
      b.attributedRevenue - a.attributedRevenue ||
      (a.influencerId < b.influencerId ? -1 : a.influencerId > b.influencerId ? 1 : 0)
    );
}

export function aggregateAttributionByCampaign(
  results: readonly AttributionResult[]
): CampaignAttribution[] {
  const byKey = new Map<string, CampaignAttribution>();

  for (const r of results) {
    const key = `${r.influencerId}|${r.campaign}`;
    let entry = byKey.get(key);
    if (!entry) {
      entry = {
        influencerId: r.influencerId,
        campaign: r.campaign,
        touchpoints: 0,
        attributedRevenue: 0,
        attributedOrders: 0,
      };
      byKey.set(key, entry);
    }
    entry.touchpoints++;
    entry.attributedRevenue += r.attributedRevenue;
    entry.attributedOrders += r.attributedOrders;
  }

  return Array.from(byKey.values());
}
