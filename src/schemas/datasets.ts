import { z } from "zod";

/**
 * Row Schemas for Uploaded Datasets
 *
 * One schema per dataset kind. Each takes a row keyed by the canonical
 * (lower-case) column name and produces the typed record the rest of the
 * pipeline works with. Cells may arrive as numbers or as strings from a
 * CSV parser; numeric IDs are normalised to their string form so that
 * `1` and `"1"` join.
 */

// ============================================================================
// Cell Schemas
// ============================================================================

export type ColumnType = 'id' | 'string' | 'text' | 'integer' | 'decimal' | 'date' | 'basis';

export function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

const numericString = z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number);
const numericCell = z.union([z.number(), numericString]);

const idCell = z.union([
  z.string().trim().min(1),
  z.number().finite(),
]).transform(String);

const stringCell = z.union([z.string(), z.number()]).transform(v => String(v).trim());

/** Free text (captions, URLs); blank is allowed. */
const textCell = z.union([z.string(), z.number()]).nullish().transform(v => (v == null ? '' : String(v).trim()));

const integerCell = numericCell.pipe(z.number().int().nonnegative());

const decimalCell = numericCell.pipe(z.number().finite().nonnegative());

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * `YYYY-MM-DD` stays as is (after a calendar check); any other parseable
 * timestamp is normalised to a full ISO string.
 */
const dateCell = z.union([z.string().trim(), z.date()]).transform((value, ctx) => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' });
      return z.NEVER;
    }
    return value.toISOString();
  }

  const dateOnly = DATE_ONLY.exec(value);
  if (dateOnly) {
    const [, y, m, d] = dateOnly;
    const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
    if (parsed.toISOString().slice(0, 10) !== value) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid calendar date: ${value}` });
      return z.NEVER;
    }
    return value;
  }

  const ts = Date.parse(value);
  if (Number.isNaN(ts)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable date: ${value}` });
    return z.NEVER;
  }
  return new Date(ts).toISOString();
});

export const PAYOUT_BASES = ['post', 'order'] as const;
export type PayoutBasis = typeof PAYOUT_BASES[number];

/** Accepts `post`, `order`, and the `per-post` / `per_order` spellings. */
const basisCell = z.string()
  .trim()
  .toLowerCase()
  .transform(v => v.replace(/^per[-_ ]/, ''))
  .pipe(z.enum(PAYOUT_BASES));

function optionalCell<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(v => (isBlank(v) ? undefined : v), schema.optional());
}

// ============================================================================
// Dataset Row Schemas
// ============================================================================

export const InfluencerColumns = z.object({
  id: idCell,
  name: stringCell,
  category: stringCell,
  gender: stringCell,
  follower_count: integerCell,
  platform: stringCell,
});

export const InfluencerRowSchema = InfluencerColumns.transform(r => ({
  id: r.id,
  name: r.name,
  category: r.category,
  gender: r.gender,
  followerCount: r.follower_count,
  platform: r.platform,
}));

export const PostColumns = z.object({
  influencer_id: idCell,
  platform: stringCell,
  date: dateCell,
  url: textCell,
  caption: textCell,
  reach: integerCell,
  likes: integerCell,
  comments: integerCell,
});

export const PostRowSchema = PostColumns.transform(r => ({
  influencerId: r.influencer_id,
  platform: r.platform,
  date: r.date,
  url: r.url,
  caption: r.caption,
  reach: r.reach,
  likes: r.likes,
  comments: r.comments,
}));

export const TrackingColumns = z.object({
  source: stringCell,
  campaign: stringCell,
  influencer_id: idCell,
  user_id: idCell,
  product: stringCell,
  date: dateCell,
  orders: integerCell,
  revenue: decimalCell,
});

export const TrackingRowSchema = TrackingColumns.transform(r => ({
  source: r.source,
  campaign: r.campaign,
  influencerId: r.influencer_id,
  userId: r.user_id,
  product: r.product,
  date: r.date,
  orders: r.orders,
  revenue: r.revenue,
}));

export const PayoutColumns = z.object({
  influencer_id: idCell,
  basis: basisCell,
  total_payout: decimalCell,
  rate: optionalCell(decimalCell),
  orders: optionalCell(integerCell),
});

export const PayoutRowSchema = PayoutColumns.transform(r => ({
  influencerId: r.influencer_id,
  basis: r.basis,
  totalPayout: r.total_payout,
  rate: r.rate,
  orders: r.orders,
}));

// ============================================================================
// Column Contracts
// ============================================================================

export interface ColumnContract {
  required: Readonly<Record<string, ColumnType>>;
  optional: Readonly<Record<string, ColumnType>>;
}

export const COLUMN_CONTRACTS = {
  influencers: {
    required: {
      id: 'id',
      name: 'string',
      category: 'string',
      gender: 'string',
      follower_count: 'integer',
      platform: 'string',
    },
    optional: {},
  },
  posts: {
    required: {
      influencer_id: 'id',
      platform: 'string',
      date: 'date',
      url: 'text',
      caption: 'text',
      reach: 'integer',
      likes: 'integer',
      comments: 'integer',
    },
    optional: {},
  },
  tracking: {
    required: {
      source: 'string',
      campaign: 'string',
      influencer_id: 'id',
      user_id: 'id',
      product: 'string',
      date: 'date',
      orders: 'integer',
      revenue: 'decimal',
    },
    optional: {},
  },
  payouts: {
    required: {
      influencer_id: 'id',
      basis: 'basis',
      total_payout: 'decimal',
    },
    optional: {
      rate: 'decimal',
      orders: 'integer',
    },
  },
} as const satisfies Record<'influencers' | 'posts' | 'tracking' | 'payouts', ColumnContract>;

// ============================================================================
// Record Types
// ============================================================================

/**
 * Position of the row in the uploaded table. Tracking events use it as the
 * tie-breaker for identical timestamps.
 */
export interface SourceRow {
  rowIndex: number;
}

export type Influencer = z.output<typeof InfluencerRowSchema> & SourceRow;
export type Post = z.output<typeof PostRowSchema> & SourceRow;
export type TrackingEvent = z.output<typeof TrackingRowSchema> & SourceRow;
export type Payout = z.output<typeof PayoutRowSchema> & SourceRow;

export type RawRow = Record<string, unknown>;
export type RawTable = readonly RawRow[];
