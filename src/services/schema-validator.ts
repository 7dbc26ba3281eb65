/**
 * Schema Validator
 *
 * Checks an uploaded table against its dataset's column contract and turns
 * conforming rows into typed records. Tolerant by default: bad rows are
 * dropped and reported, good rows are kept. Strict mode rejects the whole
 * table on the first violation.
 */

import { z } from "zod";
import {
  DATASET_KINDS,
  DATASET_KIND_ALIASES,
  MAX_REPORTED_ROWS,
  type DatasetKind,
} from "../config/analytics";
import {
  COLUMN_CONTRACTS,
  InfluencerRowSchema,
  PayoutRowSchema,
  PostRowSchema,
  TrackingRowSchema,
  isBlank,
  type ColumnContract,
  type ColumnType,
  type Influencer,
  type Payout,
  type Post,
  type RawRow,
  type RawTable,
  type SourceRow,
  type TrackingEvent,
} from "../schemas/datasets";
import { ConfigurationError } from "./errors";

// =============================================================================
// Types
// =============================================================================

export type ViolationProblem =
  | 'missing_column'
  | 'missing_value'
  | 'invalid_type'
  | 'out_of_range'
  | 'invalid_enum'
  | 'invalid_date';

export interface Violation {
  column: string;
  problem: ViolationProblem;
  message: string;
  rowIndices: number[];  // capped at MAX_REPORTED_ROWS
  totalRows: number;
}

export interface ValidationOptions {
  strict?: boolean;
}

export interface ValidationOutcome<T> {
  ok: boolean;
  strict: boolean;
  rows: T[];
  rowCount: number;
  validRowCount: number;
  rejectedRowCount: number;
  violations: Violation[];
}

export type ValidationResult =
  | ({ kind: 'influencers' } & ValidationOutcome<Influencer>)
  | ({ kind: 'posts' } & ValidationOutcome<Post>)
  | ({ kind: 'tracking' } & ValidationOutcome<TrackingEvent>)
  | ({ kind: 'payouts' } & ValidationOutcome<Payout>);

// =============================================================================
// Kind resolution
// =============================================================================

const DatasetKindSchema = z.enum(DATASET_KINDS);

export function resolveDatasetKind(name: string): DatasetKind {
  const key = name.trim().toLowerCase();
  const parsed = DatasetKindSchema.safeParse(DATASET_KIND_ALIASES[key] ?? key);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Unknown dataset kind "${name}". Expected one of: ${DATASET_KINDS.join(', ')}`
    );
  }
  return parsed.data;
}

// =============================================================================
// Validation
// =============================================================================

export function validate(kind: 'influencers', table: RawTable, options?: ValidationOptions): Extract<ValidationResult, { kind: 'influencers' }>;
export function validate(kind: 'posts', table: RawTable, options?: ValidationOptions): Extract<ValidationResult, { kind: 'posts' }>;
export function validate(kind: 'tracking', table: RawTable, options?: ValidationOptions): Extract<ValidationResult, { kind: 'tracking' }>;
export function validate(kind: 'payouts', table: RawTable, options?: ValidationOptions): Extract<ValidationResult, { kind: 'payouts' }>;
export function validate(kind: DatasetKind, table: RawTable, options?: ValidationOptions): ValidationResult;
export function validate(kind: DatasetKind, table: RawTable, options: ValidationOptions = {}): ValidationResult {
  switch (kind) {
    case 'influencers':
      return { kind, ...runValidation(InfluencerRowSchema, COLUMN_CONTRACTS.influencers, table, options) };
    case 'posts':
      return { kind, ...runValidation(PostRowSchema, COLUMN_CONTRACTS.posts, table, options) };
    case 'tracking':
      return { kind, ...runValidation(TrackingRowSchema, COLUMN_CONTRACTS.tracking, table, options) };
    case 'payouts':
      return { kind, ...runValidation(PayoutRowSchema, COLUMN_CONTRACTS.payouts, table, options) };
  }
}

/**
 * Lower-cases and trims every header so `ID`, ` Url ` and `url` all match
 * the contract's `id` / `url`. Columns outside the contract are dropped.
 */
function canonicalizeRow(row: RawRow, columns: ReadonlySet<string>): RawRow {
  const out: RawRow = {};
  for (const [key, value] of Object.entries(row)) {
    const name = key.trim().toLowerCase();
    if (columns.has(name) && !(name in out)) {
      out[name] = value;
    }
  }
  return out;
}

function classifyIssue(issue: z.ZodIssue, type: ColumnType, value: unknown): ViolationProblem {
  if (isBlank(value)) return 'missing_value';
  if (type === 'date') return 'invalid_date';
  if (issue.code === z.ZodIssueCode.too_small) return 'out_of_range';
  if (issue.code === z.ZodIssueCode.invalid_value) return 'invalid_enum';
  return 'invalid_type';
}

const PROBLEM_MESSAGES: Record<ViolationProblem, string> = {
  missing_column: 'Required column is missing',
  missing_value: 'Required value is empty',
  invalid_type: 'Value has the wrong type',
  out_of_range: 'Value is out of range',
  invalid_enum: 'Value is not one of the allowed options',
  invalid_date: 'Value is not a valid date',
};

const EXPECTED_TYPE: Record<ColumnType, string> = {
  id: 'identifier',
  string: 'string',
  text: 'string',
  integer: 'non-negative integer',
  decimal: 'non-negative decimal',
  date: 'date (YYYY-MM-DD or ISO 8601)',
  basis: 'post | order',
};

function runValidation<S extends z.ZodType<object>>(
  schema: S,
  contract: ColumnContract,
  table: RawTable,
  options: ValidationOptions
): ValidationOutcome<z.output<S> & SourceRow> {
  const strict = options.strict ?? false;
  const columnTypes: Record<string, ColumnType> = { ...contract.optional, ...contract.required };
  const knownColumns = new Set(Object.keys(columnTypes));

  const canonical = table.map(row => canonicalizeRow(row, knownColumns));

  // Offending rows per (column, problem), in first-seen order
  const offenders = new Map<string, { column: string; problem: ViolationProblem; rows: number[] }>();
  const flag = (column: string, problem: ViolationProblem, rowIndex: number) => {
    const key = `${column}|${problem}`;
    let entry = offenders.get(key);
    if (!entry) {
      entry = { column, problem, rows: [] };
      offenders.set(key, entry);
    }
    if (entry.rows[entry.rows.length - 1] !== rowIndex) {
      entry.rows.push(rowIndex);
    }
  };

  // A column absent from every row is a table-level violation
  const missingColumns = new Set<string>();
  if (canonical.length > 0) {
    const present = new Set(canonical.flatMap(row => Object.keys(row)));
    for (const column of Object.keys(contract.required)) {
      if (!present.has(column)) {
        missingColumns.add(column);
        canonical.forEach((_, i) => flag(column, 'missing_column', i));
      }
    }
  }

  const rows: Array<z.output<S> & SourceRow> = [];

  if (missingColumns.size === 0) {
    canonical.forEach((row, rowIndex) => {
      const parsed = schema.safeParse(row);
      if (parsed.success) {
        rows.push({ ...parsed.data, rowIndex });
        return;
      }
      for (const issue of parsed.error.issues) {
        const column = String(issue.path[0] ?? '');
        const type = columnTypes[column] ?? 'string';
        flag(column, classifyIssue(issue, type, row[column]), rowIndex);
      }
    });
  }

  const violations: Violation[] = Array.from(offenders.values()).map(({ column, problem, rows: rowIndices }) => ({
    column,
    problem,
    message: problem === 'missing_column'
      ? `${PROBLEM_MESSAGES[problem]}: ${column}`
      : `${PROBLEM_MESSAGES[problem]} in ${column} (expected ${EXPECTED_TYPE[columnTypes[column] ?? 'string']})`,
    rowIndices: rowIndices.slice(0, MAX_REPORTED_ROWS),
    totalRows: rowIndices.length,
  }));

  const ok = violations.length === 0;
  const kept = strict && !ok ? [] : rows;

  return {
    ok,
    strict,
    rows: kept,
    rowCount: table.length,
    validRowCount: kept.length,
    rejectedRowCount: table.length - kept.length,
    violations,
  };
}
