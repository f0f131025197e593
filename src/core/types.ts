/**
 * Health ETL Core Types
 *
 * Record, key and enum types shared by acquisition, transformation and
 * distribution. Every table is keyed by COUNTRY × AGE × SEX × YEAR.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

// ============================================================================
// Key Domains
// ============================================================================

/**
 * Survey age groups (years)
 */
export const AGES = [11, 13, 15] as const;

export type Age = (typeof AGES)[number];

/**
 * Survey sex categories
 */
export const SEXES = ['MALE', 'FEMALE'] as const;

export type Sex = (typeof SEXES)[number];

/**
 * Composite key columns, in output order
 */
export const KEY_COLUMNS = ['COUNTRY', 'AGE', 'SEX', 'YEAR'] as const;

export type KeyColumn = (typeof KEY_COLUMNS)[number];

/**
 * Measure domain (percent of children)
 */
export const MEASURE_MIN = 0;
export const MEASURE_MAX = 100;

export function isAge(value: number | null): value is Age {
  return value !== null && (AGES as readonly number[]).includes(value);
}

export function isSex(value: string | null): value is Sex {
  return value !== null && (SEXES as readonly string[]).includes(value);
}

// ============================================================================
// Rows and Records
// ============================================================================

/**
 * Key fields as loaded, before any invariant has been checked
 */
export interface KeyedRow {
  readonly COUNTRY: string | null;
  readonly AGE: number | null;
  readonly SEX: string | null;
  readonly YEAR: number | null;
}

/**
 * One row of a raw extract after type normalization
 */
export interface LoadedRow extends KeyedRow {
  /** Measure value; null when the extract has no estimate */
  readonly VALUE: number | null;
}

/**
 * Validated composite key
 */
export interface CompositeKey {
  readonly COUNTRY: string;
  readonly AGE: Age;
  readonly SEX: Sex;
  readonly YEAR: number;
}

export interface ActivityRecord extends CompositeKey {
  /** Percent meeting the physical-activity guideline */
  readonly ACTIVITY_VAL: number | null;
}

export interface ObesityRecord extends CompositeKey {
  /** Percent overweight, obesity included */
  readonly OBESITY_VAL: number | null;
}

export interface CuratedRecord extends CompositeKey {
  readonly ACTIVITY_VAL: number | null;
  readonly OBESITY_VAL: number | null;
  /** ACTIVITY_VAL − OBESITY_VAL, in percentage points */
  readonly GAP_pp: number | null;
}

// ============================================================================
// Column Layouts
// ============================================================================

export const ACTIVITY_COLUMNS = [...KEY_COLUMNS, 'ACTIVITY_VAL'] as const;
export const OBESITY_COLUMNS = [...KEY_COLUMNS, 'OBESITY_VAL'] as const;
export const CURATED_COLUMNS = [
  ...KEY_COLUMNS,
  'ACTIVITY_VAL',
  'OBESITY_VAL',
  'GAP_pp',
] as const;

/**
 * Table names used in diagnostics
 */
export type TableName = 'activity' | 'obesity' | 'curated';

// ============================================================================
// Check Outcomes
// ============================================================================

export type CheckRule =
  | 'non-empty'
  | 'key-not-null'
  | 'key-domain'
  | 'key-unique'
  | 'measure-range'
  | 'gap-consistency'
  | 'cardinality'
  | 'activity-coverage';

export type CheckStatus = 'pass' | 'fail' | 'warn';

/**
 * Outcome of one rule on one table
 */
export interface TableCheck {
  readonly table: string;
  readonly rule: CheckRule;
  /** Measure column, for measure-range checks */
  readonly column?: string;
  readonly status: CheckStatus;
  readonly message: string;
  /** Offending rows (or keys) */
  readonly violations: number;
  /** Up to five offending keys */
  readonly sampleKeys: readonly string[];
}

/**
 * Row counts per table at the point a run stopped or finished
 */
export type TableCounts = Readonly<Partial<Record<TableName, number>>>;

// ============================================================================
// Key Helpers
// ============================================================================

/**
 * Format a key as COUNTRY/AGE/SEX/YEAR (also used as the join key)
 */
export function formatKey(row: KeyedRow): string {
  return [row.COUNTRY, row.AGE, row.SEX, row.YEAR]
    .map((part) => (part === null ? '<null>' : String(part)))
    .join('/');
}

/**
 * Narrow a loaded row to a validated key, or null if any field is out of domain
 */
export function toCompositeKey(row: KeyedRow): CompositeKey | null {
  const { COUNTRY, AGE, SEX, YEAR } = row;
  if (COUNTRY === null || YEAR === null || !isAge(AGE) || !isSex(SEX)) {
    return null;
  }
  return { COUNTRY, AGE, SEX, YEAR };
}
