/**
 * Table Invariant Checks
 *
 * Columnar passes over an in-memory table. Each rule yields one TableCheck;
 * the pipeline turns failing checks into a DataQualityError.
 * Rows are never dropped or clamped here.
 *
 * RULES:
 * - non-empty: the table has at least one row
 * - key-not-null: COUNTRY, AGE, SEX, YEAR present on every row
 * - key-domain: AGE in {11,13,15}, SEX in {MALE,FEMALE}
 * - key-unique: no two rows share COUNTRY/AGE/SEX/YEAR
 * - measure-range: measures, where present, inside their domain
 * - gap-consistency: GAP_pp equals ACTIVITY_VAL − OBESITY_VAL (curated only)
 * - cardinality: curated rows ≤ min(activity rows, obesity rows)
 * - activity-coverage: every activity key also present in obesity (warn only)
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { DataQualityError } from '../core/errors.js';
import {
  MEASURE_MAX,
  MEASURE_MIN,
  formatKey,
  isAge,
  isSex,
  toCompositeKey,
} from '../core/types.js';
import type {
  CheckRule,
  CheckStatus,
  CompositeKey,
  CuratedRecord,
  KeyedRow,
  LoadedRow,
  TableCheck,
  TableCounts,
} from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

export type { CheckRule, CheckStatus, TableCheck } from '../core/types.js';

/**
 * Range rule for one numeric column
 */
export interface MeasureRule<T> {
  readonly column: string;
  readonly min: number;
  readonly max: number;
  readonly value: (row: T) => number | null;
}

// ============================================================================
// Constants
// ============================================================================

export const SAMPLE_SIZE = 5;

/**
 * GAP_pp spans the difference of two [0,100] measures
 */
export const GAP_MIN = MEASURE_MIN - MEASURE_MAX;
export const GAP_MAX = MEASURE_MAX - MEASURE_MIN;

const GAP_TOLERANCE = 1e-9;

/**
 * Range rule for a loaded table's VALUE, reported under its output column name
 */
export function sourceMeasureRule(column: string): MeasureRule<LoadedRow> {
  return {
    column,
    min: MEASURE_MIN,
    max: MEASURE_MAX,
    value: (row) => row.VALUE,
  };
}

export const CURATED_RULES: readonly MeasureRule<CuratedRecord>[] = [
  { column: 'ACTIVITY_VAL', min: MEASURE_MIN, max: MEASURE_MAX, value: (row) => row.ACTIVITY_VAL },
  { column: 'OBESITY_VAL', min: MEASURE_MIN, max: MEASURE_MAX, value: (row) => row.OBESITY_VAL },
  { column: 'GAP_pp', min: GAP_MIN, max: GAP_MAX, value: (row) => row.GAP_pp },
];

// ============================================================================
// Check Builders
// ============================================================================

function outcome(
  table: string,
  rule: CheckRule,
  offending: readonly string[],
  passMessage: string,
  failMessage: string,
  failStatus: CheckStatus = 'fail'
): TableCheck {
  const failed = offending.length > 0;
  return {
    table,
    rule,
    status: failed ? failStatus : 'pass',
    message: failed ? failMessage : passMessage,
    violations: offending.length,
    sampleKeys: offending.slice(0, SAMPLE_SIZE),
  };
}

function checkNonEmpty(table: string, rows: readonly KeyedRow[]): TableCheck {
  return {
    table,
    rule: 'non-empty',
    status: rows.length > 0 ? 'pass' : 'fail',
    message: rows.length > 0 ? `${rows.length} rows` : `${table} is empty`,
    violations: rows.length > 0 ? 0 : 1,
    sampleKeys: [],
  };
}

function checkKeyNotNull(table: string, rows: readonly KeyedRow[]): TableCheck {
  const offending = rows
    .filter((row) => row.COUNTRY === null || row.AGE === null || row.SEX === null || row.YEAR === null)
    .map(formatKey);
  return outcome(
    table,
    'key-not-null',
    offending,
    'All key values present',
    `${offending.length} rows have null key values`
  );
}

function checkKeyDomain(table: string, rows: readonly KeyedRow[]): TableCheck {
  const offending = rows
    .filter(
      (row) =>
        (row.AGE !== null && !isAge(row.AGE)) || (row.SEX !== null && !isSex(row.SEX))
    )
    .map(formatKey);
  return outcome(
    table,
    'key-domain',
    offending,
    'AGE and SEX within their enums',
    `${offending.length} rows have AGE outside {11,13,15} or SEX outside {MALE,FEMALE}`
  );
}

function checkKeyUnique(table: string, rows: readonly KeyedRow[]): TableCheck {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const key = formatKey(row);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  // Most-duplicated keys first; ties keep first-seen order
  const duplicated = [...counts.entries()]
    .filter(([, count]) => count > 1)
    .sort((a, b) => b[1] - a[1]);
  const duplicateRows = duplicated.reduce((sum, [, count]) => sum + count, 0);

  return {
    table,
    rule: 'key-unique',
    status: duplicated.length > 0 ? 'fail' : 'pass',
    message:
      duplicated.length > 0
        ? `${duplicateRows} duplicate rows on keys`
        : 'Composite key unique',
    violations: duplicateRows,
    sampleKeys: duplicated.slice(0, SAMPLE_SIZE).map(([key, count]) => `${key} (x${count})`),
  };
}

function checkMeasureRange<T extends KeyedRow>(
  table: string,
  rows: readonly T[],
  rule: MeasureRule<T>
): TableCheck {
  const offending = rows
    .filter((row) => {
      const value = rule.value(row);
      return value !== null && !(value >= rule.min && value <= rule.max);
    })
    .map((row) => `${formatKey(row)}=${String(rule.value(row))}`);
  return {
    ...outcome(
      table,
      'measure-range',
      offending,
      `${rule.column} within [${rule.min},${rule.max}]`,
      `${offending.length} rows have ${rule.column} outside [${rule.min},${rule.max}]`
    ),
    column: rule.column,
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run the per-table rules (emptiness, keys, measure ranges)
 */
export function checkTable<T extends KeyedRow>(
  table: string,
  rows: readonly T[],
  measures: readonly MeasureRule<T>[]
): TableCheck[] {
  return [
    checkNonEmpty(table, rows),
    checkKeyNotNull(table, rows),
    checkKeyDomain(table, rows),
    checkKeyUnique(table, rows),
    ...measures.map((rule) => checkMeasureRange(table, rows, rule)),
  ];
}

/**
 * Run the per-table rules plus gap consistency and the cardinality bound
 */
export function checkCuratedTable(
  curated: readonly CuratedRecord[],
  sourceCounts: { readonly activity: number; readonly obesity: number }
): TableCheck[] {
  const inconsistent = curated
    .filter((row) => {
      if (row.ACTIVITY_VAL === null || row.OBESITY_VAL === null) {
        return row.GAP_pp !== null;
      }
      const expected = row.ACTIVITY_VAL - row.OBESITY_VAL;
      return row.GAP_pp === null || Math.abs(row.GAP_pp - expected) > GAP_TOLERANCE;
    })
    .map(formatKey);

  const bound = Math.min(sourceCounts.activity, sourceCounts.obesity);
  const cardinality: TableCheck = {
    table: 'curated',
    rule: 'cardinality',
    status: curated.length <= bound ? 'pass' : 'fail',
    message: `${curated.length} rows; bound min(${sourceCounts.activity}, ${sourceCounts.obesity}) = ${bound}`,
    violations: curated.length <= bound ? 0 : curated.length - bound,
    sampleKeys: [],
  };

  return [
    ...checkTable('curated', curated, CURATED_RULES),
    outcome(
      'curated',
      'gap-consistency',
      inconsistent,
      'GAP_pp = ACTIVITY_VAL - OBESITY_VAL on every row',
      `${inconsistent.length} rows have GAP_pp inconsistent with its measures`
    ),
    cardinality,
  ];
}

/**
 * Report activity keys that find no obesity row. Never fails a run.
 */
export function checkActivityCoverage(
  activity: readonly KeyedRow[],
  obesity: readonly KeyedRow[]
): TableCheck {
  const obesityKeys = new Set(obesity.map(formatKey));
  const unmatched = activity.map(formatKey).filter((key) => !obesityKeys.has(key));
  return outcome(
    'activity',
    'activity-coverage',
    unmatched,
    'Every activity key has an obesity row',
    `${unmatched.length} activity keys have no obesity row and are excluded from curated`,
    'warn'
  );
}

/**
 * Throw a DataQualityError when any check failed
 *
 * The error is named after the first failure and carries every check of the
 * run so far, so all failures can be reported together.
 *
 * @param checks - Checks of the run so far, in report order
 * @param counts - Row counts at this point of the run
 */
export function assertChecks(checks: readonly TableCheck[], counts: TableCounts = {}): void {
  const failure = checks.find((check) => check.status === 'fail');
  if (failure) {
    throw new DataQualityError(failure.table, failure.rule, failure.message, failure.sampleKeys, {
      checks,
      counts,
    });
  }
}

/**
 * Narrow checked rows to typed records
 *
 * @throws DataQualityError if a row's key is out of domain (checks were skipped)
 */
export function narrowRows<R>(
  table: string,
  rows: readonly LoadedRow[],
  build: (key: CompositeKey, value: number | null) => R
): R[] {
  return rows.map((row) => {
    const key = toCompositeKey(row);
    if (!key) {
      throw new DataQualityError(table, 'key-domain', 'Row key failed narrowing', [formatKey(row)]);
    }
    return build(key, row.VALUE);
  });
}
