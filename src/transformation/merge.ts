/**
 * Curated Merge
 *
 * Inner join of the activity and obesity tables on COUNTRY/AGE/SEX/YEAR.
 * Both inputs are key-unique (checked before the join), so the join is 1:1.
 * Output rows follow the activity table's order.
 */

import { formatKey } from '../core/types.js';
import type { ActivityRecord, CuratedRecord, ObesityRecord } from '../core/types.js';

/**
 * ACTIVITY_VAL − OBESITY_VAL, null when either side is missing
 */
export function computeGap(activity: number | null, obesity: number | null): number | null {
  return activity === null || obesity === null ? null : activity - obesity;
}

/**
 * Join activity and obesity rows present in both tables
 */
export function mergeMeasures(
  activity: readonly ActivityRecord[],
  obesity: readonly ObesityRecord[]
): CuratedRecord[] {
  const obesityByKey = new Map<string, ObesityRecord>();
  for (const row of obesity) {
    obesityByKey.set(formatKey(row), row);
  }

  const curated: CuratedRecord[] = [];
  for (const row of activity) {
    const match = obesityByKey.get(formatKey(row));
    if (!match) continue;

    curated.push({
      COUNTRY: row.COUNTRY,
      AGE: row.AGE,
      SEX: row.SEX,
      YEAR: row.YEAR,
      ACTIVITY_VAL: row.ACTIVITY_VAL,
      OBESITY_VAL: match.OBESITY_VAL,
      GAP_pp: computeGap(row.ACTIVITY_VAL, match.OBESITY_VAL),
    });
  }

  return curated;
}
