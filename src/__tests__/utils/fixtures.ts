/**
 * Test Fixtures
 *
 * Builders for raw survey extracts in the layout the loader expects:
 * free-text metadata above the table, a trailing "Last update" footer.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no `@ts-ignore`.
 */

import { DEFAULT_PREFIXES, rawFilePath } from '../../acquisition/measure-loader.js';
import { AGES } from '../../core/types.js';

/**
 * One data line of a raw extract
 */
export interface ExtractRow {
  readonly country: string;
  readonly sex: string;
  readonly year: number | string;
  readonly value: number | string;
}

/**
 * Render a raw extract with metadata lines around the table
 */
export function buildExtract(
  rows: readonly ExtractRow[],
  options: { readonly title?: string; readonly footer?: boolean } = {}
): string {
  const lines = [
    options.title ?? 'Survey indicator extract',
    'Generated for testing',
    'COUNTRY,SEX,YEAR,VALUE',
    ...rows.map((row) => `${row.country},${row.sex},${row.year},${row.value}`),
  ];
  if (options.footer ?? true) {
    lines.push('Last update,2022.12.05');
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Country code for an index, e.g. 7 → C07
 */
export function countryCode(index: number): string {
  return `C${String(index).padStart(2, '0')}`;
}

/**
 * Rows for every country in `countries` × both sexes, one year
 */
export function countryRows(
  countries: readonly string[],
  year: number,
  value: (country: string, sex: string) => number | string
): ExtractRow[] {
  return countries.flatMap((country) =>
    ['MALE', 'FEMALE'].map((sex) => ({ country, sex, year, value: value(country, sex) }))
  );
}

/**
 * Raw extract files keyed by their relative path
 */
export type ExtractFiles = Map<string, string>;

/**
 * Files of one measure: one extract per age
 */
export function measureFiles(
  prefix: string,
  rowsForAge: (age: number) => readonly ExtractRow[],
  ages: readonly number[] = AGES
): ExtractFiles {
  return new Map(ages.map((age) => [rawFilePath(prefix, age), buildExtract(rowsForAge(age))]));
}

/**
 * Survey layout used by the pipeline scenarios
 *
 * - activity: 73 countries × 3 ages × 2 sexes in 2014 (438 rows)
 * - obesity: the same 438 keys plus 128 rows from 2001 that activity lacks
 *   (21 countries at every age, one more country at age 11 only)
 */
export const SURVEY = {
  activityCountries: Array.from({ length: 73 }, (_, i) => countryCode(i + 1)),
  extraObesityCountries: Array.from({ length: 22 }, (_, i) => countryCode(i + 1)),
  year: 2014,
  extraYear: 2001,
} as const;

/**
 * Deterministic activity percentage for a key
 */
export function activityValue(country: string, sex: string, age: number): number {
  const index = Number(country.slice(1));
  return 10 + (index % 50) + (sex === 'MALE' ? 5 : 0) + (age - 11) / 2;
}

/**
 * Deterministic obesity percentage for a key
 */
export function obesityValue(country: string, sex: string, age: number): number {
  const index = Number(country.slice(1));
  return 5 + (index % 30) + (sex === 'MALE' ? 0.5 : 0) + (age - 11) / 4;
}

/**
 * Full set of raw extracts for both measures
 */
export function surveyFiles(
  overrides: {
    readonly activityValue?: (country: string, sex: string, age: number) => number | string;
  } = {}
): ExtractFiles {
  const activity = overrides.activityValue ?? activityValue;

  const activityFiles = measureFiles(DEFAULT_PREFIXES.activity, (age) =>
    countryRows(SURVEY.activityCountries, SURVEY.year, (country, sex) => activity(country, sex, age))
  );

  const obesityFiles = measureFiles(DEFAULT_PREFIXES.obesity, (age) => {
    const extraCountries =
      age === 11 ? SURVEY.extraObesityCountries : SURVEY.extraObesityCountries.slice(0, 21);
    return [
      ...countryRows(SURVEY.activityCountries, SURVEY.year, (country, sex) =>
        obesityValue(country, sex, age)
      ),
      ...countryRows(extraCountries, SURVEY.extraYear, (country, sex) =>
        obesityValue(country, sex, age)
      ),
    ];
  });

  return new Map([...activityFiles, ...obesityFiles]);
}
