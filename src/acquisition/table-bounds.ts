/**
 * Raw Extract Table Detection
 *
 * Raw survey extracts wrap the data table in free-text metadata: a title and
 * notes above the header, a "Last update" footer below. The table is located
 * by its header (first line naming every required column) and its extent
 * (contiguous lines with exactly four columns).
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { DataQualityError } from '../core/errors.js';
import type { KeyedRow, LoadedRow } from '../core/types.js';

/**
 * Columns every raw extract must carry
 */
export const RAW_COLUMNS = ['COUNTRY', 'SEX', 'YEAR', 'VALUE'] as const;

/**
 * Commas on a data line (RAW_COLUMNS.length - 1)
 */
const DATA_LINE_COMMAS = 3;

/**
 * Plain decimal notation, optional exponent. No hex, binary or Infinity literals.
 */
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Location of the table within a raw extract
 */
export interface TableBounds {
  /** 0-based index of the header line */
  readonly headerIndex: number;
  /** Contiguous data lines following the header */
  readonly dataRows: number;
}

/**
 * Split extract text into lines, dropping a leading UTF-8 BOM
 */
export function splitLines(text: string): string[] {
  const stripped = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  return stripped.split(/\r?\n/);
}

function countCommas(line: string): number {
  let count = 0;
  for (const char of line) {
    if (char === ',') count++;
  }
  return count;
}

/**
 * Find the header line and count the data lines beneath it
 *
 * @param lines - Extract lines
 * @param requiredColumns - Column names the header must contain
 * @param source - Name used in diagnostics
 * @throws DataQualityError when no line contains every required column
 */
export function findTableBounds(
  lines: readonly string[],
  requiredColumns: readonly string[] = RAW_COLUMNS,
  source = 'raw extract'
): TableBounds {
  const headerIndex = lines.findIndex((line) =>
    requiredColumns.every((column) => line.includes(column))
  );

  if (headerIndex === -1) {
    throw new DataQualityError(
      source,
      'header-present',
      `Header not found (expected columns: ${requiredColumns.join(', ')})`
    );
  }

  let dataRows = 0;
  for (const line of lines.slice(headerIndex + 1)) {
    if (countCommas(line) !== DATA_LINE_COMMAS) break;
    dataRows++;
  }

  return { headerIndex, dataRows };
}

/**
 * Parse a single CSV line handling quoted values
 */
export function parseCSVLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      values.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  values.push(current.trim());

  return values;
}

/**
 * Empty cells become null
 */
function textCell(value: string | undefined): string | null {
  return value === undefined || value === '' ? null : value;
}

/**
 * Non-decimal or empty cells become null. A decimal that overflows stays
 * Infinity so the range check rejects it.
 */
function measureCell(value: string | undefined): number | null {
  if (value === undefined || !DECIMAL_PATTERN.test(value)) return null;
  return Number(value);
}

/**
 * Empty cells become null; anything else must be a decimal integer
 */
function yearCell(value: string | undefined, source: string, partial: KeyedRow): number | null {
  if (value === undefined || value === '') return null;
  const num = DECIMAL_PATTERN.test(value) ? Number(value) : Number.NaN;
  if (!Number.isInteger(num)) {
    throw new DataQualityError(
      source,
      'year-integer',
      `YEAR "${value}" is not an integer`,
      [`${partial.COUNTRY ?? '<null>'}/${partial.AGE ?? '<null>'}/${partial.SEX ?? '<null>'}/${value}`]
    );
  }
  return num;
}

/**
 * Parse the table located by `bounds` into typed rows for one age group
 *
 * @param lines - Extract lines
 * @param bounds - Result of findTableBounds
 * @param age - Age group the extract describes
 * @param source - Name used in diagnostics
 */
export function parseTableRows(
  lines: readonly string[],
  bounds: TableBounds,
  age: number,
  source = 'raw extract'
): LoadedRow[] {
  const header = parseCSVLine(lines[bounds.headerIndex] ?? '').map((h) => h.toUpperCase());
  const index = (column: string): number => header.indexOf(column);
  const [countryIdx, sexIdx, yearIdx, valueIdx] = RAW_COLUMNS.map(index);

  const missing = RAW_COLUMNS.filter((column) => index(column) === -1);
  if (missing.length > 0) {
    throw new DataQualityError(
      source,
      'header-present',
      `Header line does not split into columns ${missing.join(', ')}`
    );
  }

  const rows: LoadedRow[] = [];
  const dataLines = lines.slice(bounds.headerIndex + 1, bounds.headerIndex + 1 + bounds.dataRows);

  for (const line of dataLines) {
    const values = parseCSVLine(line);
    const cell = (idx: number | undefined): string | undefined =>
      idx === undefined ? undefined : values[idx];

    const key = {
      COUNTRY: textCell(cell(countryIdx)),
      AGE: age,
      SEX: textCell(cell(sexIdx)),
      YEAR: null,
    };

    rows.push({
      ...key,
      YEAR: yearCell(cell(yearIdx), source, key),
      VALUE: measureCell(cell(valueIdx)),
    });
  }

  return rows;
}
