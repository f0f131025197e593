/**
 * Measure Loader
 *
 * Reads one measure (activity OR obesity) across age groups and stacks the
 * per-age tables into a single table. AGE comes from the file name.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { PipelineLogger } from '../core/logging.js';
import type { LoadedRow, TableName } from '../core/types.js';
import type { SourceReader } from './source-reader.js';
import { findTableBounds, parseTableRows, splitLines, RAW_COLUMNS } from './table-bounds.js';

/**
 * Directory (or key prefix) holding raw extracts
 */
export const RAW_DIR = 'raw';

/**
 * Default file name prefixes of the raw extracts
 */
export const DEFAULT_PREFIXES = {
  activity: 'Percentages of physically active children among',
  obesity: 'Prevalence of overweight (including obesity) among',
} as const;

export interface ReadMeasureOptions {
  /** Table the rows belong to (for diagnostics) */
  readonly table: Exclude<TableName, 'curated'>;
  /** Age groups, read and stacked in this order */
  readonly ages: readonly number[];
  /** File name prefix */
  readonly prefix: string;
}

/**
 * Relative path of the raw extract for one age group
 */
export function rawFilePath(prefix: string, age: number): string {
  return `${RAW_DIR}/${prefix} ${age}-year-olds.csv`;
}

/**
 * Read + stack one measure across ages
 */
export async function readMeasure(
  reader: SourceReader,
  options: ReadMeasureOptions,
  logger: PipelineLogger
): Promise<LoadedRow[]> {
  const rows: LoadedRow[] = [];

  for (const age of options.ages) {
    const path = rawFilePath(options.prefix, age);
    const source = reader.locate(path);
    const lines = splitLines(await reader.readText(path));

    const bounds = findTableBounds(lines, RAW_COLUMNS, source);
    logger.info('Located table in raw extract', {
      table: options.table,
      file: path,
      header_idx: bounds.headerIndex,
      data_rows: bounds.dataRows,
    });

    if (bounds.dataRows === 0) {
      logger.warn('No data rows detected; skipping', { table: options.table, file: path });
      continue;
    }

    rows.push(...parseTableRows(lines, bounds, age, source));
  }

  return rows;
}
