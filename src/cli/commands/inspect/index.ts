/**
 * Inspect Command
 *
 * Locates the table inside one raw extract and prints its bounds, header and
 * first data rows. Nothing is validated beyond header detection.
 *
 * Usage:
 *   health-etl inspect <file> [--rows <n>]
 */

import type { Command } from 'commander';
import { basename, dirname, resolve } from 'node:path';
import { LocalSourceReader } from '../../../acquisition/source-reader.js';
import { findTableBounds, splitLines } from '../../../acquisition/table-bounds.js';
import type { TableBounds } from '../../../acquisition/table-bounds.js';
import { ConfigurationError } from '../../../core/errors.js';
import { getGlobalContext } from '../../context.js';

export interface InspectResult extends TableBounds {
  readonly file: string;
  readonly totalLines: number;
  readonly header: string;
  readonly preview: readonly string[];
}

interface InspectOptions {
  readonly rows: string;
}

/**
 * Register the inspect command
 */
export function registerInspectCommand(program: Command): void {
  program
    .command('inspect <file>')
    .description('Show where the table sits inside a raw extract')
    .option('--rows <n>', 'Data rows to preview', '3')
    .action(async (file: string, options: InspectOptions) => {
      const { config } = getGlobalContext();
      const previewRows = Number.parseInt(options.rows, 10);
      if (!Number.isInteger(previewRows) || previewRows < 0) {
        throw new ConfigurationError(`Invalid --rows "${options.rows}"`);
      }

      const result = await inspectExtract(resolve(file), previewRows);
      console.log(config.json ? JSON.stringify(result, null, 2) : formatInspection(result));
    });
}

/**
 * Read a local extract and locate its table
 */
export async function inspectExtract(path: string, previewRows = 3): Promise<InspectResult> {
  const reader = new LocalSourceReader(dirname(path));
  const lines = splitLines(await reader.readText(basename(path)));
  const bounds = findTableBounds(lines, undefined, path);
  const firstRow = bounds.headerIndex + 1;

  return {
    file: path,
    totalLines: lines.length,
    headerIndex: bounds.headerIndex,
    dataRows: bounds.dataRows,
    header: lines[bounds.headerIndex] ?? '',
    preview: lines.slice(firstRow, firstRow + Math.min(previewRows, bounds.dataRows)),
  };
}

export function formatInspection(result: InspectResult): string {
  const lines = [
    `File:         ${result.file}`,
    `Lines:        ${result.totalLines}`,
    `Header index: ${result.headerIndex}`,
    `Data rows:    ${result.dataRows}`,
    `Header:       ${result.header}`,
  ];
  for (const row of result.preview) {
    lines.push(`  ${row}`);
  }
  return lines.join('\n');
}
