/**
 * Artifact Serializers
 *
 * Encodes processed and curated tables as CSV snapshots and, optionally,
 * SNAPPY-compressed Parquet files. Encoding is deterministic: the same rows
 * always produce the same bytes.
 *
 * LAYOUT (relative to the output root or container):
 * - processed/activity_merged.{csv,parquet}
 * - processed/obesity_merged.{csv,parquet}
 * - curated/df_merged.{csv,parquet}
 */

import { Writable } from 'stream';
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import {
  ACTIVITY_COLUMNS,
  CURATED_COLUMNS,
  OBESITY_COLUMNS,
} from '../core/types.js';
import type { ActivityRecord, CuratedRecord, ObesityRecord } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One serialized output file
 */
export interface Artifact {
  /** Path relative to the output root, e.g. curated/df_merged.csv */
  readonly path: string;
  readonly contentType: string;
  readonly body: Uint8Array;
  readonly rows: number;
}

/**
 * Tables persisted by a run
 */
export interface OutputTables {
  readonly activity: readonly ActivityRecord[];
  readonly obesity: readonly ObesityRecord[];
  readonly curated: readonly CuratedRecord[];
}

type Cell = string | number | null;

export const ARTIFACT_BASENAMES = {
  activity: 'processed/activity_merged',
  obesity: 'processed/obesity_merged',
  curated: 'curated/df_merged',
} as const;

export const CONTENT_TYPES = {
  csv: 'text/csv; charset=utf-8',
  parquet: 'application/vnd.apache.parquet',
} as const;

// ============================================================================
// CSV
// ============================================================================

/**
 * Escape a value for CSV output
 */
function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: Cell): string {
  if (value === null) return '';
  return typeof value === 'number' ? String(value) : escapeCSV(value);
}

/**
 * Encode rows as CSV with a header row and a trailing newline
 */
export function toCsv<R extends { readonly [K in C]: Cell }, C extends string>(
  rows: readonly R[],
  columns: readonly C[]
): string {
  const lines = [columns.map(escapeCSV).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

// ============================================================================
// Parquet
// ============================================================================

const KEY_FIELDS = {
  COUNTRY: { type: 'UTF8', compression: 'SNAPPY' },
  AGE: { type: 'INT32', compression: 'SNAPPY' },
  SEX: { type: 'UTF8', compression: 'SNAPPY' },
  YEAR: { type: 'INT32', compression: 'SNAPPY' },
} as const;

const MEASURE_FIELD = { type: 'DOUBLE', optional: true, compression: 'SNAPPY' } as const;

export const PARQUET_SCHEMAS = {
  activity: new ParquetSchema({ ...KEY_FIELDS, ACTIVITY_VAL: MEASURE_FIELD }),
  obesity: new ParquetSchema({ ...KEY_FIELDS, OBESITY_VAL: MEASURE_FIELD }),
  curated: new ParquetSchema({
    ...KEY_FIELDS,
    ACTIVITY_VAL: MEASURE_FIELD,
    OBESITY_VAL: MEASURE_FIELD,
    GAP_pp: MEASURE_FIELD,
  }),
};

/**
 * Drop null cells; optional Parquet fields are encoded by absence
 */
function toParquetRow<R extends { readonly [K in C]: Cell }, C extends string>(
  row: R,
  columns: readonly C[]
): Record<string, string | number> {
  const result: Record<string, string | number> = {};
  for (const column of columns) {
    const value = row[column];
    if (value !== null) {
      result[column] = value;
    }
  }
  return result;
}

/**
 * Collects written chunks in memory
 */
class BufferWritable extends Writable {
  private readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Encode rows as a Parquet file, entirely in memory
 */
export async function toParquet<R extends { readonly [K in C]: Cell }, C extends string>(
  rows: readonly R[],
  columns: readonly C[],
  schema: ParquetSchema
): Promise<Buffer> {
  const output = new BufferWritable();
  const writer = await ParquetWriter.openStream(schema, output);
  for (const row of rows) {
    await writer.appendRow(toParquetRow(row, columns));
  }
  await writer.close();
  return output.toBuffer();
}

// ============================================================================
// Artifact Assembly
// ============================================================================

/**
 * Serialize every output table; CSV first, then Parquet when requested
 */
export async function buildArtifacts(
  tables: OutputTables,
  options: { readonly writeParquet: boolean }
): Promise<Artifact[]> {
  const artifacts: Artifact[] = [
    csvArtifact(ARTIFACT_BASENAMES.activity, tables.activity, ACTIVITY_COLUMNS),
    csvArtifact(ARTIFACT_BASENAMES.obesity, tables.obesity, OBESITY_COLUMNS),
    csvArtifact(ARTIFACT_BASENAMES.curated, tables.curated, CURATED_COLUMNS),
  ];

  if (options.writeParquet) {
    artifacts.push(
      await parquetArtifact(ARTIFACT_BASENAMES.activity, tables.activity, ACTIVITY_COLUMNS, PARQUET_SCHEMAS.activity),
      await parquetArtifact(ARTIFACT_BASENAMES.obesity, tables.obesity, OBESITY_COLUMNS, PARQUET_SCHEMAS.obesity),
      await parquetArtifact(ARTIFACT_BASENAMES.curated, tables.curated, CURATED_COLUMNS, PARQUET_SCHEMAS.curated)
    );
  }

  return artifacts;
}

function csvArtifact<R extends { readonly [K in C]: Cell }, C extends string>(
  basename: string,
  rows: readonly R[],
  columns: readonly C[]
): Artifact {
  return {
    path: `${basename}.csv`,
    contentType: CONTENT_TYPES.csv,
    body: Buffer.from(toCsv(rows, columns), 'utf-8'),
    rows: rows.length,
  };
}

async function parquetArtifact<R extends { readonly [K in C]: Cell }, C extends string>(
  basename: string,
  rows: readonly R[],
  columns: readonly C[],
  schema: ParquetSchema
): Promise<Artifact> {
  return {
    path: `${basename}.parquet`,
    contentType: CONTENT_TYPES.parquet,
    body: await toParquet(rows, columns, schema),
    rows: rows.length,
  };
}
