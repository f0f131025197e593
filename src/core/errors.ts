/**
 * Health ETL Error Types
 *
 * Every failure of a run is one of three kinds. All are fatal: the run aborts
 * and nothing is persisted. The CLI maps `exitCode` to the process status.
 */

import type { TableCheck, TableCounts } from './types.js';

/**
 * Exit codes shared by the CLI and the report formatter
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type PipelineErrorKind = 'data-quality' | 'transport' | 'configuration';

/**
 * Base class for all run-aborting errors
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Human-readable diagnostic for the terminal
   */
  getSummary(): string {
    return `${this.name}: ${this.message}`;
  }
}

/**
 * Checks and row counts of the run that failed, for the report
 */
export interface DataQualityContext {
  readonly checks?: readonly TableCheck[];
  readonly counts?: TableCounts;
}

/**
 * A loaded or derived table violates a key, uniqueness or range invariant
 *
 * RECOVERY:
 * - Inspect the sample keys in the offending raw extract
 * - Fix the extract upstream; rows are never dropped or clamped here
 */
export class DataQualityError extends PipelineError {
  readonly kind = 'data-quality';
  readonly exitCode = EXIT_CODES.DATA_INTEGRITY_ERROR;
  /** Every check that ran before the abort; empty when loading failed */
  readonly checks: readonly TableCheck[];
  readonly counts: TableCounts;

  /**
   * @param table - Table that failed (activity, obesity, curated, or a raw file name)
   * @param rule - Rule identifier, e.g. `key-unique`
   * @param detail - What was wrong
   * @param sampleKeys - Up to five offending keys
   */
  constructor(
    public readonly table: string,
    public readonly rule: string,
    detail: string,
    public readonly sampleKeys: readonly string[] = [],
    context: DataQualityContext = {}
  ) {
    super(`[${table}] ${rule}: ${detail}`);
    this.checks = context.checks ?? [];
    this.counts = context.counts ?? {};
  }

  /**
   * Failed checks, the named one first
   */
  get failures(): readonly TableCheck[] {
    return this.checks.filter((check) => check.status === 'fail');
  }

  override getSummary(): string {
    const lines = [`Data quality check failed for table "${this.table}"`, `  Rule: ${this.rule}`, `  ${this.message}`];
    if (this.sampleKeys.length > 0) {
      lines.push(`  Sample keys: ${this.sampleKeys.join(', ')}`);
    }

    const others = this.failures.slice(1);
    if (others.length > 0) {
      lines.push(`  Also failed (${others.length}):`);
      for (const check of others) {
        const rule = check.column ? `${check.rule}(${check.column})` : check.rule;
        lines.push(`    [${check.table}] ${rule}: ${check.message}`);
        if (check.sampleKeys.length > 0) {
          lines.push(`      Sample keys: ${check.sampleKeys.join(', ')}`);
        }
      }
    }
    return lines.join('\n');
  }
}

/**
 * The store or filesystem could not be read or written
 */
export class TransportError extends PipelineError {
  readonly kind = 'transport';
  readonly exitCode = EXIT_CODES.NETWORK_ERROR;

  constructor(
    public readonly location: string,
    reason: string,
    cause?: unknown
  ) {
    super(`${reason} (${location})`, { cause });
  }

  override getSummary(): string {
    return `Transport failure at ${this.location}\n  ${this.message}`;
  }
}

/**
 * Invalid or incomplete run configuration, raised before any I/O
 */
export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration';
  readonly exitCode = EXIT_CODES.CONFIG_ERROR;

  override getSummary(): string {
    return `Configuration error: ${this.message}`;
  }
}

/**
 * Narrow an unknown thrown value to a PipelineError
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
