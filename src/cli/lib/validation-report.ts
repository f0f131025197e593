/**
 * Validation Report Formatter
 *
 * Formats the checks of a pipeline run for the terminal. Supports table,
 * JSON, and summary output modes.
 */

import { EXIT_CODES } from '../../core/errors.js';
import type { ExitCode } from '../../core/errors.js';
import type { CheckStatus, TableCheck, TableCounts } from '../../core/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Aggregated check counts
 */
export interface ValidationSummary {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly warnings: number;
  /** Pass rate as percentage */
  readonly passRate: number;
}

/**
 * Complete validation report
 */
export interface ValidationReport {
  readonly timestamp: string;
  readonly mode: string;
  /** Row counts per table; a failed run has counts up to where it stopped */
  readonly counts: TableCounts;
  readonly summary: ValidationSummary;
  readonly checks: readonly TableCheck[];
  readonly overallStatus: CheckStatus;
}

export type OutputFormat = 'table' | 'json' | 'summary';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'summary'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

// =============================================================================
// Status Icons (ASCII-safe for CI compatibility)
// =============================================================================

const STATUS_ICONS: Record<CheckStatus, string> = {
  pass: '[PASS]',
  fail: '[FAIL]',
  warn: '[WARN]',
};

const STATUS_COLORS: Record<CheckStatus, string> = {
  pass: '\x1b[32m', // green
  fail: '\x1b[31m', // red
  warn: '\x1b[33m', // yellow
};

const RESET = '\x1b[0m';

// =============================================================================
// Report Builder
// =============================================================================

/**
 * Build a validation report from the checks of a run
 */
export function buildReport(
  mode: string,
  counts: TableCounts,
  checks: readonly TableCheck[],
  now: Date = new Date()
): ValidationReport {
  const passed = checks.filter((c) => c.status === 'pass').length;
  const failed = checks.filter((c) => c.status === 'fail').length;
  const warnings = checks.filter((c) => c.status === 'warn').length;
  const total = checks.length;

  let overallStatus: CheckStatus;
  if (failed > 0) {
    overallStatus = 'fail';
  } else if (warnings > 0) {
    overallStatus = 'warn';
  } else {
    overallStatus = 'pass';
  }

  return {
    timestamp: now.toISOString(),
    mode,
    counts,
    summary: {
      total,
      passed,
      failed,
      warnings,
      passRate: total > 0 ? (passed / total) * 100 : 0,
    },
    checks,
    overallStatus,
  };
}

/**
 * Check label, e.g. `curated:measure-range(GAP_pp)`
 */
export function checkId(check: TableCheck): string {
  const rule = check.column ? `${check.rule}(${check.column})` : check.rule;
  return `${check.table}:${rule}`;
}

// =============================================================================
// Formatters
// =============================================================================

/**
 * Format report as JSON
 */
export function formatJson(report: ValidationReport, verbose = false): string {
  if (verbose) {
    return JSON.stringify(report, null, 2);
  }

  // Non-verbose: everything but passing checks
  return JSON.stringify(
    {
      timestamp: report.timestamp,
      mode: report.mode,
      overallStatus: report.overallStatus,
      counts: report.counts,
      summary: report.summary,
      issues: report.checks
        .filter((c) => c.status !== 'pass')
        .map((c) => ({
          id: checkId(c),
          status: c.status,
          message: c.message,
          sampleKeys: c.sampleKeys,
        })),
    },
    null,
    2
  );
}

/**
 * Format report as table
 */
export function formatTable(report: ValidationReport, useColor = true): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('='.repeat(80));
  lines.push(`VALIDATION REPORT: ${report.mode.toUpperCase()}`);
  lines.push('='.repeat(80));
  lines.push(`Timestamp: ${report.timestamp}`);
  lines.push(
    `Rows: ${Object.entries(report.counts)
      .map(([table, count]) => `${table}=${count}`)
      .join(' | ')}`
  );
  lines.push('');

  const { summary } = report;
  lines.push(`Overall Status: ${icon(report.overallStatus, useColor)}`);
  lines.push(
    `Total: ${summary.total} | Passed: ${summary.passed} | Failed: ${summary.failed} | Warnings: ${summary.warnings}`
  );
  lines.push('');

  if (report.checks.length > 0) {
    lines.push('-'.repeat(80));
    lines.push(padEnd('Check', 36) + padEnd('Status', 10) + 'Message');
    lines.push('-'.repeat(80));

    for (const check of report.checks) {
      lines.push(
        padEnd(truncate(checkId(check), 35), 36) +
          padEnd(icon(check.status, useColor), useColor ? 18 : 10) + // Account for color codes
          truncate(check.message, 34)
      );
    }

    lines.push('-'.repeat(80));
  }

  const issues = report.checks.filter((c) => c.status !== 'pass');
  if (issues.length > 0) {
    lines.push('');
    lines.push('ISSUES:');
    lines.push('-'.repeat(80));

    for (const check of issues) {
      lines.push(`  ${checkId(check)} ${STATUS_ICONS[check.status]}:`);
      lines.push(`    ${check.message}`);
      if (check.sampleKeys.length > 0) {
        lines.push(`    Sample: ${check.sampleKeys.join(', ')}`);
      }
      lines.push('');
    }
  }

  lines.push('='.repeat(80));

  return lines.join('\n');
}

/**
 * Format report as a short summary
 */
export function formatSummary(report: ValidationReport, useColor = true): string {
  const lines: string[] = [];

  lines.push(
    `${icon(report.overallStatus, useColor)} ${report.mode}: ${report.summary.passed}/${report.summary.total} checks passed`
  );

  if (report.summary.failed > 0) {
    lines.push(`  Failed: ${report.summary.failed}`);
  }
  if (report.summary.warnings > 0) {
    lines.push(`  Warnings: ${report.summary.warnings}`);
  }

  return lines.join('\n');
}

/**
 * Format report based on output format option
 */
export function formatReport(
  report: ValidationReport,
  format: OutputFormat,
  options: { verbose?: boolean; color?: boolean } = {}
): string {
  const useColor = options.color ?? process.stdout.isTTY ?? false;

  switch (format) {
    case 'json':
      return formatJson(report, options.verbose);
    case 'table':
      return formatTable(report, useColor);
    case 'summary':
      return formatSummary(report, useColor);
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

function icon(status: CheckStatus, useColor: boolean): string {
  return useColor ? `${STATUS_COLORS[status]}${STATUS_ICONS[status]}${RESET}` : STATUS_ICONS[status];
}

function padEnd(str: string, length: number): string {
  return str.padEnd(length);
}

function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Exit code for a report
 *
 * A warn report still exits 0; a fail report exits with the data integrity code.
 */
export function getExitCode(status: CheckStatus): ExitCode {
  switch (status) {
    case 'pass':
    case 'warn':
      return EXIT_CODES.SUCCESS;
    case 'fail':
      return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
}
