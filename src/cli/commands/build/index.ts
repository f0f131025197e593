/**
 * Build Command
 *
 * Loads both measures, validates them, joins them into the curated table and
 * persists the artifacts according to the execution mode.
 *
 * Usage:
 *   health-etl build [options]
 *
 * Options:
 *   --account <name>          Store account identifier
 *   --container <name>        Store container (bucket)
 *   --dry-run                 Validate only, write nothing (default)
 *   --write-remote            Write artifacts to the store container
 *   --write-local             Write artifacts under --output-dir
 *   --write-parquet           Also emit Parquet artifacts
 *   --source <kind>           Where raw extracts live: local|remote (default: remote)
 *   --input-dir <dir>         Root holding raw/ for --source local
 *   --output-dir <dir>        Root receiving processed/ and curated/ for --write-local
 *   --ages <n...>             Age groups to read (default: 11 13 15)
 *   --activity-prefix <text>  Activity extract file name prefix
 *   --obesity-prefix <text>   Obesity extract file name prefix
 *   --format <fmt>            Report format: table|json|summary (default: table)
 *
 * The store credential is read from HEALTH_ETL_ACCESS_KEY_ID and
 * HEALTH_ETL_SECRET_ACCESS_KEY; it is never accepted as a flag.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { Command } from 'commander';
import { ConfigurationError, DataQualityError } from '../../../core/errors.js';
import type { ExitCode } from '../../../core/errors.js';
import type { CredentialProvider } from '../../../storage/credentials.js';
import { MergePipeline } from '../../../transformation/pipeline.js';
import type { PipelineResult } from '../../../transformation/pipeline.js';
import { getGlobalContext } from '../../context.js';
import type { CLIConfig } from '../../lib/config.js';
import type { CLILogger } from '../../lib/logger.js';
import { createRuntime, planRun } from '../../lib/run-plan.js';
import type { BuildFlags, StoreFactory } from '../../lib/run-plan.js';
import {
  buildReport,
  formatReport,
  getExitCode,
  isOutputFormat,
  OUTPUT_FORMATS,
} from '../../lib/validation-report.js';
import type { OutputFormat, ValidationReport } from '../../lib/validation-report.js';

/**
 * Raw command options, as commander hands them over
 */
export interface BuildCommandOptions {
  readonly account?: string;
  readonly container?: string;
  readonly dryRun?: boolean;
  readonly writeRemote?: boolean;
  readonly writeLocal?: boolean;
  readonly writeParquet?: boolean;
  readonly source?: string;
  readonly inputDir?: string;
  readonly outputDir?: string;
  readonly ages?: readonly string[];
  readonly activityPrefix?: string;
  readonly obesityPrefix?: string;
  readonly format?: string;
}

/**
 * Collaborators of a build run
 */
export interface BuildContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly credentials: CredentialProvider;
  readonly storeFactory?: StoreFactory;
  readonly cwd?: string;
}

export interface BuildOutcome {
  /** Null when a data quality check aborted the run */
  readonly result: PipelineResult | null;
  readonly report: ValidationReport;
  readonly exitCode: ExitCode;
}

/**
 * Register the build command
 */
export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Merge and validate the activity and obesity extracts')
    .option('--account <name>', 'Store account identifier')
    .option('--container <name>', 'Store container (bucket)')
    .option('--dry-run', 'Validate only, write nothing (default)')
    .option('--write-remote', 'Write artifacts to the store container')
    .option('--write-local', 'Write artifacts under --output-dir')
    .option('--write-parquet', 'Also emit Parquet artifacts')
    .option('--source <kind>', 'Where raw extracts live: local|remote', 'remote')
    .option('--input-dir <dir>', 'Root holding raw/ for --source local')
    .option('--output-dir <dir>', 'Root receiving processed/ and curated/ for --write-local')
    .option('--ages <n...>', 'Age groups to read (default: 11 13 15)')
    .option('--activity-prefix <text>', 'Activity extract file name prefix')
    .option('--obesity-prefix <text>', 'Obesity extract file name prefix')
    .option('--format <fmt>', `Report format: ${OUTPUT_FORMATS.join('|')}`)
    .action(async (options: BuildCommandOptions) => {
      const { config, logger, credentials } = getGlobalContext();
      const format = resolveFormat(options.format, config.json);

      const outcome = await executeBuild(options, { config, logger, credentials });
      console.log(formatReport(outcome.report, format, { verbose: config.verbose }));

      if (outcome.exitCode !== 0) process.exit(outcome.exitCode);
    });
}

/**
 * Parse `--ages` values
 *
 * @throws ConfigurationError on a non-integer value
 */
export function parseAges(values: readonly string[] | undefined): number[] | undefined {
  if (values === undefined) return undefined;
  return values.map((value) => {
    const age = Number(value);
    if (!Number.isInteger(age)) {
      throw new ConfigurationError(`Invalid age group "${value}"`);
    }
    return age;
  });
}

/**
 * Report format from --format, falling back to the global --json flag
 *
 * @throws ConfigurationError on an unknown format
 */
export function resolveFormat(value: string | undefined, json: boolean): OutputFormat {
  if (value === undefined) return json ? 'json' : 'table';
  if (!isOutputFormat(value)) {
    throw new ConfigurationError(`Invalid format "${value}". Must be: ${OUTPUT_FORMATS.join('|')}`);
  }
  return value;
}

/**
 * Execute the build command
 *
 * Configuration problems surface before the pipeline starts. A failed check
 * yields a `fail` report listing every check that ran; load-time data quality
 * errors and transport failures propagate unchanged.
 */
export async function executeBuild(
  options: BuildCommandOptions,
  context: BuildContext
): Promise<BuildOutcome> {
  const { config, logger, credentials } = context;

  const flags: BuildFlags = {
    account: options.account,
    container: options.container,
    source: options.source,
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    dryRun: options.dryRun,
    writeRemote: options.writeRemote,
    writeLocal: options.writeLocal,
    writeParquet: options.writeParquet,
    ages: parseAges(options.ages),
    activityPrefix: options.activityPrefix,
    obesityPrefix: options.obesityPrefix,
  };

  const plan = planRun(flags, config, context.cwd);
  const runLogger = logger.child({ mode: plan.mode, source: plan.source });
  const runtime = createRuntime(plan, config, credentials, runLogger, context.storeFactory);

  logger.commandStart('build', {
    mode: plan.mode,
    source: plan.source,
    ...(plan.account ? { account: plan.account } : {}),
    ...(plan.container ? { container: plan.container } : {}),
    ages: plan.pipeline.ages.join(','),
    parquet: plan.pipeline.writeParquet,
  });

  const pipeline = new MergePipeline(plan.pipeline, {
    source: runtime.source,
    sink: runtime.sink,
    logger: runLogger,
  });

  let result: PipelineResult;
  try {
    result = await pipeline.run();
  } catch (error) {
    logger.commandEnd(false);
    if (error instanceof DataQualityError && error.checks.length > 0) {
      const report = buildReport(plan.mode, error.counts, error.checks);
      return { result: null, report, exitCode: getExitCode(report.overallStatus) };
    }
    throw error;
  }

  const report = buildReport(result.mode, result.counts, result.checks);
  logger.commandEnd(true, {
    curated: result.counts.curated,
    written: result.written.length,
    planned: result.planned.length,
  });

  return { result, report, exitCode: getExitCode(report.overallStatus) };
}
