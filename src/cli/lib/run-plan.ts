/**
 * Run Planning
 *
 * Turns build flags plus loaded configuration into a fully resolved run:
 * execution mode, where raw extracts come from, where artifacts go, and
 * the collaborators the pipeline needs. Every ConfigurationError is raised
 * here, before the pipeline performs any I/O.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { resolve } from 'node:path';
import { BlobSourceReader, LocalSourceReader } from '../../acquisition/source-reader.js';
import type { SourceReader } from '../../acquisition/source-reader.js';
import { ConfigurationError } from '../../core/errors.js';
import { DryRunSink, LocalSink, RemoteSink } from '../../distribution/sinks.js';
import type { ExecutionMode, OutputSink } from '../../distribution/sinks.js';
import { S3BlobStore } from '../../storage/blob-store.js';
import type { BlobStore, S3BlobStoreOptions } from '../../storage/blob-store.js';
import { CREDENTIAL_ENV } from '../../storage/credentials.js';
import type { CredentialProvider } from '../../storage/credentials.js';
import type { PipelineConfig } from '../../transformation/pipeline.js';
import { resolvePath, validateAges } from './config.js';
import type { CLIConfig } from './config.js';
import type { PipelineLogger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export type SourceKind = 'local' | 'remote';

/**
 * Flags accepted by `health-etl build`
 */
export interface BuildFlags {
  readonly account?: string;
  readonly container?: string;
  readonly source?: string;
  readonly inputDir?: string;
  readonly outputDir?: string;
  readonly dryRun?: boolean;
  readonly writeRemote?: boolean;
  readonly writeLocal?: boolean;
  readonly writeParquet?: boolean;
  readonly ages?: readonly number[];
  readonly activityPrefix?: string;
  readonly obesityPrefix?: string;
}

/**
 * A validated run, before any collaborator exists
 */
export interface RunPlan {
  readonly mode: ExecutionMode;
  readonly source: SourceKind;
  readonly account: string | null;
  readonly container: string | null;
  /** Absolute root holding raw/ (local source) */
  readonly inputDir: string;
  /** Absolute root receiving artifacts (write-local) */
  readonly outputDir: string;
  readonly pipeline: PipelineConfig;
}

/**
 * Collaborators wired from a plan
 */
export interface Runtime {
  readonly source: SourceReader;
  readonly sink: OutputSink;
}

export type StoreFactory = (options: S3BlobStoreOptions) => BlobStore;

const defaultStoreFactory: StoreFactory = (options) => new S3BlobStore(options);

// ============================================================================
// Planning
// ============================================================================

/**
 * Resolve the execution mode from the three exclusive flags
 *
 * @throws ConfigurationError when more than one is set
 */
export function resolveMode(flags: BuildFlags): ExecutionMode {
  const selected: ExecutionMode[] = [];
  if (flags.dryRun) selected.push('dry-run');
  if (flags.writeRemote) selected.push('write-remote');
  if (flags.writeLocal) selected.push('write-local');

  if (selected.length > 1) {
    throw new ConfigurationError(
      `Conflicting mode flags: ${selected.map((mode) => `--${mode}`).join(', ')}. Choose one.`
    );
  }
  return selected[0] ?? 'dry-run';
}

function resolveSourceKind(value: string | undefined): SourceKind {
  if (value === undefined || value === 'remote') return 'remote';
  if (value === 'local') return 'local';
  throw new ConfigurationError(`Invalid source "${value}". Must be: local|remote`);
}

function nonBlank(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Validate flags against configuration and produce a run plan
 *
 * @throws ConfigurationError
 */
export function planRun(flags: BuildFlags, config: CLIConfig, cwd = process.cwd()): RunPlan {
  const mode = resolveMode(flags);
  const source = resolveSourceKind(flags.source);

  const ages = flags.ages ?? config.source.ages;
  validateAges(ages);

  const account = nonBlank(flags.account);
  const container = nonBlank(flags.container);
  const remoteSides = [
    source === 'remote' ? 'source' : null,
    mode === 'write-remote' ? 'sink' : null,
  ].filter((side): side is string => side !== null);

  if (remoteSides.length > 0) {
    const missing = [account ? null : '--account', container ? null : '--container'].filter(
      (flag): flag is string => flag !== null
    );
    if (missing.length > 0) {
      throw new ConfigurationError(
        `${missing.join(' and ')} required for remote ${remoteSides.join(' and ')}`
      );
    }
  }

  return {
    mode,
    source,
    account,
    container,
    inputDir: flags.inputDir ? resolve(cwd, flags.inputDir) : resolvePath(config, 'input', cwd),
    outputDir: flags.outputDir ? resolve(cwd, flags.outputDir) : resolvePath(config, 'output', cwd),
    pipeline: {
      ages,
      activityPrefix: flags.activityPrefix ?? config.source.activityPrefix,
      obesityPrefix: flags.obesityPrefix ?? config.source.obesityPrefix,
      writeParquet: flags.writeParquet ?? false,
    },
  };
}

// ============================================================================
// Wiring
// ============================================================================

/**
 * Build the source reader and output sink for a plan
 *
 * The credential is only requested when a remote side is selected.
 *
 * @throws ConfigurationError when a remote side has no credential
 */
export function createRuntime(
  plan: RunPlan,
  config: CLIConfig,
  credentials: CredentialProvider,
  logger: PipelineLogger,
  storeFactory: StoreFactory = defaultStoreFactory
): Runtime {
  const needsStore = plan.source === 'remote' || plan.mode === 'write-remote';

  let store: BlobStore | null = null;
  if (needsStore) {
    const credential = credentials.resolve();
    if (!credential) {
      throw new ConfigurationError(
        `Store credential missing: set ${CREDENTIAL_ENV.ACCESS_KEY_ID} and ${CREDENTIAL_ENV.SECRET_ACCESS_KEY}`
      );
    }
    if (!plan.account) {
      throw new ConfigurationError('--account required for the object store');
    }
    store = storeFactory({
      account: plan.account,
      endpointTemplate: config.store.endpoint,
      region: config.store.region,
      forcePathStyle: config.store.forcePathStyle,
      credential,
    });
  }

  return {
    source: createSource(plan, store),
    sink: createSink(plan, store, logger),
  };
}

function requireContainer(plan: RunPlan): string {
  if (!plan.container) {
    throw new ConfigurationError('--container required for the object store');
  }
  return plan.container;
}

function createSource(plan: RunPlan, store: BlobStore | null): SourceReader {
  if (plan.source === 'local') {
    return new LocalSourceReader(plan.inputDir);
  }
  if (!store) {
    throw new ConfigurationError('Remote source selected without a store');
  }
  return new BlobSourceReader(store, requireContainer(plan));
}

function createSink(plan: RunPlan, store: BlobStore | null, logger: PipelineLogger): OutputSink {
  switch (plan.mode) {
    case 'dry-run':
      return new DryRunSink(logger);
    case 'write-local':
      return new LocalSink(plan.outputDir, logger);
    case 'write-remote':
      if (!store) {
        throw new ConfigurationError('Remote sink selected without a store');
      }
      return new RemoteSink(store, requireContainer(plan), logger);
  }
}
