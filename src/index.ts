/**
 * health-etl
 *
 * Library surface of the merge-and-validate pipeline. The CLI in bin/ is a
 * thin layer over these exports.
 *
 * @packageDocumentation
 */

// Core
export {
  AGES,
  SEXES,
  KEY_COLUMNS,
  ACTIVITY_COLUMNS,
  OBESITY_COLUMNS,
  CURATED_COLUMNS,
  MEASURE_MIN,
  MEASURE_MAX,
  formatKey,
  isAge,
  isSex,
  toCompositeKey,
} from './core/types.js';
export type {
  Age,
  Sex,
  KeyedRow,
  LoadedRow,
  CompositeKey,
  ActivityRecord,
  ObesityRecord,
  CuratedRecord,
  TableName,
  TableCounts,
} from './core/types.js';
export {
  EXIT_CODES,
  PipelineError,
  DataQualityError,
  TransportError,
  ConfigurationError,
  isPipelineError,
} from './core/errors.js';
export type { ExitCode, PipelineErrorKind, DataQualityContext } from './core/errors.js';
export { formatBytes } from './core/logging.js';
export type { LogLevel, LogMetadata, PipelineLogger } from './core/logging.js';

// Acquisition
export { findTableBounds, parseTableRows, splitLines, RAW_COLUMNS } from './acquisition/table-bounds.js';
export type { TableBounds } from './acquisition/table-bounds.js';
export { readMeasure, rawFilePath, DEFAULT_PREFIXES, RAW_DIR } from './acquisition/measure-loader.js';
export { LocalSourceReader, BlobSourceReader } from './acquisition/source-reader.js';
export type { SourceReader } from './acquisition/source-reader.js';

// Storage
export { S3BlobStore, resolveEndpoint, describeStoreFailure } from './storage/blob-store.js';
export type { BlobStore, S3BlobStoreOptions } from './storage/blob-store.js';
export {
  EnvCredentialProvider,
  StaticCredentialProvider,
  CREDENTIAL_ENV,
} from './storage/credentials.js';
export type { CredentialProvider, StoreCredential } from './storage/credentials.js';

// Transformation
export { MergePipeline } from './transformation/pipeline.js';
export type {
  PipelineConfig,
  PipelineDependencies,
  PipelineResult,
  ArtifactSummary,
} from './transformation/pipeline.js';
export { mergeMeasures, computeGap } from './transformation/merge.js';
export {
  checkTable,
  checkCuratedTable,
  checkActivityCoverage,
  assertChecks,
} from './transformation/validator.js';
export type { TableCheck, CheckRule, CheckStatus } from './transformation/validator.js';
export { buildArtifacts, toCsv, toParquet } from './transformation/serializers.js';
export type { Artifact, OutputTables } from './transformation/serializers.js';

// Distribution
export { DryRunSink, LocalSink, RemoteSink } from './distribution/sinks.js';
export type { ExecutionMode, OutputSink, PersistResult } from './distribution/sinks.js';
