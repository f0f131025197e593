/**
 * Merge-and-Validate Pipeline
 *
 * load → validate sources → inner join → validate curated → serialize → sink
 *
 * Steps before the sink are pure computation over in-memory tables. Every
 * artifact is serialized before the first write, and nothing reaches the sink
 * unless every check passed.
 *
 * DETERMINISTIC: Same extracts + same options → byte-identical artifacts
 */

import { readMeasure } from '../acquisition/measure-loader.js';
import type { SourceReader } from '../acquisition/source-reader.js';
import type { PipelineLogger } from '../core/logging.js';
import type { ActivityRecord, CuratedRecord, ObesityRecord } from '../core/types.js';
import type { ExecutionMode, OutputSink } from '../distribution/sinks.js';
import { mergeMeasures } from './merge.js';
import { buildArtifacts } from './serializers.js';
import {
  assertChecks,
  checkActivityCoverage,
  checkCuratedTable,
  checkTable,
  narrowRows,
  sourceMeasureRule,
} from './validator.js';
import type { TableCheck } from './validator.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What to read and what to emit
 */
export interface PipelineConfig {
  /** Age groups to read, in stacking order */
  readonly ages: readonly number[];
  readonly activityPrefix: string;
  readonly obesityPrefix: string;
  /** Also emit Parquet artifacts */
  readonly writeParquet: boolean;
}

/**
 * Collaborators chosen at startup
 */
export interface PipelineDependencies {
  readonly source: SourceReader;
  readonly sink: OutputSink;
  readonly logger: PipelineLogger;
}

export interface ArtifactSummary {
  readonly path: string;
  readonly rows: number;
  readonly bytes: number;
}

export interface PipelineResult {
  readonly mode: ExecutionMode;
  readonly counts: {
    readonly activity: number;
    readonly obesity: number;
    readonly curated: number;
  };
  /** Every check that ran, sources first */
  readonly checks: readonly TableCheck[];
  readonly artifacts: readonly ArtifactSummary[];
  readonly written: readonly string[];
  readonly planned: readonly string[];
  /** Curated rows, in output order */
  readonly curated: readonly CuratedRecord[];
}

// ============================================================================
// Pipeline
// ============================================================================

export class MergePipeline {
  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: PipelineDependencies
  ) {}

  async run(): Promise<PipelineResult> {
    const { source, sink, logger } = this.deps;

    // STEP 1: Load
    const activityRows = await readMeasure(
      source,
      { table: 'activity', ages: this.config.ages, prefix: this.config.activityPrefix },
      logger
    );
    const obesityRows = await readMeasure(
      source,
      { table: 'obesity', ages: this.config.ages, prefix: this.config.obesityPrefix },
      logger
    );
    logger.info('Row counts', { activity: activityRows.length, obesity: obesityRows.length });

    // STEP 2: Source checks
    const sourceChecks = [
      ...checkTable('activity', activityRows, [sourceMeasureRule('ACTIVITY_VAL')]),
      ...checkTable('obesity', obesityRows, [sourceMeasureRule('OBESITY_VAL')]),
    ];
    assertChecks(sourceChecks, { activity: activityRows.length, obesity: obesityRows.length });

    const activity = narrowRows<ActivityRecord>('activity', activityRows, (key, value) => ({
      ...key,
      ACTIVITY_VAL: value,
    }));
    const obesity = narrowRows<ObesityRecord>('obesity', obesityRows, (key, value) => ({
      ...key,
      OBESITY_VAL: value,
    }));

    // STEP 3-4: Join + GAP_pp
    const curated = mergeMeasures(activity, obesity);
    logger.info('Merged rows (inner on COUNTRY, AGE, SEX, YEAR)', { curated: curated.length });

    // STEP 5: Curated checks
    const curatedChecks = checkCuratedTable(curated, {
      activity: activity.length,
      obesity: obesity.length,
    });
    assertChecks([...sourceChecks, ...curatedChecks], {
      activity: activity.length,
      obesity: obesity.length,
      curated: curated.length,
    });

    const coverage = checkActivityCoverage(activity, obesity);
    if (coverage.status === 'warn') {
      logger.warn(coverage.message, { sample: coverage.sampleKeys });
    }

    // STEP 6: Serialize, then persist
    const artifacts = await buildArtifacts(
      { activity, obesity, curated },
      { writeParquet: this.config.writeParquet }
    );
    const persisted = await sink.persist(artifacts);

    return {
      mode: sink.mode,
      counts: { activity: activity.length, obesity: obesity.length, curated: curated.length },
      checks: [...sourceChecks, ...curatedChecks, coverage],
      artifacts: artifacts.map((artifact) => ({
        path: artifact.path,
        rows: artifact.rows,
        bytes: artifact.body.byteLength,
      })),
      written: persisted.written,
      planned: persisted.planned,
      curated,
    };
  }
}
