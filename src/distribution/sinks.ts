/**
 * Output Sinks
 *
 * The execution mode only decides which sink receives the serialized
 * artifacts; validation is identical in every mode.
 *
 * - dry-run: records what would be written, touches nothing
 * - local: writes under an output directory
 * - remote: writes into a store container
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { TransportError, errorMessage } from '../core/errors.js';
import type { PipelineLogger } from '../core/logging.js';
import { formatBytes } from '../core/logging.js';
import type { BlobStore } from '../storage/blob-store.js';
import type { Artifact } from '../transformation/serializers.js';

export type ExecutionMode = 'dry-run' | 'write-local' | 'write-remote';

export interface PersistResult {
  /** Locations written, in artifact order */
  readonly written: readonly string[];
  /** Locations that would have been written (dry run only) */
  readonly planned: readonly string[];
}

export interface OutputSink {
  readonly mode: ExecutionMode;
  persist(artifacts: readonly Artifact[]): Promise<PersistResult>;
}

/**
 * Validation-only sink
 */
export class DryRunSink implements OutputSink {
  readonly mode = 'dry-run';

  constructor(private readonly logger: PipelineLogger) {}

  async persist(artifacts: readonly Artifact[]): Promise<PersistResult> {
    for (const artifact of artifacts) {
      this.logger.info('Dry run: skipping write', {
        path: artifact.path,
        rows: artifact.rows,
        size: formatBytes(artifact.body.byteLength),
      });
    }
    return { written: [], planned: artifacts.map((artifact) => artifact.path) };
  }
}

/**
 * Writes artifacts below a local directory
 */
export class LocalSink implements OutputSink {
  readonly mode = 'write-local';

  constructor(
    private readonly rootDir: string,
    private readonly logger: PipelineLogger
  ) {}

  async persist(artifacts: readonly Artifact[]): Promise<PersistResult> {
    const written: string[] = [];
    for (const artifact of artifacts) {
      const path = join(this.rootDir, artifact.path);
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, artifact.body);
      } catch (error) {
        throw new TransportError(path, `Cannot write file: ${errorMessage(error)}`, error);
      }
      this.logger.info('Wrote artifact', {
        location: path,
        rows: artifact.rows,
        size: formatBytes(artifact.body.byteLength),
      });
      written.push(path);
    }
    return { written, planned: [] };
  }
}

/**
 * Writes artifacts into a store container
 */
export class RemoteSink implements OutputSink {
  readonly mode = 'write-remote';

  constructor(
    private readonly store: BlobStore,
    private readonly container: string,
    private readonly logger: PipelineLogger
  ) {}

  async persist(artifacts: readonly Artifact[]): Promise<PersistResult> {
    const written: string[] = [];
    for (const artifact of artifacts) {
      const location = await this.store.put(
        this.container,
        artifact.path,
        artifact.body,
        artifact.contentType
      );
      this.logger.info('Wrote artifact', {
        location,
        rows: artifact.rows,
        size: formatBytes(artifact.body.byteLength),
      });
      written.push(location);
    }
    return { written, planned: [] };
  }
}
