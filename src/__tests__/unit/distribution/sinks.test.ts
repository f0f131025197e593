/**
 * Output Sink Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TransportError } from '../../../core/errors.js';
import { DryRunSink, LocalSink, RemoteSink } from '../../../distribution/sinks.js';
import type { Artifact } from '../../../transformation/serializers.js';
import { MemoryBlobStore, RecordingLogger } from '../../utils/mocks.js';

const artifacts: Artifact[] = [
  {
    path: 'processed/activity_merged.csv',
    contentType: 'text/csv; charset=utf-8',
    body: Buffer.from('COUNTRY,AGE,SEX,YEAR,ACTIVITY_VAL\n', 'utf-8'),
    rows: 0,
  },
  {
    path: 'curated/df_merged.csv',
    contentType: 'text/csv; charset=utf-8',
    body: Buffer.from('COUNTRY\nARM\n', 'utf-8'),
    rows: 1,
  },
];

describe('DryRunSink', () => {
  it('plans every artifact and writes none', async () => {
    const logger = new RecordingLogger();
    const result = await new DryRunSink(logger).persist(artifacts);

    expect(result).toEqual({
      written: [],
      planned: ['processed/activity_merged.csv', 'curated/df_merged.csv'],
    });
    expect(logger.entries[1]).toEqual({
      level: 'info',
      message: 'Dry run: skipping write',
      metadata: { path: 'curated/df_merged.csv', rows: 1, size: '12 B' },
    });
  });
});

describe('LocalSink', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'health-etl-sink-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates layer directories and writes the bodies', async () => {
    const result = await new LocalSink(root, new RecordingLogger()).persist(artifacts);

    expect(result.written).toEqual([
      join(root, 'processed/activity_merged.csv'),
      join(root, 'curated/df_merged.csv'),
    ]);
    expect(await readFile(join(root, 'curated', 'df_merged.csv'), 'utf-8')).toBe('COUNTRY\nARM\n');
  });

  it('overwrites existing files', async () => {
    const sink = new LocalSink(root, new RecordingLogger());
    await sink.persist(artifacts);
    await sink.persist(artifacts);

    expect(await readFile(join(root, 'curated', 'df_merged.csv'), 'utf-8')).toBe('COUNTRY\nARM\n');
  });

  it('raises a TransportError when the target cannot be created', async () => {
    const blocker = join(root, 'blocked');
    await writeFile(blocker, 'not a directory');

    await expect(new LocalSink(blocker, new RecordingLogger()).persist(artifacts)).rejects.toBeInstanceOf(
      TransportError
    );
  });
});

describe('RemoteSink', () => {
  it('puts every artifact into the container and returns store locations', async () => {
    const store = new MemoryBlobStore();
    const result = await new RemoteSink(store, 'exports', new RecordingLogger()).persist(artifacts);

    expect(result).toEqual({
      written: [
        'test-account/exports/processed/activity_merged.csv',
        'test-account/exports/curated/df_merged.csv',
      ],
      planned: [],
    });
    expect(store.calls).toEqual([
      { op: 'put', container: 'exports', key: 'processed/activity_merged.csv' },
      { op: 'put', container: 'exports', key: 'curated/df_merged.csv' },
    ]);
  });
});
