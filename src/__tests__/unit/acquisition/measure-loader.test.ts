/**
 * Measure Loader Tests
 */

import { describe, it, expect } from 'vitest';
import { rawFilePath, readMeasure } from '../../../acquisition/measure-loader.js';
import { TransportError } from '../../../core/errors.js';
import { buildExtract } from '../../utils/fixtures.js';
import { MemorySourceReader, RecordingLogger } from '../../utils/mocks.js';

const PREFIX = 'Test measure among';

describe('rawFilePath', () => {
  it('names the extract by prefix and age', () => {
    expect(rawFilePath('Percentages of physically active children among', 11)).toBe(
      'raw/Percentages of physically active children among 11-year-olds.csv'
    );
  });
});

describe('readMeasure', () => {
  it('stacks ages in the order given', async () => {
    const reader = new MemorySourceReader(
      new Map([
        [rawFilePath(PREFIX, 11), buildExtract([{ country: 'ARM', sex: 'MALE', year: 2010, value: 20 }])],
        [rawFilePath(PREFIX, 15), buildExtract([{ country: 'ARM', sex: 'MALE', year: 2010, value: 40 }])],
      ])
    );
    const logger = new RecordingLogger();

    const rows = await readMeasure(reader, { table: 'activity', ages: [15, 11], prefix: PREFIX }, logger);

    expect(rows).toEqual([
      { COUNTRY: 'ARM', AGE: 15, SEX: 'MALE', YEAR: 2010, VALUE: 40 },
      { COUNTRY: 'ARM', AGE: 11, SEX: 'MALE', YEAR: 2010, VALUE: 20 },
    ]);
    expect(reader.reads).toEqual([rawFilePath(PREFIX, 15), rawFilePath(PREFIX, 11)]);
    expect(logger.entries[0]).toEqual({
      level: 'info',
      message: 'Located table in raw extract',
      metadata: { table: 'activity', file: rawFilePath(PREFIX, 15), header_idx: 2, data_rows: 1 },
    });
  });

  it('skips a file with no data rows and warns', async () => {
    const reader = new MemorySourceReader(
      new Map([
        [rawFilePath(PREFIX, 11), buildExtract([])],
        [rawFilePath(PREFIX, 13), buildExtract([{ country: 'AUT', sex: 'FEMALE', year: 2006, value: 23 }])],
      ])
    );
    const logger = new RecordingLogger();

    const rows = await readMeasure(reader, { table: 'obesity', ages: [11, 13], prefix: PREFIX }, logger);

    expect(rows).toEqual([{ COUNTRY: 'AUT', AGE: 13, SEX: 'FEMALE', YEAR: 2006, VALUE: 23 }]);
    expect(logger.messages('warn')).toEqual(['No data rows detected; skipping']);
  });

  it('propagates a missing file as a TransportError', async () => {
    const reader = new MemorySourceReader(new Map());

    await expect(
      readMeasure(reader, { table: 'activity', ages: [11], prefix: PREFIX }, new RecordingLogger())
    ).rejects.toBeInstanceOf(TransportError);
  });
});
