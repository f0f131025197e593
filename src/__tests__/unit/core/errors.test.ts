/**
 * Pipeline Error Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DataQualityError,
  TransportError,
  errorMessage,
  isPipelineError,
} from '../../../core/errors.js';

describe('PipelineError subclasses', () => {
  it('map to their exit codes', () => {
    expect(new ConfigurationError('x').exitCode).toBe(3);
    expect(new TransportError('loc', 'x').exitCode).toBe(4);
    expect(new DataQualityError('activity', 'key-unique', 'x').exitCode).toBe(5);
  });

  it('carry their class name', () => {
    const error = new DataQualityError('curated', 'gap-consistency', '1 rows have GAP_pp inconsistent with its measures');

    expect(error.name).toBe('DataQualityError');
    expect(error.kind).toBe('data-quality');
    expect(error).toBeInstanceOf(Error);
    expect(isPipelineError(error)).toBe(true);
  });

  it('summarise a data quality failure with its sample keys', () => {
    const error = new DataQualityError('activity', 'measure-range', '1 rows have ACTIVITY_VAL outside [0,100]', [
      'ARM/11/MALE/2014=105',
    ]);

    expect(error.getSummary()).toBe(
      [
        'Data quality check failed for table "activity"',
        '  Rule: measure-range',
        '  [activity] measure-range: 1 rows have ACTIVITY_VAL outside [0,100]',
        '  Sample keys: ARM/11/MALE/2014=105',
      ].join('\n')
    );
  });

  it('list every other failed check in the summary', () => {
    const error = new DataQualityError('activity', 'measure-range', '1 rows have ACTIVITY_VAL outside [0,100]', ['ARM/11/MALE/2014=105'], {
      checks: [
        { table: 'activity', rule: 'measure-range', column: 'ACTIVITY_VAL', status: 'fail', message: '1 rows have ACTIVITY_VAL outside [0,100]', violations: 1, sampleKeys: ['ARM/11/MALE/2014=105'] },
        { table: 'obesity', rule: 'key-not-null', status: 'pass', message: 'All key values present', violations: 0, sampleKeys: [] },
        { table: 'obesity', rule: 'key-unique', status: 'fail', message: '2 duplicate rows on keys', violations: 2, sampleKeys: ['ARM/15/MALE/2014 (x2)'] },
      ],
    });

    expect(error.getSummary().split('\n').slice(4)).toEqual([
      '  Also failed (1):',
      '    [obesity] key-unique: 2 duplicate rows on keys',
      '      Sample keys: ARM/15/MALE/2014 (x2)',
    ]);
  });

  it('keep the transport cause', () => {
    const cause = new Error('ECONNRESET');
    const error = new TransportError('acct/exports/k', 'Store unreachable: ECONNRESET', cause);

    expect(error.message).toBe('Store unreachable: ECONNRESET (acct/exports/k)');
    expect(error.cause).toBe(cause);
  });
});

describe('errorMessage', () => {
  it('handles non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(isPipelineError(new Error('x'))).toBe(false);
  });
});
