import { describe, it, expect } from 'vitest';
import {
  buildStatusFilters,
  describeStatusCode,
  formatFilterDate,
  formatSubmissionList,
} from '../../src/core/status-report.js';
import { ValidationError } from '../../src/core/errors.js';

describe('describeStatusCode', () => {
  it.each([
    ['SSFSzz', 'Failed'],
    ['SSPzzz', 'Processing'],
    ['SSSSSS', 'Succeeded'],
    ['SSSSSX', 'Cancelled'],
    ['zzzzzz', 'Not started'],
    ['SSRzzS', 'Succeeded'],
    ['SSRzzz', 'Retrying error'],
    ['SSNzzz', 'Unknown'],
  ])('describes %s as %s', (code, word) => {
    expect(describeStatusCode(code)).toBe(word);
  });
});

describe('buildStatusFilters', () => {
  it('adds nothing without options', () => {
    expect(buildStatusFilters({})).toEqual([]);
  });

  it('adds the active and test filters', () => {
    expect(buildStatusFilters({ activeOnly: true, includeTests: false })).toEqual([
      ['active', '==', true],
      ['test', '==', false],
    ]);
  });

  it('adds date bounds after explicit filters', () => {
    const explicit: Array<['source_id', '^', string]> = [['source_id', '^', 'oxide']];
    expect(
      buildStatusFilters({
        filters: explicit,
        newerThan: [2020, 2, 11],
        olderThan: new Date(Date.UTC(2020, 2, 1, 12, 30)),
      })
    ).toEqual([
      ['source_id', '^', 'oxide'],
      ['submission_time', '>=', '2020-02-11T00:00:00Z'],
      ['submission_time', '<=', '2020-03-01T12:30:00Z'],
    ]);
    expect(explicit).toHaveLength(1);
  });

  it('rejects identical dates', () => {
    const result = buildStatusFilters({ newerThan: [2020, 2, 11], olderThan: [2020, 2, 11] });
    expect(result).toBeInstanceOf(ValidationError);
  });

  it('rejects invalid dates', () => {
    const newer = buildStatusFilters({ newerThan: new Date('not a date') });
    expect(newer).toBeInstanceOf(ValidationError);
    if (newer instanceof ValidationError) {
      expect(newer.message).toBe('newerThan is not a valid date');
    }

    const older = buildStatusFilters({ olderThan: [2020, NaN, 1] });
    expect(older).toBeInstanceOf(ValidationError);
    if (older instanceof ValidationError) {
      expect(older.message).toBe('olderThan is not a valid date');
    }
  });

  it('rejects inverted dates', () => {
    const result = buildStatusFilters({ newerThan: [2020, 2, 12], olderThan: [2020, 2, 11] });
    expect(result).toBeInstanceOf(ValidationError);
    if (result instanceof ValidationError) {
      expect(result.message).toBe('newerThan must be before olderThan');
    }
  });
});

describe('formatFilterDate', () => {
  it('keeps milliseconds when they are not zero', () => {
    expect(formatFilterDate(new Date(Date.UTC(2020, 0, 1, 0, 0, 0, 250)))).toBe(
      '2020-01-01T00:00:00.250Z'
    );
  });
});

describe('formatSubmissionList', () => {
  const submissions = [
    { source_id: 'oxide_v1', active: true, status_code: 'SSPzzz', status_message: 'Step 3 running\n' },
    { source_id: 'metal_v2', active: false, status_code: 'SSSSSS', status_message: 'All done\n' },
  ];

  it('prints one line per submission', () => {
    expect(formatSubmissionList(submissions, false)).toBe(
      'oxide_v1: Processing - Processing\nmetal_v2: Not processing - Succeeded'
    );
  });

  it('prints the full status messages when verbose', () => {
    expect(formatSubmissionList(submissions, true)).toBe(
      '\n\nStep 3 running\nThis submission is still processing.\n' +
        '\n\nAll done\nThis submission is no longer processing.'
    );
  });
});
