/**
 * Exit Code Mapping and Output Formatting Tests
 */

import { describe, expect, it } from 'vitest';
import { EXIT_CODES, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import { ConfigError } from '../../../cli/lib/config.js';
import { formatTable } from '../../../cli/lib/output.js';
import {
  AlreadyExistsError,
  MissingFieldError,
  NotFoundError,
  ParseError,
  PartialFailureError,
} from '../../../core/errors.js';

describe('exitCodeFor', () => {
  it('should map precondition failures to 2', () => {
    expect(exitCodeFor(new NotFoundError('gone'))).toBe(EXIT_CODES.PRECONDITION_FAILED);
    expect(exitCodeFor(new AlreadyExistsError('taken'))).toBe(EXIT_CODES.PRECONDITION_FAILED);
    expect(exitCodeFor(new MissingFieldError('league', 'spring.json'))).toBe(2);
  });

  it('should map data integrity failures to 5', () => {
    expect(exitCodeFor(new ParseError('bad json'))).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
    const partial = new PartialFailureError(
      {
        operation: 'clone',
        codename: 'bloom',
        completedSteps: ['copy-rankings'],
        failedStep: 'write-definition',
        rollbackAttempted: true,
        unrestoredSteps: [],
      },
      new Error('disk full')
    );
    expect(exitCodeFor(partial)).toBe(5);
  });

  it('should map config errors to 3 and anything else to 1', () => {
    expect(exitCodeFor(new ConfigError('bad config'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('formatTable', () => {
  it('should pad columns to their widest cell', () => {
    const table = formatTable(
      [
        { cup: 'spring', cp: 1500 },
        { cup: 'ultra-remix', cp: 2500 },
      ],
      [
        { key: 'cup', header: 'Cup' },
        { key: 'cp', header: 'CP', align: 'right' },
      ]
    );

    expect(table.split('\n')).toEqual([
      'Cup         |   CP',
      '------------+-----',
      'spring      | 1500',
      'ultra-remix | 2500',
    ]);
  });

  it('should report an empty table', () => {
    expect(formatTable([], [{ key: 'cup', header: 'Cup' }])).toBe('No entries found.');
  });
});
