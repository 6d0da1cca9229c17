import { describe, it, expect } from 'vitest';
import {
  AppError,
  ComparisonError,
  FileAccessError,
  ParseError,
  UsageError,
  describeError,
  exitCodeFor,
} from '../../src/utils/errors.js';

describe('error taxonomy', () => {
  it('builds every failure on AppError with its own code', () => {
    const errors = [
      new FileAccessError('/tmp/x.ics', 'no such file'),
      new ParseError('bad'),
      new ComparisonError('naive'),
      new UsageError('usage'),
    ];

    expect(errors.every((error) => error instanceof AppError)).toBe(true);
    expect(errors.map((error) => error.code)).toEqual(['FILE_ACCESS', 'PARSE', 'COMPARISON', 'USAGE']);
    expect(errors.map((error) => error.name)).toEqual([
      'FileAccessError',
      'ParseError',
      'ComparisonError',
      'UsageError',
    ]);
    expect(errors.some((error) => error.recoverable)).toBe(false);
  });

  it('maps usage mistakes to 2 and other failures to 1', () => {
    expect(exitCodeFor(new UsageError('usage'))).toBe(2);
    expect(exitCodeFor(new ParseError('bad'))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });

  it('describes thrown non-errors', () => {
    expect(describeError(new ComparisonError('naive'))).toBe('naive');
    expect(describeError(42)).toBe('42');
  });
});
