import { describe, it, expect } from 'vitest';
import {
  EXIT_ABORTED,
  EXIT_FAILURE,
  EXIT_USAGE,
  formatCliError,
  toCliError,
} from '../../src/cli/error-handler.js';
import {
  ConfigError,
  DuplicateItemError,
  EmptyInputError,
  IndeterminateComparisonError,
  InvalidBandsError,
  NotFoundError,
} from '../../src/errors.js';

describe('toCliError', () => {
  it('should keep the code, message and details of app errors', () => {
    expect(toCliError(new DuplicateItemError('a'))).toEqual({
      code: 'DUPLICATE_ITEM',
      message: 'Duplicate item key "a"',
      details: { key: 'a' },
      exitCode: EXIT_USAGE,
    });
  });

  it('should omit details when the error has none', () => {
    const error = toCliError(new NotFoundError('Tier list "x" not found'));
    expect(error).toEqual({ code: 'NOT_FOUND', message: 'Tier list "x" not found', exitCode: EXIT_USAGE });
  });

  it('should map exit codes by error kind', () => {
    expect(toCliError(new IndeterminateComparisonError('Comparison aborted')).exitCode).toBe(EXIT_ABORTED);
    expect(toCliError(new InvalidBandsError('bad')).exitCode).toBe(EXIT_USAGE);
    expect(toCliError(new ConfigError('bad')).exitCode).toBe(EXIT_USAGE);
    expect(toCliError(new EmptyInputError('empty')).exitCode).toBe(EXIT_FAILURE);
  });

  it('should treat a closed prompt as an interruption', () => {
    const closed = new Error('User force closed the prompt with SIGINT');
    closed.name = 'ExitPromptError';

    expect(toCliError(closed)).toEqual({
      code: 'INTERRUPTED',
      message: 'Interrupted',
      exitCode: EXIT_ABORTED,
    });
  });

  it('should hide the message of unknown errors', () => {
    expect(toCliError(new TypeError('x is undefined'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      exitCode: EXIT_FAILURE,
    });
    expect(toCliError('boom').code).toBe('INTERNAL_ERROR');
  });
});

describe('formatCliError', () => {
  it('should explain that an aborted session saved nothing', () => {
    const error = toCliError(new IndeterminateComparisonError('Comparison aborted'));
    expect(formatCliError(error)).toBe(
      'Aborted: Comparison aborted. Nothing was saved; start the session again to rank.'
    );
  });

  it('should say goodbye after an interruption', () => {
    const closed = new Error('User force closed the prompt with SIGINT');
    closed.name = 'ExitPromptError';
    expect(formatCliError(toCliError(closed))).toBe('Interrupted. Bye.');
  });

  it('should prefix other errors with their code', () => {
    expect(formatCliError(toCliError(new InvalidBandsError('Band 1 score must be a finite number')))).toBe(
      'Error [INVALID_BANDS]: Band 1 score must be a finite number'
    );
  });
});
