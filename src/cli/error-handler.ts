/**
 * CLI error mapping.
 * AppError subclasses keep their code, message and details and get an exit
 * code; Ctrl+C at a prompt becomes INTERRUPTED; unknown errors become
 * INTERNAL_ERROR.
 */

import { AppError, type ErrorCode } from '../errors.js';

export interface CliError {
  code: ErrorCode | 'INTERRUPTED' | 'INTERNAL_ERROR';
  message: string;
  details?: Record<string, unknown>;
  exitCode: number;
}

/** Conventional exit status for a run interrupted by the user. */
export const EXIT_ABORTED = 130;
/** Bad input or configuration; rerunning unchanged will fail again. */
export const EXIT_USAGE = 2;
export const EXIT_FAILURE = 1;

const EXIT_CODES: Record<ErrorCode, number> = {
  INDETERMINATE_COMPARISON: EXIT_ABORTED,
  INVALID_BANDS: EXIT_USAGE,
  INVALID_RANKING: EXIT_USAGE,
  INVALID_INPUT: EXIT_USAGE,
  DUPLICATE_ITEM: EXIT_USAGE,
  NOT_FOUND: EXIT_USAGE,
  CONFIG_ERROR: EXIT_USAGE,
  EMPTY_INPUT: EXIT_FAILURE,
  INVALID_TRANSITION: EXIT_FAILURE,
};

export function toCliError(err: unknown): CliError {
  if (err instanceof AppError) {
    return {
      code: err.code,
      message: err.message,
      ...(err.details && { details: err.details }),
      exitCode: EXIT_CODES[err.code],
    };
  }

  // @inquirer/prompts rejects with ExitPromptError when a prompt is closed
  if (err instanceof Error && err.name === 'ExitPromptError') {
    return {
      code: 'INTERRUPTED',
      message: 'Interrupted',
      exitCode: EXIT_ABORTED,
    };
  }

  // Unknown error — the log gets the detail, the user a stable message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    exitCode: EXIT_FAILURE,
  };
}

export function formatCliError(error: CliError): string {
  if (error.code === 'INDETERMINATE_COMPARISON') {
    return `Aborted: ${error.message}. Nothing was saved; start the session again to rank.`;
  }
  if (error.code === 'INTERRUPTED') {
    return 'Interrupted. Bye.';
  }
  return `Error [${error.code}]: ${error.message}`;
}
