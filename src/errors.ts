/**
 * Application error hierarchy.
 * Every error raised by the engine or its collaborators is an AppError
 * carrying a stable code, so the CLI can map it without string matching.
 */

export type ErrorCode =
  | 'EMPTY_INPUT'
  | 'INDETERMINATE_COMPARISON'
  | 'INVALID_BANDS'
  | 'INVALID_RANKING'
  | 'DUPLICATE_ITEM'
  | 'INVALID_TRANSITION'
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'CONFIG_ERROR';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** No items to rank. The sorter returns an empty ranking instead of throwing this. */
export class EmptyInputError extends AppError {
  constructor(message = 'No items to rank') {
    super('EMPTY_INPUT', message);
    this.name = 'EmptyInputError';
  }
}

/** The oracle could not resolve a comparison (user quit, no preference). */
export class IndeterminateComparisonError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INDETERMINATE_COMPARISON', message, details);
    this.name = 'IndeterminateComparisonError';
  }
}

export class InvalidBandsError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_BANDS', message, details);
    this.name = 'InvalidBandsError';
  }
}

export class InvalidRankingError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_RANKING', message, details);
    this.name = 'InvalidRankingError';
  }
}

export class DuplicateItemError extends AppError {
  constructor(key: string) {
    super('DUPLICATE_ITEM', `Duplicate item key "${key}"`, { key });
    this.name = 'DuplicateItemError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super('INVALID_TRANSITION', `Cannot move session from ${from} to ${to}`, { from, to });
    this.name = 'InvalidTransitionError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, details);
    this.name = 'ConfigError';
  }
}
