/**
 * Logging provider interface.
 * Wraps log destinations (stderr, Axiom) behind one structured API.
 */

/** Log severity levels. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Severity order, lowest first. */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** True when `level` is at or above `threshold`. */
export function meetsLevel(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/** A structured log event. */
export interface LogEvent {
  /** Severity level. */
  level: LogLevel;
  /** Human-readable message. */
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata, e.g. sessionId and comparison counts. */
  fields?: Record<string, unknown>;
}

export interface ILogProvider {
  /** Record a structured log event. */
  log(event: LogEvent): void;

  /** Flush any buffered events. Returns when the flush attempt completes. */
  flush(): Promise<void>;

  /* Convenience methods — all non-blocking. */
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}
