/**
 * Log provider for local runs.
 * Keeps every session event in memory so tests can assert on them, and
 * echoes those at or above `minLevel` to stderr. Stdout belongs to the
 * comparison prompts and the printed tier list.
 */

import { meetsLevel, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Echo events to stderr. Default: false. */
  outputToConsole?: boolean;
  /** Lowest level echoed. Everything is still recorded. Default: 'info'. */
  minLevel?: LogLevel;
}

/** `[WARN] Ranking session aborted {"comparisons":3}` */
export function formatLogLine(event: LogEvent): string {
  const fields = event.fields ? ` ${JSON.stringify(event.fields)}` : '';
  return `[${event.level.toUpperCase()}] ${event.message}${fields}`;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Recorded events, oldest first. */
  readonly events: LogEvent[] = [];

  private readonly echo: boolean;
  private readonly minLevel: LogLevel;

  constructor(options: ConsoleLogProviderOptions = {}) {
    this.echo = options.outputToConsole ?? false;
    this.minLevel = options.minLevel ?? 'info';
  }

  log(event: LogEvent): void {
    const recorded: LogEvent = { ...event, timestamp: event.timestamp ?? new Date().toISOString() };
    this.events.push(recorded);

    if (this.echo && meetsLevel(recorded.level, this.minLevel)) {
      console.error(formatLogLine(recorded));
    }
  }

  /** Events are written as they arrive. */
  async flush(): Promise<void> {}

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  clear(): void {
    this.events.length = 0;
  }
}
