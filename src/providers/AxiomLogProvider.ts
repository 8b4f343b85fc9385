/**
 * Axiom log provider.
 * Buffers session events and ships them in batches to Axiom's ingest API.
 * Non-blocking: failed batches stay buffered for the next flush.
 * Degrades to a no-op when apiToken is empty.
 */

import { meetsLevel, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  /** Axiom dataset name. */
  dataset: string;
  /** Merged into every event's fields, e.g. { service: 'album-tiers' }. */
  defaultFields?: Record<string, unknown>;
  /** Events below this level are dropped. Default: 'info'. */
  minLevel?: LogLevel;
  /** Flush after this many buffered events. Default: 25. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000 (10s). 0 disables. */
  flushIntervalMs?: number;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider implements ILogProvider {
  private buffer: LogEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly defaultFields: Record<string, unknown>;
  private readonly minLevel: LogLevel;
  private readonly flushThreshold: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;

  /** Reason the most recent flush failed, or null after a successful one. */
  lastFlushError: string | null = null;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.defaultFields = options.defaultFields ?? {};
    this.minLevel = options.minLevel ?? 'info';
    this.flushThreshold = options.flushThreshold ?? 25;
    this.enabled = Boolean(this.apiToken);

    const flushIntervalMs = options.flushIntervalMs ?? 10_000;
    if (this.enabled && flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, flushIntervalMs);
      // A CLI run must be able to exit while the timer is pending
      this.flushTimer.unref();
    }
  }

  /** Number of events waiting to be sent. */
  get pending(): number {
    return this.buffer.length;
  }

  log(event: LogEvent): void {
    if (!this.enabled || !meetsLevel(event.level, this.minLevel)) return;

    this.buffer.push({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      fields: { ...this.defaultFields, ...event.fields },
    });

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;

    const batch = [...this.buffer];

    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });

      if (response.ok) {
        // Only clear the events that were in this batch
        this.buffer.splice(0, batch.length);
        this.lastFlushError = null;
      } else {
        this.lastFlushError = `Axiom ingest returned ${response.status}`;
      }
    } catch (err) {
      this.lastFlushError = err instanceof Error ? err.message : String(err);
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

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
}
