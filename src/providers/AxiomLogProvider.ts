/**
 * Axiom log provider.
 * Buffers events and sends them in batches to Axiom's ingest API.
 * Delivery never blocks or fails a request: a failed flush keeps the batch
 * for the next attempt. The first failure of an outage is reported on stderr,
 * the platform's own log stream, and nothing more until a flush succeeds.
 * No-op when apiToken is empty.
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  dataset: string;
  /** Added to every event as `service`. Default: 'feedback-insights'. */
  service?: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000. 0 disables. */
  flushIntervalMs?: number;
  /** Oldest events are dropped beyond this many. Default: 1_000. */
  maxBuffered?: number;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider implements ILogProvider {
  private buffer: Array<LogEvent & { service: string }> = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly service: string;
  private readonly flushThreshold: number;
  private readonly flushIntervalMs: number;
  private readonly maxBuffered: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;
  private failing = false;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.service = options.service ?? 'feedback-insights';
    this.flushThreshold = options.flushThreshold ?? 50;
    this.flushIntervalMs = options.flushIntervalMs ?? 10_000;
    this.maxBuffered = options.maxBuffered ?? 1_000;
    this.enabled = Boolean(this.apiToken);

    if (this.enabled && this.flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, this.flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  log(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      service: this.service,
    });

    if (this.buffer.length > this.maxBuffered) {
      this.buffer.splice(0, this.buffer.length - this.maxBuffered);
    }

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
        this.failing = false;
      } else {
        this.reportFailure(`Axiom ingest returned ${response.status}`);
      }
    } catch (err) {
      this.reportFailure(err instanceof Error ? err.message : String(err));
    }
  }

  private reportFailure(error: string): void {
    if (this.failing) return;
    this.failing = true;
    console.warn(
      JSON.stringify({
        level: 'warn',
        message: 'Axiom flush failed; events kept for retry',
        service: this.service,
        fields: { error, buffered: this.buffer.length },
      })
    );
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
