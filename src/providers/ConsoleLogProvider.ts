/**
 * Console-based log provider.
 * Keeps the most recent events in memory for inspection (useful in tests).
 * Optionally writes one JSON line per event to stdout, which is what the
 * function runtime ships to its log drain.
 */

import { LOG_LEVEL_ORDER, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to stdout as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Drop events below this level. Default: 'debug' (keep everything). */
  minLevel?: LogLevel;
  /** Retain at most this many events, dropping the oldest. 0 retains none. Default: 1_000. */
  maxEvents?: number;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all retained events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;
  private readonly maxEvents: number;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
    this.maxEvents = options?.maxEvents ?? 1_000;
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }

    if (this.outputToConsole) {
      console.log(JSON.stringify(stamped));
    }
  }

  async flush(): Promise<void> {
    // Nothing to flush: events are written synchronously.
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

  /** Events at exactly the given level. */
  eventsAt(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
