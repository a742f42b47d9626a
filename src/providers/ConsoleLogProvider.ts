/**
 * Console-based log provider.
 * Buffers events in memory for inspection (useful in tests).
 * Optionally writes one line per event to stdout.
 */

import { meetsLevel } from './ILogProvider.js';
import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to console.log as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug' (keep everything). */
  minLevel?: LogLevel;
  /** Cap on the in-memory buffer; oldest events are evicted first. Default: 1000. */
  maxBufferedEvents?: number;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;
  private readonly maxBufferedEvents: number;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
    this.maxBufferedEvents = options?.maxBufferedEvents ?? 1000;
  }

  log(event: LogEvent): void {
    if (!meetsLevel(event.level, this.minLevel)) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);
    if (this.events.length > this.maxBufferedEvents) {
      this.events.splice(0, this.events.length - this.maxBufferedEvents);
    }

    if (this.outputToConsole) {
      console.log(formatLine(stamped));
    }
  }

  async flush(): Promise<void> {
    // Nothing to flush; console writes are synchronous.
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

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}

/** `2025-11-12T10:30:00.000Z [INFO] message {"key":"value"}` */
export function formatLine(event: LogEvent): string {
  const prefix = `${event.timestamp ?? ''} [${event.level.toUpperCase()}]`.trim();
  const fieldsStr =
    event.fields && Object.keys(event.fields).length > 0 ? ` ${JSON.stringify(event.fields)}` : '';
  return `${prefix} ${event.message}${fieldsStr}`;
}
