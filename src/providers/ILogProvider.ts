/**
 * Logging provider interface.
 * Everything in the service logs through this; main.ts picks the implementation.
 */

/** Log severity levels, lowest first. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** A structured log event. */
export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

/** Extended event for HTTP request logging. */
export interface RequestLogEvent extends LogEvent {
  method: string;
  /** URL path without the query string. */
  path: string;
  status: number;
  durationMs: number;
  requestId: string;
}

export interface ILogProvider {
  /** Record a structured log event. Never throws. */
  log(event: LogEvent): void;

  /** Flush any buffered events. Returns when the flush attempt completes. */
  flush(): Promise<void>;

  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** True when `level` is at or above `threshold`. */
export function meetsLevel(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}
