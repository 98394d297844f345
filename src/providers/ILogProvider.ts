/**
 * Logging provider interface.
 * Wraps external logging services (Axiom, console, etc).
 */

/** Log severity levels. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** A structured log event. */
export interface LogEvent {
  /** Severity level. */
  level: LogLevel;
  /** Human-readable message. */
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

/** Extended event for HTTP request logging. */
export interface RequestLogEvent extends LogEvent {
  /** HTTP method (GET, POST, etc). */
  method: string;
  /** URL path (e.g. /api/v1/evaluations). */
  path: string;
  /** HTTP response status code. */
  status: number;
  /** Request duration in milliseconds. */
  durationMs: number;
  /** Authenticated operator, if any. */
  operator?: string;
  /** Evaluation addressed by the path, for /evaluations/:id routes. */
  evaluationId?: string;
}

/** Extended event for a single question attempt inside a run. */
export interface DispatchLogEvent extends LogEvent {
  evaluationId?: string;
  questionId: string;
  attempt: number;
  /** Failure reason of the attempt, when it failed. */
  reason?: string;
}

export interface ILogProvider {
  /** Enqueue a structured log event for delivery. */
  log(event: LogEvent): void;

  /** Flush any buffered events. Returns when the flush attempt completes. */
  flush(): Promise<void>;

  /* Convenience methods. None of them block. */
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((known) => known === value);
}

/** True when `level` is at or above `minLevel`. */
export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}
