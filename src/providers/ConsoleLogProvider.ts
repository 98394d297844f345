/**
 * Console-based log provider.
 * Buffers events in memory for inspection (useful in tests).
 * Optionally writes to the console: warn and error go to stderr.
 */

import { isLevelEnabled, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to the console as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Drop events below this level. Default: 'debug' (keep everything). */
  minLevel?: LogLevel;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
  }

  log(event: LogEvent): void {
    if (!isLevelEnabled(event.level, this.minLevel)) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);

    if (this.outputToConsole) {
      const { level, message, timestamp: _ts, fields, ...extra } = stamped;
      const merged = { ...extra, ...fields };
      const prefix = `[${level.toUpperCase()}]`;
      const fieldsStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
      const line = `${prefix} ${message}${fieldsStr}`;
      if (level === 'warn' || level === 'error') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  async flush(): Promise<void> {
    // Nothing to flush: events are synchronous.
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

  /** Events whose message matches, for assertions. */
  find(message: string | RegExp): LogEvent[] {
    return this.events.filter((e) =>
      typeof message === 'string' ? e.message === message : message.test(e.message)
    );
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
