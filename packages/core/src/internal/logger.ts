/**
 * Structured logging for collection internals.
 *
 * Entries are JSON lines on stderr. Library code only logs at debug level,
 * so nothing is written unless debug mode is switched on through `configure`
 * or TESSERA_DEBUG.
 */

import { getConfig } from '../config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly component: string;
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  readonly component: string;
  /**
   * Overrides the configured debug flag. When omitted, `getConfig().debug`
   * is consulted on every call.
   */
  readonly debugMode?: boolean;
  readonly sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean | undefined;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode;
    this.sink = options.sink ?? stderrSink;
  }

  get debugEnabled(): boolean {
    return this.debugMode ?? getConfig().debug;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugEnabled) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    this.sink(JSON.stringify(entry));
  }
}

export function createLogger(component: string): Logger {
  return new Logger({ component });
}
