/**
 * File-based logging.
 *
 * stdout carries the editor frame, so log lines only ever go to a file.
 * With no file configured every call is a no-op.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Path to the log file. Logging is disabled when absent. */
  logFile?: string;
  level?: LogLevel;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LogSink {
  file: string | null;
  level: LogLevel;
}

const sink: LogSink = { file: null, level: 'info' };

/** Point every logger at a file (or disable with no file). */
export function configureLogging(options: LoggerOptions): void {
  sink.level = options.level ?? 'info';
  sink.file = options.logFile ?? null;
  if (sink.file !== null) {
    mkdirSync(dirname(sink.file), { recursive: true });
  }
}

export function formatLogLine(
  timestamp: Date,
  level: LogLevel,
  scope: string,
  message: string,
  context?: Record<string, unknown>,
): string {
  const ctx = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `${timestamp.toISOString()} ${level.toUpperCase().padEnd(5)} [${scope}] ${message}${ctx}\n`;
}

export class Logger {
  readonly scope: string;

  constructor(scope: string) {
    this.scope = scope;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const detail = error instanceof Error ? error.message : error === undefined ? undefined : String(error);
    this.write('error', message, detail === undefined ? context : { ...context, error: detail });
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (sink.file === null || LOG_LEVELS[level] < LOG_LEVELS[sink.level]) return;
    appendFileSync(sink.file, formatLogLine(new Date(), level, this.scope, message, context));
  }
}

export function getLogger(scope: string): Logger {
  return new Logger(scope);
}
