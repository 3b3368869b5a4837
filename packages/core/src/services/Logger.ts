/**
 * Logger Service
 *
 * Structured logging through pino. Components take an optional logger
 * and derive their own with `logger.child({ component })`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import pino from 'pino';
import type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for dependency injection
 */
export type ILogger = Logger;

export interface LoggerOptions {
  level?: LogLevel;
  /** Log file path. Logs go to stdout when omitted. */
  file?: string;
  /** Extra bindings attached to every line */
  name?: string;
}

/**
 * Create the root logger for a process.
 */
export function createLogger(options: LoggerOptions = {}): ILogger {
  const { level = 'info', file, name = 'taskdock' } = options;

  if (!file) {
    return pino({ name, level });
  }

  fs.mkdirSync(path.dirname(file), { recursive: true });
  return pino({ name, level }, pino.destination({ dest: file, sync: false }));
}

/**
 * Logger that discards everything. Used by tests and embedders that bring no logger.
 */
export function createNullLogger(): ILogger {
  return pino({ level: 'silent' });
}
