/**
 * Logger - Lightweight logging for config loading and validation
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context support for structured logging
 * - Console (stderr) and file output, or both via MultiLogger
 * - Safe handling of circular references
 *
 * Console output goes to stderr so commands that print a document
 * (`docsite dump`) keep stdout clean.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Loaded config', { path: 'mkdocs.yml' });
 *
 *   const logger = createLogger('warnings', { logFile: '.docsite/check.log' });
 */

import { createWriteStream, existsSync, writeFileSync, mkdirSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@docsite/types';

export type { Logger, LogLevel };

type LogMethod = keyof Logger;

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Minimum level required for each method
 */
const METHOD_LEVELS: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_TAGS: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Safe JSON stringify that handles circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

/**
 * Format log message with optional context
 */
export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Shared level filtering. Subclasses only decide where a line goes.
 */
abstract class LevelLogger implements Logger {
  private readonly priority: number;

  constructor(logLevel: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
  }

  protected abstract write(method: LogMethod, message: string, context?: Record<string, unknown>): void;

  private log(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_LEVELS[method]) return;
    this.write(method, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }
}

/**
 * Console-based Logger implementation
 *
 * Respects log level threshold - methods below threshold are no-ops.
 */
export class ConsoleLogger extends LevelLogger {
  constructor(logLevel: LogLevel = 'info') {
    super(logLevel);
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    console.error(formatMessage(`[${METHOD_TAGS[method]}] ${message}`, context));
  }
}

/**
 * File-based Logger implementation
 *
 * Writes lines with ISO timestamps through a write stream. The file is
 * truncated on construction and parent directories are created.
 * Throws on construction if the path points to a directory.
 */
export class FileLogger extends LevelLogger {
  private readonly stream: WriteStream;
  readonly filePath: string;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    const resolvedPath = resolve(filePath);
    this.filePath = resolvedPath;

    mkdirSync(dirname(resolvedPath), { recursive: true });

    if (existsSync(resolvedPath) && statSync(resolvedPath).isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      console.error(`[ERROR] Log file write failed: ${err.message}`);
    });
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${METHOD_TAGS[method]}] ${message}`, context) + '\n');
  }

  /** Flush and close the write stream. Resolves when all data is written. */
  close(): Promise<void> {
    return new Promise((resolveClose) => {
      this.stream.end(resolveClose);
    });
  }
}

/**
 * Logger that fans out to several loggers, each filtering on its own level.
 */
export class MultiLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(loggers: Logger[]) {
    this.loggers = loggers;
  }

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  /** Close every inner FileLogger. */
  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Logger that drops everything. Default for library calls.
 */
export const silentLogger: Logger = new ConsoleLogger('silent');

/**
 * Create a Logger with the given console level.
 *
 * With `logFile`, returns a MultiLogger writing to console and file;
 * the file always captures at 'debug' level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}
