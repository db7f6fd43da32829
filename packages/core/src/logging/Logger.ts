/**
 * Logger - Lightweight leveled logging for apimeta
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Collected declarations', { functions: 12 });
 *
 *   // Also keep a full debug trace of the run on disk:
 *   const logger = createLogger('warnings', { logFile: 'apimeta.log' });
 */

import { appendFileSync, existsSync, mkdirSync, statSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

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

const METHOD_LABELS: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON stringify that tolerates circular references and bigint values
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} ${safeStringify(context)}`;
}

/**
 * Shared level filtering. Subclasses only decide where a formatted line goes.
 */
abstract class LevelFilteredLogger implements Logger {
  private readonly priority: number;

  constructor(level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: LogMethod, line: string): void;

  private log(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_LEVELS[method]) return;
    this.write(method, formatMessage(`[${METHOD_LABELS[method]}] ${message}`, context));
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
 * Console-based Logger. Methods below the threshold are no-ops.
 */
export class ConsoleLogger extends LevelFilteredLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected write(method: LogMethod, line: string): void {
    switch (method) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'debug':
      case 'trace':
        console.debug(line);
        break;
    }
  }
}

/**
 * File-based Logger
 *
 * Lines carry an ISO timestamp. The file is truncated on construction and
 * appended to synchronously, so nothing is lost when the process exits.
 * Parent directories are created automatically.
 */
export class FileLogger extends LevelFilteredLogger {
  readonly filePath: string;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    this.filePath = resolve(filePath);

    mkdirSync(dirname(this.filePath), { recursive: true });

    if (existsSync(this.filePath) && statSync(this.filePath).isDirectory()) {
      throw new Error(`Cannot write log file: '${this.filePath}' is a directory`);
    }

    writeFileSync(this.filePath, '');
  }

  protected write(_method: LogMethod, line: string): void {
    appendFileSync(this.filePath, `${new Date().toISOString()} ${line}\n`);
  }
}

/**
 * Delegates to several loggers, each applying its own level filter.
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
}

/**
 * Create a Logger with the given console level.
 *
 * With `logFile`, a file logger capturing everything at 'debug' is added
 * next to the console logger.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}

/**
 * Logger that drops everything; the default for library callers.
 */
export const NULL_LOGGER: Logger = new ConsoleLogger('silent');
