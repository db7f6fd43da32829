/**
 * Compile command action - loads config, runs the compile pipeline, reports errors.
 *
 * Kept apart from compile.ts so the action can run without commander and
 * without exiting the process.
 */

import { resolve } from 'path';
import {
  compileToFile,
  createLogger,
  findConfigFile,
  isLogLevel,
  loadConfig,
  LOG_LEVELS,
  type LogLevel,
} from '@apimeta/core';
import { printError, formatFailure } from '../utils/errorFormatter.js';

export interface CompileCommandOptions {
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
  logLevel?: string;
  logFile?: string;
}

export function exitWithCode(code: number, exitFn: (code: number) => void = process.exit): void {
  exitFn(code);
}

/**
 * Determine log level from CLI options.
 * Priority: --log-level > --quiet > --verbose > default ('warnings')
 *
 * @returns undefined for an unknown --log-level value
 */
export function getLogLevel(options: Pick<CompileCommandOptions, 'quiet' | 'verbose' | 'logLevel'>): LogLevel | undefined {
  if (options.logLevel !== undefined) {
    return isLogLevel(options.logLevel) ? options.logLevel : undefined;
  }
  if (options.quiet) return 'errors';
  if (options.verbose) return 'info';
  return 'warnings';
}

/**
 * Compile `input` into `output`.
 *
 * @returns the process exit code: 0 once the output is written, 1 on any error
 */
export function compileAction(input: string, output: string, options: CompileCommandOptions = {}): number {
  const logLevel = getLogLevel(options);
  if (logLevel === undefined) {
    printError(`Unknown log level "${options.logLevel}"`, [`Use one of: ${LOG_LEVELS.join(', ')}`]);
    return 1;
  }

  try {
    const logFile = options.logFile ? resolve(options.logFile) : undefined;
    const logger = createLogger(logLevel, logFile ? { logFile } : undefined);

    const configPath = options.config ?? findConfigFile(input);
    const config = loadConfig(configPath, logger);

    compileToFile(input, output, { config, logger });
    return 0;
  } catch (err) {
    const { title, nextSteps } = formatFailure(err);
    printError(title, nextSteps);
    return 1;
  }
}
