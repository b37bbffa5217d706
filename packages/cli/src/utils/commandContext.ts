/**
 * Shared plumbing for commands: output sinks, logger setup, config loading.
 *
 * Each command is a `runX(options, context)` function returning an exit
 * code, so it can be driven without a child process.
 */

import type { Command } from 'commander';
import {
  DocsiteError,
  MultiLogger,
  createLogger,
  isLogLevel,
  loadConfig,
  type LoadedConfig,
  type Logger,
} from '@docsite/core';
import { formatDocsiteError } from './errorFormatter.js';

export interface CommandIO {
  /** Command output (stdout) */
  out(line: string): void;
  /** Errors and status (stderr) */
  err(line: string): void;
  color: boolean;
}

export const processIO: CommandIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  color: process.stdout.isTTY === true && !process.env.NO_COLOR,
};

export interface CommandContext {
  io: CommandIO;
  logger: Logger;
}

/**
 * Options every command takes for locating the project.
 */
export interface ProjectOptions {
  project: string;
  configFile?: string;
}

/**
 * Options declared on the root program.
 */
export type GlobalOptions = {
  logLevel: string;
  logFile?: string;
};

/**
 * Build the context for an action from the root program's options.
 *
 * @throws Error for an unknown log level
 */
export function contextFromCommand(command: Command): CommandContext {
  const globals = command.optsWithGlobals<GlobalOptions>();
  if (!isLogLevel(globals.logLevel)) {
    throw new Error(`Unknown log level: ${globals.logLevel}`);
  }
  return {
    io: processIO,
    logger: createLogger(globals.logLevel, { logFile: globals.logFile }),
  };
}

/**
 * Flush the log file, if any, once a command is done.
 */
export async function closeContext(context: CommandContext): Promise<void> {
  if (context.logger instanceof MultiLogger) {
    await context.logger.close();
  }
}

/**
 * Run a command body against a commander action and set the exit code.
 */
export async function runAction<T>(
  command: Command,
  options: T,
  run: (options: T, context: CommandContext) => number
): Promise<void> {
  const context = contextFromCommand(command);
  try {
    process.exitCode = run(options, context);
  } finally {
    await closeContext(context);
  }
}

/**
 * Load the project's config, printing a formatted error on failure.
 *
 * @returns null when loading failed (the error is already printed)
 */
export function loadProject(options: ProjectOptions, context: CommandContext): LoadedConfig | null {
  try {
    return loadConfig(options.project, { configFile: options.configFile, logger: context.logger });
  } catch (err) {
    reportError(err, context);
    return null;
  }
}

/**
 * Print a DocsiteError; rethrow anything else.
 */
export function reportError(err: unknown, context: CommandContext): void {
  if (!(err instanceof DocsiteError)) {
    throw err;
  }
  for (const line of formatDocsiteError(err)) {
    context.io.err(line);
  }
}
