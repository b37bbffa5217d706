/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { DocsiteError, MissingFileError } from '@docsite/core';

/**
 * Lines of a standardized error message.
 */
export function formatError(title: string, nextSteps?: string[]): string[] {
  const lines = [`✗ ${title}`];
  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines;
}

/**
 * Lines for a DocsiteError: the message (with file and line when known),
 * one line per missing file, then the suggestion as the next step.
 */
export function formatDocsiteError(error: DocsiteError): string[] {
  const { filePath, lineNumber } = error.context;
  let title = error.message;
  if (filePath && lineNumber) {
    title += ` (${filePath}:${lineNumber})`;
  }

  const lines = [`✗ ${title}`];
  if (error instanceof MissingFileError) {
    for (const ref of error.missing) {
      lines.push(`  - ${ref.path} (${ref.location})`);
    }
  }
  if (error.suggestion) {
    lines.push('');
    lines.push(`→ ${error.suggestion}`);
  }
  return lines;
}

/**
 * Print a standardized error message and exit.
 *
 * @example
 * exitWithError('No config file found', [
 *   'Run: docsite check -p path/to/project'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  for (const line of formatError(title, nextSteps)) {
    console.error(line);
  }
  process.exit(1);
}
