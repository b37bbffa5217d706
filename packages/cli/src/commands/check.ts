/**
 * Check command - load a site config and report every problem found
 *
 * Loading errors (bad YAML, unknown extensions) stop the run; everything
 * after that is collected: missing files, unknown plugins, theme and i18n
 * findings.
 */

import { Command, Option } from 'commander';
import {
  DiagnosticCollector,
  DiagnosticReporter,
  DocsiteError,
  REPORT_FORMATS,
  checkConfig,
  loadConfig,
  type ReportFormat,
} from '@docsite/core';
import { runAction, type CommandContext, type ProjectOptions } from '../utils/commandContext.js';
import { formatError } from '../utils/errorFormatter.js';
import { formatStatus } from '../utils/output.js';

export interface CheckCommandOptions extends ProjectOptions {
  format: string;
  quiet?: boolean;
  strict?: boolean;
}

/**
 * @returns 0 when clean, 1 on errors (or warnings with `--strict` or `strict: true`)
 */
export function runCheck(options: CheckCommandOptions, context: CommandContext): number {
  const { io, logger } = context;
  const format: ReportFormat | undefined = REPORT_FORMATS.find(f => f === options.format);
  if (!format) {
    for (const line of formatError(`Unknown format: ${options.format}`, [`Use one of: ${REPORT_FORMATS.join(', ')}`])) {
      io.err(line);
    }
    return 1;
  }

  const collector = new DiagnosticCollector();
  let strict = options.strict === true;
  try {
    const loaded = loadConfig(options.project, { configFile: options.configFile, logger, collector });
    strict = strict || loaded.config.strict;
    checkConfig(loaded.config, { fileRoot: loaded.docsRoot, collector, logger });
  } catch (err) {
    if (!(err instanceof DocsiteError)) {
      throw err;
    }
    collector.addFromError('load', err);
  }

  const reporter = new DiagnosticReporter(collector);
  io.out(reporter.report({ format, includeSummary: true, errorsOnly: options.quiet }));

  const failed = collector.hasErrors() || (strict && collector.hasWarnings());
  if (format === 'text') {
    io.err(formatStatus(reporter.getStats(), io.color));
  }
  return failed ? 1 : 0;
}

export const checkCommand = new Command('check')
  .description('Validate the site config and every file it references')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-f, --config-file <path>', 'Config file, relative to the project')
  .addOption(new Option('--format <format>', 'Report format').choices([...REPORT_FORMATS]).default('text'))
  .option('-q, --quiet', 'Only report errors')
  .option('--strict', 'Treat warnings as errors (also set by strict: true in the config)')
  .addHelpText('after', `
Examples:
  docsite check                      Check mkdocs.yml in the current directory
  docsite check -p docs-site         Check another project
  docsite check --format json        Machine-readable report for CI
  docsite check --strict             Fail on warnings too
`)
  .action((options: CheckCommandOptions, command: Command) => runAction(command, options, runCheck));
