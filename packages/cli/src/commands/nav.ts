/**
 * Nav command - print the navigation tree, optionally for one language
 */

import { Command } from 'commander';
import {
  defaultFileExists,
  formatNavTree,
  getI18nSettings,
  localizeNav,
  resolveReference,
  type I18nSettings,
  type NavigationNode,
} from '@docsite/core';
import { loadProject, reportError, runAction, type CommandContext, type ProjectOptions } from '../utils/commandContext.js';
import { formatError } from '../utils/errorFormatter.js';

export interface NavCommandOptions extends ProjectOptions {
  lang?: string;
  json?: boolean;
}

export function runNav(options: NavCommandOptions, context: CommandContext): number {
  const { io } = context;
  const loaded = loadProject(options, context);
  if (!loaded) {
    return 1;
  }

  let nav: readonly NavigationNode[] | null = loaded.config.nav;

  if (options.lang) {
    let settings: I18nSettings | null;
    try {
      settings = getI18nSettings(loaded.config);
    } catch (err) {
      reportError(err, context);
      return 1;
    }
    if (!settings) {
      formatError('The i18n plugin is not enabled', ['Add i18n under plugins to use --lang']).forEach(line => io.err(line));
      return 1;
    }
    const codes = settings.languages.map(l => l.code);
    if (!codes.includes(options.lang)) {
      formatError(`Unknown language: ${options.lang}`, [`Configured: ${codes.join(', ')}`]).forEach(line => io.err(line));
      return 1;
    }
    if (nav) {
      const exists = (path: string): boolean => {
        const absolute = resolveReference(loaded.docsRoot, path);
        return absolute !== null && defaultFileExists(absolute);
      };
      nav = localizeNav(nav, options.lang, settings, exists);
    }
  }

  io.out(options.json ? JSON.stringify(nav, null, 2) : formatNavTree(nav));
  return 0;
}

export const navCommand = new Command('nav')
  .description('Print the navigation tree')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-f, --config-file <path>', 'Config file, relative to the project')
  .option('-l, --lang <code>', 'Show titles and pages for one language (i18n plugin)')
  .option('-j, --json', 'Output as JSON')
  .action((options: NavCommandOptions, command: Command) => runAction(command, options, runNav));
