/**
 * Dump command - print the config with defaults filled in, in canonical form
 */

import { Command } from 'commander';
import { serializeConfig } from '@docsite/core';
import { loadProject, runAction, type CommandContext, type ProjectOptions } from '../utils/commandContext.js';

export function runDump(options: ProjectOptions, context: CommandContext): number {
  const loaded = loadProject(options, context);
  if (!loaded) {
    return 1;
  }
  context.io.out(serializeConfig(loaded.config).trimEnd());
  return 0;
}

export const dumpCommand = new Command('dump')
  .description('Print the normalized config document')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-f, --config-file <path>', 'Config file, relative to the project')
  .action((options: ProjectOptions, command: Command) => runAction(command, options, runDump));
