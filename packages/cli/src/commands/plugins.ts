/**
 * Plugins command - list the declared plugins as the renderer will load them
 */

import { Command } from 'commander';
import { resolvePlugins, type PluginHandle } from '@docsite/core';
import { loadProject, reportError, runAction, type CommandContext, type ProjectOptions } from '../utils/commandContext.js';
import { paint } from '../utils/output.js';

export interface PluginsCommandOptions extends ProjectOptions {
  json?: boolean;
}

export function formatPlugin(handle: PluginHandle, color: boolean): string[] {
  const lines = [
    `${handle.position + 1}. ${handle.name} ${paint(`(${handle.package})`, 'dim', color)} - ${handle.description}`,
  ];
  if (Object.keys(handle.options).length > 0) {
    lines.push(`   options: ${JSON.stringify(handle.options)}`);
  }
  return lines;
}

export function runPlugins(options: PluginsCommandOptions, context: CommandContext): number {
  const { io } = context;
  const loaded = loadProject(options, context);
  if (!loaded) {
    return 1;
  }

  let handles: PluginHandle[];
  try {
    handles = resolvePlugins(loaded.config);
  } catch (err) {
    reportError(err, context);
    return 1;
  }

  if (options.json) {
    io.out(JSON.stringify(handles, null, 2));
  } else if (handles.length === 0) {
    io.out('No plugins enabled.');
  } else {
    for (const handle of handles) {
      formatPlugin(handle, io.color).forEach(line => io.out(line));
    }
  }
  return 0;
}

export const pluginsCommand = new Command('plugins')
  .description('List enabled plugins in load order')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-f, --config-file <path>', 'Config file, relative to the project')
  .option('-j, --json', 'Output as JSON')
  .action((options: PluginsCommandOptions, command: Command) => runAction(command, options, runPlugins));
