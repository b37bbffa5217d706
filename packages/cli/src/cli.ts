#!/usr/bin/env -S node --import tsx
/**
 * @docsite/cli - CLI for checking documentation site configs
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { LOG_LEVELS } from '@docsite/core';
import { checkCommand } from './commands/check.js';
import { navCommand } from './commands/nav.js';
import { pluginsCommand } from './commands/plugins.js';
import { dumpCommand } from './commands/dump.js';
import { exitWithError } from './utils/errorFormatter.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

const program = new Command();

program
  .name('docsite')
  .description('Load, validate and inspect mkdocs.yml site configs')
  .version(pkg.version)
  .addOption(new Option('--log-level <level>', 'Console log level').choices([...LOG_LEVELS]).default('warnings'))
  .option('--log-file <path>', 'Also write a debug log to this file');

program.addCommand(checkCommand);
program.addCommand(navCommand);
program.addCommand(pluginsCommand);
program.addCommand(dumpCommand);

program.parseAsync().catch((err: unknown) => {
  exitWithError(err instanceof Error ? err.message : String(err), [
    'Re-run with --log-level debug --log-file docsite.log for details',
  ]);
});
