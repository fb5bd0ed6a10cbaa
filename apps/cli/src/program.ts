import { Command } from 'commander';
import { ENV_DATA_FILE, ENV_ON_CORRUPT } from '@dolist/core';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createDeleteCommand } from './commands/delete.js';
import { createStatsCommand } from './commands/stats.js';
import { createCategoriesCommand } from './commands/categories.js';
import { createMenuCommand, runInteractive } from './commands/menu.js';

/** Build the dolist program with every command registered */
export function createProgram(): Command {
  const program = new Command()
    .name('dolist')
    .description('Local task tracker')
    .version('1.0.0')
    .option('-f, --file <path>', `Task file to use (env: ${ENV_DATA_FILE})`)
    .option('--on-corrupt <policy>', `What to do with an unreadable task file: fail, start-empty (env: ${ENV_ON_CORRUPT})`);

  // Register commands
  program.addCommand(createAddCommand());
  program.addCommand(createListCommand());
  program.addCommand(createCheckCommand());
  program.addCommand(createUncheckCommand());
  program.addCommand(createDeleteCommand());
  program.addCommand(createStatsCommand());
  program.addCommand(createCategoriesCommand());
  program.addCommand(createMenuCommand());

  // Default action (no command): interactive menu
  program.action((_opts: unknown, cmd: Command) => runInteractive(cmd));

  return program;
}
