import { Command } from 'commander';
import { sortTasksForDisplay } from '@dolist/core';
import * as out from '../output.js';
import { $try, openStore, type GlobalOptions } from '../helpers.js';

interface ListOptions extends GlobalOptions {
  category?: string;
  done?: boolean;
  pending?: boolean;
  sort?: boolean;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks')
    .option('-c, --category <name>', 'Only tasks in this category')
    .option('--done', 'Show only completed tasks')
    .option('--pending', 'Show only incomplete tasks')
    .option('-s, --sort', 'Sort by completion, then priority, then age')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals() as ListOptions;

      if (g.done && g.pending) {
        out.error('Cannot use both --done and --pending at the same time');
        process.exitCode = 1;
        return;
      }

      const store = openStore(g);
      const completed = g.done ? true : g.pending ? false : undefined;
      const tasks = store.list({ category: g.category, completed });

      const message = completed === true
        ? 'No completed tasks found'
        : completed === false
          ? 'No pending tasks found'
          : store.size === 0
            ? 'No tasks saved yet... use the add command to create one'
            : 'No tasks found';
      out.printTasks(g.sort ? sortTasksForDisplay(tasks) : tasks, message);
    }));
}
