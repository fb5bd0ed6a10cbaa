import { Command } from 'commander';
import { parseDate } from '@dolist/core';
import * as out from '../output.js';
import { $try, openStore, parsePriorityArg, type GlobalOptions } from '../helpers.js';

interface AddOptions extends GlobalOptions {
  description?: string;
  category?: string;
  priority?: string;
  due?: string;
}

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Longer description')
    .option('-c, --category <name>', 'Category (default: General)')
    .option('-p, --priority <level>', 'Priority: high, medium, low (default: medium)')
    .option('--due <date>', 'Due date: YYYY-MM-DD, today, tomorrow, +3d, friday')
    .action((title: string, _opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals() as AddOptions;
      const store = openStore(g);

      // Unparseable values go through as typed so the store reports them
      const result = store.add({
        title,
        description: g.description,
        category: g.category,
        priority: g.priority === undefined ? undefined : parsePriorityArg(g.priority) ?? g.priority,
        dueDate: g.due === undefined ? undefined : parseDate(g.due) ?? g.due,
      });

      if (result.type === 'success') {
        out.success(result.message);
      } else {
        out.error(result.error.message);
        process.exitCode = 1;
      }
    }));
}
