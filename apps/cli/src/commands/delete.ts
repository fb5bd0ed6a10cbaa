import { Command } from 'commander';
import { $try, openStore, type GlobalOptions } from '../helpers.js';
import { applyToIds } from './check.js';

export function createDeleteCommand(): Command {
  return new Command('delete')
    .alias('remove')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[], _opts: unknown, cmd: Command) => $try(() => {
      const store = openStore(cmd.optsWithGlobals() as GlobalOptions);
      applyToIds(taskIds, id => store.remove(id));
    }));
}
