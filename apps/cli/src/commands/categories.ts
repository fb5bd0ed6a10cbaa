import { Command } from 'commander';
import * as out from '../output.js';
import { $try, openStore, type GlobalOptions } from '../helpers.js';

export function createCategoriesCommand(): Command {
  return new Command('categories')
    .description('List the categories in use')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const store = openStore(cmd.optsWithGlobals() as GlobalOptions);
      const categories = store.categories();
      if (categories.length === 0) {
        out.info('No categories yet');
        return;
      }
      for (const c of categories) out.info(c);
    }));
}
