import { Command } from 'commander';
import * as out from '../output.js';
import { $try, openStore, type GlobalOptions } from '../helpers.js';

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show task statistics')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const store = openStore(cmd.optsWithGlobals() as GlobalOptions);
      for (const line of out.formatStats(store.stats())) out.info(line);
    }));
}
