import { Command } from 'commander';
import { $try, openStore, type GlobalOptions } from '../helpers.js';
import { createLinePrompter } from '../interactive/prompter.js';
import { runMenu } from '../interactive/menu.js';

/** Open the store and run the interactive menu on stdin/stdout */
export function runInteractive(cmd: Command): Promise<void> {
  return $try(async () => {
    const store = openStore(cmd.optsWithGlobals() as GlobalOptions);
    const prompter = createLinePrompter(process.stdin, process.stdout);
    try {
      await runMenu(store, prompter);
    } finally {
      prompter.close();
    }
  });
}

export function createMenuCommand(): Command {
  return new Command('menu')
    .description('Interactive numbered menu (default when no command is given)')
    .action((_opts: unknown, cmd: Command) => runInteractive(cmd));
}
