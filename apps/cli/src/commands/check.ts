import { Command } from 'commander';
import type { TaskResult, TaskStore } from '@dolist/core';
import * as out from '../output.js';
import { $try, openStore, parseTaskId, reportResult, type GlobalOptions } from '../helpers.js';

/**
 * Apply `op` to every id argument. Ids that aren't numbers are reported
 * and skipped; the rest are processed in order.
 */
export function applyToIds(rawIds: readonly string[], op: (id: number) => TaskResult): void {
  for (const raw of rawIds) {
    const id = parseTaskId(raw);
    if (id == null) {
      out.error(`Invalid task id '${raw}'`);
      process.exitCode = 1;
      continue;
    }
    reportResult(op(id));
  }
}

function createMarkCommand(name: string, description: string, mark: (store: TaskStore, id: number) => TaskResult): Command {
  return new Command(name)
    .description(description)
    .argument('<taskIds...>', 'The id(s) of the task(s)')
    .action((taskIds: string[], _opts: unknown, cmd: Command) => $try(() => {
      const store = openStore(cmd.optsWithGlobals() as GlobalOptions);
      applyToIds(taskIds, id => mark(store, id));
    }));
}

export function createCheckCommand(): Command {
  return createMarkCommand('check', 'Mark one or more tasks complete', (store, id) => store.markComplete(id));
}

export function createUncheckCommand(): Command {
  return createMarkCommand('uncheck', 'Mark one or more tasks incomplete', (store, id) => store.markIncomplete(id));
}
