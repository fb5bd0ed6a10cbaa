/**
 * CLI helpers: store opening, argument parsing, error handling.
 */

import type { Priority as PriorityType, TaskId, TaskResult, TaskStore } from '@dolist/core';
import { Priority, isSuccess, openTaskStore, resolveConfig } from '@dolist/core';
import * as out from './output.js';

/** Options every command inherits from the program */
export interface GlobalOptions {
  file?: string;
  onCorrupt?: string;
}

/**
 * Open the store from --file/--on-corrupt (falling back to the environment).
 * Prints a warning when a corrupt file was moved aside.
 */
export function openStore(g: GlobalOptions, env: NodeJS.ProcessEnv = process.env): TaskStore {
  const config = resolveConfig({ dataFile: g.file, onCorrupt: g.onCorrupt }, env);
  const { store, recovery } = openTaskStore(config);
  if (recovery) {
    const dest = recovery.quarantinedTo ?? 'nowhere (file disappeared)';
    out.warning(`${recovery.reason}. Moved it to ${dest} and started with an empty list.`);
  }
  return store;
}

/**
 * Parse a task id argument. Only positive whole numbers are ids.
 */
export function parseTaskId(raw: string): TaskId | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const id = Number(trimmed);
  return id > 0 && Number.isSafeInteger(id) ? id : null;
}

/**
 * Parse a priority string (any case, or 1/2/3, p1/p2/p3) into a Priority value.
 */
export function parsePriorityArg(level: string): PriorityType | null {
  switch (level.trim().toLowerCase()) {
    case 'high': case 'h': case '1': case 'p1': return Priority.High;
    case 'medium': case 'm': case '2': case 'p2': return Priority.Medium;
    case 'low': case 'l': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

/**
 * Print a result; a failure makes the process exit with 1.
 */
export function reportResult(result: TaskResult): void {
  out.printResult(result);
  if (!isSuccess(result)) process.exitCode = 1;
}

/**
 * Run a command action, printing any error and setting exit code 1.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
