/**
 * The numbered interactive menu. Each action returns false when input
 * ends mid-prompt, which ends the session like choosing Exit.
 */

import chalk from 'chalk';
import { PRIORITIES, TASK_DEFAULTS, parseDate } from '@dolist/core';
import type { Priority, TaskStore } from '@dolist/core';
import * as out from '../output.js';
import { parsePriorityArg, parseTaskId } from '../helpers.js';
import type { LinePrompter } from './prompter.js';

export const MENU_ITEMS = [
  'Add Task',
  'List Tasks',
  'Mark Task Complete',
  'Mark Task Incomplete',
  'Remove Task',
  'View Statistics',
  'Filter by Category',
  'Exit',
] as const;

const EXIT_CHOICE = String(MENU_ITEMS.length);

export interface MenuOptions {
  /** "Today" for relative due dates and due labels */
  now?: () => Date;
}

type Action = (ctx: MenuContext) => Promise<boolean>;

interface MenuContext {
  store: TaskStore;
  prompter: LinePrompter;
  now: () => Date;
}

function printMenu(): void {
  out.info('');
  out.info(chalk.bold('MENU OPTIONS:'));
  MENU_ITEMS.forEach((item, i) => out.info(`${i + 1}. ${item}`));
}

function isYes(answer: string): boolean {
  return answer.toLowerCase().startsWith('y');
}

/** Ask until the answer is non-empty */
async function askRequired(prompter: LinePrompter, question: string): Promise<string | null> {
  for (;;) {
    const answer = await prompter.ask(question);
    if (answer === null || answer !== '') return answer;
    out.error('This field is required. Please try again.');
  }
}

async function askTaskId(prompter: LinePrompter, question: string): Promise<number | null | 'invalid'> {
  const answer = await askRequired(prompter, question);
  if (answer === null) return null;
  return parseTaskId(answer) ?? 'invalid';
}

const addTask: Action = async ({ store, prompter, now }) => {
  out.info(chalk.bold('ADD NEW TASK'));

  const title = await askRequired(prompter, 'Task title: ');
  if (title === null) return false;

  const description = await prompter.ask('Description (optional): ');
  if (description === null) return false;

  const categories = store.categories();
  out.info(`Available categories: ${categories.length > 0 ? categories.join(', ') : 'None'}`);
  const category = await prompter.ask(`Category (default: ${TASK_DEFAULTS.category}): `);
  if (category === null) return false;

  let priority: Priority | undefined;
  for (;;) {
    const answer = await prompter.ask(`Priority (${PRIORITIES.join(', ')}; default: ${TASK_DEFAULTS.priority}): `);
    if (answer === null) return false;
    if (answer === '') break;
    const parsed = parsePriorityArg(answer);
    if (parsed) {
      priority = parsed;
      break;
    }
    out.error(`Unknown priority '${answer}'. Use one of: ${PRIORITIES.join(', ')}`);
  }

  let dueDate: string | null = null;
  for (;;) {
    const answer = await prompter.ask('Due date (YYYY-MM-DD, today, tomorrow, +3d; optional): ');
    if (answer === null) return false;
    if (answer === '') break;
    dueDate = parseDate(answer, now());
    if (dueDate) break;
    out.error(`Could not understand date '${answer}'`);
  }

  const result = store.add({ title, description, category, priority, dueDate });
  if (result.type === 'success') out.success(result.message);
  else out.error(result.error.message);
  return true;
};

const listTasks: Action = async ({ store, prompter, now }) => {
  out.info(chalk.bold('TASK LIST'));

  const showCompleted = await prompter.ask('Show completed tasks? (y/N): ');
  if (showCompleted === null) return false;
  const category = await prompter.ask('Filter by category (optional): ');
  if (category === null) return false;

  const tasks = store.list({
    category: category || undefined,
    completed: isYes(showCompleted) ? undefined : false,
  });
  if (tasks.length > 0) out.info(`Found ${tasks.length} task(s):`);
  out.printTasks(tasks, 'No tasks found.', now());
  return true;
};

function markTask(complete: boolean): Action {
  return async ({ store, prompter }) => {
    out.info(chalk.bold(`MARK TASK ${complete ? 'COMPLETE' : 'INCOMPLETE'}`));

    const id = await askTaskId(prompter, 'Enter task ID: ');
    if (id === null) return false;
    if (id === 'invalid') {
      out.error('Invalid task ID. Please enter a number.');
      return true;
    }
    out.printResult(complete ? store.markComplete(id) : store.markIncomplete(id));
    return true;
  };
}

const removeTask: Action = async ({ store, prompter, now }) => {
  out.info(chalk.bold('REMOVE TASK'));

  const id = await askTaskId(prompter, 'Enter task ID to remove: ');
  if (id === null) return false;
  if (id === 'invalid') {
    out.error('Invalid task ID. Please enter a number.');
    return true;
  }

  const task = store.get(id);
  if (!task) {
    out.error(`Could not find task with id ${id}`);
    return true;
  }

  out.info('Task to remove:');
  out.printTasks([task], '', now());
  const confirm = await prompter.ask('Are you sure you want to remove this task? (y/N): ');
  if (confirm === null) return false;

  if (isYes(confirm)) out.printResult(store.remove(id));
  else out.info('Task removal cancelled.');
  return true;
};

const showStatistics: Action = async ({ store }) => {
  out.info(chalk.bold('TASK STATISTICS'));
  for (const line of out.formatStats(store.stats())) out.info(line);
  return true;
};

const filterByCategory: Action = async ({ store, prompter, now }) => {
  out.info(chalk.bold('FILTER BY CATEGORY'));

  const categories = store.categories();
  out.info(`Available categories: ${categories.length > 0 ? categories.join(', ') : 'None'}`);
  const category = await askRequired(prompter, 'Category: ');
  if (category === null) return false;

  const tasks = store.list({ category });
  if (tasks.length > 0) out.info(`Found ${tasks.length} task(s) in '${category}':`);
  out.printTasks(tasks, `No tasks in '${category}'.`, now());
  return true;
};

const ACTIONS = new Map<string, Action>([
  ['1', addTask],
  ['2', listTasks],
  ['3', markTask(true)],
  ['4', markTask(false)],
  ['5', removeTask],
  ['6', showStatistics],
  ['7', filterByCategory],
]);

/**
 * Run the menu until the user exits or input ends. The store writes
 * through on every change, so there is nothing left to save on exit.
 */
export async function runMenu(store: TaskStore, prompter: LinePrompter, options: MenuOptions = {}): Promise<void> {
  const ctx: MenuContext = { store, prompter, now: options.now ?? (() => new Date()) };

  out.info(chalk.bold('TO-DO LIST MANAGER'));

  for (;;) {
    printMenu();
    const choice = await prompter.ask(`Enter your choice (1-${EXIT_CHOICE}): `);
    if (choice === null || choice === EXIT_CHOICE) break;

    const action = ACTIONS.get(choice);
    if (!action) {
      out.error(`Invalid choice. Please enter a number from 1-${EXIT_CHOICE}.`);
      continue;
    }
    try {
      if (!(await action(ctx))) break;
    } catch (err: unknown) {
      // A failed save leaves the store unchanged; report it and keep going
      out.error(`${err instanceof Error ? err.message : String(err)}. Please try again.`);
    }
  }

  out.success('Goodbye! All tasks have been saved.');
}
