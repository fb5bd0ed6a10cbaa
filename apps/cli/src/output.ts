/**
 * chalk-based output formatting. All user-facing messages go through here.
 */

import chalk from 'chalk';
import { Priority, TASK_DEFAULTS } from '@dolist/core';
import type { Task, TaskResult, TaskStats } from '@dolist/core';

const MS_PER_DAY = 86400000;
const DESCRIPTION_INDENT = '          '; // id + priority + checkbox columns

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

export function formatCategory(category: string): string {
  if (category === TASK_DEFAULTS.category) return '';
  return chalk.cyan(`  (${category})`);
}

export function formatDueDate(dueDate: string | null, completed: boolean, now: Date = new Date()): string {
  if (!dueDate) return '';

  const [y = 0, m = 1, d = 1] = dueDate.split('-').map(Number);
  const dueD = new Date(y, m - 1, d);

  if (completed) return chalk.dim(`  Due: ${formatMonthDay(dueD)}`);

  const todayD = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const diff = Math.round((dueD.getTime() - todayD.getTime()) / MS_PER_DAY);

  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  if (diff < 7) return chalk.dim(`  Due: ${dueD.toLocaleDateString('en-US', { weekday: 'long' })}`);
  return chalk.dim(`  Due: ${formatMonthDay(dueD)}`);
}

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

export function formatTask(task: Task, now?: Date): string {
  const taskId = chalk.dim(`(${task.id})`);
  const priority = formatPriority(task.priority);
  const checkbox = formatCheckbox(task.completed);
  const title = task.completed ? chalk.strikethrough(task.title) : chalk.bold(task.title);
  const line = `${taskId} ${priority} ${checkbox} ${title}${formatCategory(task.category)}${formatDueDate(task.dueDate, task.completed, now)}`;

  if (!task.description) return line;
  return `${line}\n${DESCRIPTION_INDENT}${chalk.dim(task.description)}`;
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatStats(stats: TaskStats): string[] {
  const lines = [
    `Total tasks: ${stats.total}`,
    `Completed: ${chalk.green(String(stats.completed))}`,
    `Incomplete: ${chalk.yellow(String(stats.incomplete))}`,
    `Completion rate: ${percent(stats.completionRate)}`,
  ];

  if (stats.categories.length > 0) {
    lines.push('', chalk.bold('By category:'));
    for (const c of stats.categories) {
      lines.push(`  ${c.category}: ${c.completed}/${c.total} (${percent(c.completed / c.total)})`);
    }
  }
  return lines;
}

// --- Task output ---

export function printTasks(tasks: readonly Task[], emptyMessage: string, now?: Date): void {
  if (tasks.length === 0) {
    info(emptyMessage);
    return;
  }
  for (const task of tasks) {
    console.log(formatTask(task, now));
  }
}

// --- Result output ---

export function printResult(result: TaskResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'no-change': info(result.message); break;
    case 'not-found': error(result.error.message); break;
    case 'invalid': error(result.error.message); break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
