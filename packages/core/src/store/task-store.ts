/**
 * The in-memory task collection. Every successful mutation is written
 * through to the repository before the call returns.
 */

import type { Task, TaskId, NewTaskInput, TaskFilter, TaskStats, CategoryStats } from '../types/task.js';
import type { TaskResult, DataResult } from '../types/results.js';
import type { TaskRepository } from '../persistence/task-repository.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { createTask, normalizeNewTask, nextIdAfter, withCompletion } from './task-helpers.js';

export interface TaskStoreOptions {
  /** Clock used for createdAt/completedAt. Defaults to the system clock. */
  now?: () => Date;
}

export class TaskStore {
  private tasks: readonly Task[];
  private nextId: TaskId;
  private readonly repository: TaskRepository;
  private readonly now: () => Date;

  private constructor(repository: TaskRepository, tasks: readonly Task[], options: TaskStoreOptions) {
    this.repository = repository;
    this.tasks = tasks;
    this.nextId = nextIdAfter(tasks);
    this.now = options.now ?? (() => new Date());
  }

  /** Load the repository's tasks into a new store */
  static open(repository: TaskRepository, options: TaskStoreOptions = {}): TaskStore {
    return new TaskStore(repository, repository.load(), options);
  }

  get size(): number {
    return this.tasks.length;
  }

  add(input: NewTaskInput): DataResult<Task> {
    let fields: ReturnType<typeof normalizeNewTask>;
    try {
      fields = normalizeNewTask(input);
    } catch (err: unknown) {
      if (err instanceof ValidationError) return { type: 'invalid', error: err };
      throw err;
    }

    if (!Number.isSafeInteger(this.nextId)) {
      return { type: 'invalid', error: new ValidationError('id', 'No task ids left') };
    }

    const task = createTask(this.nextId, fields, this.now());
    this.commit([...this.tasks, task]);
    this.nextId = task.id + 1;
    return { type: 'success', data: task, message: `Task added with ID: ${task.id}` };
  }

  remove(id: TaskId): TaskResult {
    if (!this.get(id)) return notFound(id);

    this.commit(this.tasks.filter(t => t.id !== id));
    return { type: 'success', message: `Task ${id} removed` };
  }

  markComplete(id: TaskId): TaskResult {
    return this.setCompleted(id, true);
  }

  markIncomplete(id: TaskId): TaskResult {
    return this.setCompleted(id, false);
  }

  get(id: TaskId): Task | null {
    return this.tasks.find(t => t.id === id) ?? null;
  }

  /** Tasks in insertion order; category and completion filters combine with AND */
  list(filter: TaskFilter = {}): readonly Task[] {
    const category = filter.category?.trim().toLowerCase() || undefined;
    return this.tasks.filter(t =>
      (category === undefined || t.category.toLowerCase() === category)
      && (filter.completed === undefined || t.completed === filter.completed),
    );
  }

  /** Distinct categories, sorted */
  categories(): string[] {
    return [...new Set(this.tasks.map(t => t.category))].sort();
  }

  stats(): TaskStats {
    const byCategory = new Map<string, { total: number; completed: number }>();
    let completed = 0;

    for (const task of this.tasks) {
      const entry = byCategory.get(task.category) ?? { total: 0, completed: 0 };
      entry.total++;
      if (task.completed) {
        entry.completed++;
        completed++;
      }
      byCategory.set(task.category, entry);
    }

    const total = this.tasks.length;
    const categories: CategoryStats[] = [...byCategory].map(([category, s]) => ({ category, ...s }));

    return {
      total,
      completed,
      incomplete: total - completed,
      completionRate: total === 0 ? 0 : completed / total,
      perCategoryCounts: Object.fromEntries(categories.map(c => [c.category, c.total])),
      categories,
    };
  }

  private setCompleted(id: TaskId, completed: boolean): TaskResult {
    const task = this.get(id);
    if (!task) return notFound(id);

    const label = completed ? 'complete' : 'incomplete';
    if (task.completed === completed) {
      return { type: 'no-change', message: `Task ${id} is already ${label}` };
    }

    const updated = withCompletion(task, completed, this.now());
    this.commit(this.tasks.map(t => (t.id === id ? updated : t)));
    return { type: 'success', message: `Task ${id} marked as ${label}` };
  }

  /** Persist first so a failed save leaves the in-memory state untouched */
  private commit(next: readonly Task[]): void {
    this.repository.save(next);
    this.tasks = next;
  }
}

function notFound(taskId: TaskId): Extract<TaskResult, { type: 'not-found' }> {
  return { type: 'not-found', taskId, error: new NotFoundError(taskId) };
}
