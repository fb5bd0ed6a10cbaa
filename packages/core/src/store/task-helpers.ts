import type { Task, TaskId, NewTaskInput } from '../types/task.js';
import { Priority, PriorityRank, PRIORITIES, isPriority } from '../types/priority.js';
import { ValidationError } from '../errors.js';
import { isCalendarDate } from '../parsers/date-parser.js';

/** Values applied to every field an add call leaves out */
export const TASK_DEFAULTS = {
  description: '',
  category: 'General',
  priority: Priority.Medium,
  dueDate: null,
} as const satisfies Pick<Task, 'description' | 'category' | 'priority' | 'dueDate'>;

type TaskFields = Omit<Task, 'id' | 'completed' | 'createdAt' | 'completedAt'>;

/**
 * Apply defaults and check the invariants of a new task.
 * Throws ValidationError naming the offending field.
 */
export function normalizeNewTask(input: NewTaskInput): TaskFields {
  const title = input.title.trim();
  if (!title) {
    throw new ValidationError('title', 'Task title must not be empty');
  }

  const priority = input.priority?.trim() || TASK_DEFAULTS.priority;
  if (!isPriority(priority)) {
    throw new ValidationError('priority', `Unknown priority '${priority}'. Use one of: ${PRIORITIES.join(', ')}`);
  }

  const dueDate = input.dueDate?.trim() || TASK_DEFAULTS.dueDate;
  if (dueDate != null && !isCalendarDate(dueDate)) {
    throw new ValidationError('dueDate', `Invalid due date '${dueDate}'. Expected YYYY-MM-DD`);
  }

  return {
    title,
    description: input.description?.trim() ?? TASK_DEFAULTS.description,
    category: input.category?.trim() || TASK_DEFAULTS.category,
    priority,
    dueDate,
  };
}

/** Build a pending task record from already-normalized fields */
export function createTask(id: TaskId, fields: TaskFields, now: Date): Task {
  return {
    id,
    ...fields,
    completed: false,
    createdAt: now.toISOString(),
    completedAt: null,
  };
}

/** Return a copy of the task with the completion flag set (stamps completedAt) */
export function withCompletion(task: Task, completed: boolean, now: Date): Task {
  return {
    ...task,
    completed,
    completedAt: completed ? now.toISOString() : null,
  };
}

/** The id after the highest one in use, or 1 for an empty collection */
export function nextIdAfter(tasks: readonly Task[]): TaskId {
  return tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
}

/** Sort for display: incomplete first, then by priority, then oldest first */
export function sortTasksForDisplay(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => {
    if (a.completed !== b.completed) return a.completed ? 1 : -1;
    const p = PriorityRank[a.priority] - PriorityRank[b.priority];
    if (p !== 0) return p;
    return a.createdAt.localeCompare(b.createdAt);
  });
}
