import type { Priority } from './priority.js';

export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string;
  readonly category: string;
  readonly priority: Priority;
  readonly dueDate: string | null; // yyyy-MM-dd
  readonly completed: boolean;
  readonly createdAt: string; // ISO string
  readonly completedAt: string | null; // ISO string
}

/** Fields accepted when adding a task; everything but the title is optional */
export interface NewTaskInput {
  readonly title: string;
  readonly description?: string;
  readonly category?: string;
  readonly priority?: string;
  readonly dueDate?: string | null;
}

export interface TaskFilter {
  readonly category?: string;
  readonly completed?: boolean;
}

export interface CategoryStats {
  readonly category: string;
  readonly total: number;
  readonly completed: number;
}

export interface TaskStats {
  readonly total: number;
  readonly completed: number;
  readonly incomplete: number;
  /** completed / total, 0 for an empty store */
  readonly completionRate: number;
  readonly perCategoryCounts: Readonly<Record<string, number>>;
  readonly categories: readonly CategoryStats[];
}
