/**
 * On-disk shape of the task file: a JSON array of snake_case records.
 */

import { z, type ZodError } from 'zod';
import type { Task } from '../types/task.js';
import { Priority } from '../types/priority.js';
import { isCalendarDate } from '../parsers/date-parser.js';
import { TASK_DEFAULTS } from '../store/task-helpers.js';

export const taskRecordSchema = z.object({
  id: z.number().int().positive().lt(Number.MAX_SAFE_INTEGER),
  title: z.string().refine(s => s.trim().length > 0, 'title must not be empty'),
  description: z.string().default(TASK_DEFAULTS.description),
  category: z.string().min(1).default(TASK_DEFAULTS.category),
  priority: z.enum([Priority.High, Priority.Medium, Priority.Low]).default(TASK_DEFAULTS.priority),
  due_date: z.string().refine(isCalendarDate, 'expected YYYY-MM-DD').nullable().default(TASK_DEFAULTS.dueDate),
  completed: z.boolean().default(false),
  created_at: z.string().min(1),
  completed_at: z.string().nullable().default(null),
});

export const taskFileSchema = z.array(taskRecordSchema).superRefine((records, ctx) => {
  const seen = new Set<number>();
  records.forEach((r, index) => {
    if (seen.has(r.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `duplicate id ${r.id}` });
    }
    seen.add(r.id);
  });
});

export type TaskRecord = z.output<typeof taskRecordSchema>;

export function toTask(record: TaskRecord): Task {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    category: record.category,
    priority: record.priority,
    dueDate: record.due_date,
    completed: record.completed,
    createdAt: record.created_at,
    completedAt: record.completed_at,
  };
}

export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    category: task.category,
    priority: task.priority,
    due_date: task.dueDate,
    completed: task.completed,
    created_at: task.createdAt,
    completed_at: task.completedAt,
  };
}

/** Format the first few zod issues as "path: message; ..." */
export function describeIssues(error: ZodError, limit = 3): string {
  const parts = error.errors.slice(0, limit).map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  const more = error.errors.length - limit;
  return more > 0 ? `${parts.join('; ')} (+${more} more)` : parts.join('; ');
}
