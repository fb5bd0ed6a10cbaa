/**
 * Stores the task list as a JSON array in a single file.
 * Writes go to a temp file beside the target and are renamed over it.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Task } from '../types/task.js';
import type { TaskRepository } from './task-repository.js';
import { CorruptDataError } from '../errors.js';
import { taskFileSchema, toRecord, toTask, describeIssues } from './task-file-schema.js';

/** Format a date as yyyy-MM-ddTHH-mm-ss (filesystem-safe) */
function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}T${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}`;
}

export class JsonFileTaskRepository implements TaskRepository {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  load(): Task[] {
    if (!existsSync(this.filePath)) return [];

    let text: string;
    try {
      text = readFileSync(this.filePath, 'utf8');
    } catch (err: unknown) {
      throw new CorruptDataError(this.filePath, `cannot be read (${errorMessage(err)})`, { cause: err });
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err: unknown) {
      throw new CorruptDataError(this.filePath, `invalid JSON (${errorMessage(err)})`, { cause: err });
    }

    const parsed = taskFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new CorruptDataError(this.filePath, describeIssues(parsed.error), { cause: parsed.error });
    }
    return parsed.data.map(toTask);
  }

  save(tasks: readonly Task[]): void {
    mkdirSync(dirname(this.filePath), { recursive: true });

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, JSON.stringify(tasks.map(toRecord), null, 2) + '\n', 'utf8');
      renameSync(tmpPath, this.filePath);
    } catch (err: unknown) {
      rmSync(tmpPath, { force: true });
      throw err;
    }
  }

  /**
   * Move the current file aside to `<file>.corrupt-<timestamp>`.
   * Returns the new path, or null when there is no file.
   */
  quarantine(now: Date = new Date()): string | null {
    if (!existsSync(this.filePath)) return null;

    const dest = `${this.filePath}.corrupt-${formatTimestamp(now)}`;
    renameSync(this.filePath, dest);
    return dest;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
