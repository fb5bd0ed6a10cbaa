import type { Task } from '../types/task.js';
import type { TaskRepository } from './task-repository.js';

/** Keeps the "persisted" tasks in memory. For tests. */
export class InMemoryTaskRepository implements TaskRepository {
  private stored: readonly Task[];
  saveCount = 0;

  constructor(initial: readonly Task[] = []) {
    this.stored = initial;
  }

  load(): Task[] {
    return [...this.stored];
  }

  save(tasks: readonly Task[]): void {
    this.stored = [...tasks];
    this.saveCount++;
  }
}
