import type { Task } from '../types/task.js';

/** The save/load contract the store writes through to */
export interface TaskRepository {
  /** All persisted tasks in insertion order; empty on first run */
  load(): Task[];
  /** Replace the persisted collection with `tasks` */
  save(tasks: readonly Task[]): void;
}
