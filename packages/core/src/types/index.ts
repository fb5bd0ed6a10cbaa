export { Priority, PRIORITIES, PriorityRank, isPriority } from './priority.js';
export type { TaskId, Task, NewTaskInput, TaskFilter, TaskStats, CategoryStats } from './task.js';
export type { TaskResult, DataResult, FailedResult } from './results.js';
export { isSuccess, isError, unwrap } from './results.js';
