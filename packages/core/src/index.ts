// Types
export { Priority, PRIORITIES, PriorityRank, isPriority } from './types/index.js';
export type {
  TaskId, Task, NewTaskInput, TaskFilter, TaskStats, CategoryStats,
  TaskResult, DataResult, FailedResult,
} from './types/index.js';
export { isSuccess, isError, unwrap } from './types/index.js';

// Errors
export { DolistError, ValidationError, NotFoundError, CorruptDataError } from './errors.js';

// Store
export { TaskStore } from './store/task-store.js';
export type { TaskStoreOptions } from './store/task-store.js';
export { TASK_DEFAULTS, sortTasksForDisplay } from './store/task-helpers.js';
export { openTaskStore } from './store/open-store.js';
export type { OpenedStore, Recovery } from './store/open-store.js';

// Persistence
export type { TaskRepository } from './persistence/task-repository.js';
export { JsonFileTaskRepository } from './persistence/json-file-repository.js';
export { InMemoryTaskRepository } from './persistence/memory-repository.js';

// Config
export {
  CorruptDataPolicy, getDefaultDataPath, parseCorruptDataPolicy, resolveConfig,
  ENV_DATA_FILE, ENV_ON_CORRUPT,
} from './config.js';
export type { TrackerConfig, ConfigOverrides } from './config.js';

// Parsers
export { parseDate, formatDate, isCalendarDate } from './parsers/date-parser.js';
