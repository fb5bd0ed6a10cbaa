import type { TaskId } from './types/task.js';

export class DolistError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** Rejected input: empty title, unknown priority, malformed date, bad config value */
export class ValidationError extends DolistError {
  public readonly field: string;

  public constructor(field: string, message: string) {
    super(message);
    this.field = field;
  }
}

export class NotFoundError extends DolistError {
  public readonly taskId: TaskId;

  public constructor(taskId: TaskId) {
    super(`Could not find task with id ${taskId}`);
    this.taskId = taskId;
  }
}

/** The task file exists but cannot be read back as a task list */
export class CorruptDataError extends DolistError {
  public readonly filePath: string;

  public constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`Task file ${filePath} is corrupt: ${reason}`, options);
    this.filePath = filePath;
  }
}
