import type { TaskId } from './task.js';
import type { NotFoundError, ValidationError } from '../errors.js';

/** Outcome of a store mutation; failures carry the error instead of throwing it */
export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId; readonly error: NotFoundError }
  | { readonly type: 'invalid'; readonly error: ValidationError };

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId; readonly error: NotFoundError }
  | { readonly type: 'invalid'; readonly error: ValidationError };

export type FailedResult = Extract<TaskResult, { readonly error: unknown }>;

/** no-change counts as success: re-marking a task is idempotent */
export function isSuccess(r: TaskResult): boolean {
  return r.type === 'success' || r.type === 'no-change';
}

export function isError(r: TaskResult | DataResult<unknown>): r is FailedResult {
  return r.type === 'not-found' || r.type === 'invalid';
}

/** Return the data of a successful result, or throw the error it carries */
export function unwrap<T>(r: DataResult<T>): T {
  if (r.type === 'success') return r.data;
  throw r.error;
}
