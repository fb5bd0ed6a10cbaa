import type { TrackerConfig } from '../config.js';
import { CorruptDataPolicy } from '../config.js';
import { CorruptDataError } from '../errors.js';
import { JsonFileTaskRepository } from '../persistence/json-file-repository.js';
import { TaskStore, type TaskStoreOptions } from './task-store.js';

export interface Recovery {
  /** Where the unreadable file was moved, or null if it vanished meanwhile */
  readonly quarantinedTo: string | null;
  readonly reason: string;
}

export interface OpenedStore {
  readonly store: TaskStore;
  /** Set when the file was corrupt and the policy allowed starting empty */
  readonly recovery: Recovery | null;
}

/**
 * Open the store backed by the configured JSON file.
 * A corrupt file is fatal under the `fail` policy; under `start-empty`
 * it is moved aside and the store starts with no tasks.
 */
export function openTaskStore(config: TrackerConfig, options: TaskStoreOptions = {}): OpenedStore {
  const repository = new JsonFileTaskRepository(config.dataFile);
  try {
    return { store: TaskStore.open(repository, options), recovery: null };
  } catch (err: unknown) {
    if (!(err instanceof CorruptDataError) || config.onCorrupt !== CorruptDataPolicy.StartEmpty) {
      throw err;
    }
    const quarantinedTo = repository.quarantine(options.now?.());
    return { store: TaskStore.open(repository, options), recovery: { quarantinedTo, reason: err.message } };
  }
}
