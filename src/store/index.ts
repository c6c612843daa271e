/**
 * Task Store Module
 */

import type { TaskStore, StoreDriver } from './types.js';
import { MemoryTaskStore } from './memory-task-store.js';
import { FileTaskStore } from './file-task-store.js';
import { SqliteTaskStore } from './sqlite-task-store.js';
import { StorageError, toError } from '../errors/index.js';
import { ok, err, type Result } from '../utils/result.js';

export type { TaskStore, StoreDriver } from './types.js';
export { MemoryTaskStore } from './memory-task-store.js';
export { FileTaskStore } from './file-task-store.js';
export { SqliteTaskStore } from './sqlite-task-store.js';
export {
  PersistedTaskSchema,
  serializeTask,
  deserializeTask,
  parseTaskJson,
  type PersistedTask,
} from './serialization.js';

export interface StoreOptions {
  driver: StoreDriver;
  /** Directory for the file driver, database file for sqlite */
  path: string;
}

/**
 * Open the store selected by configuration
 */
export function createTaskStore(options: StoreOptions): Result<TaskStore, StorageError> {
  try {
    switch (options.driver) {
      case 'memory':
        return ok(new MemoryTaskStore());
      case 'file':
        return ok(new FileTaskStore(options.path));
      case 'sqlite':
        return ok(new SqliteTaskStore(options.path));
    }
  } catch (error) {
    return err(new StorageError('open', `cannot open ${options.driver} store at ${options.path}`, {
      cause: toError(error),
    }));
  }
}
