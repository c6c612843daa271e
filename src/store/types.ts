import type { Task } from '../types/task.js';
import type { StorageError } from '../errors/index.js';
import type { Result } from '../utils/result.js';

/**
 * Key-value persistence of task records, addressed by id.
 *
 * Writes are synchronous and complete before returning; the task manager
 * relies on that to keep its queues in line with durable state.
 */
export interface TaskStore {
  /** Upsert; overwrites any record with the same id */
  put(task: Task): Result<void, StorageError>;
  /** `null` when absent */
  get(id: string): Result<Task | null, StorageError>;
  /** Snapshot of every record, in no particular order */
  list(): Result<Task[], StorageError>;
  /** No-op when absent */
  delete(id: string): Result<void, StorageError>;
  close?(): void;
}

export type StoreDriver = 'memory' | 'file' | 'sqlite';
