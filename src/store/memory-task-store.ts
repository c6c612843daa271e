/**
 * In-memory task store. Records are copied on the way in and out, so a
 * caller holding a task object cannot change what is stored.
 */

import { cloneTask, type Task } from '../types/task.js';
import type { StorageError } from '../errors/index.js';
import { ok, type Result } from '../utils/result.js';
import type { TaskStore } from './types.js';

export class MemoryTaskStore implements TaskStore {
  private records: Map<string, Task> = new Map();

  put(task: Task): Result<void, StorageError> {
    this.records.set(task.id, cloneTask(task));
    return ok(undefined);
  }

  get(id: string): Result<Task | null, StorageError> {
    const record = this.records.get(id);
    return ok(record ? cloneTask(record) : null);
  }

  list(): Result<Task[], StorageError> {
    return ok(Array.from(this.records.values(), cloneTask));
  }

  delete(id: string): Result<void, StorageError> {
    this.records.delete(id);
    return ok(undefined);
  }

  size(): number {
    return this.records.size;
  }
}
