/**
 * File Task Store
 *
 * One JSON document per task in a storage directory. Documents are
 * written to a temporary file first and renamed into place, so a crash
 * mid-write leaves the previous version intact.
 */

import fs from 'fs-extra';
import * as path from 'path';
import type { Task } from '../types/task.js';
import { StorageError } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';
import { parseTaskJson, serializeTask } from './serialization.js';
import type { TaskStore } from './types.js';

const RECORD_EXTENSION = '.json';

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

export class FileTaskStore implements TaskStore {
  private readonly storageDir: string;

  constructor(storageDir: string) {
    this.storageDir = path.resolve(storageDir);
    fs.ensureDirSync(this.storageDir);
  }

  getStorageDir(): string {
    return this.storageDir;
  }

  put(task: Task): Result<void, StorageError> {
    const target = this.recordPath(task.id);
    const temp = `${target}.tmp`;
    try {
      fs.writeFileSync(temp, JSON.stringify(serializeTask(task), null, 2));
      fs.renameSync(temp, target);
      return ok(undefined);
    } catch (error) {
      fs.removeSync(temp);
      return err(new StorageError('put', `cannot write task ${task.id}`, {
        cause: asError(error),
        context: { path: target },
      }));
    }
  }

  get(id: string): Result<Task | null, StorageError> {
    const file = this.recordPath(id);
    if (!fs.pathExistsSync(file)) {
      return ok(null);
    }
    try {
      return parseTaskJson(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
      return err(new StorageError('get', `cannot read task ${id}`, { cause: asError(error) }));
    }
  }

  /**
   * Unreadable or malformed documents are skipped with a warning
   */
  list(): Result<Task[], StorageError> {
    let entries: string[];
    try {
      entries = fs.readdirSync(this.storageDir);
    } catch (error) {
      return err(new StorageError('list', `cannot read ${this.storageDir}`, { cause: asError(error) }));
    }

    const tasks: Task[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(RECORD_EXTENSION)) continue;

      const file = path.join(this.storageDir, entry);
      let parsed: Result<Task, StorageError>;
      try {
        parsed = parseTaskJson(fs.readFileSync(file, 'utf-8'));
      } catch (error) {
        parsed = err(new StorageError('list', `cannot read ${entry}`, { cause: asError(error) }));
      }

      if (parsed.ok) {
        tasks.push(parsed.value);
      } else {
        logger.warn(`Skipping task record ${entry}: ${parsed.error.message}`);
      }
    }
    return ok(tasks);
  }

  delete(id: string): Result<void, StorageError> {
    try {
      fs.removeSync(this.recordPath(id));
      return ok(undefined);
    } catch (error) {
      return err(new StorageError('delete', `cannot delete task ${id}`, { cause: asError(error) }));
    }
  }

  private recordPath(id: string): string {
    return path.join(this.storageDir, `${encodeURIComponent(id)}${RECORD_EXTENSION}`);
  }
}
