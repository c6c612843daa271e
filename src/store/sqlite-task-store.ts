/**
 * SQLite Task Store
 *
 * Keeps each task as a JSON record in a single `tasks` table, with the
 * state and update time denormalized into columns for inspection.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import fs from 'fs-extra';
import type { Task } from '../types/task.js';
import { StorageError } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';
import { parseTaskJson, serializeTask } from './serialization.js';
import type { TaskStore } from './types.js';

interface TaskRow {
  id: string;
  record: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    record TEXT NOT NULL,
    state TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_tasks_state ON tasks(state);
`;

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

export class SqliteTaskStore implements TaskStore {
  private db: Database.Database;

  /**
   * @param target - database file path, ':memory:', or an open connection
   */
  constructor(target: string | Database.Database) {
    if (typeof target === 'string') {
      if (target !== ':memory:') {
        fs.ensureDirSync(path.dirname(path.resolve(target)));
      }
      this.db = new Database(target);
      this.db.pragma('journal_mode = WAL');
    } else {
      this.db = target;
    }
    this.db.exec(SCHEMA);
  }

  put(task: Task): Result<void, StorageError> {
    try {
      this.db
        .prepare<[string, string, string, string]>(`
          INSERT INTO tasks (id, record, state, updated_at)
          VALUES (?, ?, ?, ?)
          ON CONFLICT(id) DO UPDATE SET
            record = excluded.record,
            state = excluded.state,
            updated_at = excluded.updated_at
        `)
        .run(
          task.id,
          JSON.stringify(serializeTask(task)),
          task.state,
          task.metadata.updatedAt.toISOString()
        );
      return ok(undefined);
    } catch (error) {
      return err(new StorageError('put', `cannot write task ${task.id}`, { cause: asError(error) }));
    }
  }

  get(id: string): Result<Task | null, StorageError> {
    let row: TaskRow | undefined;
    try {
      row = this.db.prepare<[string], TaskRow>('SELECT id, record FROM tasks WHERE id = ?').get(id);
    } catch (error) {
      return err(new StorageError('get', `cannot read task ${id}`, { cause: asError(error) }));
    }
    return row ? parseTaskJson(row.record) : ok(null);
  }

  /**
   * Rows whose record no longer parses are skipped with a warning
   */
  list(): Result<Task[], StorageError> {
    let rows: TaskRow[];
    try {
      rows = this.db.prepare<[], TaskRow>('SELECT id, record FROM tasks').all();
    } catch (error) {
      return err(new StorageError('list', 'cannot read tasks table', { cause: asError(error) }));
    }

    const tasks: Task[] = [];
    for (const row of rows) {
      const parsed = parseTaskJson(row.record);
      if (parsed.ok) {
        tasks.push(parsed.value);
      } else {
        logger.warn(`Skipping task row ${row.id}: ${parsed.error.message}`);
      }
    }
    return ok(tasks);
  }

  delete(id: string): Result<void, StorageError> {
    try {
      this.db.prepare<[string]>('DELETE FROM tasks WHERE id = ?').run(id);
      return ok(undefined);
    } catch (error) {
      return err(new StorageError('delete', `cannot delete task ${id}`, { cause: asError(error) }));
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
