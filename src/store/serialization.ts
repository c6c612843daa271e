/**
 * Persisted task representation
 *
 * {id, payload, agentId, priority, state,
 *  metadata{createdAt, updatedAt, retries, maxRetries, lastError}}
 * with ISO-8601 timestamps. Every store writes and reads this shape.
 */

import { z } from 'zod';
import type { Task } from '../types/task.js';
import { StorageError } from '../errors/index.js';
import { ok, err, type Result } from '../utils/result.js';

export const TaskStateSchema = z.enum(['pending', 'queued', 'running', 'completed', 'failed', 'cancelled']);

export const PersistedTaskSchema = z.object({
  id: z.string().min(1),
  payload: z.unknown(),
  agentId: z.string(),
  priority: z.number(),
  state: TaskStateSchema,
  metadata: z.object({
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
    retries: z.number().int().min(0),
    maxRetries: z.number().int().min(0),
    lastError: z.string().optional(),
  }),
});

export type PersistedTask = z.infer<typeof PersistedTaskSchema>;

export function serializeTask(task: Task): PersistedTask {
  return {
    id: task.id,
    payload: task.payload,
    agentId: task.agentId,
    priority: task.priority,
    state: task.state,
    metadata: {
      createdAt: task.metadata.createdAt.toISOString(),
      updatedAt: task.metadata.updatedAt.toISOString(),
      retries: task.metadata.retries,
      maxRetries: task.metadata.maxRetries,
      ...(task.metadata.lastError !== undefined ? { lastError: task.metadata.lastError } : {}),
    },
  };
}

export function deserializeTask(record: PersistedTask): Task {
  return {
    id: record.id,
    payload: record.payload,
    agentId: record.agentId,
    priority: record.priority,
    state: record.state,
    metadata: {
      createdAt: new Date(record.metadata.createdAt),
      updatedAt: new Date(record.metadata.updatedAt),
      retries: record.metadata.retries,
      maxRetries: record.metadata.maxRetries,
      ...(record.metadata.lastError !== undefined ? { lastError: record.metadata.lastError } : {}),
    },
  };
}

/**
 * Parse a JSON document into a task, validating its shape
 */
export function parseTaskJson(json: string): Result<Task, StorageError> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    return err(new StorageError('get', 'record is not valid JSON', {
      cause: error instanceof Error ? error : undefined,
    }));
  }

  const parsed = PersistedTaskSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    return err(new StorageError('get', `record does not match task schema (${issues.join(', ')})`));
  }
  return ok(deserializeTask(parsed.data));
}
