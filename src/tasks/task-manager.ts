/**
 * Task Manager - Task lifecycle and priority queues
 *
 * Owns the task state machine:
 *
 *   pending  -> queued | running | cancelled
 *   queued   -> running | cancelled
 *   running  -> completed | failed
 *   running  -> pending   (failed with an error while retries remain)
 *
 * load() resumes queued records as pending and treats running records
 * as interrupted attempts.
 *
 * Every mutation persists to the task store first and only then touches
 * the in-memory map and queues, so a storage failure leaves both as they
 * were. Mutations are synchronous, which keeps the pop-and-transition in
 * nextReady() and the read-modify-write in updateState() atomic on the
 * event loop.
 */

import { EventEmitter } from 'events';
import {
  TERMINAL_STATES,
  cloneTask,
  isTerminalState,
  priorityClassOf,
  type CreateTaskOptions,
  type QueueStatus,
  type Task,
  type TaskFilter,
  type TaskState,
} from '../types/task.js';
import {
  DuplicateTaskError,
  InvalidStateTransitionError,
  StorageError,
  TaskNotFoundError,
} from '../errors/index.js';
import type { TaskStore } from '../store/types.js';
import { logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';
import { PriorityQueues } from './priority-queues.js';

export interface TaskManagerConfig {
  defaultMaxRetries: number;
  /** Period of the cleanup loop started by start() */
  cleanupIntervalMs: number;
  /** Terminal tasks older than this are removed by the cleanup loop */
  retentionMs: number;
}

export const DEFAULT_TASK_MANAGER_CONFIG: TaskManagerConfig = {
  defaultMaxRetries: 3,
  cleanupIntervalMs: 60 * 60 * 1000,
  retentionMs: 7 * 24 * 60 * 60 * 1000,
};

export interface TaskStateChange {
  task: Task;
  from: TaskState;
  to: TaskState;
}

const ALLOWED_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ['queued', 'running', 'cancelled'],
  queued: ['running', 'cancelled'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
  cancelled: [],
};

const CLEANABLE_STATES: readonly TaskState[] = TERMINAL_STATES.filter(state => state !== 'failed');

export const INTERRUPTED_ERROR = 'interrupted by restart';

export type UpdateStateError = TaskNotFoundError | InvalidStateTransitionError | StorageError;

export class TaskManager extends EventEmitter {
  private tasks: Map<string, Task> = new Map();
  private queues = new PriorityQueues();
  private config: TaskManagerConfig;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly store: TaskStore,
    config: Partial<TaskManagerConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_TASK_MANAGER_CONFIG, ...config };
  }

  /**
   * Create, persist and enqueue a new pending task
   */
  create<TPayload>(
    id: string,
    payload: TPayload,
    agentId: string,
    priority = 1,
    options: CreateTaskOptions = {}
  ): Result<Task<TPayload>, DuplicateTaskError | StorageError> {
    if (this.tasks.has(id)) {
      return err(new DuplicateTaskError(id));
    }
    const existing = this.store.get(id);
    if (!existing.ok) {
      return existing;
    }
    if (existing.value) {
      return err(new DuplicateTaskError(id, 'already exists in the task store'));
    }

    const now = new Date();
    const task: Task<TPayload> = {
      id,
      payload,
      agentId,
      priority,
      state: 'pending',
      metadata: {
        createdAt: now,
        updatedAt: now,
        retries: 0,
        maxRetries: options.maxRetries ?? this.config.defaultMaxRetries,
      },
    };

    const persisted = this.store.put(task);
    if (!persisted.ok) {
      logger.error(`Failed to persist task ${id}`, persisted.error);
      return persisted;
    }

    this.tasks.set(id, cloneTask(task));
    if (options.enqueue ?? true) {
      this.queues.enqueue(id, priorityClassOf(priority));
    }
    logger.debug(`Task ${id} created for agent ${agentId}`, {
      priorityClass: priorityClassOf(priority),
    });
    this.emit('task:created', cloneTask(task));

    return ok(task);
  }

  /**
   * Pop the head of the highest-priority non-empty queue and mark it running
   */
  nextReady(): Result<Task | null, StorageError> {
    for (let entry = this.queues.dequeue(); entry; entry = this.queues.dequeue()) {
      const current = this.tasks.get(entry.taskId);
      if (!current || current.state !== 'pending') {
        logger.warn(`Dropping stale queue entry ${entry.taskId}`);
        continue;
      }

      const next = this.withState(current, 'running');
      const persisted = this.store.put(next);
      if (!persisted.ok) {
        this.queues.requeueFront(entry.taskId, entry.priorityClass);
        logger.error(`Failed to persist dequeue of task ${entry.taskId}`, persisted.error);
        return persisted;
      }

      this.commit(current, next);
      return ok(cloneTask(next));
    }
    return ok(null);
  }

  /**
   * Move a task to a new state.
   *
   * A transition to `failed` that carries an error applies the retry
   * policy: while retries remain the task goes back to `pending` and is
   * re-enqueued in its original priority class.
   */
  updateState(id: string, newState: TaskState, error?: string | Error): Result<Task, UpdateStateError> {
    const current = this.tasks.get(id);
    if (!current) {
      return err(new TaskNotFoundError(id));
    }
    if (!ALLOWED_TRANSITIONS[current.state].includes(newState)) {
      return err(new InvalidStateTransitionError(id, current.state, newState));
    }

    const next = this.withState(current, newState);
    if (error !== undefined) {
      next.metadata.lastError = error instanceof Error ? error.message : error;
    }

    const retrying =
      newState === 'failed' &&
      error !== undefined &&
      next.metadata.retries < next.metadata.maxRetries;
    if (retrying) {
      next.metadata.retries++;
      next.state = 'pending';
    }

    const persisted = this.store.put(next);
    if (!persisted.ok) {
      logger.error(`Failed to persist state ${newState} for task ${id}`, persisted.error);
      return persisted;
    }

    this.commit(current, next);

    if (retrying) {
      this.queues.enqueue(id, priorityClassOf(next.priority));
      logger.info(`Retrying task ${id} (attempt ${next.metadata.retries})`);
    } else if (newState === 'failed') {
      logger.error(`Task ${id} failed after ${next.metadata.retries} retries`, {
        lastError: next.metadata.lastError,
      });
    }

    return ok(cloneTask(next));
  }

  /**
   * Cancel a pending or queued task
   */
  cancel(id: string): Result<Task, UpdateStateError> {
    return this.updateState(id, 'cancelled');
  }

  /**
   * Rebuild in-memory state from the store; pending tasks are re-enqueued
   * oldest first. Returns the number of tasks put back in a queue.
   *
   * No worker survives a restart, so a `queued` record goes back to
   * `pending` and a `running` record counts as an interrupted attempt
   * under the retry policy. Recovered records are persisted before they
   * are taken into memory; a record whose write fails is left out and
   * picked up by the next load().
   */
  load(): Result<number, StorageError> {
    const listed = this.store.list();
    if (!listed.ok) {
      logger.error('Failed to load persisted tasks', listed.error);
      return listed;
    }

    const records = [...listed.value].sort(
      (a, b) => a.metadata.createdAt.getTime() - b.metadata.createdAt.getTime()
    );

    let requeued = 0;
    let recovered = 0;
    for (const record of records) {
      if (this.tasks.has(record.id)) continue;

      const task = isTerminalState(record.state) ? record : this.recover(record);
      if (task !== record) {
        const persisted = this.store.put(task);
        if (!persisted.ok) {
          logger.error(`Failed to persist recovery of task ${record.id}`, persisted.error);
          return persisted;
        }
        recovered++;
      }

      this.tasks.set(task.id, task);
      if (task.state === 'pending') {
        this.queues.enqueue(task.id, priorityClassOf(task.priority));
        requeued++;
      }
      if (task !== record) {
        this.emit('task:state-changed', {
          task: cloneTask(task),
          from: record.state,
          to: task.state,
        } satisfies TaskStateChange);
      }
    }

    logger.info(`Loaded ${records.length} persisted task(s), ${requeued} ready for dispatch`, { recovered });
    return ok(requeued);
  }

  /**
   * Remove completed/cancelled tasks last updated before the cutoff
   */
  cleanup(olderThan: Date): number {
    let removed = 0;
    for (const task of Array.from(this.tasks.values())) {
      if (!CLEANABLE_STATES.includes(task.state)) continue;
      if (task.metadata.updatedAt.getTime() >= olderThan.getTime()) continue;

      const deleted = this.store.delete(task.id);
      if (!deleted.ok) {
        logger.error(`Failed to delete task ${task.id} during cleanup`, deleted.error);
        continue;
      }
      this.tasks.delete(task.id);
      removed++;
      this.emit('task:removed', task.id);
    }

    if (removed > 0) {
      logger.info(`Cleaned up ${removed} finished task(s)`);
    }
    return removed;
  }

  getTask(id: string): Task | undefined {
    const task = this.tasks.get(id);
    return task ? cloneTask(task) : undefined;
  }

  listTasks(filter: TaskFilter = {}): Task[] {
    return Array.from(this.tasks.values())
      .filter(t => filter.state === undefined || t.state === filter.state)
      .filter(t => filter.agentId === undefined || t.agentId === filter.agentId)
      .map(cloneTask);
  }

  getQueueStatus(): QueueStatus {
    return this.queues.counts();
  }

  isQueued(id: string): boolean {
    return this.queues.has(id);
  }

  /**
   * Start the periodic cleanup loop
   */
  start(): void {
    if (this.cleanupTimer) return;

    this.cleanupTimer = setInterval(() => {
      this.cleanup(new Date(Date.now() - this.config.retentionMs));
    }, this.config.cleanupIntervalMs);
    logger.debug('Task manager cleanup loop started');
  }

  stop(): void {
    if (!this.cleanupTimer) return;

    clearInterval(this.cleanupTimer);
    this.cleanupTimer = null;
    logger.debug('Task manager cleanup loop stopped');
  }

  isRunning(): boolean {
    return this.cleanupTimer !== null;
  }

  getConfig(): TaskManagerConfig {
    return { ...this.config };
  }

  /**
   * The state a non-terminal record resumes in after a restart
   */
  private recover(record: Task): Task {
    if (record.state === 'queued') {
      return this.withState(record, 'pending');
    }
    if (record.state !== 'running') {
      return record;
    }

    const next = this.withState(record, 'failed');
    next.metadata.lastError = INTERRUPTED_ERROR;
    if (next.metadata.retries < next.metadata.maxRetries) {
      next.metadata.retries++;
      next.state = 'pending';
    }
    logger.warn(`Task ${record.id} was interrupted while running`, {
      state: next.state,
      retries: next.metadata.retries,
    });
    return next;
  }

  private withState(task: Task, state: TaskState): Task {
    const next = cloneTask(task);
    next.state = state;
    next.metadata.updatedAt = new Date();
    return next;
  }

  /**
   * Apply an already-persisted change to memory and the queues
   */
  private commit(previous: Task, next: Task): void {
    this.tasks.set(next.id, next);
    if (next.state !== 'pending') {
      this.queues.remove(next.id);
    }
    if (previous.state !== next.state || previous.metadata.retries !== next.metadata.retries) {
      this.emit('task:state-changed', {
        task: cloneTask(next),
        from: previous.state,
        to: next.state,
      } satisfies TaskStateChange);
    }
    logger.debug(`Task ${next.id}: ${previous.state} -> ${next.state}`);
  }
}
