import { TaskloomError } from './base-error.js';

/**
 * A task with the same id is already known (or already in flight)
 */
export class DuplicateTaskError extends TaskloomError {
  public readonly taskId: string;

  constructor(taskId: string, reason = 'already exists') {
    super('DUPLICATE_TASK', `Task "${taskId}" ${reason}`, { context: { taskId } });
    this.name = 'DuplicateTaskError';
    this.taskId = taskId;
  }
}

/**
 * Task id is unknown to the task manager
 */
export class TaskNotFoundError extends TaskloomError {
  public readonly taskId: string;

  constructor(taskId: string) {
    super('TASK_NOT_FOUND', `Task "${taskId}" not found`, { context: { taskId } });
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

/**
 * Requested state change is not allowed by the task state machine
 */
export class InvalidStateTransitionError extends TaskloomError {
  public readonly taskId: string;
  public readonly from: string;
  public readonly to: string;

  constructor(taskId: string, from: string, to: string) {
    super('INVALID_STATE_TRANSITION', `Task "${taskId}" cannot move from ${from} to ${to}`, {
      context: { taskId, from, to },
    });
    this.name = 'InvalidStateTransitionError';
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

/**
 * No agent registered under the id
 */
export class AgentNotFoundError extends TaskloomError {
  public readonly agentId: string;

  constructor(agentId: string) {
    super('AGENT_NOT_FOUND', `Agent "${agentId}" not registered`, { context: { agentId } });
    this.name = 'AgentNotFoundError';
    this.agentId = agentId;
  }
}

/**
 * Agent did not settle within its timeout
 */
export class AgentTimeoutError extends TaskloomError {
  public readonly agentId: string;
  public readonly timeoutMs: number;

  constructor(agentId: string, timeoutMs: number) {
    super('AGENT_TIMEOUT', `Agent "${agentId}" timed out after ${timeoutMs}ms`, {
      context: { agentId, timeoutMs },
    });
    this.name = 'AgentTimeoutError';
    this.agentId = agentId;
    this.timeoutMs = timeoutMs;
  }
}

export class DuplicateScheduleError extends TaskloomError {
  public readonly jobId: string;

  constructor(jobId: string) {
    super('DUPLICATE_SCHEDULE', `Job "${jobId}" is already scheduled`, { context: { jobId } });
    this.name = 'DuplicateScheduleError';
    this.jobId = jobId;
  }
}

export class ScheduleNotFoundError extends TaskloomError {
  public readonly jobId: string;

  constructor(jobId: string) {
    super('SCHEDULE_NOT_FOUND', `Job "${jobId}" not found`, { context: { jobId } });
    this.name = 'ScheduleNotFoundError';
    this.jobId = jobId;
  }
}

/**
 * Schedule configuration does not match its kind
 */
export class InvalidScheduleError extends TaskloomError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_SCHEDULE', `Invalid schedule: ${issues.join('; ')}`, { context: { issues } });
    this.name = 'InvalidScheduleError';
    this.issues = issues;
  }
}

/**
 * Backing medium of a task store failed
 */
export class StorageError extends TaskloomError {
  public readonly operation: 'put' | 'get' | 'list' | 'delete' | 'open';

  constructor(
    operation: 'put' | 'get' | 'list' | 'delete' | 'open',
    message: string,
    options: { cause?: Error; context?: Record<string, unknown> } = {}
  ) {
    super('STORAGE_ERROR', `Storage ${operation} failed: ${message}`, options);
    this.name = 'StorageError';
    this.operation = operation;
  }
}

export class QueueFullError extends TaskloomError {
  public readonly capacity: number;

  constructor(capacity: number) {
    super('QUEUE_FULL', `Event queue full (capacity: ${capacity})`, { context: { capacity } });
    this.name = 'QueueFullError';
    this.capacity = capacity;
  }
}

/**
 * Component no longer accepts work
 */
export class ShutdownError extends TaskloomError {
  constructor(component: string) {
    super('SHUTDOWN', `${component} is shutting down`, { context: { component } });
    this.name = 'ShutdownError';
  }
}

export class ConfigurationError extends TaskloomError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION_ERROR', `Invalid configuration:\n  ${issues.join('\n  ')}`, {
      context: { issues },
      isOperational: false,
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Execution was withdrawn before a worker picked it up
 */
export class TaskCancelledError extends TaskloomError {
  public readonly taskId: string;

  constructor(taskId: string) {
    super('TASK_CANCELLED', `Task "${taskId}" was cancelled before it started`, { context: { taskId } });
    this.name = 'TaskCancelledError';
    this.taskId = taskId;
  }
}

/**
 * Writing, compressing or removing an export file failed
 */
export class ExportError extends TaskloomError {
  public readonly path: string;

  constructor(path: string, message: string, options: { cause?: Error } = {}) {
    super('EXPORT_ERROR', `Export to ${path} failed: ${message}`, { ...options, context: { path } });
    this.name = 'ExportError';
    this.path = path;
  }
}
