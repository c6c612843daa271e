/**
 * Error Module
 */

export { TaskloomError, ERROR_CODES, type ErrorCode, type ErrorOptions, type SerializedError } from './base-error.js';
export {
  DuplicateTaskError,
  TaskNotFoundError,
  InvalidStateTransitionError,
  AgentNotFoundError,
  AgentTimeoutError,
  DuplicateScheduleError,
  ScheduleNotFoundError,
  InvalidScheduleError,
  StorageError,
  QueueFullError,
  ShutdownError,
  ConfigurationError,
  TaskCancelledError,
  ExportError,
} from './task-errors.js';

import { TaskloomError } from './base-error.js';

export function isTaskloomError(error: unknown): error is TaskloomError {
  return error instanceof TaskloomError;
}

/**
 * Extract a message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
