/**
 * Base Error Class
 *
 * Every error the orchestration core returns carries one of the codes
 * below, so callers can branch on `code` without instanceof checks
 * across module boundaries.
 */

export const ERROR_CODES = [
  'DUPLICATE_TASK',
  'TASK_NOT_FOUND',
  'INVALID_STATE_TRANSITION',
  'AGENT_NOT_FOUND',
  'AGENT_TIMEOUT',
  'DUPLICATE_SCHEDULE',
  'SCHEDULE_NOT_FOUND',
  'INVALID_SCHEDULE',
  'STORAGE_ERROR',
  'QUEUE_FULL',
  'SHUTDOWN',
  'CONFIGURATION_ERROR',
  'TASK_CANCELLED',
  'EXPORT_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ErrorOptions {
  cause?: Error;
  /** False for programming errors; true for conditions callers handle */
  isOperational?: boolean;
  context?: Record<string, unknown>;
}

/** Serialized form of an error and its cause chain */
export interface SerializedError {
  name: string;
  code?: ErrorCode;
  message: string;
  timestamp?: string;
  context?: Record<string, unknown>;
  cause?: SerializedError;
  stack?: string;
}

function serializeCause(cause: unknown): SerializedError | undefined {
  if (cause instanceof TaskloomError) {
    return cause.toJSON();
  }
  if (cause instanceof Error) {
    return { name: cause.name, message: cause.message };
  }
  return undefined;
}

export class TaskloomError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: ErrorOptions = {}) {
    super(message);
    this.name = 'TaskloomError';
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.timestamp = new Date();
    this.context = options.context;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: serializeCause(this.cause),
      stack: this.stack,
    };
  }
}
