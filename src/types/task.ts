/**
 * Task Types
 */

export type TaskState = 'pending' | 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export type PriorityClass = 'high' | 'medium' | 'low';

/** Dequeue order: high first, low last */
export const PRIORITY_CLASSES: readonly PriorityClass[] = ['high', 'medium', 'low'];

export const TERMINAL_STATES: readonly TaskState[] = ['completed', 'failed', 'cancelled'];

export interface TaskMetadata {
  createdAt: Date;
  updatedAt: Date;
  retries: number;
  maxRetries: number;
  lastError?: string;
}

export interface Task<TPayload = unknown> {
  readonly id: string;
  payload: TPayload;
  agentId: string;
  priority: number;
  state: TaskState;
  metadata: TaskMetadata;
}

export interface CreateTaskOptions {
  maxRetries?: number;
  /**
   * Put the task in a dispatch queue (default). Callers that hand the
   * task to an executor themselves pass false.
   */
  enqueue?: boolean;
}

export interface TaskFilter {
  state?: TaskState;
  agentId?: string;
}

export interface QueueStatus {
  high: number;
  medium: number;
  low: number;
}

/**
 * Map an integer priority onto its class.
 * Two cuts only: above 1 is high, below 1 is low, 1 itself is medium.
 */
export function priorityClassOf(priority: number): PriorityClass {
  if (priority > 1) return 'high';
  if (priority < 1) return 'low';
  return 'medium';
}

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function cloneTask(task: Task): Task {
  return {
    ...task,
    payload: structuredClone(task.payload),
    metadata: {
      ...task.metadata,
      createdAt: new Date(task.metadata.createdAt),
      updatedAt: new Date(task.metadata.updatedAt),
    },
  };
}
