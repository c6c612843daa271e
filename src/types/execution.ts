/**
 * Execution Types shared by the orchestrator and the scheduler
 */

import type { Task } from './task.js';
import type { Result } from '../utils/result.js';

/**
 * Executes a task payload. Throwing or rejecting reports a failure.
 */
export interface Agent<TPayload = unknown, TResult = unknown> {
  execute(payload: TPayload): TResult | Promise<TResult>;
}

export interface ExecutionOutcome {
  taskId: string;
  agentId: string;
  success: boolean;
  result?: unknown;
  error?: Error;
  /** Task state after the outcome was recorded */
  state?: Task['state'];
  /** True when the task manager re-enqueued the task for another attempt */
  retrying: boolean;
  durationMs: number;
}

/**
 * The scheduler's view of the execution layer
 */
export interface ExecutionGateway {
  /**
   * Run a task to its outcome. An error result means the execution layer
   * itself could not run the task; a failed agent is an Ok outcome with
   * `success: false`.
   */
  execute(task: Task): Promise<Result<ExecutionOutcome, Error>>;
  /** Whether any agent can currently be reached */
  isConnected(): boolean;
}
