/**
 * Type definitions for the Orchestrator module
 */

import type { Agent } from '../types/execution.js';

export interface AgentOptions {
  /** Overrides OrchestratorConfig.agentTimeoutMs; 0 disables the timeout */
  timeoutMs?: number;
}

export interface OrchestratorConfig {
  /** Worker pool size: concurrent agent invocations */
  maxWorkers: number;
  /**
   * Default agent timeout in ms; 0 means none.
   *
   * A timed-out call is reported as failed and its worker slot is freed,
   * but the agent's own promise cannot be aborted and keeps running. Agents
   * that ignore their timeout can therefore push the number of live calls
   * above maxWorkers.
   */
  agentTimeoutMs: number;
  /** Period of the dispatch loop started by start() */
  dispatchIntervalMs: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxWorkers: 5,
  agentTimeoutMs: 0,
  dispatchIntervalMs: 100,
};

export interface ExecutionContext {
  taskId: string;
  agentId: string;
  priority: number;
  submittedAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
}

export type ExecutionStatus =
  | { status: 'not_found' }
  | { status: 'running'; context: ExecutionContext }
  | { status: 'completed'; result: unknown; context: ExecutionContext }
  | { status: 'failed'; error: string; context: ExecutionContext };

export interface RegisteredAgent {
  agent: Agent;
  options: AgentOptions;
  registeredAt: Date;
  completed: number;
  failed: number;
}

export interface AgentInfo {
  agentId: string;
  timeoutMs: number;
  registeredAt: Date;
  completed: number;
  failed: number;
}
