/**
 * Orchestrator Module
 */

export { Orchestrator, type SubmitError } from './orchestrator.js';
export { WorkerPool, type PoolJob, type WorkerPoolStats } from './worker-pool.js';
export {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type AgentInfo,
  type AgentOptions,
  type ExecutionContext,
  type ExecutionStatus,
  type OrchestratorConfig,
  type RegisteredAgent,
} from './types.js';
