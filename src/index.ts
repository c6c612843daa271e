/**
 * Taskloom - Task orchestration core
 *
 * Priority task queues with persisted state, pluggable agents on a bounded
 * worker pool, one-time/interval/cron schedules and a pub/sub event bus.
 */

export * from './errors/index.js';
export * from './utils/result.js';
export { Logger, getLogger, resetLogger, logger, type LogLevel, type LogFormat, type LogEntry, type LoggerOptions } from './utils/logger.js';

export * from './types/task.js';
export type { Agent, ExecutionGateway, ExecutionOutcome } from './types/execution.js';

export * from './store/index.js';
export * from './tasks/index.js';
export * from './events/index.js';
export * from './orchestrator/index.js';
export * from './scheduler/index.js';
export * from './agents/index.js';
export * from './notifications/index.js';
export * from './export/index.js';
export * from './config/index.js';
export * from './runtime/index.js';
