export {
  TaskManager,
  DEFAULT_TASK_MANAGER_CONFIG,
  type TaskManagerConfig,
  type TaskStateChange,
  type UpdateStateError,
} from './task-manager.js';
export { PriorityQueues, type QueueEntry } from './priority-queues.js';
