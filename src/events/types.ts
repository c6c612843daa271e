/**
 * Event Types
 */

/** Advisory only; delivery is FIFO by arrival */
export type EventPriority = 'low' | 'normal' | 'high' | 'critical';

export interface BusEvent<TData = unknown> {
  readonly type: string;
  readonly data: TData;
  readonly priority: EventPriority;
  readonly timestamp: Date;
  readonly source?: string;
  readonly id?: string;
}

/**
 * What a publisher hands to the bus; priority defaults to `normal` and
 * timestamp to the moment of publishing
 */
export interface EventInput<TData = unknown> {
  type: string;
  data: TData;
  priority?: EventPriority;
  timestamp?: Date;
  source?: string;
  id?: string;
}

export type EventCallback = (event: BusEvent) => void | Promise<void>;

export interface EventBusConfig {
  /** Maximum number of undelivered events */
  maxQueueSize: number;
}

export interface EventBusStats {
  published: number;
  delivered: number;
  failed: number;
  dropped: number;
}

export const DEFAULT_EVENT_BUS_CONFIG: EventBusConfig = {
  maxQueueSize: 1000,
};

/** Event types published by the orchestration core */
export const EventTypes = {
  TASK_SCHEDULED: 'task_scheduled',
  TASK_EXECUTED: 'task_executed',
  TASK_QUEUED_OFFLINE: 'task_queued_offline',
  SCHEDULE_CANCELLED: 'schedule_cancelled',
  TASK_COMPLETED: 'task_completed',
  TASK_FAILED: 'task_failed',
  TASK_STATE_CHANGED: 'task_state_changed',
} as const;
