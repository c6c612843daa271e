/**
 * Type definitions for the Scheduler module
 */

export type ScheduleKind = 'one_time' | 'recurring' | 'cron';

export interface ScheduleRetryOptions {
  /** Retry a firing the execution layer could not run (default true) */
  retryOnFailure?: boolean;
  /** Default 3 */
  maxRetries?: number;
  /** Delay before a retry in ms (default 5 minutes) */
  retryDelay?: number;
}

export interface OneTimeSchedule extends ScheduleRetryOptions {
  kind: 'one_time';
  startAt: Date;
}

export interface RecurringSchedule extends ScheduleRetryOptions {
  kind: 'recurring';
  /** Period in ms */
  interval: number;
  startAt?: Date;
  endAt?: Date;
}

export interface CronSchedule extends ScheduleRetryOptions {
  kind: 'cron';
  cronExpression: string;
  startAt?: Date;
  endAt?: Date;
}

export type ScheduleConfig = OneTimeSchedule | RecurringSchedule | CronSchedule;

/** A validated config with every retry option filled in */
export type ResolvedScheduleConfig = ScheduleConfig & Required<ScheduleRetryOptions>;

/**
 * What each firing materializes as a task
 */
export interface TaskTemplate<TPayload = unknown> {
  /** Job key; firings get the task id `<id>#<n>` */
  id: string;
  payload: TPayload;
  maxRetries?: number;
}

export interface ScheduledJobInfo {
  jobId: string;
  kind: ScheduleKind;
  agentId: string;
  priority: number;
  config: ResolvedScheduleConfig;
  nextFireAt: Date | null;
  retryCount: number;
  firingCount: number;
  pendingRetries: number;
  createdAt: Date;
  lastFireAt?: Date;
}

export interface OfflineFiring {
  jobId: string;
  taskId: string;
  attempt: number;
  queuedAt: Date;
}

export interface DrainResult {
  attempted: number;
  requeued: number;
}

export type FireResult = 'succeeded' | 'failed' | 'retrying' | 'offline' | 'skipped';

export interface SchedulerConfig {
  /** Offline firings kept at most; the oldest is dropped beyond it */
  maxOfflineFirings: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  maxOfflineFirings: 1000,
};

export const DEFAULT_RETRY_OPTIONS: Required<ScheduleRetryOptions> = {
  retryOnFailure: true,
  maxRetries: 3,
  retryDelay: 5 * 60 * 1000,
};
