/**
 * Task Scheduler - Time-triggered task executions
 *
 * Features:
 * - One-time, fixed-interval and cron schedules
 * - Each firing materialized as a task and run through the execution gateway
 * - Retry with a fixed delay when the execution layer cannot run a firing
 * - Offline queue for firings that come due while no agent is reachable
 * - Timers armed only between start() and stop()
 */

import { EventEmitter } from 'events';
import type { EventBus } from '../events/event-bus.js';
import { EventTypes, type EventPriority } from '../events/types.js';
import {
  AgentNotFoundError,
  DuplicateScheduleError,
  DuplicateTaskError,
  InvalidScheduleError,
  InvalidStateTransitionError,
  ScheduleNotFoundError,
  getErrorMessage,
  toError,
} from '../errors/index.js';
import type { TaskManager } from '../tasks/task-manager.js';
import type { ExecutionGateway, ExecutionOutcome } from '../types/execution.js';
import type { Task } from '../types/task.js';
import { logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';
import { OfflineQueue } from './offline-queue.js';
import { firstFireTime, nextFireTime, parseScheduleConfig } from './schedule-config.js';
import {
  DEFAULT_SCHEDULER_CONFIG,
  type DrainResult,
  type FireResult,
  type OfflineFiring,
  type ResolvedScheduleConfig,
  type ScheduleConfig,
  type ScheduledJobInfo,
  type SchedulerConfig,
  type TaskTemplate,
} from './types.js';

/** Largest delay setTimeout accepts; longer waits are chained */
const MAX_TIMER_DELAY = 2_147_483_647;

interface Firing {
  jobId: string;
  taskId: string;
  /** 0 for the scheduled fire, n for its n-th retry */
  attempt: number;
}

interface PendingRetry {
  firing: Firing;
  dueAt: Date;
  timer: ReturnType<typeof setTimeout> | null;
}

interface ScheduledJob {
  jobId: string;
  template: TaskTemplate;
  config: ResolvedScheduleConfig;
  agentId: string;
  priority: number;
  retryCount: number;
  firingCount: number;
  nextFireAt: Date | null;
  timer: ReturnType<typeof setTimeout> | null;
  pendingRetries: Map<string, PendingRetry>;
  inFlight: number;
  createdAt: Date;
  lastFireAt?: Date;
}

/**
 * Errors that retrying cannot fix
 */
function isPermanentFailure(error: Error): boolean {
  return (
    error instanceof DuplicateTaskError ||
    error instanceof AgentNotFoundError ||
    error instanceof InvalidStateTransitionError
  );
}

export class TaskScheduler extends EventEmitter {
  private jobs: Map<string, ScheduledJob> = new Map();
  private offline: OfflineQueue;
  private config: SchedulerConfig;
  private running = false;
  private inFlight: Set<Promise<FireResult>> = new Set();

  constructor(
    private readonly taskManager: TaskManager,
    private readonly eventBus: EventBus,
    private readonly gateway: ExecutionGateway,
    config: Partial<SchedulerConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.offline = new OfflineQueue(this.config.maxOfflineFirings);
  }

  // ============================================================================
  // Jobs
  // ============================================================================

  /**
   * Bind a task template to a schedule. The config is validated for its
   * kind at run time as well, since it may come from JSON; nothing is
   * created when it does not validate.
   */
  schedule(
    template: TaskTemplate,
    config: ScheduleConfig,
    agentId: string,
    priority = 1
  ): Result<ScheduledJobInfo, DuplicateScheduleError | InvalidScheduleError> {
    if (this.jobs.has(template.id)) {
      return err(new DuplicateScheduleError(template.id));
    }

    const parsed = parseScheduleConfig(config);
    if (!parsed.ok) {
      logger.warn(`Rejected schedule for job ${template.id}: ${parsed.error.message}`);
      return parsed;
    }

    const now = new Date();
    const nextFireAt = firstFireTime(parsed.value, now);
    if (!nextFireAt) {
      return err(new InvalidScheduleError(['schedule has no fire time']));
    }

    const job: ScheduledJob = {
      jobId: template.id,
      template,
      config: parsed.value,
      agentId,
      priority,
      retryCount: 0,
      firingCount: 0,
      nextFireAt,
      timer: null,
      pendingRetries: new Map(),
      inFlight: 0,
      createdAt: now,
    };
    this.jobs.set(job.jobId, job);

    if (this.running) {
      this.arm(job);
    }

    logger.info(`Scheduled ${parsed.value.kind} job ${job.jobId}`, {
      agentId,
      nextFireAt: nextFireAt.toISOString(),
    });
    this.publish(
      EventTypes.TASK_SCHEDULED,
      { jobId: job.jobId, kind: parsed.value.kind, agentId, nextFireAt },
      'normal'
    );
    this.emit('job:scheduled', this.toInfo(job));

    return ok(this.toInfo(job));
  }

  /**
   * Remove a job with its armed timers, retries and offline firings.
   * A firing already handed to the execution layer is not affected.
   */
  cancel(jobId: string): Result<void, ScheduleNotFoundError> {
    const job = this.jobs.get(jobId);
    if (!job) {
      return err(new ScheduleNotFoundError(jobId));
    }

    this.disarm(job);
    job.pendingRetries.clear();
    const droppedOffline = this.offline.removeJob(jobId);
    this.jobs.delete(jobId);

    logger.info(`Cancelled job ${jobId}`, { droppedOffline });
    this.publish(EventTypes.SCHEDULE_CANCELLED, { jobId }, 'normal');
    this.emit('job:cancelled', jobId);

    return ok(undefined);
  }

  list(): ScheduledJobInfo[] {
    return Array.from(this.jobs.values()).map(job => this.toInfo(job));
  }

  getJob(jobId: string): ScheduledJobInfo | undefined {
    const job = this.jobs.get(jobId);
    return job ? this.toInfo(job) : undefined;
  }

  getOfflineQueue(): OfflineFiring[] {
    return this.offline.snapshot();
  }

  /**
   * Re-attempt every offline firing in order once an agent is reachable.
   * Firings that still cannot run go back on the queue.
   */
  async drainOffline(): Promise<DrainResult> {
    if (!this.gateway.isConnected()) {
      logger.debug(`Still offline, ${this.offline.size()} firing(s) kept`);
      return { attempted: 0, requeued: 0 };
    }

    const firings = this.offline.drain();
    let requeued = 0;
    for (const entry of firings) {
      const firing = this.fire({ jobId: entry.jobId, taskId: entry.taskId, attempt: entry.attempt }, true);
      this.track(firing);
      if ((await firing) === 'offline') {
        requeued++;
      }
    }

    if (firings.length > 0) {
      logger.info(`Drained offline queue: ${firings.length} attempted, ${requeued} requeued`);
    }
    return { attempted: firings.length, requeued };
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Arm the timers of every job
   */
  start(): void {
    if (this.running) return;

    this.running = true;
    for (const job of this.jobs.values()) {
      this.arm(job);
    }
    logger.info(`Scheduler started with ${this.jobs.size} job(s)`);
    this.emit('scheduler:started');
  }

  /**
   * Clear every timer and wait for firings in progress
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    for (const job of this.jobs.values()) {
      this.disarm(job);
    }
    await Promise.allSettled(Array.from(this.inFlight));
    logger.info('Scheduler stopped');
    this.emit('scheduler:stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // ============================================================================
  // Timers
  // ============================================================================

  private arm(job: ScheduledJob): void {
    if (job.timer) {
      clearTimeout(job.timer);
      job.timer = null;
    }
    if (job.nextFireAt) {
      const dueAt = job.nextFireAt.getTime();
      job.timer = this.setTimer(dueAt, () => {
        job.timer = null;
        this.trigger(job);
      }, timer => {
        job.timer = timer;
      });
    }

    for (const retry of job.pendingRetries.values()) {
      if (retry.timer) continue;
      retry.timer = this.setTimer(retry.dueAt.getTime(), () => {
        job.pendingRetries.delete(retry.firing.taskId);
        this.track(this.fire(retry.firing, false));
      }, timer => {
        retry.timer = timer;
      });
    }
  }

  private disarm(job: ScheduledJob): void {
    if (job.timer) {
      clearTimeout(job.timer);
      job.timer = null;
    }
    for (const retry of job.pendingRetries.values()) {
      if (retry.timer) {
        clearTimeout(retry.timer);
        retry.timer = null;
      }
    }
  }

  /**
   * setTimeout that reaches `dueAt` through a chain of timers when the
   * delay exceeds the platform limit; `rearmed` receives each new handle
   */
  private setTimer(
    dueAt: number,
    callback: () => void,
    rearmed: (timer: ReturnType<typeof setTimeout>) => void
  ): ReturnType<typeof setTimeout> {
    const delay = Math.max(0, dueAt - Date.now());
    if (delay <= MAX_TIMER_DELAY) {
      return setTimeout(callback, delay);
    }
    return setTimeout(() => {
      rearmed(this.setTimer(dueAt, callback, rearmed));
    }, MAX_TIMER_DELAY);
  }

  /**
   * A job's fire time has come: start the firing and arm the next one
   */
  private trigger(job: ScheduledJob): void {
    const scheduledAt = job.nextFireAt;
    if (!scheduledAt || !this.jobs.has(job.jobId)) return;

    job.firingCount++;
    job.lastFireAt = new Date();
    const firing: Firing = { jobId: job.jobId, taskId: `${job.jobId}#${job.firingCount}`, attempt: 0 };

    // Missed fire times collapse into this one
    const now = Date.now();
    let next = nextFireTime(job.config, scheduledAt);
    while (next && next.getTime() <= now) {
      next = nextFireTime(job.config, next);
    }
    job.nextFireAt = next;
    if (this.running) {
      this.arm(job);
    }

    logger.debug(`Job ${job.jobId} fired`, { taskId: firing.taskId, nextFireAt: next?.toISOString() });
    this.emit('job:fired', firing.taskId);
    this.track(this.fire(firing, false));
  }

  /**
   * Keep a firing visible to stop() until it settles
   */
  private track(promise: Promise<FireResult>): void {
    this.inFlight.add(promise);
    promise
      .finally(() => this.inFlight.delete(promise))
      .catch(error => logger.error(`Firing crashed: ${getErrorMessage(error)}`, toError(error)));
  }

  // ============================================================================
  // Firing
  // ============================================================================

  /**
   * Run one firing to its end. The job's retry counter is only inspected
   * after the gateway call has settled.
   */
  private async fire(firing: Firing, fromOffline: boolean): Promise<FireResult> {
    const job = this.jobs.get(firing.jobId);
    if (!job) {
      logger.debug(`Skipping firing ${firing.taskId} of cancelled job`);
      return 'skipped';
    }

    if (!this.gateway.isConnected()) {
      this.queueOffline(job, firing);
      return 'offline';
    }

    job.inFlight++;
    let result: Result<ExecutionOutcome, Error>;
    try {
      const task = this.materialize(job, firing);
      result = task.ok ? await this.gateway.execute(task.value) : task;
    } catch (error) {
      result = err(toError(error));
    } finally {
      job.inFlight--;
    }

    if (result.ok) {
      job.retryCount = 0;
      this.reportExecuted(job, firing, result.value);
      this.finishIfDone(job);
      return result.value.success ? 'succeeded' : 'failed';
    }

    const error = result.error;
    logger.warn(`Firing ${firing.taskId} could not run: ${error.message}`);

    if (!isPermanentFailure(error) && !this.gateway.isConnected()) {
      this.queueOffline(job, firing);
      return 'offline';
    }
    if (fromOffline && !isPermanentFailure(error)) {
      this.queueOffline(job, firing);
      return 'offline';
    }

    const { retryOnFailure, maxRetries, retryDelay } = job.config;
    if (!isPermanentFailure(error) && retryOnFailure && job.retryCount < maxRetries && this.jobs.has(job.jobId)) {
      job.retryCount++;
      this.armRetry(job, { ...firing, attempt: firing.attempt + 1 }, retryDelay);
      return 'retrying';
    }

    this.reportExecuted(job, firing, undefined, error);
    this.finishIfDone(job);
    return 'failed';
  }

  /**
   * The task for a firing; a retry reuses the task while it is still pending.
   * Firing tasks stay out of the dispatch queues so that only the
   * scheduler hands them to the execution layer.
   */
  private materialize(job: ScheduledJob, firing: Firing): Result<Task, Error> {
    const existing = this.taskManager.getTask(firing.taskId);
    if (existing) {
      return existing.state === 'pending'
        ? ok(existing)
        : err(new DuplicateTaskError(firing.taskId, `is already ${existing.state}`));
    }
    return this.taskManager.create(firing.taskId, job.template.payload, job.agentId, job.priority, {
      maxRetries: job.template.maxRetries,
      enqueue: false,
    });
  }

  private armRetry(job: ScheduledJob, firing: Firing, delay: number): void {
    const retry: PendingRetry = { firing, dueAt: new Date(Date.now() + delay), timer: null };
    job.pendingRetries.set(firing.taskId, retry);
    logger.info(`Retrying firing ${firing.taskId} in ${delay}ms (retry ${job.retryCount}/${job.config.maxRetries})`);
    if (this.running) {
      this.arm(job);
    }
  }

  private queueOffline(job: ScheduledJob, firing: Firing): void {
    const dropped = this.offline.enqueue(firing);
    if (dropped) {
      logger.warn(`Offline queue full, dropped firing ${dropped.taskId}`);
    }
    logger.info(`No agent reachable, firing ${firing.taskId} queued offline`);
    this.publish(EventTypes.TASK_QUEUED_OFFLINE, { jobId: job.jobId, taskId: firing.taskId }, 'normal');
  }

  private reportExecuted(job: ScheduledJob, firing: Firing, outcome?: ExecutionOutcome, error?: Error): void {
    const success = outcome?.success ?? false;
    const failure = outcome?.error ?? error;
    this.publish(
      EventTypes.TASK_EXECUTED,
      {
        jobId: job.jobId,
        taskId: firing.taskId,
        success,
        ...(outcome && success ? { result: outcome.result } : {}),
        ...(failure ? { error: failure.message } : {}),
        attempt: firing.attempt,
      },
      'high'
    );
    this.emit('job:executed', { jobId: job.jobId, taskId: firing.taskId, success });
  }

  /**
   * Drop a job that has no fire time, retry or offline firing left
   */
  private finishIfDone(job: ScheduledJob): void {
    if (job.nextFireAt || job.pendingRetries.size > 0 || job.inFlight > 0) return;
    if (this.offline.hasJob(job.jobId)) return;
    if (this.jobs.get(job.jobId) !== job) return;

    this.jobs.delete(job.jobId);
    logger.info(`Job ${job.jobId} finished after ${job.firingCount} firing(s)`);
    this.emit('job:finished', job.jobId);
  }

  private toInfo(job: ScheduledJob): ScheduledJobInfo {
    return {
      jobId: job.jobId,
      kind: job.config.kind,
      agentId: job.agentId,
      priority: job.priority,
      config: { ...job.config },
      nextFireAt: job.nextFireAt ? new Date(job.nextFireAt) : null,
      retryCount: job.retryCount,
      firingCount: job.firingCount,
      pendingRetries: job.pendingRetries.size,
      createdAt: new Date(job.createdAt),
      ...(job.lastFireAt ? { lastFireAt: new Date(job.lastFireAt) } : {}),
    };
  }

  private publish(type: string, data: Record<string, unknown>, priority: EventPriority): void {
    const published = this.eventBus.publish({ type, data, priority, source: 'scheduler' });
    if (!published.ok) {
      logger.warn(`Dropped ${type} event: ${published.error.message}`);
    }
  }
}
