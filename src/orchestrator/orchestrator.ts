/**
 * Orchestrator - Routes tasks to registered agents
 *
 * Tasks reach the worker pool two ways: submit() hands over a pending
 * task directly, and the dispatch loop (start/stop) pulls whatever the
 * task manager has ready. Either way a worker runs the agent, reports the
 * outcome through TaskManager.updateState() (which owns the retry policy)
 * and publishes task_completed or task_failed on the event bus.
 */

import { EventEmitter } from 'events';
import type { EventBus } from '../events/event-bus.js';
import { EventTypes, type EventPriority } from '../events/types.js';
import {
  AgentNotFoundError,
  AgentTimeoutError,
  DuplicateTaskError,
  ShutdownError,
  TaskCancelledError,
  TaskNotFoundError,
  getErrorMessage,
  toError,
} from '../errors/index.js';
import type { TaskManager, UpdateStateError } from '../tasks/task-manager.js';
import type { Agent, ExecutionGateway, ExecutionOutcome } from '../types/execution.js';
import type { Task } from '../types/task.js';
import { logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';
import { WorkerPool, type WorkerPoolStats } from './worker-pool.js';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type AgentInfo,
  type AgentOptions,
  type ExecutionContext,
  type ExecutionStatus,
  type OrchestratorConfig,
  type RegisteredAgent,
} from './types.js';

export type SubmitError = AgentNotFoundError | DuplicateTaskError | ShutdownError | UpdateStateError;

type ExecutionPhase = 'waiting' | 'running' | 'completed' | 'failed';

interface Execution {
  task: Task;
  context: ExecutionContext;
  phase: ExecutionPhase;
  result?: unknown;
  error?: Error;
  done: Promise<ExecutionOutcome>;
  settle: (outcome: ExecutionOutcome) => void;
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

export class Orchestrator extends EventEmitter implements ExecutionGateway {
  private agents: Map<string, RegisteredAgent> = new Map();
  private executions: Map<string, Execution> = new Map();
  private config: OrchestratorConfig;
  private pool: WorkerPool;
  private shuttingDown = false;
  private dispatchTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly taskManager: TaskManager,
    private readonly eventBus: EventBus,
    config: Partial<OrchestratorConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };
    this.pool = new WorkerPool(this.config.maxWorkers);
    this.pool.on('job:finished', () => this.dispatchReady());
    this.taskManager.on('task:removed', (taskId: string) => this.forget(taskId));
  }

  // ============================================================================
  // Agent registry
  // ============================================================================

  register(agentId: string, agent: Agent, options: AgentOptions = {}): void {
    const previous = this.agents.get(agentId);
    this.agents.set(agentId, {
      agent,
      options,
      registeredAt: new Date(),
      completed: previous?.completed ?? 0,
      failed: previous?.failed ?? 0,
    });
    logger.info(`Registered agent: ${agentId}`);
    this.emit('agent:registered', agentId);
  }

  /**
   * Remove an agent; executions already handed to the pool keep running
   */
  unregister(agentId: string): boolean {
    const removed = this.agents.delete(agentId);
    if (removed) {
      logger.info(`Unregistered agent: ${agentId}`);
      this.emit('agent:unregistered', agentId);
    }
    return removed;
  }

  listAgents(): AgentInfo[] {
    return Array.from(this.agents.entries()).map(([agentId, registered]) => ({
      agentId,
      timeoutMs: this.timeoutFor(registered),
      registeredAt: new Date(registered.registeredAt),
      completed: registered.completed,
      failed: registered.failed,
    }));
  }

  isConnected(): boolean {
    return !this.shuttingDown && this.agents.size > 0;
  }

  // ============================================================================
  // Execution
  // ============================================================================

  /**
   * Hand a pending task to the worker pool. A task the task manager has
   * never seen is created first. Returns without waiting for the agent.
   */
  submit(task: Task): Result<ExecutionContext, SubmitError> {
    if (this.shuttingDown) {
      return err(new ShutdownError('Orchestrator'));
    }
    const registered = this.agents.get(task.agentId);
    if (!registered) {
      return err(new AgentNotFoundError(task.agentId));
    }
    if (this.isInFlight(task.id)) {
      return err(new DuplicateTaskError(task.id, 'is already in flight'));
    }

    if (!this.taskManager.getTask(task.id)) {
      const created = this.taskManager.create(task.id, task.payload, task.agentId, task.priority, {
        maxRetries: task.metadata.maxRetries,
      });
      if (!created.ok) {
        return created;
      }
    }

    const queued = this.taskManager.updateState(task.id, 'queued');
    if (!queued.ok) {
      return queued;
    }

    const execution = this.dispatch(queued.value, registered, false);
    return ok({ ...execution.context });
  }

  /**
   * Run a task to its outcome; used by the scheduler
   */
  async execute(task: Task): Promise<Result<ExecutionOutcome, Error>> {
    const submitted = this.submit(task);
    if (!submitted.ok) {
      return submitted;
    }
    return this.waitFor(task.id);
  }

  /**
   * Outcome of a tracked execution once it settles
   */
  async waitFor(taskId: string): Promise<Result<ExecutionOutcome, TaskNotFoundError>> {
    const execution = this.executions.get(taskId);
    if (!execution) {
      return err(new TaskNotFoundError(taskId));
    }
    return ok(await execution.done);
  }

  status(taskId: string): ExecutionStatus {
    const execution = this.executions.get(taskId);
    if (!execution) {
      return { status: 'not_found' };
    }

    const context = { ...execution.context };
    switch (execution.phase) {
      case 'waiting':
      case 'running':
        return { status: 'running', context };
      case 'completed':
        return { status: 'completed', result: execution.result, context };
      case 'failed':
        return {
          status: 'failed',
          error: execution.error ? execution.error.message : 'unknown error',
          context,
        };
    }
  }

  /**
   * Withdraw an execution no worker has started; it stops being tracked
   */
  cancel(taskId: string): boolean {
    const execution = this.executions.get(taskId);
    if (!execution || execution.phase !== 'waiting') {
      return false;
    }
    if (!this.pool.cancel(taskId)) {
      return false;
    }

    this.withdraw(execution);
    logger.info(`Cancelled task ${taskId}`);
    return true;
  }

  /**
   * Stop accepting submissions. With `wait` every execution handed to the
   * pool finishes first; otherwise those not yet started are cancelled.
   */
  async shutdown(wait = true): Promise<void> {
    if (this.shuttingDown) return;

    this.shuttingDown = true;
    this.stop();
    logger.info(`Orchestrator shutting down (wait: ${wait})`);

    const dropped = await this.pool.shutdown(wait);
    for (const taskId of dropped) {
      const execution = this.executions.get(taskId);
      if (execution) {
        this.withdraw(execution);
      }
    }

    this.executions.clear();
    this.agents.clear();
    logger.info('Orchestrator shut down');
    this.emit('orchestrator:shutdown');
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  // ============================================================================
  // Dispatch loop
  // ============================================================================

  /**
   * Pull ready tasks from the task manager whenever a worker is free
   */
  start(): void {
    if (this.dispatchTimer || this.shuttingDown) return;

    this.dispatchTimer = setInterval(() => this.dispatchReady(), this.config.dispatchIntervalMs);
    logger.info('Orchestrator dispatch loop started');
    this.dispatchReady();
  }

  stop(): void {
    if (!this.dispatchTimer) return;

    clearInterval(this.dispatchTimer);
    this.dispatchTimer = null;
    logger.info('Orchestrator dispatch loop stopped');
  }

  isRunning(): boolean {
    return this.dispatchTimer !== null;
  }

  getConfig(): OrchestratorConfig {
    return { ...this.config };
  }

  getPoolStats(): WorkerPoolStats {
    return this.pool.getStats();
  }

  private dispatchReady(): void {
    if (!this.dispatchTimer || this.shuttingDown) return;

    while (this.pool.hasFreeSlot()) {
      const next = this.taskManager.nextReady();
      if (!next.ok) {
        logger.error('Dispatch loop could not claim a task', next.error);
        return;
      }
      const task = next.value;
      if (!task) return;

      const registered = this.agents.get(task.agentId);
      if (!registered) {
        this.failClaimed(task, new AgentNotFoundError(task.agentId));
        continue;
      }
      if (this.pool.has(task.id)) {
        this.failClaimed(task, new DuplicateTaskError(task.id, 'is already in flight'));
        continue;
      }
      this.dispatch(task, registered, true);
    }
  }

  /**
   * A claimed task that cannot be handed to a worker fails through the
   * regular retry path
   */
  private failClaimed(task: Task, error: Error): void {
    logger.warn(`Cannot dispatch task ${task.id}: ${error.message}`);
    const updated = this.taskManager.updateState(task.id, 'failed', error);
    const retrying = updated.ok && updated.value.state === 'pending';
    this.publish(
      EventTypes.TASK_FAILED,
      {
        taskId: task.id,
        agentId: task.agentId,
        error: error.message,
        retrying,
        retries: updated.ok ? updated.value.metadata.retries : task.metadata.retries,
      },
      'high'
    );
  }

  // ============================================================================
  // Workers
  // ============================================================================

  /**
   * Track an execution and queue it on the pool. `claimed` tasks are
   * already running in the task manager.
   */
  private dispatch(task: Task, registered: RegisteredAgent, claimed: boolean): Execution {
    const { promise, resolve } = deferred<ExecutionOutcome>();
    const execution: Execution = {
      task,
      context: {
        taskId: task.id,
        agentId: task.agentId,
        priority: task.priority,
        submittedAt: new Date(),
      },
      phase: 'waiting',
      done: promise,
      settle: resolve,
    };
    this.executions.set(task.id, execution);
    this.pool.submit(task.id, () => this.run(execution, registered, claimed));
    logger.debug(`Task ${task.id} handed to worker pool`, { agentId: task.agentId });
    return execution;
  }

  private async run(execution: Execution, registered: RegisteredAgent, claimed: boolean): Promise<void> {
    const { task, context } = execution;

    if (!claimed) {
      const started = this.taskManager.updateState(task.id, 'running');
      if (!started.ok) {
        logger.error(`Task ${task.id} could not start`, started.error);
        this.record(execution, registered, err(started.error), false);
        return;
      }
    }

    execution.phase = 'running';
    context.startedAt = new Date();
    logger.debug(`Executing task ${task.id} on agent ${task.agentId}`);

    let outcome: Result<unknown, Error>;
    try {
      outcome = ok(await this.invoke(task, registered));
    } catch (error) {
      outcome = err(toError(error));
    }
    this.record(execution, registered, outcome, true);
  }

  private async invoke(task: Task, registered: RegisteredAgent): Promise<unknown> {
    const execution = Promise.resolve().then(() => registered.agent.execute(task.payload));
    const timeoutMs = this.timeoutFor(registered);
    if (timeoutMs <= 0) {
      return execution;
    }

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new AgentTimeoutError(task.agentId, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([execution, timeoutPromise]);
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }

  /**
   * Report an agent outcome and settle its waiter.
   * `reportToManager` is false when the task never reached running.
   */
  private record(
    execution: Execution,
    registered: RegisteredAgent,
    outcome: Result<unknown, Error>,
    reportToManager: boolean
  ): void {
    const { task, context } = execution;
    context.finishedAt = new Date();
    const durationMs = context.finishedAt.getTime() - (context.startedAt ?? context.submittedAt).getTime();

    if (outcome.ok) {
      const updated = this.taskManager.updateState(task.id, 'completed');
      if (!updated.ok) {
        logger.error(`Task ${task.id} completed but its state was not saved`, updated.error);
      }
      registered.completed++;
      execution.phase = 'completed';
      execution.result = outcome.value;

      this.publish(
        EventTypes.TASK_COMPLETED,
        { taskId: task.id, agentId: task.agentId, result: outcome.value, durationMs },
        'normal'
      );
      logger.debug(`Task ${task.id} completed in ${durationMs}ms`);
      execution.settle({
        taskId: task.id,
        agentId: task.agentId,
        success: true,
        result: outcome.value,
        state: updated.ok ? updated.value.state : undefined,
        retrying: false,
        durationMs,
      });
      return;
    }

    const error = outcome.error;
    let state: Task['state'] | undefined;
    let retries = task.metadata.retries;
    if (reportToManager) {
      const updated = this.taskManager.updateState(task.id, 'failed', error);
      if (updated.ok) {
        state = updated.value.state;
        retries = updated.value.metadata.retries;
      } else {
        logger.error(`Task ${task.id} failed and its state was not saved`, updated.error);
      }
    }
    const retrying = state === 'pending';
    registered.failed++;
    execution.phase = 'failed';
    execution.error = error;

    this.publish(
      EventTypes.TASK_FAILED,
      { taskId: task.id, agentId: task.agentId, error: error.message, retrying, retries },
      'high'
    );
    logger.warn(`Task ${task.id} failed: ${getErrorMessage(error)}`, { retrying, retries });
    execution.settle({
      taskId: task.id,
      agentId: task.agentId,
      success: false,
      error,
      state,
      retrying,
      durationMs,
    });
  }

  private withdraw(execution: Execution): void {
    const { task } = execution;
    const cancelled = this.taskManager.cancel(task.id);
    if (!cancelled.ok) {
      logger.error(`Task ${task.id} was withdrawn but not cancelled`, cancelled.error);
    }
    this.executions.delete(task.id);
    execution.settle({
      taskId: task.id,
      agentId: task.agentId,
      success: false,
      error: new TaskCancelledError(task.id),
      state: cancelled.ok ? cancelled.value.state : undefined,
      retrying: false,
      durationMs: 0,
    });
  }

  /**
   * Drop the record of a settled execution whose task was cleaned up
   */
  private forget(taskId: string): void {
    const execution = this.executions.get(taskId);
    if (execution && (execution.phase === 'completed' || execution.phase === 'failed')) {
      this.executions.delete(taskId);
    }
  }

  private isInFlight(taskId: string): boolean {
    const execution = this.executions.get(taskId);
    const tracked = execution !== undefined && (execution.phase === 'waiting' || execution.phase === 'running');
    return tracked || this.pool.has(taskId);
  }

  private timeoutFor(registered: RegisteredAgent): number {
    return registered.options.timeoutMs ?? this.config.agentTimeoutMs;
  }

  private publish(type: string, data: Record<string, unknown>, priority: EventPriority): void {
    const published = this.eventBus.publish({ type, data, priority, source: 'orchestrator' });
    if (!published.ok) {
      logger.warn(`Dropped ${type} event: ${published.error.message}`);
    }
  }
}
