/**
 * Runtime - Owns one instance of each orchestration component
 *
 * Built once by the entry point and passed by reference. Construction
 * wires the components together but starts nothing; start() loads
 * persisted tasks and starts every background loop.
 */

import { loadConfig, loadEnvironment, DEFAULT_CONFIG, type TaskloomConfig } from '../config/index.js';
import type { ConfigurationError, ExportError, StorageError } from '../errors/index.js';
import { EventBus } from '../events/event-bus.js';
import { EventTypes } from '../events/types.js';
import { TaskExporter } from '../export/task-exporter.js';
import type { ExportOptions } from '../export/types.js';
import { TaskNotifier, type NotificationSink } from '../notifications/task-notifier.js';
import { Orchestrator } from '../orchestrator/orchestrator.js';
import { TaskScheduler } from '../scheduler/scheduler.js';
import { createTaskStore } from '../store/index.js';
import type { TaskStore } from '../store/types.js';
import type { TaskFilter } from '../types/task.js';
import { TaskManager, type TaskStateChange } from '../tasks/task-manager.js';
import { logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';

export interface RuntimeOptions {
  config?: Partial<TaskloomConfig>;
  /** Use this store instead of the one the config selects */
  store?: TaskStore;
  /** Render task notifications to this sink; the log when `true` */
  notifications?: boolean | NotificationSink;
}

export class Runtime {
  readonly config: TaskloomConfig;
  readonly store: TaskStore;
  readonly eventBus: EventBus;
  readonly taskManager: TaskManager;
  readonly orchestrator: Orchestrator;
  readonly scheduler: TaskScheduler;
  readonly notifier: TaskNotifier | null;
  readonly exporter: TaskExporter;
  private started = false;
  private closed = false;
  private readonly forwardStateChange = (change: TaskStateChange): void => {
    const published = this.eventBus.publish({
      type: EventTypes.TASK_STATE_CHANGED,
      data: { taskId: change.task.id, from: change.from, to: change.to },
      priority: 'low',
      source: 'task-manager',
    });
    if (!published.ok) {
      logger.warn(`Dropped state change of task ${change.task.id}: ${published.error.message}`);
    }
  };

  constructor(config: TaskloomConfig, store: TaskStore, notifications: boolean | NotificationSink = false) {
    this.config = config;
    this.store = store;
    this.eventBus = new EventBus({ maxQueueSize: config.eventQueueSize });
    this.taskManager = new TaskManager(store, {
      defaultMaxRetries: config.defaultMaxRetries,
      cleanupIntervalMs: config.cleanupIntervalMs,
      retentionMs: config.taskRetentionMs,
    });
    this.orchestrator = new Orchestrator(this.taskManager, this.eventBus, {
      maxWorkers: config.maxWorkers,
      agentTimeoutMs: config.agentTimeoutMs,
      dispatchIntervalMs: config.dispatchIntervalMs,
    });
    this.scheduler = new TaskScheduler(this.taskManager, this.eventBus, this.orchestrator);
    this.exporter = new TaskExporter(config.exportDir);

    if (notifications === false) {
      this.notifier = null;
    } else if (notifications === true) {
      this.notifier = new TaskNotifier(this.eventBus);
    } else {
      this.notifier = new TaskNotifier(this.eventBus, notifications);
    }

    this.taskManager.on('task:state-changed', this.forwardStateChange);
  }

  /**
   * Load persisted tasks and start every background loop. Returns the
   * number of tasks re-queued from the store.
   */
  start(): Result<number, StorageError> {
    if (this.closed) {
      return ok(0);
    }
    const loaded = this.taskManager.load();
    if (!loaded.ok) {
      return loaded;
    }
    if (this.started) {
      return loaded;
    }

    this.notifier?.attach();
    this.eventBus.start();
    this.taskManager.start();
    this.orchestrator.start();
    this.scheduler.start();
    this.started = true;

    logger.info('Runtime started', { requeued: loaded.value, store: this.config.store.driver });
    return loaded;
  }

  /**
   * Pause the background loops; start() resumes them
   */
  async stop(): Promise<void> {
    if (!this.started) return;

    await this.scheduler.stop();
    this.orchestrator.stop();
    this.taskManager.stop();
    await this.eventBus.stop();
    this.started = false;
    logger.info('Runtime stopped');
  }

  /**
   * Stop for good: shut the orchestrator down, deliver the remaining
   * events, retry queued exports and close the store
   */
  async shutdown(wait = true): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.scheduler.stop();
    await this.orchestrator.shutdown(wait);
    this.taskManager.stop();
    this.taskManager.off('task:state-changed', this.forwardStateChange);

    if (!this.eventBus.isRunning()) {
      this.eventBus.start();
    }
    await this.eventBus.flush();
    await this.eventBus.stop();
    this.notifier?.detach();
    await this.exporter.processOfflineQueue();
    this.store.close?.();
    this.started = false;
    logger.info('Runtime shut down');
  }

  /**
   * Export the tasks matching `filter`, with the result of each one the
   * orchestrator completed
   */
  async exportTasks(options: ExportOptions, filter: TaskFilter = {}): Promise<Result<string, ExportError>> {
    return this.exporter.exportTasks(this.taskManager.listTasks(filter), options, task => {
      const status = this.orchestrator.status(task.id);
      return status.status === 'completed' ? status.result : undefined;
    });
  }

  isStarted(): boolean {
    return this.started;
  }
}

/**
 * Build a runtime from a (partial) configuration
 */
export function createRuntime(options: RuntimeOptions = {}): Result<Runtime, StorageError> {
  const config: TaskloomConfig = {
    ...DEFAULT_CONFIG,
    ...options.config,
    store: { ...DEFAULT_CONFIG.store, ...options.config?.store },
  };

  let store: TaskStore;
  if (options.store) {
    store = options.store;
  } else {
    const opened = createTaskStore(config.store);
    if (!opened.ok) {
      return opened;
    }
    store = opened.value;
  }

  return ok(new Runtime(config, store, options.notifications));
}

/**
 * Build a runtime from .env and the process environment
 */
export function createRuntimeFromEnv(
  env: Record<string, string | undefined> = process.env
): Result<Runtime, ConfigurationError | StorageError> {
  loadEnvironment();
  const config = loadConfig(env);
  if (!config.ok) {
    logger.error('Invalid configuration', config.error);
    return err(config.error);
  }
  return createRuntime({ config: config.value, notifications: true });
}
