/**
 * Task Notifier
 *
 * Turns task_completed and task_failed events into rendered notifications
 * and hands them to a sink. Delivery channels (mail, push, chat) live
 * behind the sink.
 */

import type { EventBus } from '../events/event-bus.js';
import { EventTypes, type BusEvent, type EventCallback } from '../events/types.js';
import { getLogger } from '../utils/logger.js';

export interface NotificationTemplate {
  subject: string;
  body: string;
}

export interface TaskNotification {
  eventType: string;
  taskId: string;
  subject: string;
  body: string;
  timestamp: Date;
}

export type NotificationSink = (notification: TaskNotification) => void | Promise<void>;

/**
 * Placeholders: {task_id}, {agent_id}, {timestamp}, {error_message}
 */
export const DEFAULT_TEMPLATES: Record<string, NotificationTemplate> = {
  [EventTypes.TASK_COMPLETED]: {
    subject: 'Task Completed: {task_id}',
    body: 'Your task {task_id} has been completed successfully at {timestamp}.',
  },
  [EventTypes.TASK_FAILED]: {
    subject: 'Task Failed: {task_id}',
    body: 'Your task {task_id} has failed. Error: {error_message}',
  },
};

function field(data: unknown, key: string): string {
  if (typeof data !== 'object' || data === null || !(key in data)) {
    return '';
  }
  const value: unknown = Reflect.get(data, key);
  return value === undefined || value === null ? '' : String(value);
}

export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function logSink(): NotificationSink {
  const log = getLogger().child('notifications');
  return notification => {
    log.info(notification.subject, { taskId: notification.taskId, body: notification.body });
  };
}

export class TaskNotifier {
  private templates: Record<string, NotificationTemplate>;
  private callback: EventCallback;
  private attached = false;

  constructor(
    private readonly eventBus: EventBus,
    private readonly sink: NotificationSink = logSink(),
    templates: Record<string, NotificationTemplate> = {}
  ) {
    this.templates = { ...DEFAULT_TEMPLATES, ...templates };
    this.callback = event => this.handle(event);
  }

  /**
   * Subscribe to every event type that has a template
   */
  attach(): void {
    if (this.attached) return;

    for (const eventType of Object.keys(this.templates)) {
      this.eventBus.subscribe(eventType, this.callback);
    }
    this.attached = true;
  }

  detach(): void {
    if (!this.attached) return;

    for (const eventType of Object.keys(this.templates)) {
      this.eventBus.unsubscribe(eventType, this.callback);
    }
    this.attached = false;
  }

  render(event: BusEvent): TaskNotification | null {
    const template = this.templates[event.type];
    if (!template) return null;

    const values = {
      task_id: field(event.data, 'taskId'),
      agent_id: field(event.data, 'agentId'),
      timestamp: event.timestamp.toISOString(),
      error_message: field(event.data, 'error'),
    };
    return {
      eventType: event.type,
      taskId: values.task_id,
      subject: renderTemplate(template.subject, values),
      body: renderTemplate(template.body, values),
      timestamp: event.timestamp,
    };
  }

  private async handle(event: BusEvent): Promise<void> {
    const notification = this.render(event);
    if (notification) {
      await this.sink(notification);
    }
  }
}
