/**
 * Event Bus - Publish/subscribe delivery with a single consumer
 *
 * Publishers append to a bounded FIFO queue and return at once. One
 * consumer loop, running between start() and stop(), drains the queue in
 * arrival order and calls every subscriber of the event's type in turn,
 * awaiting asynchronous callbacks before moving on. A failing callback is
 * logged and skipped.
 */

import { QueueFullError } from '../errors/index.js';
import { getErrorMessage, toError } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';
import {
  DEFAULT_EVENT_BUS_CONFIG,
  type BusEvent,
  type EventBusConfig,
  type EventBusStats,
  type EventCallback,
  type EventInput,
} from './types.js';

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export class EventBus {
  private subscribers: Map<string, Set<EventCallback>> = new Map();
  private queue: BusEvent[] = [];
  private config: EventBusConfig;
  private running = false;
  private draining: Promise<void> | null = null;
  private stats: EventBusStats = { published: 0, delivered: 0, failed: 0, dropped: 0 };

  constructor(config: Partial<EventBusConfig> = {}) {
    this.config = { ...DEFAULT_EVENT_BUS_CONFIG, ...config };
  }

  /**
   * Subscribe a callback; subscribing it twice to one type has no effect
   */
  subscribe(eventType: string, callback: EventCallback): boolean {
    let callbacks = this.subscribers.get(eventType);
    if (!callbacks) {
      callbacks = new Set();
      this.subscribers.set(eventType, callbacks);
    }
    if (!callbacks.has(callback)) {
      callbacks.add(callback);
      logger.debug(`Subscribed to event type: ${eventType}`);
    }
    return true;
  }

  /**
   * Unsubscribe a callback; succeeds when it was never subscribed
   */
  unsubscribe(eventType: string, callback: EventCallback): boolean {
    const callbacks = this.subscribers.get(eventType);
    if (callbacks?.delete(callback)) {
      if (callbacks.size === 0) {
        this.subscribers.delete(eventType);
      }
      logger.debug(`Unsubscribed from event type: ${eventType}`);
    }
    return true;
  }

  publish<TData>(input: EventInput<TData>): Result<BusEvent<TData>, QueueFullError> {
    if (this.queue.length >= this.config.maxQueueSize) {
      logger.warn(`Event queue full, rejecting ${input.type}`);
      return err(new QueueFullError(this.config.maxQueueSize));
    }

    const event: BusEvent<TData> = Object.freeze({
      type: input.type,
      data: input.data,
      priority: input.priority ?? 'normal',
      timestamp: input.timestamp ?? new Date(),
      ...(input.source !== undefined ? { source: input.source } : {}),
      ...(input.id !== undefined ? { id: input.id } : {}),
    });

    this.queue.push(event);
    this.stats.published++;
    logger.debug(`Published event: ${event.type}`);
    this.scheduleDrain();

    return ok(event);
  }

  /**
   * Start the consumer loop; queued events are delivered from now on
   */
  start(): void {
    if (this.running) return;

    this.running = true;
    logger.info('Event bus started');
    this.scheduleDrain();
  }

  /**
   * Halt the consumer after the event being delivered; undelivered events
   * stay queued for the next start()
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    if (this.draining) {
      await this.draining;
    }
    logger.info('Event bus stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Resolves once the consumer has nothing left to deliver
   */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  queueDepth(): number {
    return this.queue.length;
  }

  subscriberCount(eventType: string): number {
    return this.subscribers.get(eventType)?.size ?? 0;
  }

  /**
   * Drop every queued event without delivering it
   */
  clear(): number {
    const dropped = this.queue.length;
    this.queue = [];
    this.stats.dropped += dropped;
    logger.info(`Event queue cleared (${dropped} dropped)`);
    return dropped;
  }

  getStats(): EventBusStats {
    return { ...this.stats };
  }

  getConfig(): EventBusConfig {
    return { ...this.config };
  }

  private scheduleDrain(): void {
    if (!this.running || this.draining || this.queue.length === 0) return;

    // Deliver after the publisher's synchronous code has finished
    this.draining = Promise.resolve()
      .then(() => this.drain())
      .finally(() => {
        this.draining = null;
        this.scheduleDrain();
      });
  }

  private async drain(): Promise<void> {
    while (this.running) {
      const event = this.queue.shift();
      if (!event) return;
      await this.deliver(event);
    }
  }

  private async deliver(event: BusEvent): Promise<void> {
    const callbacks = this.subscribers.get(event.type);
    if (!callbacks) return;

    for (const callback of Array.from(callbacks)) {
      try {
        const result = callback(event);
        if (isPromiseLike(result)) {
          await result;
        }
        this.stats.delivered++;
      } catch (error) {
        this.stats.failed++;
        logger.error(`Error in event handler for ${event.type}: ${getErrorMessage(error)}`, toError(error));
      }
    }
  }
}
