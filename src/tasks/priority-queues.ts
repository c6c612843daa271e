/**
 * Priority Queues
 *
 * Three FIFO queues of task ids, one per priority class. A task id is
 * held by at most one queue at a time.
 */

import { PRIORITY_CLASSES, type PriorityClass, type QueueStatus } from '../types/task.js';

export interface QueueEntry {
  taskId: string;
  priorityClass: PriorityClass;
}

export class PriorityQueues {
  private queues: Record<PriorityClass, string[]> = {
    high: [],
    medium: [],
    low: [],
  };
  private locations: Map<string, PriorityClass> = new Map();

  /**
   * Append to the tail of a class; an id already queued elsewhere is moved
   */
  enqueue(taskId: string, priorityClass: PriorityClass): void {
    this.remove(taskId);
    this.queues[priorityClass].push(taskId);
    this.locations.set(taskId, priorityClass);
  }

  /**
   * Put an id back at the head of its class (undo of a dequeue)
   */
  requeueFront(taskId: string, priorityClass: PriorityClass): void {
    this.remove(taskId);
    this.queues[priorityClass].unshift(taskId);
    this.locations.set(taskId, priorityClass);
  }

  /**
   * Pop the head of the highest non-empty class
   */
  dequeue(): QueueEntry | undefined {
    for (const priorityClass of PRIORITY_CLASSES) {
      const taskId = this.queues[priorityClass].shift();
      if (taskId !== undefined) {
        this.locations.delete(taskId);
        return { taskId, priorityClass };
      }
    }
    return undefined;
  }

  peek(): QueueEntry | undefined {
    for (const priorityClass of PRIORITY_CLASSES) {
      const taskId = this.queues[priorityClass][0];
      if (taskId !== undefined) {
        return { taskId, priorityClass };
      }
    }
    return undefined;
  }

  remove(taskId: string): boolean {
    const priorityClass = this.locations.get(taskId);
    if (!priorityClass) {
      return false;
    }
    const queue = this.queues[priorityClass];
    queue.splice(queue.indexOf(taskId), 1);
    this.locations.delete(taskId);
    return true;
  }

  has(taskId: string): boolean {
    return this.locations.has(taskId);
  }

  classOf(taskId: string): PriorityClass | undefined {
    return this.locations.get(taskId);
  }

  counts(): QueueStatus {
    return {
      high: this.queues.high.length,
      medium: this.queues.medium.length,
      low: this.queues.low.length,
    };
  }

  size(): number {
    return this.locations.size;
  }

  clear(): void {
    this.queues = { high: [], medium: [], low: [] };
    this.locations.clear();
  }
}
