/**
 * Offline Queue
 *
 * Holds firings that came due while no agent could be reached, in FIFO
 * order, until the scheduler drains them on reconnection. When full the
 * oldest firing is dropped to make room.
 */

import type { OfflineFiring } from './types.js';

/**
 * Usage:
 * ```typescript
 * const queue = new OfflineQueue(50);
 *
 * // While disconnected
 * queue.enqueue({ jobId: 'report', taskId: 'report#3', attempt: 0 });
 *
 * // Once reconnected
 * for (const firing of queue.drain()) {
 *   await retry(firing);
 * }
 * ```
 */
export class OfflineQueue {
  private readonly maxSize: number;
  private queue: OfflineFiring[] = [];

  constructor(maxSize = 1000) {
    this.maxSize = Math.max(1, maxSize);
  }

  /**
   * Queue a firing. Returns the firing dropped to make room, if any.
   */
  enqueue(firing: Omit<OfflineFiring, 'queuedAt'>): OfflineFiring | undefined {
    const entry: OfflineFiring = { ...firing, queuedAt: new Date() };

    let dropped: OfflineFiring | undefined;
    if (this.queue.length >= this.maxSize) {
      dropped = this.queue.shift();
    }
    this.queue.push(entry);
    return dropped;
  }

  /**
   * Remove and return every queued firing in FIFO order
   */
  drain(): OfflineFiring[] {
    const firings = this.queue;
    this.queue = [];
    return firings;
  }

  /**
   * Drop every firing of one job; returns how many were removed
   */
  removeJob(jobId: string): number {
    const before = this.queue.length;
    this.queue = this.queue.filter(firing => firing.jobId !== jobId);
    return before - this.queue.length;
  }

  hasJob(jobId: string): boolean {
    return this.queue.some(firing => firing.jobId === jobId);
  }

  snapshot(): OfflineFiring[] {
    return this.queue.map(firing => ({ ...firing, queuedAt: new Date(firing.queuedAt) }));
  }

  size(): number {
    return this.queue.length;
  }

  clear(): void {
    this.queue = [];
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  getMaxSize(): number {
    return this.maxSize;
  }
}
