/**
 * Worker Pool - Bounded concurrency for agent invocations
 *
 * Jobs wait in FIFO order until one of `size` slots is free. A job that
 * has not been handed a slot can still be cancelled.
 */

import { EventEmitter } from 'events';
import { getErrorMessage, toError } from '../errors/index.js';
import { logger } from '../utils/logger.js';

export type PoolJob = () => Promise<void>;

interface WaitingJob {
  id: string;
  run: PoolJob;
}

export interface WorkerPoolStats {
  size: number;
  active: number;
  waiting: number;
  completed: number;
}

export class WorkerPool extends EventEmitter {
  private waiting: WaitingJob[] = [];
  private active: Set<string> = new Set();
  private completedCount = 0;
  private accepting = true;
  private idleWaiters: Array<() => void> = [];
  private readonly size: number;

  constructor(size: number) {
    super();
    this.size = Math.max(1, Math.floor(size));
  }

  /**
   * Queue a job; false once the pool is shut down or the id is taken
   */
  submit(id: string, run: PoolJob): boolean {
    if (!this.accepting || this.has(id)) {
      return false;
    }
    this.waiting.push({ id, run });
    this.pump();
    return true;
  }

  /**
   * Remove a job that has not started yet
   */
  cancel(id: string): boolean {
    const index = this.waiting.findIndex(job => job.id === id);
    if (index === -1) {
      return false;
    }
    this.waiting.splice(index, 1);
    this.emit('job:cancelled', id);
    this.settleIdle();
    return true;
  }

  has(id: string): boolean {
    return this.active.has(id) || this.waiting.some(job => job.id === id);
  }

  isActive(id: string): boolean {
    return this.active.has(id);
  }

  isWaiting(id: string): boolean {
    return this.waiting.some(job => job.id === id);
  }

  /**
   * Whether a newly submitted job would start without waiting
   */
  hasFreeSlot(): boolean {
    return this.accepting && this.active.size + this.waiting.length < this.size;
  }

  activeCount(): number {
    return this.active.size;
  }

  waitingCount(): number {
    return this.waiting.length;
  }

  getStats(): WorkerPoolStats {
    return {
      size: this.size,
      active: this.active.size,
      waiting: this.waiting.length,
      completed: this.completedCount,
    };
  }

  /**
   * Resolves when no job is running or waiting
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting jobs. With `wait` every queued and running job finishes
   * first; without it waiting jobs are dropped. Returns dropped job ids.
   */
  async shutdown(wait: boolean): Promise<string[]> {
    this.accepting = false;

    if (wait) {
      await this.onIdle();
      return [];
    }

    const dropped = this.waiting.map(job => job.id);
    this.waiting = [];
    this.settleIdle();
    return dropped;
  }

  private pump(): void {
    while (this.active.size < this.size) {
      const job = this.waiting.shift();
      if (!job) break;

      this.active.add(job.id);
      this.emit('job:started', job.id);
      // Run after the submitter's synchronous code has finished
      Promise.resolve()
        .then(() => this.runJob(job))
        .catch(error => {
          logger.error(`Worker pool job ${job.id} crashed: ${getErrorMessage(error)}`, toError(error));
        });
    }
  }

  private async runJob(job: WaitingJob): Promise<void> {
    try {
      await job.run();
    } catch (error) {
      logger.error(`Job ${job.id} rejected: ${getErrorMessage(error)}`, toError(error));
    } finally {
      this.active.delete(job.id);
      this.completedCount++;
      this.emit('job:finished', job.id);
      this.pump();
      this.settleIdle();
    }
  }

  private isIdle(): boolean {
    return this.active.size === 0 && this.waiting.length === 0;
  }

  private settleIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
