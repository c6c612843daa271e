/**
 * OfflineQueue tests
 */

import { OfflineQueue } from '../../src/scheduler/offline-queue.js';

describe('OfflineQueue', () => {
  it('should drain in FIFO order and empty itself', () => {
    const queue = new OfflineQueue();
    queue.enqueue({ jobId: 'a', taskId: 'a#1', attempt: 0 });
    queue.enqueue({ jobId: 'b', taskId: 'b#1', attempt: 0 });

    const drained = queue.drain();
    expect(drained.map(f => f.taskId)).toEqual(['a#1', 'b#1']);
    expect(drained[0].queuedAt).toBeInstanceOf(Date);
    expect(queue.isEmpty()).toBe(true);
  });

  it('should drop the oldest firing when full', () => {
    const queue = new OfflineQueue(2);
    queue.enqueue({ jobId: 'a', taskId: 'a#1', attempt: 0 });
    queue.enqueue({ jobId: 'a', taskId: 'a#2', attempt: 0 });

    const dropped = queue.enqueue({ jobId: 'a', taskId: 'a#3', attempt: 0 });
    expect(dropped?.taskId).toBe('a#1');
    expect(queue.snapshot().map(f => f.taskId)).toEqual(['a#2', 'a#3']);
  });

  it('should remove the firings of one job', () => {
    const queue = new OfflineQueue();
    queue.enqueue({ jobId: 'a', taskId: 'a#1', attempt: 0 });
    queue.enqueue({ jobId: 'b', taskId: 'b#1', attempt: 1 });
    queue.enqueue({ jobId: 'a', taskId: 'a#2', attempt: 0 });

    expect(queue.removeJob('a')).toBe(2);
    expect(queue.hasJob('a')).toBe(false);
    expect(queue.hasJob('b')).toBe(true);
    expect(queue.size()).toBe(1);
  });

  it('should hand out snapshots that do not alias its entries', () => {
    const queue = new OfflineQueue();
    queue.enqueue({ jobId: 'a', taskId: 'a#1', attempt: 0 });

    queue.snapshot()[0].attempt = 9;
    expect(queue.snapshot()[0].attempt).toBe(0);
  });

  it('should hold at least one firing', () => {
    expect(new OfflineQueue(0).getMaxSize()).toBe(1);
  });
});
