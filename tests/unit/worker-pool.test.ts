/**
 * WorkerPool tests
 */

import { WorkerPool } from '../../src/orchestrator/worker-pool.js';
import { createDeferred, flushPromises, type Deferred } from '../test-utils.js';

describe('WorkerPool', () => {
  let pool: WorkerPool;
  let gates: Map<string, Deferred<void>>;

  function submitGated(id: string): boolean {
    const gate = createDeferred<void>();
    gates.set(id, gate);
    return pool.submit(id, () => gate.promise);
  }

  function release(id: string): void {
    gates.get(id)?.resolve();
  }

  beforeEach(() => {
    pool = new WorkerPool(2);
    gates = new Map();
  });

  // ==========================================================================
  // Concurrency
  // ==========================================================================

  it('should run at most size jobs at once', async () => {
    submitGated('a');
    submitGated('b');
    submitGated('c');

    expect(pool.getStats()).toEqual({ size: 2, active: 2, waiting: 1, completed: 0 });
    expect(pool.isActive('a')).toBe(true);
    expect(pool.isWaiting('c')).toBe(true);

    release('a');
    await flushPromises();
    expect(pool.getStats()).toEqual({ size: 2, active: 2, waiting: 0, completed: 1 });
    expect(pool.isActive('c')).toBe(true);
  });

  it('should start jobs in submission order', async () => {
    pool = new WorkerPool(1);
    const order: string[] = [];
    for (const id of ['first', 'second', 'third']) {
      pool.submit(id, async () => {
        order.push(id);
      });
    }

    await pool.onIdle();
    expect(order).toEqual(['first', 'second', 'third']);
  });

  it('should refuse an id that is already in the pool', () => {
    expect(submitGated('a')).toBe(true);
    expect(pool.submit('a', async () => undefined)).toBe(false);
  });

  it('should report a free slot only while nothing would wait', () => {
    expect(pool.hasFreeSlot()).toBe(true);
    submitGated('a');
    expect(pool.hasFreeSlot()).toBe(true);
    submitGated('b');
    expect(pool.hasFreeSlot()).toBe(false);
  });

  it('should survive a rejecting job', async () => {
    const finished = jest.fn();
    pool.on('job:finished', finished);
    pool.submit('bad', async () => {
      throw new Error('job failed');
    });

    await pool.onIdle();
    expect(finished).toHaveBeenCalledWith('bad');
    expect(pool.getStats().completed).toBe(1);
  });

  it('should clamp the size to one', () => {
    expect(new WorkerPool(0).getStats().size).toBe(1);
  });

  // ==========================================================================
  // Cancellation and shutdown
  // ==========================================================================

  describe('cancel', () => {
    it('should remove a waiting job', () => {
      const cancelled = jest.fn();
      pool.on('job:cancelled', cancelled);
      submitGated('a');
      submitGated('b');
      submitGated('c');

      expect(pool.cancel('c')).toBe(true);
      expect(pool.has('c')).toBe(false);
      expect(cancelled).toHaveBeenCalledWith('c');
    });

    it('should not touch a running job', () => {
      submitGated('a');
      expect(pool.cancel('a')).toBe(false);
      expect(pool.cancel('missing')).toBe(false);
    });
  });

  describe('shutdown', () => {
    it('should let queued jobs finish when waiting', async () => {
      submitGated('a');
      submitGated('b');
      submitGated('c');

      let done = false;
      const stopping = pool.shutdown(true).then(dropped => {
        done = true;
        return dropped;
      });
      expect(pool.submit('late', async () => undefined)).toBe(false);

      release('a');
      release('b');
      await flushPromises();
      expect(done).toBe(false);

      release('c');
      await expect(stopping).resolves.toEqual([]);
      expect(pool.getStats().completed).toBe(3);
    });

    it('should drop waiting jobs when not waiting', async () => {
      submitGated('a');
      submitGated('b');
      submitGated('c');
      submitGated('d');

      await expect(pool.shutdown(false)).resolves.toEqual(['c', 'd']);
      expect(pool.activeCount()).toBe(2);
      expect(pool.waitingCount()).toBe(0);
    });

    it('should resolve onIdle at once when nothing runs', async () => {
      await expect(pool.onIdle()).resolves.toBeUndefined();
    });
  });
});
