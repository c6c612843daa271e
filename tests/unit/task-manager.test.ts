/**
 * TaskManager tests
 */

import { INTERRUPTED_ERROR, TaskManager, type TaskStateChange } from '../../src/tasks/task-manager.js';
import {
  DuplicateTaskError,
  InvalidStateTransitionError,
  StorageError,
  TaskNotFoundError,
} from '../../src/errors/index.js';
import type { Task } from '../../src/types/task.js';
import { unwrap } from '../../src/utils/result.js';
import { FlakyStore, createTestTask } from '../test-utils.js';

function claim(manager: TaskManager): Task | null {
  return unwrap(manager.nextReady());
}

describe('TaskManager', () => {
  let store: FlakyStore;
  let manager: TaskManager;

  beforeEach(() => {
    store = new FlakyStore();
    manager = new TaskManager(store);
  });

  afterEach(() => {
    manager.stop();
    jest.useRealTimers();
  });

  // ==========================================================================
  // create
  // ==========================================================================

  describe('create', () => {
    it('should persist and enqueue a pending task', () => {
      const result = manager.create('t1', { text: 'hi' }, 'echo', 1);

      expect(result.ok).toBe(true);
      const task = unwrap(result);
      expect(task.state).toBe('pending');
      expect(task.metadata.retries).toBe(0);
      expect(task.metadata.maxRetries).toBe(3);
      expect(unwrap(store.get('t1'))?.state).toBe('pending');
      expect(manager.getQueueStatus()).toEqual({ high: 0, medium: 1, low: 0 });
    });

    it('should take maxRetries from options', () => {
      const task = unwrap(manager.create('t1', {}, 'echo', 1, { maxRetries: 7 }));
      expect(task.metadata.maxRetries).toBe(7);
    });

    it('should keep a task out of the queues when asked', () => {
      manager.create('t1', {}, 'echo', 1, { enqueue: false });

      expect(manager.getTask('t1')?.state).toBe('pending');
      expect(manager.isQueued('t1')).toBe(false);
      expect(claim(manager)).toBeNull();
    });

    it('should reject a duplicate id', () => {
      manager.create('t1', {}, 'echo');
      const second = manager.create('t1', {}, 'echo');

      expect(second.ok).toBe(false);
      expect(!second.ok && second.error).toBeInstanceOf(DuplicateTaskError);
      expect(manager.getQueueStatus().medium).toBe(1);
    });

    it('should reject an id that only exists in the store', () => {
      store.inner.put(createTestTask({ id: 'persisted' }));

      const result = manager.create('persisted', {}, 'echo');
      expect(!result.ok && result.error).toBeInstanceOf(DuplicateTaskError);
    });

    it('should keep nothing when the store fails', () => {
      store.failPuts = true;
      const result = manager.create('t1', {}, 'echo');

      expect(!result.ok && result.error).toBeInstanceOf(StorageError);
      expect(manager.getTask('t1')).toBeUndefined();
      expect(manager.getQueueStatus()).toEqual({ high: 0, medium: 0, low: 0 });
    });

    it('should emit task:created', () => {
      const listener = jest.fn();
      manager.on('task:created', listener);
      manager.create('t1', {}, 'echo');

      expect(listener).toHaveBeenCalledWith(expect.objectContaining({ id: 't1', state: 'pending' }));
    });
  });

  // ==========================================================================
  // nextReady
  // ==========================================================================

  describe('nextReady', () => {
    it('should serve high, then medium, then low', () => {
      manager.create('low', {}, 'echo', 0);
      manager.create('medium', {}, 'echo', 1);
      manager.create('high', {}, 'echo', 5);

      expect(claim(manager)?.id).toBe('high');
      expect(claim(manager)?.id).toBe('medium');
      expect(claim(manager)?.id).toBe('low');
      expect(claim(manager)).toBeNull();
    });

    it('should keep FIFO order within a class', () => {
      manager.create('a', {}, 'echo', 3);
      manager.create('b', {}, 'echo', 9);

      expect(claim(manager)?.id).toBe('a');
      expect(claim(manager)?.id).toBe('b');
    });

    it('should mark the task running and persist it', () => {
      manager.create('t1', {}, 'echo');
      const task = claim(manager);

      expect(task?.state).toBe('running');
      expect(unwrap(store.get('t1'))?.state).toBe('running');
      expect(manager.isQueued('t1')).toBe(false);
    });

    it('should hand a task to one caller only', () => {
      manager.create('only', {}, 'echo');
      const claims = [claim(manager), claim(manager), claim(manager)];

      expect(claims.filter(task => task !== null).map(task => task?.id)).toEqual(['only']);
    });

    it('should put the task back at the head when persisting fails', () => {
      manager.create('a', {}, 'echo');
      manager.create('b', {}, 'echo');
      store.failPuts = true;

      const failed = manager.nextReady();
      expect(!failed.ok && failed.error).toBeInstanceOf(StorageError);
      expect(manager.getTask('a')?.state).toBe('pending');

      store.failPuts = false;
      expect(claim(manager)?.id).toBe('a');
    });
  });

  // ==========================================================================
  // updateState
  // ==========================================================================

  describe('updateState', () => {
    it('should complete a running task', () => {
      manager.create('t1', {}, 'echo');
      claim(manager);

      const done = unwrap(manager.updateState('t1', 'completed'));
      expect(done.state).toBe('completed');
      expect(unwrap(store.get('t1'))?.state).toBe('completed');
    });

    it('should re-enqueue a failed task while retries remain', () => {
      manager.create('t1', {}, 'echo', 5, { maxRetries: 2 });
      claim(manager);

      const retried = unwrap(manager.updateState('t1', 'failed', new Error('boom')));
      expect(retried.state).toBe('pending');
      expect(retried.metadata.retries).toBe(1);
      expect(retried.metadata.lastError).toBe('boom');
      expect(manager.getQueueStatus()).toEqual({ high: 1, medium: 0, low: 0 });
    });

    it('should fail for good after maxRetries + 1 failures', () => {
      const maxRetries = 2;
      manager.create('t1', {}, 'echo', 1, { maxRetries });

      let last: Task | undefined;
      for (let attempt = 0; attempt <= maxRetries; attempt++) {
        expect(claim(manager)?.id).toBe('t1');
        last = unwrap(manager.updateState('t1', 'failed', `failure ${attempt}`));
      }

      expect(last?.state).toBe('failed');
      expect(last?.metadata.retries).toBe(maxRetries);
      expect(last?.metadata.lastError).toBe('failure 2');
      expect(claim(manager)).toBeNull();
    });

    it('should not retry a failure without an error', () => {
      manager.create('t1', {}, 'echo');
      claim(manager);

      expect(unwrap(manager.updateState('t1', 'failed')).state).toBe('failed');
    });

    it('should reject unknown tasks and forbidden transitions', () => {
      const unknown = manager.updateState('nope', 'running');
      expect(!unknown.ok && unknown.error).toBeInstanceOf(TaskNotFoundError);

      manager.create('t1', {}, 'echo');
      const skip = manager.updateState('t1', 'completed');
      expect(!skip.ok && skip.error).toBeInstanceOf(InvalidStateTransitionError);
    });

    it('should leave memory and queues untouched when the store fails', () => {
      manager.create('t1', {}, 'echo');
      store.failPuts = true;

      const result = manager.updateState('t1', 'queued');
      expect(!result.ok && result.error).toBeInstanceOf(StorageError);
      expect(manager.getTask('t1')?.state).toBe('pending');
      expect(manager.isQueued('t1')).toBe(true);
    });

    it('should take a queued task out of its queue', () => {
      manager.create('t1', {}, 'echo');
      manager.updateState('t1', 'queued');

      expect(manager.isQueued('t1')).toBe(false);
      expect(claim(manager)).toBeNull();
      expect(unwrap(manager.updateState('t1', 'running')).state).toBe('running');
    });

    it('should emit state changes', () => {
      const changes: Array<[string, string]> = [];
      manager.on('task:state-changed', (change: TaskStateChange) => changes.push([change.from, change.to]));

      manager.create('t1', {}, 'echo', 1, { maxRetries: 1 });
      claim(manager);
      manager.updateState('t1', 'failed', 'x');

      expect(changes).toEqual([
        ['pending', 'running'],
        ['running', 'pending'],
      ]);
    });
  });

  describe('cancel', () => {
    it('should cancel a pending task and dequeue it', () => {
      manager.create('t1', {}, 'echo');

      expect(unwrap(manager.cancel('t1')).state).toBe('cancelled');
      expect(claim(manager)).toBeNull();
    });

    it('should not cancel a running task', () => {
      manager.create('t1', {}, 'echo');
      claim(manager);

      expect(manager.cancel('t1').ok).toBe(false);
    });
  });

  // ==========================================================================
  // load and cleanup
  // ==========================================================================

  describe('load', () => {
    beforeEach(() => {
      store.inner.put(
        createTestTask({
          id: 'later',
          metadata: { createdAt: new Date('2024-01-02'), updatedAt: new Date('2024-01-02'), retries: 0, maxRetries: 3 },
        })
      );
      store.inner.put(
        createTestTask({
          id: 'earlier',
          metadata: { createdAt: new Date('2024-01-01'), updatedAt: new Date('2024-01-01'), retries: 0, maxRetries: 3 },
        })
      );
      store.inner.put(createTestTask({ id: 'done', state: 'completed' }));
    });

    it('should re-enqueue pending tasks oldest first', () => {
      expect(unwrap(manager.load())).toBe(2);
      expect(manager.getTask('done')?.state).toBe('completed');
      expect(claim(manager)?.id).toBe('earlier');
      expect(claim(manager)?.id).toBe('later');
    });

    it('should not enqueue a task twice when loaded again', () => {
      manager.load();
      expect(unwrap(manager.load())).toBe(0);
      expect(manager.getQueueStatus().medium).toBe(2);
    });

    it('should report a store that cannot be read', () => {
      store.failReads = true;
      const result = manager.load();
      expect(!result.ok && result.error).toBeInstanceOf(StorageError);
    });
  });

  describe('load after a restart', () => {
    function restarted(): TaskManager {
      return new TaskManager(store);
    }

    it('should put queued and running records back in the queue', () => {
      manager.create('a', {}, 'echo');
      manager.create('b', {}, 'echo');
      manager.updateState('a', 'queued');
      manager.updateState('a', 'running');
      manager.updateState('b', 'queued');

      const next = restarted();
      const changes: TaskStateChange[] = [];
      next.on('task:state-changed', (change: TaskStateChange) => changes.push(change));

      expect(unwrap(next.load())).toBe(2);
      expect(changes.map(c => [c.task.id, c.from, c.to])).toEqual([
        ['a', 'running', 'pending'],
        ['b', 'queued', 'pending'],
      ]);
      expect(unwrap(store.get('b'))?.state).toBe('pending');
      expect(next.getQueueStatus()).toEqual({ high: 0, medium: 2, low: 0 });
      expect(claim(next)?.id).toBe('a');
      expect(claim(next)?.id).toBe('b');
    });

    it('should count an interrupted run as an attempt', () => {
      manager.create('a', {}, 'echo', 1, { maxRetries: 2 });
      manager.updateState('a', 'running');

      restarted().load();

      const persisted = unwrap(store.get('a'));
      expect(persisted?.state).toBe('pending');
      expect(persisted?.metadata.retries).toBe(1);
      expect(persisted?.metadata.lastError).toBe(INTERRUPTED_ERROR);
    });

    it('should fail an interrupted run with no retries left', () => {
      manager.create('a', {}, 'echo', 1, { maxRetries: 0 });
      manager.updateState('a', 'running');

      const next = restarted();
      expect(unwrap(next.load())).toBe(0);
      expect(next.getTask('a')?.state).toBe('failed');
      expect(next.getTask('a')?.metadata.lastError).toBe(INTERRUPTED_ERROR);
      expect(unwrap(next.nextReady())).toBeNull();
    });

    it('should leave out a record whose recovery cannot be saved', () => {
      manager.create('b', {}, 'echo');
      manager.updateState('b', 'queued');
      store.failPuts = true;

      const next = restarted();
      const result = next.load();
      expect(!result.ok && result.error).toBeInstanceOf(StorageError);
      expect(next.getTask('b')).toBeUndefined();

      store.failPuts = false;
      expect(unwrap(next.load())).toBe(1);
      expect(next.getTask('b')?.state).toBe('pending');
    });
  });

  describe('cleanup', () => {
    it('should remove old completed and cancelled tasks only', () => {
      const old = new Date('2024-01-01');
      const recent = new Date('2024-12-01');
      const meta = (updatedAt: Date) => ({ createdAt: old, updatedAt, retries: 0, maxRetries: 3 });
      store.inner.put(createTestTask({ id: 'old-done', state: 'completed', metadata: meta(old) }));
      store.inner.put(createTestTask({ id: 'old-cancelled', state: 'cancelled', metadata: meta(old) }));
      store.inner.put(createTestTask({ id: 'old-failed', state: 'failed', metadata: meta(old) }));
      store.inner.put(createTestTask({ id: 'new-done', state: 'completed', metadata: meta(recent) }));
      manager.load();

      expect(manager.cleanup(new Date('2024-06-01'))).toBe(2);
      expect(manager.listTasks().map(t => t.id).sort()).toEqual(['new-done', 'old-failed']);
      expect(unwrap(store.get('old-done'))).toBeNull();
    });

    it('should run periodically between start and stop', () => {
      jest.useFakeTimers({ now: new Date('2024-01-01T00:00:00.000Z') });
      manager = new TaskManager(store, { cleanupIntervalMs: 1000, retentionMs: 500 });
      manager.create('t1', {}, 'echo');
      claim(manager);
      manager.updateState('t1', 'completed');

      manager.start();
      expect(manager.isRunning()).toBe(true);
      jest.advanceTimersByTime(1000);
      expect(manager.getTask('t1')).toBeUndefined();

      manager.stop();
      expect(manager.isRunning()).toBe(false);
    });
  });

  describe('queries', () => {
    it('should filter tasks by state and agent', () => {
      manager.create('a', {}, 'echo');
      manager.create('b', {}, 'other');
      claim(manager);

      expect(manager.listTasks({ state: 'pending' }).map(t => t.id)).toEqual(['b']);
      expect(manager.listTasks({ agentId: 'echo' }).map(t => t.id)).toEqual(['a']);
    });

    it('should return copies', () => {
      manager.create('a', { n: 1 }, 'echo');
      const copy = manager.getTask('a');
      if (copy) copy.state = 'completed';

      expect(manager.getTask('a')?.state).toBe('pending');
    });
  });
});
