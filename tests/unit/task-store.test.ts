/**
 * Task store tests: memory, JSON file and SQLite drivers
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  MemoryTaskStore,
  FileTaskStore,
  SqliteTaskStore,
  createTaskStore,
  parseTaskJson,
  serializeTask,
  type TaskStore,
} from '../../src/store/index.js';
import { StorageError } from '../../src/errors/index.js';
import { createTestTask } from '../test-utils.js';

function sampleTask() {
  return createTestTask({
    id: 'report/2024 #1',
    payload: { text: 'hello', nested: { n: 1 }, list: [1, 2] },
    priority: 2,
    state: 'failed',
    metadata: {
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      updatedAt: new Date('2024-01-01T00:05:00.000Z'),
      retries: 3,
      maxRetries: 3,
      lastError: 'agent crashed',
    },
  });
}

const drivers: Array<[string, () => { store: TaskStore; cleanup: () => void }]> = [
  ['MemoryTaskStore', () => ({ store: new MemoryTaskStore(), cleanup: () => undefined })],
  [
    'FileTaskStore',
    () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskloom-store-'));
      return { store: new FileTaskStore(dir), cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
    },
  ],
  [
    'SqliteTaskStore',
    () => {
      const store = new SqliteTaskStore(':memory:');
      return { store, cleanup: () => store.close() };
    },
  ],
];

describe.each(drivers)('%s', (_name, factory) => {
  let store: TaskStore;
  let cleanup: () => void;

  beforeEach(() => {
    ({ store, cleanup } = factory());
  });

  afterEach(() => {
    cleanup();
  });

  it('should return null for an absent task', () => {
    expect(store.get('missing')).toEqual({ ok: true, value: null });
  });

  it('should round-trip every field of a task', () => {
    const task = sampleTask();
    expect(store.put(task).ok).toBe(true);

    const loaded = store.get(task.id);
    expect(loaded.ok && loaded.value).toEqual(task);
  });

  it('should overwrite on put', () => {
    const task = createTestTask({ id: 't1' });
    store.put(task);
    store.put({ ...task, state: 'completed' });

    const loaded = store.get('t1');
    expect(loaded.ok && loaded.value?.state).toBe('completed');
    const listed = store.list();
    expect(listed.ok && listed.value).toHaveLength(1);
  });

  it('should list every task', () => {
    store.put(createTestTask({ id: 'a' }));
    store.put(createTestTask({ id: 'b' }));

    const listed = store.list();
    expect(listed.ok && listed.value.map(t => t.id).sort()).toEqual(['a', 'b']);
  });

  it('should delete tasks and ignore absent ids', () => {
    store.put(createTestTask({ id: 'a' }));

    expect(store.delete('a').ok).toBe(true);
    expect(store.delete('never-existed').ok).toBe(true);
    const loaded = store.get('a');
    expect(loaded.ok && loaded.value).toBeNull();
  });
});

describe('MemoryTaskStore', () => {
  it('should not share objects with callers', () => {
    const store = new MemoryTaskStore();
    const task = createTestTask({ payload: { text: 'original' } });
    store.put(task);
    task.payload = { text: 'mutated' };

    const loaded = store.get(task.id);
    expect(loaded.ok && loaded.value?.payload).toEqual({ text: 'original' });
    expect(store.size()).toBe(1);
  });
});

describe('FileTaskStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskloom-file-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write one encoded JSON document per task', () => {
    const store = new FileTaskStore(dir);
    store.put(createTestTask({ id: 'a/b' }));

    expect(fs.readdirSync(dir)).toEqual(['a%2Fb.json']);
  });

  it('should skip malformed documents when listing', () => {
    const store = new FileTaskStore(dir);
    store.put(createTestTask({ id: 'good' }));
    fs.writeFileSync(path.join(dir, 'broken.json'), '{ not json');
    fs.writeFileSync(path.join(dir, 'wrong.json'), JSON.stringify({ id: 'wrong' }));

    const listed = store.list();
    expect(listed.ok && listed.value.map(t => t.id)).toEqual(['good']);
  });

  it('should report a malformed document on get', () => {
    const store = new FileTaskStore(dir);
    fs.writeFileSync(path.join(dir, 'bad.json'), '[]');

    const loaded = store.get('bad');
    expect(loaded.ok).toBe(false);
    expect(!loaded.ok && loaded.error).toBeInstanceOf(StorageError);
  });

  it('should read back what a second instance wrote', () => {
    new FileTaskStore(dir).put(createTestTask({ id: 'shared' }));

    const loaded = new FileTaskStore(dir).get('shared');
    expect(loaded.ok && loaded.value?.id).toBe('shared');
  });
});

describe('SqliteTaskStore', () => {
  it('should fail with StorageError once closed', () => {
    const store = new SqliteTaskStore(':memory:');
    store.close();

    const result = store.put(createTestTask());
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.operation).toBe('put');
  });

  it('should persist to a database file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskloom-sqlite-'));
    const file = path.join(dir, 'nested', 'tasks.db');

    const first = new SqliteTaskStore(file);
    first.put(createTestTask({ id: 'durable' }));
    first.close();

    const second = new SqliteTaskStore(file);
    const loaded = second.get('durable');
    second.close();
    fs.rmSync(dir, { recursive: true, force: true });

    expect(loaded.ok && loaded.value?.id).toBe('durable');
  });
});

describe('serialization', () => {
  it('should use ISO timestamps', () => {
    const persisted = serializeTask(sampleTask());
    expect(persisted.metadata.createdAt).toBe('2024-01-01T00:00:00.000Z');
    expect(persisted.metadata.lastError).toBe('agent crashed');
  });

  it('should reject records with an unknown state', () => {
    const record = { ...serializeTask(sampleTask()), state: 'paused' };
    const parsed = parseTaskJson(JSON.stringify(record));
    expect(parsed.ok).toBe(false);
  });
});

describe('createTaskStore', () => {
  it('should select the driver', () => {
    const memory = createTaskStore({ driver: 'memory', path: 'unused' });
    expect(memory.ok && memory.value).toBeInstanceOf(MemoryTaskStore);

    const sqlite = createTaskStore({ driver: 'sqlite', path: ':memory:' });
    expect(sqlite.ok && sqlite.value).toBeInstanceOf(SqliteTaskStore);
    if (sqlite.ok) sqlite.value.close?.();
  });

  it('should report a store that cannot be opened', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskloom-open-'));
    const blocker = path.join(dir, 'file');
    fs.writeFileSync(blocker, 'not a directory');

    const result = createTaskStore({ driver: 'file', path: path.join(blocker, 'tasks') });
    fs.rmSync(dir, { recursive: true, force: true });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.operation).toBe('open');
  });
});
