/**
 * @fileoverview Tests for the replica store, database and host
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, renameSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { StorageError } from '../../src/errors/index.js';
import { buildDeleteBatch, buildSaveBatch } from '../../src/operations/batch-builder.js';
import { UNDO_POINT } from '../../src/operations/types.js';
import { ReplicaDatabase } from '../../src/replica/database.js';
import { mapOperations } from '../../src/replica/field-mapping.js';
import { ReplicaHost } from '../../src/replica/host.js';
import { MigrationRunner, migrations } from '../../src/replica/migrations/index.js';
import { ReplicaStore } from '../../src/replica/store.js';
import { createTask } from '../../src/task/task.js';
import { TaskId } from '../../src/task/types.js';

const ID_A = TaskId('aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa');
const ID_B = TaskId('bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb');
const ENTRY = '2026-02-01T12:00:00.000Z';

describe('ReplicaStore', () => {
  let database: ReplicaDatabase;
  let store: ReplicaStore;

  beforeEach(() => {
    database = new ReplicaDatabase(':memory:');
    database.open();
    store = new ReplicaStore(database);
  });

  afterEach(() => {
    database.close();
  });

  describe('commit', () => {
    it('should log every primitive with its previous value', () => {
      store.commit([
        { kind: 'undo_point' },
        { kind: 'create', uuid: ID_A },
        { kind: 'update', uuid: ID_A, property: 'description', value: 'Sweep' },
      ]);

      expect(store.countTasks()).toBe(1);
      expect(store.countOperations()).toBe(3);
      expect(store.countUndoPoints()).toBe(1);
      expect(store.getTaskData(ID_A)).toEqual({ description: 'Sweep' });
    });

    it('should not log updates that change nothing', () => {
      store.commit([{ kind: 'create', uuid: ID_A }, { kind: 'update', uuid: ID_A, property: 'status', value: 'pending' }]);
      const before = store.countOperations();
      store.commit([{ kind: 'update', uuid: ID_A, property: 'status', value: 'pending' }]);
      expect(store.countOperations()).toBe(before);
    });

    it('should create the task implicitly on update', () => {
      store.commit([{ kind: 'update', uuid: ID_B, property: 'description', value: 'Implicit' }]);
      expect(store.getTaskData(ID_B)).toEqual({ description: 'Implicit' });
    });

    it('should list tasks in insertion order', () => {
      store.commit([{ kind: 'create', uuid: ID_B }, { kind: 'create', uuid: ID_A }]);
      expect(store.allTaskData().map((t) => t.uuid)).toEqual([ID_B, ID_A]);
    });
  });

  describe('undo', () => {
    const commitBatch = (ops: Parameters<typeof mapOperations>[1]): void => {
      store.commit(mapOperations(store, ops));
    };

    beforeEach(() => {
      commitBatch(buildSaveBatch(null, createTask('Sort mail', { uuid: ID_A, entry: ENTRY })));
    });

    it('should revert only the latest unit of work', () => {
      commitBatch([UNDO_POINT, { type: 'add_tag', uuid: ID_A, tag: 'home' }]);
      expect(store.getTaskData(ID_A)?.tags).toBe('home');

      expect(store.undo()).toBe(true);
      expect(store.getTaskData(ID_A)?.tags).toBeUndefined();
      expect(store.getTaskData(ID_A)?.description).toBe('Sort mail');
    });

    it('should remove a task whose creation is undone', () => {
      expect(store.undo()).toBe(true);
      expect(store.getTaskData(ID_A)).toBeNull();
      expect(store.countOperations()).toBe(0);
    });

    it('should return false when there is nothing to undo', () => {
      expect(store.undo()).toBe(true);
      expect(store.undo()).toBe(false);
    });

    it('should skip units that changed nothing', () => {
      commitBatch([UNDO_POINT]);
      expect(store.undo()).toBe(true);
      expect(store.getTaskData(ID_A)).toBeNull();
    });

    it('should restore a deleted task', () => {
      commitBatch(buildDeleteBatch(ID_A));
      expect(store.getTaskData(ID_A)?.status).toBe('deleted');
      expect(store.undo()).toBe(true);
      expect(store.getTaskData(ID_A)?.status).toBe('pending');
    });
  });
});

describe('ReplicaDatabase', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(path.join(tmpdir(), 'replica-db-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should create the file and its directory and migrate the schema', () => {
    const dbPath = path.join(tmpDir, 'nested', 'replica.sqlite3');
    const database = new ReplicaDatabase(dbPath);
    const db = database.open();

    const runner = new MigrationRunner(db, migrations);
    expect(runner.getCurrentVersion()).toBe(1);
    expect(runner.tableExists('tasks')).toBe(true);
    expect(runner.tableExists('operations')).toBe(true);
    expect(runner.getPendingMigrations()).toEqual([]);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    database.close();
    expect(database.isOpen()).toBe(false);
  });

  it('should refuse a read-only open of a missing file', () => {
    const database = new ReplicaDatabase(path.join(tmpDir, 'missing.sqlite3'), { readonly: true });
    expect(() => database.open()).toThrow(StorageError);
  });

  it('should refuse a read-only open of a database without the replica schema', () => {
    const dbPath = path.join(tmpDir, 'empty.sqlite3');
    writeFileSync(dbPath, '');

    const database = new ReplicaDatabase(dbPath, { readonly: true });
    expect(() => database.open()).toThrow(`${dbPath} is not a replica database`);
    expect(database.isOpen()).toBe(false);
  });

  it('should report use before open', () => {
    const database = new ReplicaDatabase(':memory:');
    expect(() => database.getDatabase()).toThrow('Replica database is not open');
  });
});

describe('ReplicaHost', () => {
  let tmpDir: string;
  let host: ReplicaHost;

  beforeEach(() => {
    tmpDir = mkdtempSync(path.join(tmpdir(), 'replica-host-'));
    host = new ReplicaHost();
  });

  afterEach(() => {
    host.close();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should reject commands before a replica is opened', () => {
    expect(() => host.execute({ kind: 'undo' })).toThrow('Replica is not open');
  });

  it('should execute commands against the open replica', () => {
    host.open(path.join(tmpDir, 'a.sqlite3'));
    const task = createTask('Host task', { uuid: ID_A, entry: ENTRY });

    expect(host.execute({ kind: 'commit', ops: buildSaveBatch(null, task) })).toBeNull();
    expect(host.execute({ kind: 'read_task', uuid: ID_A })).toEqual(task);
    expect(host.execute({ kind: 'read_all' })).toEqual([task]);
    expect(host.execute({ kind: 'undo' })).toBe(true);
    expect(host.execute({ kind: 'read_task', uuid: ID_A })).toBeNull();
  });

  it('should switch stores on open', () => {
    const first = path.join(tmpDir, 'first.sqlite3');
    const second = path.join(tmpDir, 'second.sqlite3');
    host.open(first);
    host.commit(buildSaveBatch(null, createTask('Only in first', { uuid: ID_A, entry: ENTRY })));

    host.open(second);
    expect(host.path).toBe(second);
    expect(host.readTask(ID_A)).toBeNull();

    host.open(first);
    expect(host.readTask(ID_A)?.description).toBe('Only in first');
  });

  it('should reopen the path already open', () => {
    const live = path.join(tmpDir, 'live.sqlite3');
    const incoming = path.join(tmpDir, 'incoming.sqlite3');
    const local = new ReplicaHost({ enableWAL: false });
    const writer = new ReplicaHost({ enableWAL: false });
    local.open(live);
    local.commit(buildSaveBatch(null, createTask('Before swap', { uuid: ID_A, entry: ENTRY })));
    writer.open(incoming);
    writer.commit(buildSaveBatch(null, createTask('After swap', { uuid: ID_B, entry: ENTRY })));
    writer.close();
    renameSync(incoming, live);

    try {
      local.open(live);
      expect(local.path).toBe(live);
      expect(local.readTask(ID_A)).toBeNull();
      expect(local.readTask(ID_B)?.description).toBe('After swap');
    } finally {
      local.close();
    }
  });

  it('should keep the current store when a new one fails to open', () => {
    const good = path.join(tmpDir, 'good.sqlite3');
    const blocker = path.join(tmpDir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    host.open(good);

    expect(() => host.open(path.join(blocker, 'replica.sqlite3'))).toThrow(StorageError);
    expect(host.path).toBe(good);
    expect(host.readAll()).toEqual([]);
  });

  it('should close on shutdown', () => {
    host.open(path.join(tmpDir, 'a.sqlite3'));
    expect(host.execute({ kind: 'shutdown' })).toBeNull();
    expect(host.path).toBeNull();
  });
});
