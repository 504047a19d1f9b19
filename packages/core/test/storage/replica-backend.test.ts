/**
 * @fileoverview Tests for the replica storage backend
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { ConfigurationError, StorageError } from '../../src/errors/index.js';
import { buildSaveBatch } from '../../src/operations/batch-builder.js';
import { UNDO_POINT } from '../../src/operations/types.js';
import type { UserContext } from '../../src/query/types.js';
import { openEmbeddedReplica } from '../../src/replica/factory.js';
import { MemoryReplica } from '../../src/replica/memory-replica.js';
import { ReplicaStorageBackend } from '../../src/storage/replica-backend.js';
import { createTask, withTag } from '../../src/task/task.js';
import { TaskId } from '../../src/task/types.js';

const ID_A = TaskId('a1a1a1a1-0000-4000-8000-0000000000a1');
const ID_B = TaskId('b2b2b2b2-0000-4000-8000-0000000000b2');
const ENTRY = '2026-05-01T07:30:00.000Z';

describe('ReplicaStorageBackend', () => {
  describe('without a wrapper', () => {
    it('should refuse writes', async () => {
      const backend = new ReplicaStorageBackend('/unused/replica.sqlite3');
      const task = createTask('Nowhere to go', { uuid: ID_A, entry: ENTRY });

      await expect(backend.saveTask(task)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(backend.saveTask(task)).rejects.toThrow('write path not configured');
      await expect(backend.deleteTask(ID_A)).rejects.toThrow('write path not configured');
      expect(backend.replica).toBeNull();
    });

    it('should refuse to read through a missing actor', () => {
      expect(() => new ReplicaStorageBackend('/unused/replica.sqlite3', null, { readPath: 'actor' }))
        .toThrow('write path not configured');
    });
  });

  describe('with a memory replica', () => {
    let memory: MemoryReplica;
    let backend: ReplicaStorageBackend;

    beforeEach(async () => {
      memory = new MemoryReplica();
      backend = new ReplicaStorageBackend('memory', memory, { readPath: 'actor' });
      await backend.initialize();
    });

    afterEach(async () => {
      await backend.close();
    });

    it('should commit a create batch for a new task', async () => {
      const task = createTask('Book dentist', { uuid: ID_A, entry: ENTRY });
      await backend.saveTask(task);

      expect(memory.committed).toEqual([buildSaveBatch(null, task)]);
      expect(await backend.loadTask(ID_A)).toEqual(task);
    });

    it('should commit only the diff for an existing task', async () => {
      const task = createTask('Book dentist', { uuid: ID_A, entry: ENTRY });
      await backend.saveTask(task);
      await backend.saveTask(withTag(task, 'health'));

      expect(memory.committed[1]).toEqual([UNDO_POINT, { type: 'add_tag', uuid: ID_A, tag: 'health' }]);
      expect((await backend.loadTask(ID_A))?.tags).toEqual(['health']);
    });

    it('should save as new when the current state cannot be read', async () => {
      const task = createTask('Book dentist', { uuid: ID_A, entry: ENTRY });
      await backend.saveTask(task);
      memory.failNext('readTask', new Error('read failed'));

      await backend.saveTask({ ...task, description: 'Book hygienist' });

      const batch = memory.committed[1];
      expect(batch?.map((op) => op.type)).toEqual(['undo_point', 'create']);
      expect((await backend.loadTask(ID_A))?.description).toBe('Book hygienist');
    });

    it('should add the operation name to commit failures', async () => {
      const task = createTask('Book dentist', { uuid: ID_A, entry: ENTRY });
      memory.failNext('commitOperations', new StorageError('Replica actor disconnected: closed', { kind: 'disconnected' }));

      await expect(backend.saveTask(task)).rejects.toMatchObject({
        message: 'Failed to commit operations: Replica actor disconnected: closed',
        kind: 'disconnected',
        operation: 'save_task',
        code: 'REPLICA_DISCONNECTED',
      });

      memory.failNext('commitOperations', new Error('disk full'));
      await expect(backend.deleteTask(ID_A)).rejects.toMatchObject({
        message: 'Failed to commit operations: disk full',
        kind: 'database',
        operation: 'delete_task',
        code: 'STORAGE_DATABASE_ERROR',
      });
      expect(memory.committed).toEqual([]);
    });

    it('should delete logically', async () => {
      await backend.saveTask(createTask('Cancel gym', { uuid: ID_A, entry: ENTRY }));
      await backend.deleteTask(ID_A);

      expect(memory.committed[1]).toEqual([UNDO_POINT, { type: 'delete', uuid: ID_A }]);
      expect((await backend.loadTask(ID_A))?.status).toBe('deleted');
    });

    it('should return null for a missing task', async () => {
      expect(await backend.loadTask(ID_B)).toBeNull();
    });

    it('should query through the active context', async () => {
      await backend.saveTask(createTask('Quarterly report', { uuid: ID_A, entry: ENTRY, project: 'Work' }));
      await backend.saveTask(createTask('Fix bike', { uuid: ID_B, entry: ENTRY, project: 'Home' }));
      const context: UserContext = { name: 'work', readFilter: 'project:Work', active: true };

      const scoped = await backend.queryTasks({}, context);
      expect(scoped.map((task) => task.uuid)).toEqual([ID_A]);

      const all = await backend.queryTasks({ filterMode: 'ignore_context' }, context);
      expect(all.map((task) => task.uuid)).toEqual([ID_A, ID_B]);
    });

    it('should not support backup or restore', async () => {
      await expect(backend.backup()).rejects.toMatchObject({
        kind: 'not_supported',
        message: 'Backup not supported for replica backend',
      });
      await expect(backend.restore('[]')).rejects.toMatchObject({
        kind: 'not_supported',
        message: 'Restore not supported for replica backend',
      });
    });

    it('should close the wrapper', async () => {
      await backend.close();
      await expect(memory.readAllTasks()).rejects.toMatchObject({ kind: 'disconnected' });
    });
  });

  describe('reads before initialize', () => {
    it('should be rejected', async () => {
      const backend = new ReplicaStorageBackend('memory', new MemoryReplica(), { readPath: 'actor' });
      await expect(backend.loadAllTasks()).rejects.toThrow('Replica backend is not initialized');
      await backend.close();
    });
  });

  describe('direct read path', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = mkdtempSync(path.join(tmpdir(), 'replica-backend-'));
    });

    afterEach(() => {
      rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should see every acknowledged commit', async () => {
      const dbPath = path.join(tmpDir, 'replica.sqlite3');
      const actor = await openEmbeddedReplica(dbPath, { transport: 'inline' });
      const backend = new ReplicaStorageBackend(dbPath, actor);
      await backend.initialize();

      try {
        const task = createTask('Read my write', { uuid: ID_A, entry: ENTRY, project: 'Home' });
        await backend.saveTask(task);
        expect(await backend.loadTask(ID_A)).toEqual(task);

        await backend.saveTask({ ...task, project: 'Garden' });
        expect((await backend.loadTask(ID_A))?.project).toBe('Garden');
        expect(await backend.loadAllTasks()).toHaveLength(1);
      } finally {
        await backend.close();
      }
      expect(actor.isConnected).toBe(false);
    });

    it('should fail to initialize when the store file is missing', async () => {
      const missing = path.join(tmpDir, 'missing.sqlite3');
      const backend = new ReplicaStorageBackend(missing, new MemoryReplica());

      await expect(backend.initialize()).rejects.toMatchObject({
        kind: 'io',
        message: `replica database not found: ${missing}`,
      });
      await backend.close();
    });
  });
});
