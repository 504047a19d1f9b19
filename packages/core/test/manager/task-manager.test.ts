/**
 * @fileoverview Tests for the task manager
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HookBlockedError, TaskNotFoundError, ValidationError } from '../../src/errors/index.js';
import { TaskHookEngine } from '../../src/hooks/engine.js';
import { TaskManager } from '../../src/manager/task-manager.js';
import type { UserContext } from '../../src/query/types.js';
import { MemoryReplica } from '../../src/replica/memory-replica.js';
import { ReplicaStorageBackend } from '../../src/storage/replica-backend.js';
import { createTask } from '../../src/task/task.js';
import { TaskId, generateTaskId } from '../../src/task/types.js';

const T0 = '2026-06-01T10:00:00.000Z';
const T1 = '2026-06-01T11:00:00.000Z';

const workContext: UserContext = {
  name: 'work',
  readFilter: 'project:Work',
  writeFilter: 'project:Work',
  active: true,
};

describe('TaskManager', () => {
  let memory: MemoryReplica;
  let backend: ReplicaStorageBackend;
  let hooks: TaskHookEngine;
  let manager: TaskManager;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(T0));
    memory = new MemoryReplica();
    backend = new ReplicaStorageBackend('memory', memory, { readPath: 'actor' });
    await backend.initialize();
    hooks = new TaskHookEngine();
    manager = new TaskManager(backend, { hooks });
  });

  afterEach(async () => {
    await backend.close();
    vi.useRealTimers();
  });

  describe('addTask', () => {
    it('should build, save and return the task', async () => {
      const task = await manager.addTask('Plan offsite', {
        tags: ['team', 'planning', 'team'],
        priority: 'M',
        annotations: ['book venue'],
        udas: { budget: { type: 'number', value: 1200 } },
      });

      expect(task.status).toBe('pending');
      expect(task.entry).toBe(T0);
      expect(task.modified).toBe(T0);
      expect(task.tags).toEqual(['planning', 'team']);
      expect(task.annotations).toEqual([{ entry: T0, description: 'book venue' }]);
      expect(await manager.getTask(task.uuid)).toEqual(task);
    });

    it('should take the project from the active context', async () => {
      manager.setActiveContext(workContext);

      expect((await manager.addTask('Standup notes')).project).toBe('Work');
      expect((await manager.addTask('Own project', { project: 'Home' })).project).toBe('Home');
      expect((await manager.addTask('No context', { filterMode: 'ignore_context' })).project).toBeUndefined();
    });

    it('should validate before saving', async () => {
      await expect(manager.addTask('   ')).rejects.toBeInstanceOf(ValidationError);
      await expect(manager.addTask('Tagged', { tags: ['two words'] })).rejects.toThrow('invalid tag "two words"');
      expect(memory.committed).toEqual([]);
    });
  });

  describe('updateTask', () => {
    it('should reject an update with no changes', async () => {
      const task = await manager.addTask('Unchanged');
      await expect(manager.updateTask(task.uuid, {})).rejects.toThrow('No changes specified');
      await expect(manager.updateTask(task.uuid, { udas: {}, addTags: [] })).rejects.toThrow('No changes specified');
    });

    it('should reject a missing task', async () => {
      await expect(manager.updateTask(generateTaskId(), { description: 'x' })).rejects.toBeInstanceOf(TaskNotFoundError);
    });

    it('should apply the update as one diff batch', async () => {
      const task = await manager.addTask('Garden', {
        project: 'Home',
        tags: ['outdoor'],
        udas: { owner: { type: 'string', value: 'sam' } },
      });
      vi.setSystemTime(new Date(T1));

      const updated = await manager.updateTask(task.uuid, {
        project: null,
        addTags: ['weekend'],
        removeTags: ['outdoor'],
        addAnnotations: ['buy seeds'],
        udas: { estimate: { type: 'number', value: 3 }, owner: null },
      });

      expect(updated.project).toBeUndefined();
      expect(updated.tags).toEqual(['weekend']);
      expect(updated.annotations).toEqual([{ entry: T1, description: 'buy seeds' }]);
      expect(updated.udas).toEqual({ estimate: { type: 'number', value: 3 } });
      expect(updated.modified).toBe(T1);

      expect(memory.committed[1]).toEqual([
        { type: 'undo_point' },
        { type: 'update', uuid: task.uuid, key: 'project', oldValue: 'Home', newValue: null },
        { type: 'add_tag', uuid: task.uuid, tag: 'weekend' },
        { type: 'remove_tag', uuid: task.uuid, tag: 'outdoor' },
        { type: 'add_annotation', uuid: task.uuid, entry: T1, description: 'buy seeds' },
        { type: 'set_field', uuid: task.uuid, key: 'modified', value: T1 },
        { type: 'set_field', uuid: task.uuid, key: 'estimate', value: '3' },
        { type: 'unset_field', uuid: task.uuid, key: 'owner' },
      ]);
      expect(await manager.getTask(task.uuid)).toEqual(updated);
    });
  });

  describe('completeTask', () => {
    it('should mark the task completed once', async () => {
      const task = await manager.addTask('File taxes');
      vi.setSystemTime(new Date(T1));

      const completed = await manager.completeTask(task.uuid);
      expect(completed.status).toBe('completed');
      expect(completed.end).toBe(T1);
      expect((await manager.completedTasks()).map((t) => t.uuid)).toEqual([task.uuid]);
      expect(await manager.pendingTasks()).toEqual([]);

      await expect(manager.completeTask(task.uuid)).rejects.toThrow(`Task ${task.uuid} is already completed`);
    });
  });

  describe('deleteTask', () => {
    it('should delete through the backend and return the deleted task', async () => {
      const task = await manager.addTask('Old idea');
      const deleted = await manager.deleteTask(task.uuid);

      expect(deleted.status).toBe('deleted');
      expect((await manager.getTask(task.uuid))?.status).toBe('deleted');
      expect(memory.committed[1]).toEqual([{ type: 'undo_point' }, { type: 'delete', uuid: task.uuid }]);
    });

    it('should reject a missing task', async () => {
      await expect(manager.deleteTask(generateTaskId())).rejects.toBeInstanceOf(TaskNotFoundError);
    });
  });

  describe('annotateTask', () => {
    it('should append an annotation', async () => {
      const task = await manager.addTask('Research laptops');
      vi.setSystemTime(new Date(T1));

      const annotated = await manager.annotateTask(task.uuid, 'compare battery life');
      expect(annotated.annotations).toEqual([{ entry: T1, description: 'compare battery life' }]);
      expect((await manager.getTask(task.uuid))?.annotations).toEqual(annotated.annotations);
    });
  });

  describe('hooks', () => {
    it('should refuse a change a hook blocks', async () => {
      hooks.register({
        name: 'require-project',
        event: 'on-add',
        handler: ({ task }) => (task.project ? { action: 'continue' } : { action: 'block', reason: 'project required' }),
      });

      const adding = manager.addTask('Loose end');
      await expect(adding).rejects.toBeInstanceOf(HookBlockedError);
      await expect(adding).rejects.toThrow('Blocked by on-add hook: project required');
      expect(memory.committed).toEqual([]);
      expect((await manager.addTask('Filed', { project: 'Inbox' })).project).toBe('Inbox');
    });

    it('should save what a hook modifies', async () => {
      hooks.register({
        name: 'default-priority',
        event: 'on-add',
        handler: ({ task }) => (task.priority ? { action: 'continue' } : { action: 'modify', modifications: { priority: 'L' } }),
      });

      const task = await manager.addTask('Low key');
      expect(task.priority).toBe('L');
      expect((await manager.getTask(task.uuid))?.priority).toBe('L');
    });

    it('should validate hook modifications', async () => {
      hooks.register({
        name: 'bad-tags',
        event: 'on-add',
        handler: () => ({ action: 'modify', modifications: { tags: ['has space'] } }),
      });

      await expect(manager.addTask('Victim')).rejects.toBeInstanceOf(ValidationError);
      expect(memory.committed).toEqual([]);
    });

    it('should pass the previous version to modify hooks', async () => {
      const seen: Array<string | undefined> = [];
      hooks.register({
        name: 'audit',
        event: 'on-modify',
        handler: ({ previous }) => {
          seen.push(previous?.description);
          return { action: 'continue' };
        },
      });

      const task = await manager.addTask('Before');
      await manager.updateTask(task.uuid, { description: 'After' });
      expect(seen).toEqual(['Before']);
    });
  });

  describe('queries', () => {
    it('should narrow queries by the active context', async () => {
      await manager.addTask('Work item', { project: 'Work' });
      await manager.addTask('Home item', { project: 'Home' });

      expect(await manager.countTasks()).toBe(2);
      manager.setActiveContext(workContext);
      expect(manager.getActiveContext()).toBe(workContext);
      expect((await manager.queryTasks()).map((t) => t.description)).toEqual(['Work item']);
      expect(await manager.countTasks({ filterMode: 'ignore_context' })).toBe(2);
    });
  });

  describe('validateAll', () => {
    it('should report stored tasks that fail validation', async () => {
      const brokenId = TaskId('9a9a9a9a-0000-4000-8000-00000000009a');
      await manager.addTask('Healthy', { project: 'Home' });
      await backend.saveTask(createTask('   ', { uuid: brokenId, entry: T0, end: T0 }));
      manager.setActiveContext(workContext);

      expect(await manager.validateAll()).toEqual({
        total: 2,
        valid: 1,
        invalid: [{
          uuid: brokenId,
          issues: [
            { field: 'description', message: 'description must not be empty' },
            { field: 'end', message: 'end date set on a pending task' },
          ],
        }],
      });
    });

    it('should report a clean store', async () => {
      await manager.addTask('Only task');
      expect(await manager.validateAll()).toEqual({ total: 1, valid: 1, invalid: [] });
    });
  });
});
