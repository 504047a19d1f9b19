/**
 * @fileoverview Tests for the task hook engine
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TaskHookEngine } from '../../src/hooks/engine.js';
import type { TaskHookContext, TaskHookResult } from '../../src/hooks/types.js';
import { createTask } from '../../src/task/task.js';
import { TaskId } from '../../src/task/types.js';

const context: TaskHookContext = {
  event: 'on-add',
  task: createTask('Hooked', { uuid: TaskId('9a9a9a9a-0000-4000-8000-00000000009a'), entry: '2026-01-01T00:00:00.000Z' }),
  timestamp: '2026-01-01T00:00:00.000Z',
};

describe('TaskHookEngine', () => {
  let engine: TaskHookEngine;

  beforeEach(() => {
    engine = new TaskHookEngine({ defaultTimeoutMs: 50 });
  });

  describe('registration', () => {
    it('should order hooks by priority, highest first', () => {
      engine.register({ name: 'low', event: 'on-add', handler: () => ({ action: 'continue' }), priority: 1 });
      engine.register({ name: 'high', event: 'on-add', handler: () => ({ action: 'continue' }), priority: 10 });
      engine.register({ name: 'other', event: 'on-delete', handler: () => ({ action: 'continue' }) });

      expect(engine.getHooks('on-add').map((hook) => hook.name)).toEqual(['high', 'low']);
      expect(engine.getHooks('on-delete')[0]?.priority).toBe(0);
      expect(engine.listHooks()).toHaveLength(3);
    });

    it('should replace a hook registered under the same name', () => {
      engine.register({ name: 'dup', event: 'on-add', handler: () => ({ action: 'continue' }) });
      engine.register({ name: 'dup', event: 'on-modify', handler: () => ({ action: 'continue' }) });

      expect(engine.listHooks().map((hook) => hook.event)).toEqual(['on-modify']);
    });

    it('should unregister and clear', () => {
      engine.register({ name: 'gone', event: 'on-add', handler: () => ({ action: 'continue' }) });
      expect(engine.unregister('gone')).toBe(true);
      expect(engine.unregister('gone')).toBe(false);

      engine.register({ name: 'again', event: 'on-add', handler: () => ({ action: 'continue' }) });
      engine.clear();
      expect(engine.listHooks()).toEqual([]);
    });
  });

  describe('execute', () => {
    it('should continue when no hooks are registered', async () => {
      expect(await engine.execute(context)).toEqual({ action: 'continue' });
    });

    it('should stop at the first block', async () => {
      const later = vi.fn(() => ({ action: 'continue' as const }));
      engine.register({ name: 'guard', event: 'on-add', priority: 5, handler: () => ({ action: 'block', reason: 'no project' }) });
      engine.register({ name: 'later', event: 'on-add', handler: later });

      expect(await engine.execute(context)).toEqual({ action: 'block', reason: 'no project', message: undefined });
      expect(later).not.toHaveBeenCalled();
    });

    it('should merge modifications and collect messages', async () => {
      engine.register({
        name: 'first',
        event: 'on-add',
        priority: 2,
        handler: () => ({ action: 'modify', modifications: { project: 'Inbox', priority: 'L' }, message: 'filed' }),
      });
      engine.register({
        name: 'second',
        event: 'on-add',
        priority: 1,
        handler: async () => ({ action: 'modify', modifications: { priority: 'H' }, message: 'escalated' }),
      });

      expect(await engine.execute(context)).toEqual({
        action: 'modify',
        modifications: { project: 'Inbox', priority: 'H' },
        message: 'filed\nescalated',
      });
    });

    it('should skip hooks whose filter rejects the context', async () => {
      const handler = vi.fn(() => ({ action: 'block' as const, reason: 'never' }));
      engine.register({ name: 'filtered', event: 'on-add', handler, filter: (ctx) => ctx.task.project === 'Work' });

      expect((await engine.execute(context)).action).toBe('continue');
      expect(handler).not.toHaveBeenCalled();
    });

    it('should treat a failing hook as continue', async () => {
      engine.register({ name: 'broken', event: 'on-add', handler: () => { throw new Error('hook crashed'); } });
      engine.register({
        name: 'async-broken',
        event: 'on-add',
        handler: async () => { throw new Error('async crash'); },
      });

      expect(await engine.execute(context)).toEqual({ action: 'continue', message: undefined });
    });

    it('should treat a slow hook as continue', async () => {
      engine.register({
        name: 'slow',
        event: 'on-add',
        timeoutMs: 10,
        handler: () => new Promise<TaskHookResult>((resolve) => setTimeout(() => resolve({ action: 'block', reason: 'too late' }), 200)),
      });

      expect((await engine.execute(context)).action).toBe('continue');
    });
  });
});
