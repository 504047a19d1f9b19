/**
 * @fileoverview Hooks module exports
 *
 * Hooks intercept task changes made through TaskManager.
 *
 * @example
 * ```typescript
 * const hooks = new TaskHookEngine();
 * hooks.register({
 *   name: 'require-project',
 *   event: 'on-add',
 *   handler: ({ task }) =>
 *     task.project ? { action: 'continue' } : { action: 'block', reason: 'project required' },
 * });
 * ```
 */

export * from './types.js';
export { TaskHookEngine, DEFAULT_HOOK_TIMEOUT_MS, type TaskHookEngineOptions } from './engine.js';
