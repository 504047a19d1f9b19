/**
 * @fileoverview Task hook types
 */

import type { Task } from '../task/types.js';

export type TaskHookEvent = 'on-add' | 'on-modify' | 'on-delete' | 'on-complete';

export interface TaskHookContext {
  event: TaskHookEvent;
  /** The task as it is about to be saved */
  task: Task;
  /** Stored version, for everything but on-add */
  previous?: Task;
  timestamp: string;
}

/** Fields a hook may rewrite before the task is saved */
export type TaskModifications = Partial<
  Pick<Task, 'description' | 'project' | 'priority' | 'tags' | 'due' | 'scheduled' | 'wait' | 'udas'>
>;

export type TaskHookResult =
  | { action: 'continue'; message?: string }
  | { action: 'block'; reason: string; message?: string }
  | { action: 'modify'; modifications: TaskModifications; message?: string };

export type TaskHookHandler = (context: TaskHookContext) => Promise<TaskHookResult> | TaskHookResult;

export interface TaskHookDefinition {
  name: string;
  event: TaskHookEvent;
  handler: TaskHookHandler;
  /** Higher runs first */
  priority?: number;
  /** Skip the hook when this returns false */
  filter?: (context: TaskHookContext) => boolean;
  timeoutMs?: number;
}

export interface RegisteredTaskHook extends TaskHookDefinition {
  priority: number;
  registeredAt: string;
}
