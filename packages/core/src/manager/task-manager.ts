/**
 * @fileoverview Task manager
 *
 * High-level task operations over a StorageBackend: builds and validates
 * tasks, applies the active context, runs hooks, then saves.
 */

import { HookBlockedError, TaskNotFoundError, ValidationError } from '../errors/index.js';
import type { TaskHookEngine } from '../hooks/engine.js';
import type { TaskHookEvent } from '../hooks/types.js';
import { createLogger } from '../logging/index.js';
import { parseProjectFromFilter } from '../query/context.js';
import type { TaskQuery, UserContext } from '../query/types.js';
import type { StorageBackend } from '../storage/types.js';
import {
  createTask,
  markCompleted,
  markDeleted,
  normalizeTags,
  nowIso,
  withAnnotation,
} from '../task/task.js';
import type { Task, TaskId, UdaValue } from '../task/types.js';
import { findTaskIssues, validateTask } from '../task/validation.js';
import type { AddTaskOptions, TaskManagerOptions, TaskUpdate, ValidationReport } from './types.js';

const logger = createLogger('manager');

function pick<T>(update: T | null | undefined, current: T | undefined): T | undefined {
  if (update === undefined) return current;
  return update ?? undefined;
}

function isEmptyUpdate(update: TaskUpdate): boolean {
  const { udas, ...fields } = update;
  if (udas !== undefined && Object.keys(udas).length > 0) return false;
  return Object.values(fields).every((value) => value === undefined || (Array.isArray(value) && value.length === 0));
}

function mergeUdas(current: Record<string, UdaValue>, changes: Record<string, UdaValue | null>): Record<string, UdaValue> {
  const result = { ...current };
  for (const [name, value] of Object.entries(changes)) {
    if (value === null) {
      delete result[name];
    } else {
      result[name] = value;
    }
  }
  return result;
}

export class TaskManager {
  private readonly hooks: TaskHookEngine | null;
  private activeContext: UserContext | null;

  constructor(
    private readonly backend: StorageBackend,
    options: TaskManagerOptions = {}
  ) {
    this.hooks = options.hooks ?? null;
    this.activeContext = options.activeContext ?? null;
  }

  getActiveContext(): UserContext | null {
    return this.activeContext;
  }

  setActiveContext(context: UserContext | null): void {
    this.activeContext = context;
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  async addTask(description: string, options: AddTaskOptions = {}): Promise<Task> {
    const entry = nowIso();
    let task = createTask(description, {
      entry,
      project: options.project ?? this.contextProject(options.filterMode),
      tags: normalizeTags(options.tags ?? []),
      priority: options.priority,
      due: options.due,
      scheduled: options.scheduled,
      wait: options.wait,
      recur: options.recur,
      depends: [...new Set(options.depends ?? [])],
      annotations: (options.annotations ?? []).map((text) => ({ entry, description: text })),
      udas: { ...options.udas },
    });

    validateTask(task);
    task = await this.runHooks('on-add', task);
    await this.backend.saveTask(task);
    logger.info('Task added', { taskId: task.uuid, project: task.project });
    return task;
  }

  /**
   * @throws ValidationError for an update that changes nothing
   * @throws TaskNotFoundError when the task does not exist
   */
  async updateTask(uuid: TaskId, update: TaskUpdate): Promise<Task> {
    if (isEmptyUpdate(update)) {
      throw new ValidationError('No changes specified', { field: 'update' });
    }

    const previous = await this.requireTask(uuid);
    const at = nowIso();
    const remove = new Set(update.removeTags ?? []);
    const removeDepends = new Set(update.removeDepends ?? []);

    let task: Task = {
      ...previous,
      description: update.description ?? previous.description,
      status: update.status ?? previous.status,
      project: pick(update.project, previous.project),
      priority: pick(update.priority, previous.priority),
      due: pick(update.due, previous.due),
      scheduled: pick(update.scheduled, previous.scheduled),
      wait: pick(update.wait, previous.wait),
      recur: pick(update.recur, previous.recur),
      tags: normalizeTags([...previous.tags, ...(update.addTags ?? [])]).filter((tag) => !remove.has(tag)),
      depends: [...new Set([...previous.depends, ...(update.addDepends ?? [])])].filter((d) => !removeDepends.has(d)),
      annotations: [
        ...previous.annotations,
        ...(update.addAnnotations ?? []).map((text) => ({ entry: at, description: text })),
      ],
      udas: update.udas ? mergeUdas(previous.udas, update.udas) : previous.udas,
      modified: at,
    };

    validateTask(task);
    task = await this.runHooks('on-modify', task, previous);
    await this.backend.saveTask(task);
    logger.debug('Task updated', { taskId: uuid });
    return task;
  }

  async completeTask(uuid: TaskId): Promise<Task> {
    const previous = await this.requireTask(uuid);
    if (previous.status === 'completed') {
      throw new ValidationError(`Task ${uuid} is already completed`, { field: 'status' });
    }

    let task = markCompleted(previous);
    task = await this.runHooks('on-complete', task, previous);
    await this.backend.saveTask(task);
    logger.info('Task completed', { taskId: uuid });
    return task;
  }

  /**
   * Delete through the backend. Returns the task as it looked once deleted.
   */
  async deleteTask(uuid: TaskId): Promise<Task> {
    const previous = await this.requireTask(uuid);
    const task = markDeleted(previous);
    await this.runHooks('on-delete', task, previous);
    await this.backend.deleteTask(uuid);
    logger.info('Task deleted', { taskId: uuid });
    return task;
  }

  async annotateTask(uuid: TaskId, description: string): Promise<Task> {
    const previous = await this.requireTask(uuid);
    const at = nowIso();
    let task: Task = { ...withAnnotation(previous, description, at), modified: at };

    validateTask(task);
    task = await this.runHooks('on-modify', task, previous);
    await this.backend.saveTask(task);
    return task;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getTask(uuid: TaskId): Promise<Task | null> {
    return this.backend.loadTask(uuid);
  }

  queryTasks(query: TaskQuery = {}): Promise<Task[]> {
    return this.backend.queryTasks(query, this.activeContext);
  }

  pendingTasks(): Promise<Task[]> {
    return this.queryTasks({ status: 'pending' });
  }

  completedTasks(): Promise<Task[]> {
    return this.queryTasks({ status: 'completed' });
  }

  async countTasks(query: TaskQuery = {}): Promise<number> {
    return (await this.queryTasks(query)).length;
  }

  /**
   * Check every stored task, ignoring the active context
   */
  async validateAll(): Promise<ValidationReport> {
    const tasks = await this.backend.loadAllTasks();
    const invalid: ValidationReport['invalid'] = [];
    for (const task of tasks) {
      const issues = findTaskIssues(task);
      if (issues.length > 0) invalid.push({ uuid: task.uuid, issues });
    }
    if (invalid.length > 0) {
      logger.warn('Invalid tasks found', { total: tasks.length, invalid: invalid.length });
    }
    return { total: tasks.length, valid: tasks.length - invalid.length, invalid };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private contextProject(filterMode: AddTaskOptions['filterMode']): string | undefined {
    if (filterMode === 'ignore_context' || !this.activeContext?.writeFilter) {
      return undefined;
    }
    return parseProjectFromFilter(this.activeContext.writeFilter) ?? undefined;
  }

  private async requireTask(uuid: TaskId): Promise<Task> {
    const task = await this.backend.loadTask(uuid);
    if (!task) {
      throw new TaskNotFoundError(uuid);
    }
    return task;
  }

  private async runHooks(event: TaskHookEvent, task: Task, previous?: Task): Promise<Task> {
    if (!this.hooks) return task;

    const result = await this.hooks.execute({ event, task, previous, timestamp: nowIso() });
    switch (result.action) {
      case 'block':
        throw new HookBlockedError(event, result.reason);
      case 'modify': {
        const modified: Task = { ...task, ...result.modifications };
        validateTask(modified);
        return modified;
      }
      case 'continue':
        return task;
    }
  }
}
