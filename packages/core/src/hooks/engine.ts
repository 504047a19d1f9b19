/**
 * @fileoverview Task hook engine
 *
 * Runs registered hooks for a task event in priority order. A hook that
 * throws or times out counts as continue.
 */

import { createLogger } from '../logging/index.js';
import type {
  RegisteredTaskHook,
  TaskHookContext,
  TaskHookDefinition,
  TaskHookEvent,
  TaskHookResult,
  TaskModifications,
} from './types.js';

const logger = createLogger('hooks:engine');

export const DEFAULT_HOOK_TIMEOUT_MS = 5000;

export interface TaskHookEngineOptions {
  defaultTimeoutMs?: number;
}

export class TaskHookEngine {
  private hooks: Map<string, RegisteredTaskHook> = new Map();
  private readonly defaultTimeoutMs: number;

  constructor(options: TaskHookEngineOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_HOOK_TIMEOUT_MS;
  }

  /**
   * Register a hook, replacing any with the same name
   */
  register(definition: TaskHookDefinition): void {
    if (this.hooks.has(definition.name)) {
      logger.debug('Replacing existing hook', { name: definition.name });
    }

    const hook: RegisteredTaskHook = {
      ...definition,
      priority: definition.priority ?? 0,
      registeredAt: new Date().toISOString(),
    };

    this.hooks.set(definition.name, hook);
    logger.info('Hook registered', { name: hook.name, event: hook.event, priority: hook.priority });
  }

  unregister(name: string): boolean {
    const removed = this.hooks.delete(name);
    if (removed) {
      logger.info('Hook unregistered', { name });
    }
    return removed;
  }

  /**
   * Hooks for an event, highest priority first
   */
  getHooks(event: TaskHookEvent): RegisteredTaskHook[] {
    return Array.from(this.hooks.values())
      .filter((hook) => hook.event === event)
      .sort((a, b) => b.priority - a.priority);
  }

  listHooks(): RegisteredTaskHook[] {
    return Array.from(this.hooks.values());
  }

  clear(): void {
    this.hooks.clear();
  }

  /**
   * Run every hook for the context's event. The first block wins;
   * modifications from several hooks are merged, later ones overriding.
   */
  async execute(context: TaskHookContext): Promise<TaskHookResult> {
    const hooks = this.getHooks(context.event);
    if (hooks.length === 0) {
      return { action: 'continue' };
    }

    logger.debug('Executing hooks', { event: context.event, count: hooks.length, taskId: context.task.uuid });

    let modifications: TaskModifications | null = null;
    const messages: string[] = [];

    for (const hook of hooks) {
      if (hook.filter && !hook.filter(context)) {
        continue;
      }

      const result = await this.executeHook(hook, context);
      if (result.message) {
        messages.push(result.message);
      }

      switch (result.action) {
        case 'block':
          logger.warn('Hook blocked task change', { name: hook.name, reason: result.reason });
          return { action: 'block', reason: result.reason, message: joinMessages(messages) };
        case 'modify':
          modifications = { ...(modifications ?? {}), ...result.modifications };
          break;
        case 'continue':
          break;
      }
    }

    if (modifications) {
      return { action: 'modify', modifications, message: joinMessages(messages) };
    }
    return { action: 'continue', message: joinMessages(messages) };
  }

  private async executeHook(hook: RegisteredTaskHook, context: TaskHookContext): Promise<TaskHookResult> {
    const timeoutMs = hook.timeoutMs ?? this.defaultTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Hook timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      const result = await Promise.race([Promise.resolve().then(() => hook.handler(context)), timeout]);
      logger.debug('Hook executed', { name: hook.name, action: result.action });
      return result;
    } catch (error) {
      logger.warn('Hook failed', {
        name: hook.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return { action: 'continue' };
    } finally {
      clearTimeout(timer);
    }
  }
}

function joinMessages(messages: string[]): string | undefined {
  return messages.length > 0 ? messages.join('\n') : undefined;
}
