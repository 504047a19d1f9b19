/**
 * @fileoverview Task construction and immutable update helpers
 */

import {
  generateTaskId,
  type Annotation,
  type RecurrencePattern,
  type Task,
  type TaskId,
} from './types.js';

export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Create a new pending task
 */
export function createTask(description: string, overrides: Partial<Omit<Task, 'description'>> = {}): Task {
  const entry = overrides.entry ?? nowIso();
  return {
    uuid: overrides.uuid ?? generateTaskId(),
    description,
    status: 'pending',
    entry,
    modified: entry,
    tags: [],
    annotations: [],
    depends: [],
    udas: {},
    active: false,
    ...overrides,
  };
}

export function cloneTask(task: Task): Task {
  return structuredClone(task);
}

/**
 * Deduplicate and sort a tag list
 */
export function normalizeTags(tags: Iterable<string>): string[] {
  return [...new Set(tags)].sort();
}

export function withTag(task: Task, tag: string): Task {
  return { ...task, tags: normalizeTags([...task.tags, tag]) };
}

export function withoutTag(task: Task, tag: string): Task {
  return { ...task, tags: task.tags.filter((t) => t !== tag) };
}

export function withAnnotation(task: Task, description: string, entry: string = nowIso()): Task {
  const annotation: Annotation = { entry, description };
  return { ...task, annotations: [...task.annotations, annotation] };
}

export function withDependency(task: Task, dependsOn: TaskId): Task {
  if (task.depends.includes(dependsOn)) return task;
  return { ...task, depends: [...task.depends, dependsOn] };
}

export function withoutDependency(task: Task, dependsOn: TaskId): Task {
  return { ...task, depends: task.depends.filter((d) => d !== dependsOn) };
}

export function markCompleted(task: Task, at: string = nowIso()): Task {
  return { ...task, status: 'completed', end: at, modified: at, active: false, start: undefined };
}

export function markDeleted(task: Task, at: string = nowIso()): Task {
  return { ...task, status: 'deleted', end: at, modified: at, active: false };
}

export function startTask(task: Task, at: string = nowIso()): Task {
  return { ...task, start: at, active: true, modified: at };
}

export function stopTask(task: Task, at: string = nowIso()): Task {
  return { ...task, start: undefined, active: false, modified: at };
}

/**
 * Pending (or waiting) with a due date before `now`
 */
export function isOverdue(task: Task, now: Date = new Date()): boolean {
  if (!task.due || (task.status !== 'pending' && task.status !== 'waiting')) return false;
  return Date.parse(task.due) < now.getTime();
}

// =============================================================================
// Recurrence
// =============================================================================

export function formatRecurrence(recur: RecurrencePattern): string {
  return recur.periodic ? `P${recur.pattern}` : recur.pattern;
}

export function parseRecurrence(text: string): RecurrencePattern {
  if (text.length > 1 && text.startsWith('P')) {
    return { pattern: text.slice(1), periodic: true };
  }
  return { pattern: text, periodic: false };
}
