/**
 * @fileoverview Task domain types
 *
 * Timestamps are ISO-8601 UTC strings as produced by Date#toISOString().
 * `tags` and `depends` have set semantics; `annotations` keep insertion order.
 */

import { randomUUID } from 'crypto';

// =============================================================================
// Branded Types
// =============================================================================

/**
 * Task identity (UUID)
 */
export type TaskId = string & { readonly __brand: 'TaskId' };

export const TaskId = (id: string): TaskId => id as TaskId;

export function generateTaskId(): TaskId {
  return TaskId(randomUUID());
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isTaskId(value: string): value is TaskId {
  return UUID_PATTERN.test(value);
}

// =============================================================================
// Field Types
// =============================================================================

export const TASK_STATUSES = ['pending', 'completed', 'deleted', 'waiting', 'recurring'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

export const PRIORITIES = ['H', 'M', 'L'] as const;

export type Priority = typeof PRIORITIES[number];

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}

export interface Annotation {
  /** When the annotation was added */
  entry: string;
  description: string;
}

/**
 * User-defined attribute value
 */
export type UdaValue =
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'date'; value: string };

export interface RecurrencePattern {
  /** e.g. "weekly", "2d", "1M" */
  pattern: string;
  /** Periodic patterns are written with a leading "P" */
  periodic: boolean;
}

// =============================================================================
// Task
// =============================================================================

export interface Task {
  uuid: TaskId;
  description: string;
  status: TaskStatus;
  entry: string;
  modified?: string;
  due?: string;
  scheduled?: string;
  wait?: string;
  end?: string;
  start?: string;
  priority?: Priority;
  project?: string;
  tags: string[];
  annotations: Annotation[];
  depends: TaskId[];
  udas: Record<string, UdaValue>;
  recur?: RecurrencePattern;
  parent?: TaskId;
  mask?: string;
  active: boolean;
}
