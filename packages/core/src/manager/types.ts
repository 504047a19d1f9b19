/**
 * @fileoverview Task manager input types
 */

import type { TaskHookEngine } from '../hooks/engine.js';
import type { FilterMode, UserContext } from '../query/types.js';
import type { Priority, RecurrencePattern, TaskId, TaskStatus, UdaValue } from '../task/types.js';
import type { TaskValidationIssue } from '../task/validation.js';

export interface AddTaskOptions {
  project?: string;
  tags?: string[];
  priority?: Priority;
  due?: string;
  scheduled?: string;
  wait?: string;
  recur?: RecurrencePattern;
  depends?: TaskId[];
  /** Annotation descriptions, stamped with the creation time */
  annotations?: string[];
  udas?: Record<string, UdaValue>;
  /** 'ignore_context' leaves the project alone */
  filterMode?: FilterMode;
}

/**
 * Changes to an existing task. null clears an optional field.
 */
export interface TaskUpdate {
  description?: string;
  status?: TaskStatus;
  project?: string | null;
  priority?: Priority | null;
  due?: string | null;
  scheduled?: string | null;
  wait?: string | null;
  recur?: RecurrencePattern | null;
  addTags?: string[];
  removeTags?: string[];
  addAnnotations?: string[];
  addDepends?: TaskId[];
  removeDepends?: TaskId[];
  /** null removes the attribute */
  udas?: Record<string, UdaValue | null>;
}

export interface TaskManagerOptions {
  hooks?: TaskHookEngine;
  activeContext?: UserContext | null;
}

/**
 * Result of checking every stored task
 */
export interface ValidationReport {
  total: number;
  valid: number;
  invalid: Array<{ uuid: TaskId; issues: TaskValidationIssue[] }>;
}
