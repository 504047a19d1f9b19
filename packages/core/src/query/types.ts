/**
 * @fileoverview Query types
 */

import type { TaskStatus } from '../task/types.js';

// =============================================================================
// Filters
// =============================================================================

export type ProjectFilter =
  | { type: 'exact'; project: string }
  /** Same as exact */
  | { type: 'equals'; project: string }
  /** The project and its sub-projects (`project.` prefix) */
  | { type: 'hierarchy'; project: string }
  | { type: 'multiple'; projects: string[] }
  /** Tasks with no project */
  | { type: 'none' };

/**
 * A task passes when it has any of `include` (if non-empty) and none of
 * `exclude`.
 */
export interface TagFilter {
  include: string[];
  exclude: string[];
}

export type DateFilterField = 'due' | 'scheduled' | 'modified' | 'entry';

/** Bounds are exclusive ISO-8601 timestamps; a task without the field fails */
export interface DateFilter {
  field: DateFilterField;
  before?: string;
  after?: string;
}

export type SortField = 'entry' | 'modified' | 'due' | 'priority' | 'project' | 'description';

export interface SortCriteria {
  field: SortField;
  ascending: boolean;
}

/**
 * Whether a query is narrowed by the active context
 */
export type FilterMode = 'respect_context' | 'ignore_context';

export interface TaskQuery {
  status?: TaskStatus;
  projectFilter?: ProjectFilter;
  tagFilter?: TagFilter;
  dateFilter?: DateFilter;
  sort?: SortCriteria;
  limit?: number;
  offset?: number;
  filterMode?: FilterMode;
}

// =============================================================================
// Contexts
// =============================================================================

export interface UserContext {
  name: string;
  /** Filter expression narrowing reads, e.g. "project:Work" */
  readFilter: string;
  /** Filter expression applied to new tasks */
  writeFilter?: string;
  active: boolean;
}
