/**
 * @fileoverview In-process query evaluation
 *
 * Both storage backends load tasks and narrow them here: status, project,
 * tags, dates, then the active context, then sort, then offset/limit.
 */

import { QueryError } from '../errors/index.js';
import type { Priority, Task } from '../task/types.js';
import { parseProjectFromFilter } from './context.js';
import type {
  DateFilter,
  ProjectFilter,
  SortCriteria,
  TagFilter,
  TaskQuery,
  UserContext,
} from './types.js';

// =============================================================================
// Predicates
// =============================================================================

export function matchesProject(task: Task, filter: ProjectFilter): boolean {
  switch (filter.type) {
    case 'exact':
    case 'equals':
      return task.project === filter.project;
    case 'hierarchy':
      return task.project !== undefined
        && (task.project === filter.project || task.project.startsWith(`${filter.project}.`));
    case 'multiple':
      return task.project !== undefined && filter.projects.includes(task.project);
    case 'none':
      return task.project === undefined;
  }
}

export function matchesTags(task: Task, filter: TagFilter): boolean {
  if (filter.include.length > 0 && !filter.include.some((tag) => task.tags.includes(tag))) {
    return false;
  }
  return !filter.exclude.some((tag) => task.tags.includes(tag));
}

function parseBound(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new QueryError(`Invalid date bound "${value}"`, { bound: name });
  }
  return ms;
}

export function matchesDate(task: Task, filter: DateFilter): boolean {
  const text = task[filter.field];
  if (text === undefined) return false;
  const value = Date.parse(text);
  if (Number.isNaN(value)) return false;

  const before = parseBound(filter.before, 'before');
  const after = parseBound(filter.after, 'after');
  if (before !== undefined && !(value < before)) return false;
  if (after !== undefined && !(value > after)) return false;
  return true;
}

/**
 * Whether the context's read filter admits the task. A context whose filter
 * names no project admits everything.
 */
export function matchesContext(task: Task, context: UserContext): boolean {
  const project = parseProjectFromFilter(context.readFilter);
  return project === null || task.project === project;
}

// =============================================================================
// Sorting
// =============================================================================

const PRIORITY_RANK: Record<Priority, number> = { L: 1, M: 2, H: 3 };

function sortKey(task: Task, field: SortCriteria['field']): string | number | undefined {
  switch (field) {
    case 'priority':
      return task.priority ? PRIORITY_RANK[task.priority] : undefined;
    case 'entry':
    case 'modified':
    case 'due': {
      const text = task[field];
      return text === undefined ? undefined : Date.parse(text);
    }
    case 'project':
      return task.project;
    case 'description':
      return task.description;
  }
}

function compareKeys(left: string | number, right: string | number): number {
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stable sort; tasks missing the field go last in either direction
 */
export function sortTasks(tasks: readonly Task[], sort: SortCriteria): Task[] {
  const direction = sort.ascending ? 1 : -1;
  return [...tasks].sort((a, b) => {
    const left = sortKey(a, sort.field);
    const right = sortKey(b, sort.field);
    if (left === undefined || right === undefined) {
      if (left === right) return 0;
      return left === undefined ? 1 : -1;
    }
    return compareKeys(left, right) * direction;
  });
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Apply a query to loaded tasks. The active context narrows the result
 * unless the query ignores it.
 */
export function applyQuery(tasks: readonly Task[], query: TaskQuery, context?: UserContext | null): Task[] {
  if (query.limit !== undefined && (!Number.isInteger(query.limit) || query.limit < 0)) {
    throw new QueryError(`Invalid limit ${query.limit}`, { limit: query.limit });
  }
  if (query.offset !== undefined && (!Number.isInteger(query.offset) || query.offset < 0)) {
    throw new QueryError(`Invalid offset ${query.offset}`, { offset: query.offset });
  }

  const useContext = context && query.filterMode !== 'ignore_context' ? context : null;

  let result = tasks.filter((task) => {
    if (query.status && task.status !== query.status) return false;
    if (query.projectFilter && !matchesProject(task, query.projectFilter)) return false;
    if (query.tagFilter && !matchesTags(task, query.tagFilter)) return false;
    if (query.dateFilter && !matchesDate(task, query.dateFilter)) return false;
    if (useContext && !matchesContext(task, useContext)) return false;
    return true;
  });

  if (query.sort) {
    result = sortTasks(result, query.sort);
  }

  const start = query.offset ?? 0;
  const end = query.limit === undefined ? undefined : start + query.limit;
  return result.slice(start, end);
}
