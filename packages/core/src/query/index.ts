/**
 * @fileoverview Query exports
 */

export type {
  TaskQuery,
  ProjectFilter,
  TagFilter,
  DateFilter,
  DateFilterField,
  SortCriteria,
  SortField,
  FilterMode,
  UserContext,
} from './types.js';
export {
  applyQuery,
  sortTasks,
  matchesProject,
  matchesTags,
  matchesDate,
  matchesContext,
} from './filter.js';
export { parseProjectFromFilter, discoverContexts, getActiveContext } from './context.js';
