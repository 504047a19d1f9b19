/**
 * @fileoverview Import and export types
 */

import type { Task } from '../task/types.js';

/**
 * `legacy` is the bracketed one-task-per-line format:
 * `[description:"Buy milk" status:"pending" entry:"1767225600" +errand]`
 */
export type TaskFormat = 'json' | 'csv' | 'legacy';

export interface ExportOptions {
  /** Defaults to json */
  format?: TaskFormat;
  /** Include completed and deleted tasks (default true) */
  includeCompleted?: boolean;
  includeTags?: boolean;
  includeAnnotations?: boolean;
}

export interface ImportOptions {
  /** 'auto' (the default) detects the format from the content */
  format?: TaskFormat | 'auto';
  /** Overwrite tasks that already exist; otherwise they are skipped */
  updateExisting?: boolean;
}

/**
 * Tasks read from import text, plus one message per record that could not
 * be read
 */
export interface ParsedImport {
  tasks: Task[];
  errors: string[];
}

export interface ImportResult {
  format: TaskFormat;
  /** Saved as new tasks */
  imported: number;
  /** Saved over existing tasks */
  updated: number;
  skipped: number;
  errors: string[];
  /** Every task that was saved */
  tasks: Task[];
}
