/**
 * @fileoverview Task import
 *
 * Reads JSON, CSV or legacy text into tasks and saves them through a
 * StorageBackend. Records that cannot be read or fail validation are
 * skipped and reported in the result; storage failures propagate.
 */

import { ValidationError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { StorageBackend } from '../storage/types.js';
import { taskSchema } from '../task/schema.js';
import type { Task } from '../task/types.js';
import { findTaskIssues } from '../task/validation.js';
import { parseCsv } from './csv.js';
import { parseLegacy } from './legacy.js';
import type { ImportOptions, ImportResult, ParsedImport, TaskFormat } from './types.js';

const logger = createLogger('io:import');

/**
 * @throws ValidationError when the content matches no format
 */
export function detectImportFormat(content: string): TaskFormat {
  const trimmed = content.trim();
  const firstLine = trimmed.split(/\r?\n/, 1)[0] ?? '';

  if (trimmed.startsWith('[') && firstLine.includes('description:')) return 'legacy';
  if (trimmed.startsWith('[')) return 'json';
  if (firstLine.includes(',')) return 'csv';
  throw new ValidationError('Cannot detect import format', { field: 'format' });
}

/**
 * A JSON array of tasks in the storage format, each validated on its own
 *
 * @throws ValidationError when the text is not a JSON array
 */
export function parseJsonImport(content: string): ParsedImport {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      field: 'content',
      cause: error instanceof Error ? error : undefined,
    });
  }
  if (!Array.isArray(raw)) {
    throw new ValidationError('JSON import must be an array of tasks', { field: 'content' });
  }

  const items: unknown[] = raw;
  const tasks: Task[] = [];
  const errors: string[] = [];
  items.forEach((item, index) => {
    const result = taskSchema.safeParse(item);
    if (result.success) {
      tasks.push(result.data);
    } else {
      const detail = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      errors.push(`Task ${index + 1}: ${detail}`);
    }
  });
  return { tasks, errors };
}

export function parseImport(content: string, format: TaskFormat): ParsedImport {
  switch (format) {
    case 'json':
      return parseJsonImport(content);
    case 'csv':
      return parseCsv(content);
    case 'legacy':
      return parseLegacy(content);
  }
}

/**
 * Import tasks into `backend`. Existing tasks are skipped unless
 * `updateExisting` is set.
 */
export async function importTasks(
  backend: StorageBackend,
  content: string,
  options: ImportOptions = {}
): Promise<ImportResult> {
  const format = options.format === undefined || options.format === 'auto'
    ? detectImportFormat(content)
    : options.format;
  const parsed = parseImport(content, format);

  const result: ImportResult = {
    format,
    imported: 0,
    updated: 0,
    skipped: parsed.errors.length,
    errors: [...parsed.errors],
    tasks: [],
  };

  for (const task of parsed.tasks) {
    const issues = findTaskIssues(task);
    if (issues.length > 0) {
      result.errors.push(`Task ${task.uuid}: ${issues.map((issue) => issue.message).join('; ')}`);
      result.skipped++;
      continue;
    }

    const existing = await backend.loadTask(task.uuid);
    if (existing && !options.updateExisting) {
      result.skipped++;
      continue;
    }

    await backend.saveTask(task);
    if (existing) {
      result.updated++;
    } else {
      result.imported++;
    }
    result.tasks.push(task);
  }

  logger.info('Tasks imported', {
    format,
    imported: result.imported,
    updated: result.updated,
    skipped: result.skipped,
  });
  return result;
}
