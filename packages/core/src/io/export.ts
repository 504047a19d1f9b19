/**
 * @fileoverview Task export
 */

import { createLogger } from '../logging/index.js';
import type { StorageBackend } from '../storage/types.js';
import { serializeTasks } from '../task/schema.js';
import type { Task } from '../task/types.js';
import { formatCsv } from './csv.js';
import { formatLegacyLine } from './legacy.js';
import type { ExportOptions } from './types.js';

const logger = createLogger('io:export');

function formatJson(tasks: readonly Task[], includeTags: boolean, includeAnnotations: boolean): string {
  if (includeTags && includeAnnotations) {
    return serializeTasks(tasks);
  }
  const records = tasks.map(({ tags, annotations, ...rest }) => ({
    ...rest,
    ...(includeTags ? { tags } : {}),
    ...(includeAnnotations ? { annotations } : {}),
  }));
  return JSON.stringify(records, null, 2);
}

/**
 * Render tasks in one of the export formats
 */
export function formatTasks(tasks: readonly Task[], options: ExportOptions = {}): string {
  const { format = 'json', includeCompleted = true, includeTags = true, includeAnnotations = true } = options;
  const selected = includeCompleted
    ? tasks
    : tasks.filter((task) => task.status !== 'completed' && task.status !== 'deleted');

  switch (format) {
    case 'json':
      return formatJson(selected, includeTags, includeAnnotations);
    case 'csv':
      return formatCsv(selected, { includeTags, includeAnnotations });
    case 'legacy':
      return selected.map((task) => `${formatLegacyLine(task, { includeTags, includeAnnotations })}\n`).join('');
  }
}

/**
 * Export every task in the backend
 */
export async function exportTasks(backend: StorageBackend, options: ExportOptions = {}): Promise<string> {
  const tasks = await backend.loadAllTasks();
  const content = formatTasks(tasks, options);
  logger.info('Tasks exported', { format: options.format ?? 'json', tasks: tasks.length });
  return content;
}
