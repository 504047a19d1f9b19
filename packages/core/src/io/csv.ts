/**
 * @fileoverview CSV task format
 *
 * One header row, then one task per row. Fields holding a comma, quote or
 * line break are quoted with doubled inner quotes. Tags are space-separated
 * and annotations are exported as their descriptions joined by "; ".
 */

import { ValidationError } from '../errors/index.js';
import type { Task } from '../task/types.js';
import { taskFromFields } from './record.js';
import type { ParsedImport } from './types.js';

export const CSV_COLUMNS = ['uuid', 'description', 'status', 'project', 'priority', 'due', 'entry', 'modified', 'end'] as const;

const NEEDS_QUOTES = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTES.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Split one CSV record into its fields
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (quoted) {
      if (ch !== '"') {
        current += ch;
      } else if (line.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

export function formatCsv(
  tasks: readonly Task[],
  options: { includeTags: boolean; includeAnnotations: boolean }
): string {
  const header: string[] = [...CSV_COLUMNS];
  if (options.includeTags) header.push('tags');
  if (options.includeAnnotations) header.push('annotations');

  const rows = tasks.map((task) => {
    const values = [
      task.uuid,
      task.description,
      task.status,
      task.project ?? '',
      task.priority ?? '',
      task.due ?? '',
      task.entry,
      task.modified ?? '',
      task.end ?? '',
    ];
    if (options.includeTags) values.push(task.tags.join(' '));
    if (options.includeAnnotations) values.push(task.annotations.map((a) => a.description).join('; '));
    return values.map(escapeCsvField).join(',');
  });

  return [header.join(','), ...rows].map((line) => `${line}\n`).join('');
}

/**
 * Read CSV text with a header row. Column names are matched case-insensitively;
 * `id` is accepted for `uuid`. Rows that cannot be read are reported by line
 * number and skipped.
 */
export function parseCsv(content: string): ParsedImport {
  const lines = content.split(/\r?\n/);
  const headerLine = lines[0] ?? '';
  if (headerLine.trim().length === 0) {
    return { tasks: [], errors: [] };
  }
  const header = splitCsvLine(headerLine).map((name) => name.trim().toLowerCase());

  const tasks: Task[] = [];
  const errors: string[] = [];
  lines.slice(1).forEach((line, index) => {
    if (line.trim().length === 0) return;
    const lineNumber = index + 2;
    const values = splitCsvLine(line);
    if (values.length !== header.length) {
      errors.push(`Line ${lineNumber}: expected ${header.length} fields, found ${values.length}`);
      return;
    }

    const fields = new Map<string, string>();
    header.forEach((name, column) => fields.set(name, values[column] ?? ''));
    try {
      tasks.push(taskFromFields(fields));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      errors.push(`Line ${lineNumber}: ${error.message}`);
    }
  });

  return { tasks, errors };
}
