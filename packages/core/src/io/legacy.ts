/**
 * @fileoverview Legacy line format
 *
 * One task per line as `[key:"value" key:"value" +tag]`. Dates are epoch
 * seconds, tags may also come as `tags:"a,b"`, and each annotation is an
 * `annotation_<epoch seconds>` key. Inside quotes, `\"` and `\\` escape.
 */

import { ValidationError } from '../errors/index.js';
import { ANNOTATION_PREFIX } from '../replica/fields.js';
import type { Annotation, Task } from '../task/types.js';
import { parseImportTimestamp, taskFromFields } from './record.js';
import type { ParsedImport } from './types.js';

const TOKEN = /([A-Za-z_][\w.-]*):"((?:[^"\\]|\\.)*)"|([A-Za-z_][\w.-]*):(\S+)|\+(\S+)/g;

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function unquote(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

function epochSeconds(iso: string): string {
  return String(Math.floor(Date.parse(iso) / 1000));
}

export function formatLegacyLine(
  task: Task,
  options: { includeTags: boolean; includeAnnotations: boolean }
): string {
  const parts = [
    `description:${quote(task.description)}`,
    `entry:"${epochSeconds(task.entry)}"`,
    `status:"${task.status}"`,
    `uuid:"${task.uuid}"`,
  ];
  if (task.project) parts.push(`project:${quote(task.project)}`);
  if (task.priority) parts.push(`priority:"${task.priority}"`);
  if (task.due) parts.push(`due:"${epochSeconds(task.due)}"`);
  if (task.modified) parts.push(`modified:"${epochSeconds(task.modified)}"`);
  if (task.end) parts.push(`end:"${epochSeconds(task.end)}"`);
  if (options.includeTags && task.tags.length > 0) parts.push(`tags:${quote(task.tags.join(','))}`);
  if (options.includeAnnotations) {
    for (const annotation of task.annotations) {
      parts.push(`${ANNOTATION_PREFIX}${epochSeconds(annotation.entry)}:${quote(annotation.description)}`);
    }
  }
  return `[${parts.join(' ')}]`;
}

/**
 * @throws ValidationError when the line is not bracketed or names no description
 */
export function parseLegacyLine(line: string): Task {
  const trimmed = line.trim();
  if (!trimmed.startsWith('[') || !trimmed.endsWith(']')) {
    throw new ValidationError('line must be enclosed in brackets');
  }

  const fields = new Map<string, string>();
  const tags: string[] = [];
  const annotations: Annotation[] = [];

  for (const match of trimmed.slice(1, -1).matchAll(TOKEN)) {
    const [, quotedKey, quotedValue, bareKey, bareValue, tag] = match;
    if (tag !== undefined) {
      tags.push(tag);
      continue;
    }
    const key = quotedKey ?? bareKey ?? '';
    const value = quotedValue !== undefined ? unquote(quotedValue) : bareValue ?? '';

    if (key === 'tags') {
      tags.push(...value.split(','));
    } else if (key.startsWith(ANNOTATION_PREFIX)) {
      const entry = parseImportTimestamp(key.slice(ANNOTATION_PREFIX.length));
      if (entry === null) {
        throw new ValidationError(`invalid annotation key "${key}"`, { field: 'annotations' });
      }
      annotations.push({ entry, description: value });
    } else {
      fields.set(key, value);
    }
  }

  if (tags.length > 0) fields.set('tags', tags.join(' '));
  return taskFromFields(fields, annotations);
}

export function parseLegacy(content: string): ParsedImport {
  const tasks: Task[] = [];
  const errors: string[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length === 0) return;
    try {
      tasks.push(parseLegacyLine(line));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      errors.push(`Line ${index + 1}: ${error.message}`);
    }
  });
  return { tasks, errors };
}
