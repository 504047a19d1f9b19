/**
 * @fileoverview Task construction from flat text fields
 *
 * Shared by the CSV and legacy readers. Unknown fields are ignored; a
 * missing or malformed uuid gets a fresh one.
 */

import { ValidationError } from '../errors/index.js';
import { normalizeTimestamp } from '../replica/fields.js';
import { createTask, normalizeTags } from '../task/task.js';
import {
  TaskId,
  generateTaskId,
  isPriority,
  isTaskId,
  isTaskStatus,
  type Annotation,
  type Priority,
  type Task,
} from '../task/types.js';

const DATE_FIELDS = ['entry', 'modified', 'due', 'end'] as const;

const PRIORITY_WORDS: Record<string, Priority> = { high: 'H', medium: 'M', low: 'L' };

const COMPACT_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;
const EPOCH_SECONDS = /^\d+$/;

/**
 * Epoch seconds, compact UTC (20260101T120000Z) or ISO-8601, as an ISO string
 */
export function parseImportTimestamp(text: string): string | null {
  if (EPOCH_SECONDS.test(text)) {
    return new Date(Number(text) * 1000).toISOString();
  }
  const compact = COMPACT_TIMESTAMP.exec(text);
  if (compact) {
    const [, year, month, day, hour, minute, second] = compact;
    return normalizeTimestamp(`${year}-${month}-${day}T${hour}:${minute}:${second}Z`);
  }
  return normalizeTimestamp(text);
}

function parsePriority(text: string): Priority | undefined {
  const upper = text.toUpperCase();
  if (isPriority(upper)) return upper;
  return PRIORITY_WORDS[text.toLowerCase()];
}

/**
 * @throws ValidationError when the description is empty or a date is unreadable
 */
export function taskFromFields(fields: ReadonlyMap<string, string>, annotations: Annotation[] = []): Task {
  const description = (fields.get('description') ?? '').trim();
  if (description.length === 0) {
    throw new ValidationError('description must not be empty', { field: 'description' });
  }

  const rawId = (fields.get('uuid') ?? fields.get('id') ?? '').trim().toLowerCase();
  const status = (fields.get('status') ?? '').trim().toLowerCase();
  const overrides: Partial<Omit<Task, 'description'>> = {
    uuid: isTaskId(rawId) ? TaskId(rawId) : generateTaskId(),
    status: isTaskStatus(status) ? status : 'pending',
    annotations,
  };

  for (const field of DATE_FIELDS) {
    const text = fields.get(field)?.trim();
    if (!text) continue;
    const value = parseImportTimestamp(text);
    if (value === null) {
      throw new ValidationError(`invalid ${field} date "${text}"`, { field });
    }
    overrides[field] = value;
  }

  const project = fields.get('project')?.trim();
  if (project) overrides.project = project;

  const priority = parsePriority(fields.get('priority')?.trim() ?? '');
  if (priority) overrides.priority = priority;

  const tags = (fields.get('tags') ?? '').split(/[\s,]+/).filter((tag) => tag.length > 0);
  if (tags.length > 0) overrides.tags = normalizeTags(tags);

  return createTask(description, overrides);
}
