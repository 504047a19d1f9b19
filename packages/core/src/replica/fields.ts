/**
 * @fileoverview Replica field-key conventions
 *
 * The replica stores each task as a flat map of string keys to string values.
 * Structured task fields are encoded into that map as follows:
 *
 *   tags         space-joined tag names
 *   depends      space-joined UUIDs
 *   annotations  newline-joined "<entry> <description>" lines
 *   recur        pattern, with a leading "P" when periodic
 *   active       "true" | "false"
 *
 * When a tag, dependency or annotation is written without a task snapshot,
 * it lands under a fallback key instead: tag_<name>, dep_<uuid> or
 * annotation_<unix seconds>. Readers fold both forms together.
 */

import type { Annotation, UdaValue } from '../task/types.js';

/** Field map as stored by the replica */
export type TaskData = Record<string, string>;

export const SCALAR_FIELDS = [
  'description',
  'status',
  'entry',
  'modified',
  'due',
  'scheduled',
  'wait',
  'end',
  'start',
  'priority',
  'project',
  'recur',
  'parent',
  'mask',
  'active',
] as const;

export const TIMESTAMP_FIELDS = ['entry', 'modified', 'due', 'scheduled', 'wait', 'end', 'start'] as const;

export type TimestampField = typeof TIMESTAMP_FIELDS[number];

export const RECOGNIZED_FIELDS: ReadonlySet<string> = new Set<string>([
  ...SCALAR_FIELDS,
  'tags',
  'depends',
  'annotations',
]);

export const TAG_PREFIX = 'tag_';
export const DEPENDENCY_PREFIX = 'dep_';
export const ANNOTATION_PREFIX = 'annotation_';

/** Value written under a dep_<uuid> fallback key */
export const DEPENDENCY_MARKER = 'x';

/**
 * Whether a key is reserved by the replica and unusable as a UDA name
 */
export function isReservedField(key: string): boolean {
  return RECOGNIZED_FIELDS.has(key)
    || key === 'uuid'
    || key.startsWith(TAG_PREFIX)
    || key.startsWith(DEPENDENCY_PREFIX)
    || key.startsWith(ANNOTATION_PREFIX);
}

// =============================================================================
// Encoders
// =============================================================================

export function encodeList(values: readonly string[]): string {
  return values.join(' ');
}

export function decodeList(text: string | undefined): string[] {
  if (!text) return [];
  return text.split(/\s+/).filter((value) => value.length > 0);
}

export function encodeAnnotations(annotations: readonly Annotation[]): string {
  return annotations.map((a) => `${a.entry} ${a.description}`).join('\n');
}

/**
 * Parse "<entry> <description>" lines. Lines without a valid leading
 * timestamp are skipped.
 */
export function decodeAnnotations(text: string | undefined): Annotation[] {
  if (!text) return [];
  const annotations: Annotation[] = [];
  for (const line of text.split('\n')) {
    const space = line.indexOf(' ');
    if (space <= 0) continue;
    const entry = normalizeTimestamp(line.slice(0, space));
    if (entry === null) continue;
    annotations.push({ entry, description: line.slice(space + 1) });
  }
  return annotations;
}

export function encodeUda(value: UdaValue): string {
  switch (value.type) {
    case 'string': return value.value;
    case 'number': return String(value.value);
    case 'date': return value.value;
  }
}

const NUMERIC = /^-?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Infer a UDA type from stored text: numeric, then date/time, else string
 */
export function decodeUda(text: string): UdaValue {
  if (NUMERIC.test(text)) {
    const value = Number(text);
    if (Number.isFinite(value)) {
      return { type: 'number', value };
    }
  }
  const date = normalizeTimestamp(text);
  if (date !== null) {
    return { type: 'date', value: date };
  }
  return { type: 'string', value: text };
}

/**
 * Canonicalize an ISO-8601 date/time to UTC with milliseconds, or null
 */
export function normalizeTimestamp(text: string): string | null {
  if (!ISO_DATETIME.test(text)) return null;
  const ms = Date.parse(text);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

/**
 * Fallback annotation key, one per second of entry time
 */
export function annotationKey(entry: string): string {
  const ms = Date.parse(entry);
  const seconds = Number.isNaN(ms) ? 0 : Math.floor(ms / 1000);
  return `${ANNOTATION_PREFIX}${seconds}`;
}
