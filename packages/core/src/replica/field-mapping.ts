/**
 * @fileoverview Mapping between operations, replica primitives and tasks
 *
 * mapOperations() translates a whole batch into replica primitives before
 * anything is written, so a batch that cannot be mapped leaves the store
 * untouched. parseTaskData() rebuilds a Task from a stored field map.
 */

import { z } from 'zod';
import { StorageError } from '../errors/index.js';
import type { JsonValue, Operation } from '../operations/types.js';
import { annotationSchema, recurrenceSchema, udaValueSchema } from '../task/schema.js';
import { formatRecurrence, parseRecurrence } from '../task/task.js';
import {
  TaskId,
  isPriority,
  isTaskId,
  isTaskStatus,
  type Task,
  type UdaValue,
} from '../task/types.js';
import {
  ANNOTATION_PREFIX,
  DEPENDENCY_MARKER,
  DEPENDENCY_PREFIX,
  RECOGNIZED_FIELDS,
  TAG_PREFIX,
  TIMESTAMP_FIELDS,
  annotationKey,
  decodeAnnotations,
  decodeList,
  decodeUda,
  encodeAnnotations,
  encodeList,
  encodeUda,
  isReservedField,
  normalizeTimestamp,
  type TaskData,
} from './fields.js';
import { ReplicaTaskSnapshot, fallbackAnnotationEntries } from './snapshot.js';
import type { ReplicaPrimitive, TaskDataSource } from './store.js';

// =============================================================================
// Errors
// =============================================================================

function mappingError(message: string, context: Record<string, unknown> = {}): StorageError {
  return new StorageError(message, {
    kind: 'serialization',
    operation: 'commit',
    code: 'REPLICA_MAPPING_ERROR',
    context,
  });
}

const WHITESPACE = /\s/;

function checkTag(tag: string, uuid: TaskId): void {
  if (tag.length === 0 || WHITESPACE.test(tag)) {
    throw mappingError(`Invalid tag "${tag}"`, { taskId: uuid });
  }
}

function checkTaskId(value: string, uuid: TaskId): TaskId {
  if (!isTaskId(value)) {
    throw mappingError(`Invalid task UUID "${value}"`, { taskId: uuid });
  }
  return TaskId(value);
}

// =============================================================================
// Value encoding
// =============================================================================

const stringListSchema = z.array(z.string());
const annotationListSchema = z.array(annotationSchema);
const udaMapSchema = z.record(udaValueSchema);

/**
 * Encode a scalar JSON value as field text; null means "unset".
 */
function encodeScalar(key: string, value: JsonValue, uuid: TaskId): string | null {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw mappingError(`Non-finite number for field "${key}"`, { taskId: uuid, key });
    return String(value);
  }
  if (typeof value === 'boolean') return String(value);
  throw mappingError(`Unsupported value for field "${key}"`, { taskId: uuid, key });
}

/**
 * Field writes for one entry of a create payload
 */
function encodeCreateField(key: string, value: JsonValue, uuid: TaskId): Array<[string, string]> {
  if (key === 'uuid' || value === null) return [];

  switch (key) {
    case 'tags': {
      const tags = parseOrThrow(stringListSchema, value, key, uuid);
      tags.forEach((tag) => checkTag(tag, uuid));
      return tags.length > 0 ? [[key, encodeList([...new Set(tags)])]] : [];
    }
    case 'depends': {
      const depends = parseOrThrow(stringListSchema, value, key, uuid).map((d) => checkTaskId(d, uuid));
      return depends.length > 0 ? [[key, encodeList([...new Set(depends)])]] : [];
    }
    case 'annotations': {
      const annotations = parseOrThrow(annotationListSchema, value, key, uuid);
      return annotations.length > 0 ? [[key, encodeAnnotations(annotations)]] : [];
    }
    case 'recur':
      return [[key, formatRecurrence(parseOrThrow(recurrenceSchema, value, key, uuid))]];
    case 'udas':
      return Object.entries(parseOrThrow(udaMapSchema, value, key, uuid)).map(([name, uda]): [string, string] => {
        if (isReservedField(name)) {
          throw mappingError(`"${name}" cannot be used as an attribute name`, { taskId: uuid });
        }
        return [name, encodeUda(uda)];
      });
    default: {
      const text = encodeScalar(key, value, uuid);
      return text === null ? [] : [[key, text]];
    }
  }
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: JsonValue, key: string, uuid: TaskId): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw mappingError(`Unsupported value for field "${key}"`, {
      taskId: uuid,
      key,
      issues: result.error.errors.map((issue) => issue.message),
    });
  }
  return result.data;
}

// =============================================================================
// Operation mapping
// =============================================================================

/**
 * Per-batch view of the tasks a batch touches.
 *
 * A task that exists in the committed store gets a snapshot, loaded on first
 * touch and mutated as the batch proceeds; its tag, dependency and
 * annotation operations go through the snapshot helpers. A task with no
 * committed state (for example one created earlier in the same batch) has
 * no snapshot, and those operations fall back to raw tag_/dep_/annotation_
 * keys.
 */
class BatchMapper {
  private readonly snapshots = new Map<TaskId, ReplicaTaskSnapshot | null>();
  readonly primitives: ReplicaPrimitive[] = [];

  constructor(private readonly source: TaskDataSource) {}

  snapshot(uuid: TaskId): ReplicaTaskSnapshot | null {
    if (!this.snapshots.has(uuid)) {
      const data = this.source.getTaskData(uuid);
      this.snapshots.set(uuid, data ? new ReplicaTaskSnapshot(uuid, { ...data }, this.primitives) : null);
    }
    return this.snapshots.get(uuid) ?? null;
  }

  write(uuid: TaskId, key: string, value: string | null): void {
    const snapshot = this.snapshot(uuid);
    if (snapshot) {
      snapshot.setField(key, value);
    } else {
      this.primitives.push({ kind: 'update', uuid, property: key, value });
    }
  }

  apply(op: Operation): void {
    if (op.type === 'undo_point') {
      this.primitives.push({ kind: 'undo_point' });
      return;
    }

    const uuid = checkTaskId(op.uuid, op.uuid);
    const snapshot = this.snapshot(uuid);

    switch (op.type) {
      case 'create':
        this.primitives.push({ kind: 'create', uuid });
        for (const [key, value] of Object.entries(op.data)) {
          for (const [field, text] of encodeCreateField(key, value, uuid)) {
            this.write(uuid, field, text);
          }
        }
        break;

      case 'update':
        this.write(uuid, op.key, encodeScalar(op.key, op.newValue, uuid));
        break;

      case 'set_field':
        this.write(uuid, op.key, op.value);
        break;

      case 'unset_field':
        this.write(uuid, op.key, null);
        break;

      case 'add_tag':
        checkTag(op.tag, uuid);
        if (snapshot) snapshot.addTag(op.tag);
        else this.write(uuid, `${TAG_PREFIX}${op.tag}`, '');
        break;

      case 'remove_tag':
        checkTag(op.tag, uuid);
        if (snapshot) snapshot.removeTag(op.tag);
        else this.write(uuid, `${TAG_PREFIX}${op.tag}`, null);
        break;

      case 'add_dependency': {
        const dependsOn = checkTaskId(op.dependsOn, uuid);
        if (snapshot) {
          snapshot.addDependency(dependsOn);
        } else {
          if (dependsOn === uuid) {
            throw mappingError(`Task ${uuid} cannot depend on itself`, { taskId: uuid });
          }
          this.write(uuid, `${DEPENDENCY_PREFIX}${dependsOn}`, DEPENDENCY_MARKER);
        }
        break;
      }

      case 'remove_dependency': {
        const dependsOn = checkTaskId(op.dependsOn, uuid);
        if (snapshot) snapshot.removeDependency(dependsOn);
        else this.write(uuid, `${DEPENDENCY_PREFIX}${dependsOn}`, null);
        break;
      }

      case 'add_annotation': {
        const entry = normalizeTimestamp(op.entry);
        if (entry === null) {
          throw mappingError(`Invalid annotation timestamp "${op.entry}"`, { taskId: uuid });
        }
        if (op.description.includes('\n')) {
          throw mappingError('Annotation description must be a single line', { taskId: uuid });
        }
        if (snapshot) snapshot.addAnnotation({ entry, description: op.description });
        else this.write(uuid, annotationKey(entry), op.description);
        break;
      }

      case 'delete':
        this.write(uuid, 'status', 'deleted');
        break;
    }
  }
}

/**
 * Translate a batch into replica primitives.
 *
 * @throws StorageError (code REPLICA_MAPPING_ERROR) if any operation in the
 *   batch cannot be represented; nothing has been written at that point
 */
export function mapOperations(source: TaskDataSource, ops: readonly Operation[]): ReplicaPrimitive[] {
  const mapper = new BatchMapper(source);
  for (const op of ops) {
    mapper.apply(op);
  }
  return mapper.primitives;
}

// =============================================================================
// Task reconstruction
// =============================================================================

function fallbackSuffixes(data: TaskData, prefix: string): string[] {
  return Object.keys(data)
    .filter((key) => key.startsWith(prefix))
    .sort()
    .map((key) => key.slice(prefix.length));
}

function isUdaKey(key: string): boolean {
  return !RECOGNIZED_FIELDS.has(key)
    && !key.startsWith(TAG_PREFIX)
    && !key.startsWith(DEPENDENCY_PREFIX)
    && !key.startsWith(ANNOTATION_PREFIX);
}

/**
 * Rebuild a Task from a replica field map. Unknown status text reads as
 * pending; unparsable timestamps are dropped; every unrecognized key becomes
 * a user-defined attribute.
 */
export function parseTaskData(uuid: TaskId, data: TaskData): Task {
  const timestamps: Partial<Record<typeof TIMESTAMP_FIELDS[number], string>> = {};
  for (const field of TIMESTAMP_FIELDS) {
    const text = data[field];
    const value = text === undefined ? null : normalizeTimestamp(text);
    if (value !== null) timestamps[field] = value;
  }

  const udas: Record<string, UdaValue> = {};
  for (const [key, text] of Object.entries(data)) {
    // Defined rather than assigned, so a key such as __proto__ stays data.
    if (isUdaKey(key)) {
      Object.defineProperty(udas, key, { value: decodeUda(text), enumerable: true, writable: true, configurable: true });
    }
  }

  const status = data.status;
  const task: Task = {
    uuid,
    description: data.description ?? '',
    status: status !== undefined && isTaskStatus(status) ? status : 'pending',
    entry: timestamps.entry ?? timestamps.modified ?? new Date(0).toISOString(),
    tags: [...new Set([...decodeList(data.tags), ...fallbackSuffixes(data, TAG_PREFIX)])],
    annotations: [...decodeAnnotations(data.annotations), ...fallbackAnnotationEntries(data)],
    depends: [...new Set([...decodeList(data.depends), ...fallbackSuffixes(data, DEPENDENCY_PREFIX)])]
      .filter(isTaskId),
    udas,
    active: data.active === 'true',
  };

  for (const field of TIMESTAMP_FIELDS) {
    const value = timestamps[field];
    if (field !== 'entry' && value !== undefined) task[field] = value;
  }

  const priority = data.priority;
  if (priority !== undefined && isPriority(priority)) task.priority = priority;
  if (data.project) task.project = data.project;
  if (data.recur) task.recur = parseRecurrence(data.recur);
  const parent = data.parent;
  if (parent !== undefined && isTaskId(parent)) task.parent = parent;
  if (data.mask !== undefined) task.mask = data.mask;

  return task;
}
