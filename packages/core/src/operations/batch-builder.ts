/**
 * @fileoverview Operation Batch Builder
 *
 * Pure functions that turn a task-state transition into the smallest batch of
 * operations describing it. Callers never see the replica's primitive shapes.
 */

import { createLogger } from '../logging/index.js';
import { formatRecurrence } from '../task/task.js';
import type { Task, TaskId } from '../task/types.js';
import { encodeUda } from '../replica/fields.js';
import { UNDO_POINT, type JsonObject, type JsonValue, type Operation } from './types.js';

const logger = createLogger('operations:batch');

/** Optional text fields diffed with set_field / unset_field */
const TEXT_FIELDS = ['due', 'scheduled', 'wait', 'end', 'start', 'modified', 'priority', 'parent', 'mask'] as const;

// =============================================================================
// Create
// =============================================================================

function jsonNumber(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new TypeError(`${field} is not a finite number`);
  }
  return value;
}

/**
 * Serialize a task into the JSON object carried by a create operation
 */
export function taskToData(task: Task): JsonObject {
  const data: JsonObject = {
    uuid: task.uuid,
    description: task.description,
    status: task.status,
    entry: task.entry,
    tags: [...task.tags],
    depends: [...task.depends],
    annotations: task.annotations.map((a) => ({ entry: a.entry, description: a.description })),
    active: task.active,
  };

  for (const field of TEXT_FIELDS) {
    const value = task[field];
    if (value !== undefined) data[field] = value;
  }
  if (task.project !== undefined) data.project = task.project;
  if (task.recur) data.recur = { pattern: task.recur.pattern, periodic: task.recur.periodic };

  const udas: JsonObject = {};
  for (const [name, uda] of Object.entries(task.udas)) {
    udas[name] = uda.type === 'number'
      ? { type: uda.type, value: jsonNumber(uda.value, `uda ${name}`) }
      : { type: uda.type, value: uda.value };
  }
  data.udas = udas;

  return data;
}

/**
 * Build a create operation carrying the full task.
 *
 * If the task cannot be serialized the payload is empty; an empty create is
 * a caller bug to report, so it is logged rather than thrown.
 */
export function createFromTask(task: Task): Operation {
  try {
    return { type: 'create', uuid: task.uuid, data: taskToData(task) };
  } catch (error) {
    logger.error('Failed to serialize task for create', {
      taskId: task.uuid,
      err: error instanceof Error ? error : new Error(String(error)),
    });
    return { type: 'create', uuid: task.uuid, data: {} };
  }
}

// =============================================================================
// Update
// =============================================================================

function optional(value: string | undefined): JsonValue {
  return value ?? null;
}

function setDifference<T>(left: readonly T[], right: readonly T[]): T[] {
  const exclude = new Set(right);
  return [...new Set(left)].filter((value) => !exclude.has(value));
}

/**
 * Field-by-field diff of two versions of the same task.
 *
 * description, project and status produce generic updates. Tags and
 * dependencies produce add/remove operations for the symmetric difference.
 * Annotations are append-only: only new (entry, description) pairs appear.
 * Remaining fields and UDAs are written with set_field / unset_field.
 */
export function computeUpdateOps(oldTask: Task, newTask: Task): Operation[] {
  const uuid: TaskId = newTask.uuid;
  const ops: Operation[] = [];

  if (oldTask.description !== newTask.description) {
    ops.push({ type: 'update', uuid, key: 'description', oldValue: oldTask.description, newValue: newTask.description });
  }
  if (oldTask.project !== newTask.project) {
    ops.push({
      type: 'update',
      uuid,
      key: 'project',
      oldValue: optional(oldTask.project),
      newValue: optional(newTask.project),
    });
  }
  if (oldTask.status !== newTask.status) {
    ops.push({ type: 'update', uuid, key: 'status', oldValue: oldTask.status, newValue: newTask.status });
  }

  for (const tag of setDifference(newTask.tags, oldTask.tags)) {
    ops.push({ type: 'add_tag', uuid, tag });
  }
  for (const tag of setDifference(oldTask.tags, newTask.tags)) {
    ops.push({ type: 'remove_tag', uuid, tag });
  }

  for (const dependsOn of setDifference(newTask.depends, oldTask.depends)) {
    ops.push({ type: 'add_dependency', uuid, dependsOn });
  }
  for (const dependsOn of setDifference(oldTask.depends, newTask.depends)) {
    ops.push({ type: 'remove_dependency', uuid, dependsOn });
  }

  for (const annotation of newTask.annotations) {
    const known = oldTask.annotations.some(
      (a) => a.entry === annotation.entry && a.description === annotation.description
    );
    if (!known) {
      ops.push({ type: 'add_annotation', uuid, entry: annotation.entry, description: annotation.description });
    }
  }

  const textFields = TEXT_FIELDS.map(
    (field): [string, string | undefined, string | undefined] => [field, oldTask[field], newTask[field]]
  );
  textFields.push([
    'recur',
    oldTask.recur && formatRecurrence(oldTask.recur),
    newTask.recur && formatRecurrence(newTask.recur),
  ]);
  for (const [key, before, after] of textFields) {
    if (before === after) continue;
    ops.push(after === undefined
      ? { type: 'unset_field', uuid, key }
      : { type: 'set_field', uuid, key, value: after });
  }

  if (oldTask.active !== newTask.active) {
    ops.push({ type: 'set_field', uuid, key: 'active', value: String(newTask.active) });
  }

  for (const [name, uda] of Object.entries(newTask.udas)) {
    const before = oldTask.udas[name];
    const value = encodeUda(uda);
    if (before === undefined || encodeUda(before) !== value) {
      ops.push({ type: 'set_field', uuid, key: name, value });
    }
  }
  for (const name of Object.keys(oldTask.udas)) {
    if (!(name in newTask.udas)) {
      ops.push({ type: 'unset_field', uuid, key: name });
    }
  }

  return ops;
}

// =============================================================================
// Batches
// =============================================================================

/**
 * Batch that saves `task`: a create when nothing exists yet, otherwise the
 * diff against `existing`. Always opens with an undo point, so an unchanged
 * task yields just [undo_point].
 */
export function buildSaveBatch(existing: Task | null, task: Task): Operation[] {
  if (existing === null) {
    return [UNDO_POINT, createFromTask(task)];
  }
  return [UNDO_POINT, ...computeUpdateOps(existing, task)];
}

export function buildDeleteBatch(uuid: TaskId): Operation[] {
  return [UNDO_POINT, { type: 'delete', uuid }];
}
