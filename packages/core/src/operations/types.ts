/**
 * @fileoverview Operation types
 *
 * An Operation describes one atomic mutation to one task. A batch is an
 * ordered Operation[] that is committed as a unit and opens with an
 * undo_point.
 */

import type { TaskId } from '../task/types.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface CreateOperation {
  type: 'create';
  uuid: TaskId;
  /** Full initial field set */
  data: JsonObject;
}

/**
 * Coarse-grained field replacement. `oldValue` is carried for conflict
 * detection but not checked on commit.
 */
export interface UpdateOperation {
  type: 'update';
  uuid: TaskId;
  key: string;
  oldValue: JsonValue;
  newValue: JsonValue;
}

export interface SetFieldOperation {
  type: 'set_field';
  uuid: TaskId;
  key: string;
  value: string;
}

export interface UnsetFieldOperation {
  type: 'unset_field';
  uuid: TaskId;
  key: string;
}

export interface AddTagOperation {
  type: 'add_tag';
  uuid: TaskId;
  tag: string;
}

export interface RemoveTagOperation {
  type: 'remove_tag';
  uuid: TaskId;
  tag: string;
}

export interface AddAnnotationOperation {
  type: 'add_annotation';
  uuid: TaskId;
  entry: string;
  description: string;
}

export interface AddDependencyOperation {
  type: 'add_dependency';
  uuid: TaskId;
  dependsOn: TaskId;
}

export interface RemoveDependencyOperation {
  type: 'remove_dependency';
  uuid: TaskId;
  dependsOn: TaskId;
}

/** Logical delete: the task's status becomes deleted */
export interface DeleteOperation {
  type: 'delete';
  uuid: TaskId;
}

export interface UndoPointOperation {
  type: 'undo_point';
}

export type Operation =
  | CreateOperation
  | UpdateOperation
  | SetFieldOperation
  | UnsetFieldOperation
  | AddTagOperation
  | RemoveTagOperation
  | AddAnnotationOperation
  | AddDependencyOperation
  | RemoveDependencyOperation
  | DeleteOperation
  | UndoPointOperation;

export type OperationType = Operation['type'];

export const UNDO_POINT: UndoPointOperation = Object.freeze({ type: 'undo_point' });

/**
 * Short label for logs, e.g. "add_tag(3f2a…)"
 */
export function describeOperation(op: Operation): string {
  if (op.type === 'undo_point') return op.type;
  return `${op.type}(${op.uuid.slice(0, 8)})`;
}
