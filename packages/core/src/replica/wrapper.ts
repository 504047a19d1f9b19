/**
 * @fileoverview Replica wrapper capability
 *
 * What a storage backend needs from a replica. The worker-backed
 * ReplicaActor implements it for real stores; MemoryReplica implements it
 * for tests.
 */

import type { Operation } from '../operations/types.js';
import type { Task, TaskId } from '../task/types.js';

export interface ReplicaWrapper {
  /**
   * Point the wrapper at the store at `path`, replacing the current one.
   * Re-opening the path already open is allowed.
   */
  open(path: string): Promise<void>;

  /**
   * Apply a batch atomically: either every operation is applied or none is.
   */
  commitOperations(ops: readonly Operation[]): Promise<void>;

  /**
   * Current snapshot of a task, or null if the store has no such task.
   */
  readTask(uuid: TaskId): Promise<Task | null>;

  /**
   * Every task in the store, in insertion order
   */
  readAllTasks(): Promise<Task[]>;

  /**
   * Revert the latest unit of work (everything since the last undo point).
   *
   * @returns false when there was nothing to undo
   */
  undo(): Promise<boolean>;

  /**
   * Release the store. Any call made afterwards is rejected.
   */
  close(): Promise<void>;
}
