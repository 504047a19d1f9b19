/**
 * @fileoverview Storage backend capability
 */

import type { TaskQuery, UserContext } from '../query/types.js';
import type { Task, TaskId } from '../task/types.js';

export interface StorageBackend {
  /** Prepare the backend for use; must be called before anything else */
  initialize(): Promise<void>;

  /** Insert or update */
  saveTask(task: Task): Promise<void>;

  /** null when there is no such task */
  loadTask(uuid: TaskId): Promise<Task | null>;

  deleteTask(uuid: TaskId): Promise<void>;

  loadAllTasks(): Promise<Task[]>;

  /**
   * Tasks matching the query, narrowed by `activeContext` unless the query
   * ignores contexts
   */
  queryTasks(query: TaskQuery, activeContext?: UserContext | null): Promise<Task[]>;

  /** Snapshot of the whole store as text */
  backup(): Promise<string>;

  /** Replace the store with a snapshot produced by backup() */
  restore(data: string): Promise<void>;

  close(): Promise<void>;
}
