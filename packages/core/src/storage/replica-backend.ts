/**
 * @fileoverview Replica-backed storage
 *
 * Writes go through a ReplicaWrapper as operation batches: the current task
 * is read back through the wrapper, diffed against the new version, and the
 * batch committed in one call. Reads use a ReplicaReader, by default a
 * read-only connection of its own to the store file.
 */

import {
  ConfigurationError,
  StorageError,
  TaskLedgerError,
} from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { buildDeleteBatch, buildSaveBatch } from '../operations/batch-builder.js';
import type { Operation } from '../operations/types.js';
import { applyQuery } from '../query/filter.js';
import type { TaskQuery, UserContext } from '../query/types.js';
import {
  ActorReplicaReader,
  DirectReplicaReader,
  type ReplicaReadPath,
  type ReplicaReader,
} from '../replica/reader.js';
import type { ReplicaWrapper } from '../replica/wrapper.js';
import type { Task, TaskId } from '../task/types.js';
import type { StorageBackend } from './types.js';

const logger = createLogger('storage:replica');

export interface ReplicaStorageBackendOptions {
  /** How reads reach the store; 'actor' requires a wrapper */
  readPath?: ReplicaReadPath;
  busyTimeoutMs?: number;
}

export class ReplicaStorageBackend implements StorageBackend {
  readonly path: string;
  private readonly wrapper: ReplicaWrapper | null;
  private readonly reader: ReplicaReader;
  private initialized = false;

  constructor(path: string, wrapper?: ReplicaWrapper | null, options: ReplicaStorageBackendOptions = {}) {
    this.path = path;
    this.wrapper = wrapper ?? null;

    if (options.readPath === 'actor') {
      if (!this.wrapper) {
        throw new ConfigurationError('write path not configured', {
          code: 'REPLICA_WRAPPER_MISSING',
          context: { readPath: 'actor' },
        });
      }
      this.reader = new ActorReplicaReader(this.wrapper);
    } else {
      this.reader = new DirectReplicaReader(path, options.busyTimeoutMs);
    }
  }

  /**
   * The wrapper writes go through, if one was configured
   */
  get replica(): ReplicaWrapper | null {
    return this.wrapper;
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    await this.reader.initialize();
    this.initialized = true;
    logger.info('Replica backend initialized', { path: this.path, writable: this.wrapper !== null });
  }

  /**
   * Reopen the store file on both the write and the read path, so changes
   * made to it from outside (a sync command) become visible.
   */
  async reload(): Promise<void> {
    const wrapper = this.requireWrapper('reload');
    await wrapper.open(this.path);
    if (this.initialized) {
      await this.reader.reopen();
    }
    logger.info('Replica backend reloaded', { path: this.path });
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async saveTask(task: Task): Promise<void> {
    const wrapper = this.requireWrapper('save_task');

    let existing: Task | null = null;
    try {
      existing = await wrapper.readTask(task.uuid);
    } catch (error) {
      logger.warn('Could not read current task state, saving as new', {
        taskId: task.uuid,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    await this.commit(wrapper, buildSaveBatch(existing, task), 'save_task', task.uuid);
  }

  async deleteTask(uuid: TaskId): Promise<void> {
    const wrapper = this.requireWrapper('delete_task');
    await this.commit(wrapper, buildDeleteBatch(uuid), 'delete_task', uuid);
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async loadTask(uuid: TaskId): Promise<Task | null> {
    this.requireInitialized('load_task');
    return this.reader.readTask(uuid);
  }

  async loadAllTasks(): Promise<Task[]> {
    this.requireInitialized('load_all_tasks');
    return this.reader.readAll();
  }

  async queryTasks(query: TaskQuery, activeContext?: UserContext | null): Promise<Task[]> {
    const tasks = await this.loadAllTasks();
    return applyQuery(tasks, query, activeContext);
  }

  // ---------------------------------------------------------------------------
  // Unsupported
  // ---------------------------------------------------------------------------

  async backup(): Promise<string> {
    throw new StorageError('Backup not supported for replica backend', { kind: 'not_supported', operation: 'backup' });
  }

  async restore(_data: string): Promise<void> {
    throw new StorageError('Restore not supported for replica backend', { kind: 'not_supported', operation: 'restore' });
  }

  async close(): Promise<void> {
    await this.reader.close();
    await this.wrapper?.close();
    this.initialized = false;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private requireWrapper(operation: string): ReplicaWrapper {
    if (!this.wrapper) {
      throw new ConfigurationError('write path not configured', {
        code: 'REPLICA_WRAPPER_MISSING',
        context: { operation },
      });
    }
    return this.wrapper;
  }

  private requireInitialized(operation: string): void {
    if (!this.initialized) {
      throw new StorageError('Replica backend is not initialized', { kind: 'database', operation });
    }
  }

  private async commit(wrapper: ReplicaWrapper, batch: Operation[], operation: string, taskId: TaskId): Promise<void> {
    try {
      await wrapper.commitOperations(batch);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Failed to commit operations: ${message}`, {
        kind: error instanceof StorageError ? error.kind : 'database',
        operation,
        code: error instanceof TaskLedgerError ? error.code : undefined,
        context: { taskId, operations: batch.length },
        cause: error instanceof Error ? error : undefined,
      });
    }
    logger.debug('Batch committed', { operation, taskId, operations: batch.length });
  }
}
