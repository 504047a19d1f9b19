/**
 * @fileoverview Replica host
 *
 * Owns one replica database handle and executes commands against it
 * synchronously. The host is what runs inside the replica worker; nothing
 * outside that worker touches its handle.
 */

import { StorageError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { describeOperation, type Operation } from '../operations/types.js';
import type { Task, TaskId } from '../task/types.js';
import { ReplicaDatabase } from './database.js';
import { mapOperations, parseTaskData } from './field-mapping.js';
import type { ReplicaCommand } from './protocol.js';
import { ReplicaStore } from './store.js';

const logger = createLogger('replica:host');

export interface ReplicaHostOptions {
  enableWAL?: boolean;
  busyTimeoutMs?: number;
}

export class ReplicaHost {
  private database: ReplicaDatabase | null = null;
  private store: ReplicaStore | null = null;

  constructor(private readonly options: ReplicaHostOptions = {}) {}

  get path(): string | null {
    return this.database?.path ?? null;
  }

  /**
   * Open the replica at `path`. The new handle replaces the current one only
   * once it has opened; on failure the current handle stays in service.
   * Opening the path already in use reopens it, picking up a file that was
   * replaced underneath the old handle.
   */
  open(path: string): void {
    const database = new ReplicaDatabase(path, {
      enableWAL: this.options.enableWAL,
      busyTimeoutMs: this.options.busyTimeoutMs,
    });
    database.open();

    const previous = this.database;
    this.database = database;
    this.store = new ReplicaStore(database);
    previous?.close();
    logger.info(previous?.path === path ? 'Replica reopened' : 'Replica opened', { path });
  }

  commit(ops: readonly Operation[]): void {
    const store = this.requireStore('commit');
    const done = logger.startTimer('Batch commit');
    const primitives = mapOperations(store, ops);
    try {
      store.commit(primitives);
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to commit operations: ${error instanceof Error ? error.message : String(error)}`, {
        kind: 'database',
        operation: 'commit',
        cause: error instanceof Error ? error : undefined,
      });
    }
    done({
      operations: ops.length,
      primitives: primitives.length,
      ops: logger.isLevelEnabled('trace') ? ops.map(describeOperation) : undefined,
    });
  }

  readTask(uuid: TaskId): Task | null {
    const data = this.requireStore('read_task').getTaskData(uuid);
    return data ? parseTaskData(uuid, data) : null;
  }

  readAll(): Task[] {
    return this.requireStore('read_all')
      .allTaskData()
      .map(({ uuid, data }) => parseTaskData(uuid, data));
  }

  undo(): boolean {
    return this.requireStore('undo').undo();
  }

  close(): void {
    this.database?.close();
    this.database = null;
    this.store = null;
  }

  /**
   * Execute one command and return its result value
   */
  execute(command: ReplicaCommand): unknown {
    switch (command.kind) {
      case 'commit':
        this.commit(command.ops);
        return null;
      case 'open':
        this.open(command.path);
        return null;
      case 'read_task':
        return this.readTask(command.uuid);
      case 'read_all':
        return this.readAll();
      case 'undo':
        return this.undo();
      case 'shutdown':
        this.close();
        return null;
    }
  }

  private requireStore(operation: string): ReplicaStore {
    if (!this.store) {
      throw new StorageError('Replica is not open', { kind: 'database', operation });
    }
    return this.store;
  }
}
