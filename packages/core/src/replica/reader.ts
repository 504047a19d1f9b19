/**
 * @fileoverview Replica read paths
 *
 * Reads either go straight to the store file over a read-only connection of
 * their own, or through the actor. The direct path sees every commit the
 * actor has acknowledged, since the actor only replies after its
 * transaction has committed.
 */

import { existsSync } from 'fs';
import { StorageError } from '../errors/index.js';
import type { Task, TaskId } from '../task/types.js';
import { ReplicaDatabase } from './database.js';
import { parseTaskData } from './field-mapping.js';
import { ReplicaStore } from './store.js';
import type { ReplicaWrapper } from './wrapper.js';

export type ReplicaReadPath = 'direct' | 'actor';

export interface ReplicaReader {
  initialize(): Promise<void>;
  readTask(uuid: TaskId): Promise<Task | null>;
  readAll(): Promise<Task[]>;
  /** Drop any handle of its own and open the store file again */
  reopen(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Read-only connection to the store file
 */
export class DirectReplicaReader implements ReplicaReader {
  private database: ReplicaDatabase | null = null;
  private store: ReplicaStore | null = null;

  constructor(
    private readonly path: string,
    private readonly busyTimeoutMs: number = 5000
  ) {}

  async initialize(): Promise<void> {
    if (this.store) return;
    if (!existsSync(this.path)) {
      throw new StorageError(`replica database not found: ${this.path}`, {
        kind: 'io',
        operation: 'initialize',
        context: { path: this.path },
      });
    }
    const database = new ReplicaDatabase(this.path, { readonly: true, busyTimeoutMs: this.busyTimeoutMs });
    database.open();
    this.database = database;
    this.store = new ReplicaStore(database);
  }

  async readTask(uuid: TaskId): Promise<Task | null> {
    const data = this.requireStore().getTaskData(uuid);
    return data ? parseTaskData(uuid, data) : null;
  }

  async readAll(): Promise<Task[]> {
    return this.requireStore()
      .allTaskData()
      .map(({ uuid, data }) => parseTaskData(uuid, data));
  }

  async reopen(): Promise<void> {
    await this.close();
    await this.initialize();
  }

  async close(): Promise<void> {
    this.database?.close();
    this.database = null;
    this.store = null;
  }

  private requireStore(): ReplicaStore {
    if (!this.store) {
      throw new StorageError('Replica reader is not initialized', { kind: 'database', operation: 'read' });
    }
    return this.store;
  }
}

/**
 * Reads served by the actor, in order with its writes
 */
export class ActorReplicaReader implements ReplicaReader {
  constructor(private readonly wrapper: ReplicaWrapper) {}

  async initialize(): Promise<void> {}

  readTask(uuid: TaskId): Promise<Task | null> {
    return this.wrapper.readTask(uuid);
  }

  readAll(): Promise<Task[]> {
    return this.wrapper.readAllTasks();
  }

  // The wrapper belongs to the backend, which reopens and closes it.
  async reopen(): Promise<void> {}

  async close(): Promise<void> {}
}
