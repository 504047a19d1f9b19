/**
 * @fileoverview In-memory ReplicaWrapper for tests
 *
 * Runs the same host the worker runs, against an in-memory store, on the
 * calling thread. Every committed batch is recorded, and the next call to a
 * method can be made to fail.
 */

import { StorageError } from '../errors/index.js';
import type { Operation } from '../operations/types.js';
import type { Task, TaskId } from '../task/types.js';
import { ReplicaHost } from './host.js';
import type { ReplicaWrapper } from './wrapper.js';

type FailableMethod = 'commitOperations' | 'readTask' | 'readAllTasks' | 'undo' | 'open';

export class MemoryReplica implements ReplicaWrapper {
  /** Batches that committed, in order */
  readonly committed: Operation[][] = [];
  /** Paths passed to open() */
  readonly openedPaths: string[] = [];

  private readonly host = new ReplicaHost();
  private readonly failures = new Map<FailableMethod, Error>();
  private closed = false;

  constructor() {
    this.host.open(':memory:');
  }

  /**
   * Make the next call to `method` reject with `error`
   */
  failNext(method: FailableMethod, error: Error): void {
    this.failures.set(method, error);
  }

  async open(path: string): Promise<void> {
    this.check('open');
    this.openedPaths.push(path);
  }

  async commitOperations(ops: readonly Operation[]): Promise<void> {
    this.check('commitOperations');
    this.host.commit(ops);
    this.committed.push([...ops]);
  }

  async readTask(uuid: TaskId): Promise<Task | null> {
    this.check('readTask');
    return this.host.readTask(uuid);
  }

  async readAllTasks(): Promise<Task[]> {
    this.check('readAllTasks');
    return this.host.readAll();
  }

  async undo(): Promise<boolean> {
    this.check('undo');
    return this.host.undo();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.host.close();
  }

  private check(method: FailableMethod): void {
    if (this.closed) {
      throw new StorageError('Replica actor disconnected: closed', { kind: 'disconnected', operation: method });
    }
    const failure = this.failures.get(method);
    if (failure) {
      this.failures.delete(method);
      throw failure;
    }
  }
}
