/**
 * @fileoverview Replica store
 *
 * The embedded task store: every task is a flat string map, changed only by
 * primitive operations (create, update, undo_point). Each committed primitive
 * is appended to the operation log with the value it replaced, which is what
 * undo() walks back through.
 */

import { z } from 'zod';
import type Database from 'better-sqlite3';
import { StorageError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { TaskId } from '../task/types.js';
import type { ReplicaDatabase } from './database.js';
import type { TaskData } from './fields.js';

const logger = createLogger('replica:store');

// =============================================================================
// Types
// =============================================================================

/**
 * The primitive operations the store understands
 */
export type ReplicaPrimitive =
  | { kind: 'create'; uuid: TaskId }
  | { kind: 'update'; uuid: TaskId; property: string; value: string | null }
  | { kind: 'undo_point' };

export interface StoredTask {
  uuid: TaskId;
  data: TaskData;
}

/**
 * Read side of the store, all the field mapping needs
 */
export interface TaskDataSource {
  getTaskData(uuid: TaskId): TaskData | null;
}

interface TaskRow {
  uuid: string;
  data: string;
}

interface OperationRow {
  id: number;
  kind: 'create' | 'update' | 'undo_point';
  uuid: string | null;
  property: string | null;
  old_value: string | null;
}

const taskDataSchema = z.record(z.string());

// =============================================================================
// Store
// =============================================================================

export class ReplicaStore implements TaskDataSource {
  constructor(private readonly database: ReplicaDatabase) {}

  private get db(): Database.Database {
    return this.database.getDatabase();
  }

  getTaskData(uuid: TaskId): TaskData | null {
    const row = this.db.prepare<[string], TaskRow>('SELECT uuid, data FROM tasks WHERE uuid = ?').get(uuid);
    return row ? this.parseRow(row) : null;
  }

  allTaskData(): StoredTask[] {
    const rows = this.db.prepare<[], TaskRow>('SELECT uuid, data FROM tasks ORDER BY rowid').all();
    return rows.map((row) => ({ uuid: TaskId(row.uuid), data: this.parseRow(row) }));
  }

  countTasks(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM tasks').get();
    return row?.count ?? 0;
  }

  countOperations(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM operations').get();
    return row?.count ?? 0;
  }

  countUndoPoints(): number {
    const row = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM operations WHERE kind = 'undo_point'")
      .get();
    return row?.count ?? 0;
  }

  /**
   * Apply primitives in order inside one transaction. If any of them throws,
   * none of them are visible afterwards.
   */
  commit(primitives: readonly ReplicaPrimitive[]): void {
    if (primitives.length === 0) return;

    const timestamp = new Date().toISOString();
    const selectTask = this.db.prepare<[string], TaskRow>('SELECT uuid, data FROM tasks WHERE uuid = ?');
    const insertTask = this.db.prepare<[string, string]>('INSERT INTO tasks (uuid, data) VALUES (?, ?)');
    const updateTask = this.db.prepare<[string, string]>('UPDATE tasks SET data = ? WHERE uuid = ?');
    const logOperation = this.db.prepare<[string, string | null, string | null, string | null, string | null, string]>(`
      INSERT INTO operations (kind, uuid, property, old_value, value, timestamp)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const ensureTask = (uuid: TaskId): TaskData => {
      const row = selectTask.get(uuid);
      if (row) return this.parseRow(row);
      insertTask.run(uuid, '{}');
      logOperation.run('create', uuid, null, null, null, timestamp);
      return {};
    };

    this.database.transaction(() => {
      for (const primitive of primitives) {
        switch (primitive.kind) {
          case 'undo_point':
            logOperation.run('undo_point', null, null, null, null, timestamp);
            break;
          case 'create':
            ensureTask(primitive.uuid);
            break;
          case 'update': {
            const data = ensureTask(primitive.uuid);
            const oldValue = data[primitive.property] ?? null;
            if (oldValue === primitive.value) break;
            if (primitive.value === null) {
              delete data[primitive.property];
            } else {
              data[primitive.property] = primitive.value;
            }
            updateTask.run(JSON.stringify(data), primitive.uuid);
            logOperation.run('update', primitive.uuid, primitive.property, oldValue, primitive.value, timestamp);
            break;
          }
        }
      }
    });
  }

  /**
   * Revert the most recent unit of work: everything logged after the latest
   * undo point. Units that changed nothing are skipped over.
   *
   * @returns false when the log holds nothing to revert
   */
  undo(): boolean {
    const selectTail = this.db.prepare<[number], OperationRow>(
      'SELECT id, kind, uuid, property, old_value FROM operations WHERE id >= ? ORDER BY id DESC'
    );
    const lastUndoPoint = this.db.prepare<[], { id: number | null }>(
      "SELECT MAX(id) AS id FROM operations WHERE kind = 'undo_point'"
    );
    const deleteFrom = this.db.prepare<[number]>('DELETE FROM operations WHERE id >= ?');
    const selectTask = this.db.prepare<[string], TaskRow>('SELECT uuid, data FROM tasks WHERE uuid = ?');
    const updateTask = this.db.prepare<[string, string]>('UPDATE tasks SET data = ? WHERE uuid = ?');
    const deleteTask = this.db.prepare<[string]>('DELETE FROM tasks WHERE uuid = ?');

    return this.database.transaction(() => {
      for (;;) {
        const boundary = lastUndoPoint.get()?.id ?? 0;
        const tail = selectTail.all(boundary);
        if (tail.length === 0) {
          return false;
        }

        let reverted = 0;
        for (const row of tail) {
          if (row.kind === 'undo_point' || row.uuid === null) continue;
          if (row.kind === 'create') {
            deleteTask.run(row.uuid);
          } else if (row.property !== null) {
            const task = selectTask.get(row.uuid);
            if (!task) continue;
            const data = this.parseRow(task);
            if (row.old_value === null) {
              delete data[row.property];
            } else {
              data[row.property] = row.old_value;
            }
            updateTask.run(JSON.stringify(data), row.uuid);
          }
          reverted++;
        }
        deleteFrom.run(boundary);

        if (reverted > 0) {
          logger.debug('Undo reverted operations', { count: reverted });
          return true;
        }
      }
    });
  }

  private parseRow(row: TaskRow): TaskData {
    try {
      return taskDataSchema.parse(JSON.parse(row.data));
    } catch (error) {
      throw new StorageError(`Corrupt task data for ${row.uuid}`, {
        kind: 'serialization',
        context: { taskId: row.uuid },
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}
