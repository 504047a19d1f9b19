/**
 * @fileoverview Initial replica schema
 *
 * - tasks: one row per task, its field map stored as a JSON object
 * - operations: the local operation log that undo walks backwards
 */

import type { Migration } from '../types.js';

export const migration: Migration = {
  version: 1,
  description: 'Replica tasks and operation log',
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        uuid TEXT PRIMARY KEY,
        data TEXT NOT NULL DEFAULT '{}'
      );

      CREATE TABLE IF NOT EXISTS operations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        kind TEXT NOT NULL CHECK (kind IN ('create', 'update', 'undo_point')),
        uuid TEXT,
        property TEXT,
        old_value TEXT,
        value TEXT,
        timestamp TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_operations_kind ON operations(kind, id);
    `);
  },
};
