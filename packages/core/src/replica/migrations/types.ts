/**
 * @fileoverview Migration Types
 */

import type Database from 'better-sqlite3';

export interface Migration {
  /** Schema version this migration brings the replica to */
  version: number;
  description: string;
  /** Runs inside a transaction together with the version record */
  up: (db: Database.Database) => void;
}

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  /** Versions applied by this run, ascending */
  applied: number[];
  migrated: boolean;
}
