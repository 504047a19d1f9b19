/**
 * @fileoverview Replica database connection
 *
 * Opens the SQLite file backing a replica, configures pragmas and brings the
 * schema up to date. A read-only connection skips migrations and instead
 * checks that the schema is already there.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import * as path from 'path';
import { StorageError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { MigrationRunner, runMigrations } from './migrations/index.js';

const logger = createLogger('replica:database');

export interface ReplicaDatabaseOptions {
  readonly?: boolean;
  enableWAL?: boolean;
  busyTimeoutMs?: number;
}

export const DEFAULT_DATABASE_OPTIONS = {
  readonly: false,
  enableWAL: true,
  busyTimeoutMs: 5000,
} as const;

const IN_MEMORY = ':memory:';

export class ReplicaDatabase {
  readonly path: string;
  private readonly options: Required<ReplicaDatabaseOptions>;
  private db: Database.Database | null = null;

  constructor(dbPath: string, options: ReplicaDatabaseOptions = {}) {
    this.path = dbPath;
    this.options = { ...DEFAULT_DATABASE_OPTIONS, ...options };
  }

  /**
   * Open the connection. Writable connections create the file (and its
   * directory) when missing.
   *
   * @throws StorageError when the file cannot be opened or created
   */
  open(): Database.Database {
    if (this.db) {
      return this.db;
    }

    const { readonly } = this.options;
    let db: Database.Database;
    try {
      if (!readonly && this.path !== IN_MEMORY) {
        mkdirSync(path.dirname(this.path), { recursive: true });
      }
      db = new Database(this.path, { readonly, fileMustExist: readonly });
    } catch (error) {
      throw new StorageError(`Failed to open replica at ${this.path}: ${errorMessage(error)}`, {
        kind: 'io',
        operation: 'open',
        context: { path: this.path },
        cause: error instanceof Error ? error : undefined,
      });
    }

    try {
      this.configurePragmas(db);
      if (readonly) {
        this.assertSchema(db);
      } else {
        const result = runMigrations(db);
        if (result.migrated) {
          logger.info('Replica schema migrated', {
            path: this.path,
            fromVersion: result.fromVersion,
            toVersion: result.toVersion,
          });
        }
      }
    } catch (error) {
      db.close();
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to initialize replica at ${this.path}: ${errorMessage(error)}`, {
        kind: 'database',
        operation: 'open',
        context: { path: this.path },
        cause: error instanceof Error ? error : undefined,
      });
    }

    this.db = db;
    logger.debug('Replica database opened', { path: this.path, readonly });
    return db;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * @throws StorageError if the connection is not open
   */
  getDatabase(): Database.Database {
    if (!this.db) {
      throw new StorageError('Replica database is not open', { kind: 'database', context: { path: this.path } });
    }
    return this.db;
  }

  /**
   * Run `fn` inside one transaction; any throw rolls the whole thing back
   */
  transaction<T>(fn: () => T): T {
    return this.getDatabase().transaction(fn)();
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      logger.debug('Replica database closed', { path: this.path });
    }
  }

  private configurePragmas(db: Database.Database): void {
    const { enableWAL, busyTimeoutMs, readonly } = this.options;

    db.pragma(`busy_timeout = ${busyTimeoutMs}`);
    if (readonly) {
      return;
    }
    if (enableWAL && this.path !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma('synchronous = NORMAL');
  }

  private assertSchema(db: Database.Database): void {
    const runner = new MigrationRunner(db, []);
    if (!runner.tableExists('tasks') || !runner.tableExists('operations')) {
      throw new StorageError(`${this.path} is not a replica database`, {
        kind: 'database',
        operation: 'open',
        context: { path: this.path },
      });
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
