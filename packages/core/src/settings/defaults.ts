/**
 * @fileoverview Default Settings
 *
 * Fallback values for every setting the user file leaves out.
 */

import type { TaskLedgerSettings } from './types.js';

export const DEFAULT_SETTINGS: TaskLedgerSettings = {
  dataDir: '~/.taskledger',
  backend: 'replica',
  replica: {
    fileName: 'replica.sqlite3',
    startupTimeoutMs: 5000,
    requestTimeoutMs: 0,
    transport: 'worker',
    busyTimeoutMs: 5000,
    enableWAL: true,
    readPath: 'direct',
  },
  file: {
    fileName: 'tasks.json',
    backupDirName: 'backups',
  },
  contexts: {
    definitions: {},
  },
  sync: {
    command: 'task',
    args: ['sync'],
    timeoutMs: 60_000,
  },
};
