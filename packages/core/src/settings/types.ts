/**
 * @fileoverview Settings Types
 *
 * Shape of ~/.taskledger/settings.json once merged with defaults.
 */

import type { ReplicaTransport } from '../replica/actor.js';
import type { ReplicaReadPath } from '../replica/reader.js';

export type BackendKind = 'replica' | 'file';

export interface ReplicaSettings {
  /** Store file name inside dataDir */
  fileName: string;
  startupTimeoutMs: number;
  /** 0 disables the per-request deadline */
  requestTimeoutMs: number;
  transport: ReplicaTransport;
  busyTimeoutMs: number;
  enableWAL: boolean;
  readPath: ReplicaReadPath;
}

export interface FileBackendSettings {
  fileName: string;
  backupDirName: string;
}

export interface ContextDefinition {
  /** Read filter, e.g. "project:Work" */
  read: string;
  /** Write filter; only simple project filters are accepted */
  write?: string;
}

export interface ContextSettings {
  /** Name of the active context */
  active?: string;
  definitions: Record<string, ContextDefinition>;
}

export interface SyncSettings {
  command: string;
  args: string[];
  timeoutMs: number;
}

export interface TaskLedgerSettings {
  /** Root data directory; a leading ~ is expanded */
  dataDir: string;
  backend: BackendKind;
  replica: ReplicaSettings;
  file: FileBackendSettings;
  contexts: ContextSettings;
  sync: SyncSettings;
}
