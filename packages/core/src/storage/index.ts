/**
 * @fileoverview Storage exports
 */

export type { StorageBackend } from './types.js';
export { ReplicaStorageBackend, type ReplicaStorageBackendOptions } from './replica-backend.js';
export { FileStorageBackend, backupTimestamp, type FileStorageBackendOptions } from './file-backend.js';
export { createStorageBackend } from './factory.js';
