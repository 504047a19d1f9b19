/**
 * @fileoverview Storage backend factory
 */

import { createLogger } from '../logging/index.js';
import { openEmbeddedReplica } from '../replica/factory.js';
import { expandHome, resolveDataPath } from '../settings/loader.js';
import type { TaskLedgerSettings } from '../settings/types.js';
import { FileStorageBackend } from './file-backend.js';
import { ReplicaStorageBackend } from './replica-backend.js';
import type { StorageBackend } from './types.js';

const logger = createLogger('storage');

/**
 * Build and initialize the backend `settings.backend` selects
 */
export async function createStorageBackend(settings: TaskLedgerSettings): Promise<StorageBackend> {
  if (settings.backend === 'file') {
    const backend = new FileStorageBackend(expandHome(settings.dataDir), {
      fileName: settings.file.fileName,
      backupDirName: settings.file.backupDirName,
    });
    await backend.initialize();
    return backend;
  }

  const { replica } = settings;
  const replicaPath = resolveDataPath(settings, replica.fileName);
  const actor = await openEmbeddedReplica(replicaPath, {
    transport: replica.transport,
    startupTimeoutMs: replica.startupTimeoutMs,
    requestTimeoutMs: replica.requestTimeoutMs,
    busyTimeoutMs: replica.busyTimeoutMs,
    enableWAL: replica.enableWAL,
  });

  const backend = new ReplicaStorageBackend(replicaPath, actor, {
    readPath: replica.readPath,
    busyTimeoutMs: replica.busyTimeoutMs,
  });
  try {
    await backend.initialize();
  } catch (error) {
    logger.error('Replica backend failed to initialize', error instanceof Error ? error : { error: String(error) });
    await actor.close();
    throw error;
  }
  return backend;
}
