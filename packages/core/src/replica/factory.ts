/**
 * @fileoverview Embedded replica factory
 */

import { createLogger } from '../logging/index.js';
import { DEFAULT_STARTUP_TIMEOUT_MS, ReplicaActor, type ReplicaActorOptions } from './actor.js';

const logger = createLogger('replica:factory');

export interface EmbeddedReplicaOptions extends ReplicaActorOptions {
  /** How long to wait for the owner to open the store */
  startupTimeoutMs?: number;
}

/**
 * Start an actor owning the replica at `path` and wait for it to come up.
 * Each call starts its own owner; callers decide how to share the result.
 *
 * @throws StorageError 'timeout' if startup exceeds the timeout, or the
 *   error the owner reported when the store could not be opened
 */
export async function openEmbeddedReplica(path: string, options: EmbeddedReplicaOptions = {}): Promise<ReplicaActor> {
  const actor = new ReplicaActor(path, options);
  await actor.ready(options.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS);
  logger.info('Embedded replica started', { path, transport: options.transport ?? 'worker' });
  return actor;
}
