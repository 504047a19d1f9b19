/**
 * @fileoverview Sync and reload
 *
 * The sync protocol itself belongs to an external command. Once it has run,
 * the replica is re-opened so the actor sees what the command wrote.
 */

import { SyncError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { SyncSettings } from '../settings/types.js';
import type { ProcessResult, ProcessRunner } from './process-runner.js';

const logger = createLogger('sync');

/**
 * What a finished sync reloads; `ReplicaStorageBackend` is one
 */
export interface SyncTarget {
  readonly path: string;
  reload(): Promise<void>;
}

/**
 * Run the configured sync command, then reload the replica.
 *
 * @throws SyncError when the command cannot start or exits non-zero; the
 *   replica is not re-opened in that case
 */
export async function syncAndReload(
  target: SyncTarget,
  runner: ProcessRunner,
  settings: SyncSettings
): Promise<ProcessResult> {
  const { command, args, timeoutMs } = settings;
  logger.info('Running sync', { command, args });

  let result: ProcessResult;
  try {
    result = await runner.run(command, args, timeoutMs);
  } catch (error) {
    throw new SyncError(`Failed to run ${command}: ${error instanceof Error ? error.message : String(error)}`, {
      context: { command, args },
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (result.exitCode !== 0) {
    throw new SyncError(`${command} exited with code ${result.exitCode}`, {
      context: { command, args, exitCode: result.exitCode, signal: result.signal, stderr: result.stderr },
    });
  }

  await target.reload();
  logger.info('Sync complete, replica reloaded', { path: target.path });
  return result;
}
