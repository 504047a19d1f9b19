/**
 * @fileoverview Replica request loop
 *
 * serveReplica() is the body of the replica worker: it opens the replica,
 * reports startup on `port`, then executes requests one at a time in
 * arrival order. Each request is answered on its own reply port, which is
 * closed after the single response.
 */

import type { MessagePort } from 'worker_threads';
import { serializeError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { ReplicaHost } from './host.js';
import {
  replyPortSchema,
  requestSchema,
  type ReplicaResponse,
  type ReplicaStartupMessage,
  type ReplicaWorkerData,
} from './protocol.js';

const logger = createLogger('replica:serve');

/**
 * Serve replica requests arriving on `port` until a shutdown command.
 *
 * @returns false when the replica could not be opened (startup_failed has
 *   been posted and nothing will be served)
 */
export function serveReplica(port: MessagePort, init: ReplicaWorkerData): boolean {
  const host = new ReplicaHost({ enableWAL: init.enableWAL, busyTimeoutMs: init.busyTimeoutMs });

  try {
    host.open(init.path);
  } catch (error) {
    logger.error('Replica startup failed', error instanceof Error ? error : { error: String(error) });
    const message: ReplicaStartupMessage = { kind: 'startup_failed', error: serializeError(error) };
    port.postMessage(message);
    return false;
  }

  port.on('message', (raw: unknown) => {
    const parsed = requestSchema.safeParse(raw);
    if (!parsed.success) {
      rejectMalformed(raw, parsed.error.errors.map((issue) => issue.message).join('; '));
      return;
    }

    const { id, command, reply } = parsed.data;
    logger.trace('Replica request', { id, command: command.kind });
    let response: ReplicaResponse;
    try {
      response = { ok: true, value: host.execute(command) };
    } catch (error) {
      logger.warn('Replica command failed', {
        id,
        command: command.kind,
        error: error instanceof Error ? error.message : String(error),
      });
      response = { ok: false, error: serializeError(error) };
    }
    reply.postMessage(response);
    reply.close();

    if (command.kind === 'shutdown') {
      logger.debug('Replica shut down', { path: init.path });
      port.close();
    }
  });

  const ready: ReplicaStartupMessage = { kind: 'ready', path: init.path };
  port.postMessage(ready);
  return true;
}

function rejectMalformed(raw: unknown, detail: string): void {
  const target = replyPortSchema.safeParse(raw);
  if (!target.success) {
    logger.warn('Dropping malformed replica request', { detail });
    return;
  }
  const response: ReplicaResponse = {
    ok: false,
    error: {
      name: 'StorageError',
      code: 'STORAGE_SERIALIZATION_ERROR',
      message: `Malformed replica request: ${detail}`,
      kind: 'serialization',
      context: {},
    },
  };
  target.data.reply.postMessage(response);
  target.data.reply.close();
}
