/**
 * @fileoverview Replica worker thread entry point
 */

import { parentPort, threadId, workerData } from 'worker_threads';
import { createLogger } from '../logging/index.js';
import { workerDataSchema } from './protocol.js';
import { serveReplica } from './serve.js';

const logger = createLogger('replica:worker', { thread: 'replica-worker', threadId });

if (!parentPort) {
  throw new Error('replica-worker must be started as a worker thread');
}

const parsed = workerDataSchema.safeParse(workerData);
if (!parsed.success) {
  logger.fatal('Invalid replica worker data', { issues: parsed.error.errors.map((issue) => issue.message) });
  throw parsed.error;
}

logger.debug('Replica worker starting', { path: parsed.data.path });
serveReplica(parentPort, parsed.data);
