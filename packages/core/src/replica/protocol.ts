/**
 * @fileoverview Replica worker protocol
 *
 * Requests travel over the worker's port. Each one carries a fresh
 * MessagePort on which the worker posts exactly one response and then closes
 * it. Startup is signalled on the worker's port with a `ready` or
 * `startup_failed` message before any request is served.
 */

import { MessagePort } from 'worker_threads';
import { z } from 'zod';
import type { SerializedError } from '../errors/index.js';
import { operationListSchema } from '../operations/schema.js';
import type { Operation } from '../operations/types.js';
import { taskIdSchema } from '../task/schema.js';
import type { TaskId } from '../task/types.js';

// =============================================================================
// Commands
// =============================================================================

export type ReplicaCommand =
  | { kind: 'commit'; ops: Operation[] }
  | { kind: 'open'; path: string }
  | { kind: 'read_task'; uuid: TaskId }
  | { kind: 'read_all' }
  | { kind: 'undo' }
  | { kind: 'shutdown' };

export type ReplicaCommandKind = ReplicaCommand['kind'];

export interface ReplicaRequest {
  id: number;
  command: ReplicaCommand;
  reply: MessagePort;
}

export type ReplicaResponse =
  | { ok: true; value: unknown }
  | { ok: false; error: SerializedError };

export type ReplicaStartupMessage =
  | { kind: 'ready'; path: string }
  | { kind: 'startup_failed'; error: SerializedError };

/**
 * Passed to the worker as workerData
 */
export interface ReplicaWorkerData {
  path: string;
  enableWAL: boolean;
  busyTimeoutMs: number;
}

// =============================================================================
// Schemas
// =============================================================================

const serializedErrorSchema = z.object({
  name: z.string(),
  code: z.string(),
  message: z.string(),
  kind: z.enum(['database', 'io', 'serialization', 'not_supported', 'timeout', 'disconnected']).optional(),
  field: z.string().optional(),
  context: z.record(z.unknown()),
});

export const commandSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('commit'), ops: operationListSchema }),
  z.object({ kind: z.literal('open'), path: z.string().min(1) }),
  z.object({ kind: z.literal('read_task'), uuid: taskIdSchema }),
  z.object({ kind: z.literal('read_all') }),
  z.object({ kind: z.literal('undo') }),
  z.object({ kind: z.literal('shutdown') }),
]);

export const requestSchema = z.object({
  id: z.number().int(),
  command: commandSchema,
  reply: z.instanceof(MessagePort),
});

/** Just enough of a request to answer it when the rest is malformed */
export const replyPortSchema = z.object({
  id: z.number().int().optional(),
  reply: z.instanceof(MessagePort),
});

export const responseSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), error: serializedErrorSchema }),
]);

export const startupMessageSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ready'), path: z.string() }),
  z.object({ kind: z.literal('startup_failed'), error: serializedErrorSchema }),
]);

export const workerDataSchema = z.object({
  path: z.string().min(1),
  enableWAL: z.boolean(),
  busyTimeoutMs: z.number().int().nonnegative(),
});
