/**
 * @fileoverview Replica actor
 *
 * The replica database handle is not safe to share, so a single owner (a
 * worker thread, or in tests a port served on this thread) holds it and
 * executes requests strictly in arrival order. ReplicaActor is the async
 * handle callers use: every request carries its own reply port and awaits
 * exactly one response.
 *
 * Once the owner goes away every pending and future request fails with a
 * terminal StorageError ('disconnected'). There is no restart; open a new
 * actor instead.
 */

import { fileURLToPath } from 'url';
import { MessageChannel, Worker, type MessagePort } from 'worker_threads';
import { z } from 'zod';
import { StorageError, deserializeError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { Operation } from '../operations/types.js';
import { taskSchema } from '../task/schema.js';
import type { Task, TaskId } from '../task/types.js';
import {
  responseSchema,
  startupMessageSchema,
  type ReplicaCommand,
  type ReplicaRequest,
  type ReplicaWorkerData,
} from './protocol.js';
import { serveReplica } from './serve.js';
import type { ReplicaWrapper } from './wrapper.js';

const logger = createLogger('replica:actor');

export const DEFAULT_STARTUP_TIMEOUT_MS = 5000;

// =============================================================================
// Links
// =============================================================================

/**
 * Channel between the actor and whatever owns the replica handle
 */
export interface ReplicaLink {
  send(request: ReplicaRequest): void;
  /** Startup messages from the owner */
  onMessage(listener: (message: unknown) => void): void;
  /** The owner is gone and will answer nothing more */
  onDisconnect(listener: (reason: string) => void): void;
  terminate(): Promise<void>;
}

function workerEntry(): URL {
  // From sources the worker starts through a bootstrap that registers tsx.
  if (fileURLToPath(import.meta.url).endsWith('.ts')) {
    return new URL('./replica-worker.bootstrap.mjs', import.meta.url);
  }
  return new URL('./replica-worker.js', import.meta.url);
}

/**
 * Owner is a dedicated worker thread
 */
export class WorkerLink implements ReplicaLink {
  private readonly worker: Worker;

  constructor(data: ReplicaWorkerData) {
    this.worker = new Worker(workerEntry(), { workerData: data, execArgv: [] });
  }

  send(request: ReplicaRequest): void {
    this.worker.postMessage(request, [request.reply]);
  }

  onMessage(listener: (message: unknown) => void): void {
    this.worker.on('message', listener);
  }

  onDisconnect(listener: (reason: string) => void): void {
    this.worker.on('error', (error) => listener(`replica worker failed: ${error.message}`));
    this.worker.on('exit', (code) => listener(`replica worker exited with code ${code}`));
  }

  async terminate(): Promise<void> {
    await this.worker.terminate();
  }
}

/**
 * Owner is served on this thread over a MessageChannel. Requests still go
 * through ports, so ordering and reply handling match the worker path.
 */
export class PortLink implements ReplicaLink {
  private readonly port: MessagePort;

  constructor(data: ReplicaWorkerData) {
    const { port1, port2 } = new MessageChannel();
    this.port = port1;
    serveReplica(port2, data);
  }

  send(request: ReplicaRequest): void {
    this.port.postMessage(request, [request.reply]);
  }

  onMessage(listener: (message: unknown) => void): void {
    this.port.on('message', listener);
  }

  onDisconnect(listener: (reason: string) => void): void {
    this.port.on('close', () => listener('replica port closed'));
  }

  async terminate(): Promise<void> {
    this.port.close();
  }
}

// =============================================================================
// Actor
// =============================================================================

export type ReplicaTransport = 'worker' | 'inline';

export interface ReplicaActorOptions {
  transport?: ReplicaTransport;
  enableWAL?: boolean;
  busyTimeoutMs?: number;
  /** Per-request deadline; 0 waits indefinitely */
  requestTimeoutMs?: number;
}

interface PendingRequest {
  command: ReplicaCommand['kind'];
  port: MessagePort;
  timer: NodeJS.Timeout | null;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
}

type ActorState =
  | { kind: 'starting' }
  | { kind: 'ready' }
  | { kind: 'failed'; error: Error }
  | { kind: 'disconnected'; reason: string };

const nullableTaskSchema = taskSchema.nullable();
const taskListSchema = z.array(taskSchema);
const undoResultSchema = z.boolean();

export class ReplicaActor implements ReplicaWrapper {
  readonly path: string;
  private readonly link: ReplicaLink;
  private readonly requestTimeoutMs: number;
  private readonly pending = new Map<number, PendingRequest>();
  private nextId = 1;
  private state: ActorState = { kind: 'starting' };
  private readonly startup: Promise<void>;

  constructor(path: string, options: ReplicaActorOptions = {}, link?: ReplicaLink) {
    this.path = path;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 0;

    const data: ReplicaWorkerData = {
      path,
      enableWAL: options.enableWAL ?? true,
      busyTimeoutMs: options.busyTimeoutMs ?? 5000,
    };
    this.link = link ?? (options.transport === 'inline' ? new PortLink(data) : new WorkerLink(data));

    this.startup = new Promise<void>((resolve, reject) => {
      this.link.onMessage((raw) => {
        const parsed = startupMessageSchema.safeParse(raw);
        if (!parsed.success || this.state.kind !== 'starting') return;
        if (parsed.data.kind === 'ready') {
          this.state = { kind: 'ready' };
          logger.debug('Replica actor ready', { path });
          resolve();
        } else {
          const error = deserializeError(parsed.data.error, 'open');
          this.state = { kind: 'failed', error };
          reject(error);
        }
      });
      this.link.onDisconnect((reason) => {
        if (this.state.kind === 'starting') {
          const error = this.disconnectedError(reason);
          this.state = { kind: 'failed', error };
          reject(error);
        }
        this.disconnect(reason);
      });
    });
    // Observed through ready(); keep an unobserved failure from surfacing as unhandled.
    this.startup.catch(() => undefined);
  }

  /**
   * Wait for the owner to open the replica.
   *
   * @throws StorageError 'timeout' when startup takes longer than `timeoutMs`
   *   (the owner is then terminated), or the owner's own startup error
   */
  async ready(timeoutMs: number = DEFAULT_STARTUP_TIMEOUT_MS): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new StorageError(`Replica did not start within ${timeoutMs}ms`, {
          kind: 'timeout',
          operation: 'open',
          context: { path: this.path, timeoutMs },
        }));
      }, timeoutMs);
    });

    try {
      await Promise.race([this.startup, deadline]);
    } catch (error) {
      await this.shutdownLink();
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  get isConnected(): boolean {
    return this.state.kind === 'ready';
  }

  // ---------------------------------------------------------------------------
  // ReplicaWrapper
  // ---------------------------------------------------------------------------

  async open(path: string): Promise<void> {
    await this.request({ kind: 'open', path });
  }

  async commitOperations(ops: readonly Operation[]): Promise<void> {
    await this.request({ kind: 'commit', ops: [...ops] });
  }

  async readTask(uuid: TaskId): Promise<Task | null> {
    return this.decode(nullableTaskSchema, await this.request({ kind: 'read_task', uuid }), 'read_task');
  }

  async readAllTasks(): Promise<Task[]> {
    return this.decode(taskListSchema, await this.request({ kind: 'read_all' }), 'read_all');
  }

  async undo(): Promise<boolean> {
    return this.decode(undoResultSchema, await this.request({ kind: 'undo' }), 'undo');
  }

  /**
   * Ask the owner to release the replica, then stop it. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this.state.kind === 'disconnected' || this.state.kind === 'failed') {
      await this.shutdownLink();
      return;
    }
    try {
      await this.request({ kind: 'shutdown' });
    } catch (error) {
      if (!(error instanceof StorageError && error.isTerminal)) throw error;
    } finally {
      await this.shutdownLink();
    }
  }

  // ---------------------------------------------------------------------------
  // Request plumbing
  // ---------------------------------------------------------------------------

  private async request(command: ReplicaCommand): Promise<unknown> {
    if (this.state.kind === 'starting') {
      await this.startup;
    }
    if (this.state.kind === 'failed') {
      throw this.state.error;
    }
    if (this.state.kind === 'disconnected') {
      throw this.disconnectedError(this.state.reason, command.kind);
    }

    const id = this.nextId++;
    const { port1, port2 } = new MessageChannel();

    return new Promise<unknown>((resolve, reject) => {
      const entry: PendingRequest = { command: command.kind, port: port1, timer: null, resolve, reject };
      this.pending.set(id, entry);

      if (this.requestTimeoutMs > 0) {
        entry.timer = setTimeout(() => {
          this.settle(id)?.reject(new StorageError(
            `Replica ${command.kind} timed out after ${this.requestTimeoutMs}ms`,
            { kind: 'timeout', operation: command.kind, context: { timeoutMs: this.requestTimeoutMs } }
          ));
        }, this.requestTimeoutMs);
      }

      port1.once('message', (raw: unknown) => {
        const settled = this.settle(id);
        if (!settled) return;
        const parsed = responseSchema.safeParse(raw);
        if (!parsed.success) {
          settled.reject(new StorageError(`Malformed replica response to ${command.kind}`, {
            kind: 'serialization',
            operation: command.kind,
          }));
        } else if (parsed.data.ok) {
          settled.resolve(parsed.data.value);
        } else {
          settled.reject(deserializeError(parsed.data.error, command.kind));
        }
      });

      try {
        this.link.send({ id, command, reply: port2 });
      } catch (error) {
        this.settle(id)?.reject(new StorageError(`Failed to send ${command.kind} to replica`, {
          kind: 'serialization',
          operation: command.kind,
          cause: error instanceof Error ? error : undefined,
        }));
      }
    });
  }

  /**
   * Remove a pending request and release its port and timer
   */
  private settle(id: number): PendingRequest | undefined {
    const entry = this.pending.get(id);
    if (!entry) return undefined;
    this.pending.delete(id);
    if (entry.timer) clearTimeout(entry.timer);
    entry.port.close();
    return entry;
  }

  private decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, operation: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new StorageError(`Unexpected replica result for ${operation}`, {
        kind: 'serialization',
        operation,
        context: { issues: result.error.errors.map((issue) => issue.message) },
      });
    }
    return result.data;
  }

  private disconnect(reason: string): void {
    if (this.state.kind === 'disconnected') return;
    if (this.state.kind !== 'failed') {
      this.state = { kind: 'disconnected', reason };
    }
    if (this.pending.size > 0) {
      logger.warn('Replica disconnected with requests pending', { reason, pending: this.pending.size });
    }
    for (const id of [...this.pending.keys()]) {
      const entry = this.settle(id);
      entry?.reject(this.disconnectedError(reason, entry.command));
    }
  }

  private disconnectedError(reason: string, operation?: string): StorageError {
    return new StorageError(`Replica actor disconnected: ${reason}`, {
      kind: 'disconnected',
      operation,
      context: { path: this.path },
    });
  }

  private async shutdownLink(): Promise<void> {
    this.disconnect('closed');
    await this.link.terminate();
  }
}
