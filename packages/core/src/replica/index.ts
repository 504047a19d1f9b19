/**
 * @fileoverview Replica exports
 */

export type { ReplicaWrapper } from './wrapper.js';

export {
  ReplicaActor,
  WorkerLink,
  PortLink,
  DEFAULT_STARTUP_TIMEOUT_MS,
  type ReplicaLink,
  type ReplicaActorOptions,
  type ReplicaTransport,
} from './actor.js';
export { openEmbeddedReplica, type EmbeddedReplicaOptions } from './factory.js';
export { MemoryReplica } from './memory-replica.js';
export {
  DirectReplicaReader,
  ActorReplicaReader,
  type ReplicaReader,
  type ReplicaReadPath,
} from './reader.js';

export { ReplicaHost, type ReplicaHostOptions } from './host.js';
export { serveReplica } from './serve.js';
export type {
  ReplicaCommand,
  ReplicaCommandKind,
  ReplicaRequest,
  ReplicaResponse,
  ReplicaStartupMessage,
  ReplicaWorkerData,
} from './protocol.js';

export { ReplicaDatabase, type ReplicaDatabaseOptions } from './database.js';
export { ReplicaStore, type ReplicaPrimitive, type StoredTask, type TaskDataSource } from './store.js';
export { ReplicaTaskSnapshot } from './snapshot.js';
export { mapOperations, parseTaskData } from './field-mapping.js';
export { type TaskData, isReservedField } from './fields.js';
export { MigrationRunner, runMigrations, type Migration, type MigrationResult } from './migrations/index.js';
