/**
 * @fileoverview Tests for sync and reload
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, renameSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { SyncError } from '../../src/errors/index.js';
import { buildSaveBatch } from '../../src/operations/batch-builder.js';
import { openEmbeddedReplica } from '../../src/replica/factory.js';
import { ReplicaHost } from '../../src/replica/host.js';
import { MemoryReplica } from '../../src/replica/memory-replica.js';
import type { SyncSettings } from '../../src/settings/types.js';
import { ReplicaStorageBackend } from '../../src/storage/replica-backend.js';
import type { ProcessResult, ProcessRunner } from '../../src/sync/process-runner.js';
import { syncAndReload } from '../../src/sync/sync.js';
import { createTask } from '../../src/task/task.js';
import { TaskId } from '../../src/task/types.js';

class FakeRunner implements ProcessRunner {
  readonly calls: Array<{ command: string; args: readonly string[]; timeoutMs?: number }> = [];

  constructor(
    private readonly outcome: ProcessResult | Error,
    private readonly effect?: () => void
  ) {}

  async run(command: string, args: readonly string[], timeoutMs?: number): Promise<ProcessResult> {
    this.calls.push({ command, args, timeoutMs });
    if (this.outcome instanceof Error) throw this.outcome;
    this.effect?.();
    return this.outcome;
  }
}

const settings: SyncSettings = { command: 'task', args: ['sync'], timeoutMs: 1000 };
const DB_PATH = '/data/replica.sqlite3';

describe('syncAndReload', () => {
  let replica: MemoryReplica;
  let backend: ReplicaStorageBackend;

  beforeEach(async () => {
    replica = new MemoryReplica();
    backend = new ReplicaStorageBackend(DB_PATH, replica, { readPath: 'actor' });
    await backend.initialize();
  });

  afterEach(async () => {
    await backend.close();
  });

  it('should run the command and reopen the replica', async () => {
    const runner = new FakeRunner({ exitCode: 0, stdout: 'Sync successful.', stderr: '' });

    const result = await syncAndReload(backend, runner, settings);

    expect(result.stdout).toBe('Sync successful.');
    expect(runner.calls).toEqual([{ command: 'task', args: ['sync'], timeoutMs: 1000 }]);
    expect(replica.openedPaths).toEqual([DB_PATH]);
  });

  it('should not reopen after a failed run', async () => {
    const runner = new FakeRunner({ exitCode: 2, stdout: '', stderr: 'server unreachable' });

    let caught: unknown;
    try {
      await syncAndReload(backend, runner, settings);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SyncError);
    expect(caught).toMatchObject({
      message: 'task exited with code 2',
      code: 'SYNC_ERROR',
      context: { command: 'task', args: ['sync'], exitCode: 2, stderr: 'server unreachable' },
    });
    expect(replica.openedPaths).toEqual([]);
  });

  it('should report a command that cannot start', async () => {
    const runner = new FakeRunner(new Error('spawn task ENOENT'));

    await expect(syncAndReload(backend, runner, settings))
      .rejects.toThrow('Failed to run task: spawn task ENOENT');
    expect(replica.openedPaths).toEqual([]);
  });

  it('should surface a reopen failure', async () => {
    const runner = new FakeRunner({ exitCode: 0, stdout: '', stderr: '' });
    replica.failNext('open', new Error('locked'));

    await expect(syncAndReload(backend, runner, settings)).rejects.toThrow('locked');
  });
});

describe('syncAndReload with a store file', () => {
  const LOCAL_ID = TaskId('c3c3c3c3-0000-4000-8000-0000000000c3');
  const SYNCED_ID = TaskId('d4d4d4d4-0000-4000-8000-0000000000d4');
  const LATER_ID = TaskId('e5e5e5e5-0000-4000-8000-0000000000e5');
  const ENTRY = '2026-07-01T08:00:00.000Z';

  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(path.join(tmpdir(), 'sync-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should show what the command wrote once reloaded', async () => {
    const dbPath = path.join(tmpDir, 'replica.sqlite3');
    const actor = await openEmbeddedReplica(dbPath, { transport: 'inline', enableWAL: false });
    const fileBackend = new ReplicaStorageBackend(dbPath, actor);
    await fileBackend.initialize();

    // The command writes a fresh store and swaps it in for the open one.
    const runner = new FakeRunner({ exitCode: 0, stdout: '', stderr: '' }, () => {
      const incoming = path.join(tmpDir, 'incoming.sqlite3');
      const writer = new ReplicaHost({ enableWAL: false });
      writer.open(incoming);
      writer.commit(buildSaveBatch(null, createTask('From the server', { uuid: SYNCED_ID, entry: ENTRY })));
      writer.close();
      renameSync(incoming, dbPath);
    });

    try {
      await fileBackend.saveTask(createTask('Local only', { uuid: LOCAL_ID, entry: ENTRY }));

      await syncAndReload(fileBackend, runner, settings);

      expect((await fileBackend.loadTask(SYNCED_ID))?.description).toBe('From the server');
      expect(await fileBackend.loadTask(LOCAL_ID)).toBeNull();
      expect(await actor.readTask(SYNCED_ID)).toMatchObject({ description: 'From the server' });

      await fileBackend.saveTask(createTask('After sync', { uuid: LATER_ID, entry: ENTRY }));
      expect((await fileBackend.loadAllTasks()).map((t) => t.description)).toEqual(['From the server', 'After sync']);
    } finally {
      await fileBackend.close();
    }
  });
});
