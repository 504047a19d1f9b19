/**
 * @fileoverview JSON file storage
 *
 * Keeps every task in memory and rewrites <dataDir>/tasks.json after each
 * change (temp file, then rename). Changes run one at a time, and a change
 * whose write fails is rolled back in memory. Backups are timestamped copies
 * under <dataDir>/backups/.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ZodError } from 'zod';
import { StorageError, TaskNotFoundError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { applyQuery } from '../query/filter.js';
import type { TaskQuery, UserContext } from '../query/types.js';
import { parseTasks, serializeTasks } from '../task/schema.js';
import { cloneTask } from '../task/task.js';
import type { Task, TaskId } from '../task/types.js';
import type { StorageBackend } from './types.js';

const logger = createLogger('storage:file');

export interface FileStorageBackendOptions {
  fileName?: string;
  backupDirName?: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * yyyyMMdd_HHmmss in UTC
 */
export function backupTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
    + `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

export class FileStorageBackend implements StorageBackend {
  readonly filePath: string;
  readonly backupDir: string;
  private tasks = new Map<TaskId, Task>();
  private initialized = false;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    readonly dataDir: string,
    options: FileStorageBackendOptions = {}
  ) {
    this.filePath = path.join(dataDir, options.fileName ?? 'tasks.json');
    this.backupDir = path.join(dataDir, options.backupDirName ?? 'backups');
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      await fs.mkdir(this.backupDir, { recursive: true });
    } catch (error) {
      throw this.ioError(`Failed to create data directory ${this.dataDir}`, 'initialize', error);
    }

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw this.ioError(`Failed to read ${this.filePath}`, 'initialize', error);
      }
      content = '[]';
      try {
        await this.writeAtomically(content);
      } catch (writeError) {
        throw this.ioError(`Failed to create ${this.filePath}`, 'initialize', writeError);
      }
    }

    this.tasks = new Map(this.parse(content, 'initialize').map((task) => [task.uuid, task]));
    this.initialized = true;
    logger.info('File backend initialized', { path: this.filePath, tasks: this.tasks.size });
  }

  async saveTask(task: Task): Promise<void> {
    this.requireInitialized('save_task');
    const copy = cloneTask(task);
    await this.change('save_task', (tasks) => {
      tasks.set(copy.uuid, copy);
    });
  }

  async loadTask(uuid: TaskId): Promise<Task | null> {
    this.requireInitialized('load_task');
    const task = this.tasks.get(uuid);
    return task ? cloneTask(task) : null;
  }

  async deleteTask(uuid: TaskId): Promise<void> {
    this.requireInitialized('delete_task');
    await this.change('delete_task', (tasks) => {
      if (!tasks.delete(uuid)) {
        throw new TaskNotFoundError(uuid);
      }
    });
  }

  async loadAllTasks(): Promise<Task[]> {
    this.requireInitialized('load_all_tasks');
    return [...this.tasks.values()].map(cloneTask);
  }

  async queryTasks(query: TaskQuery, activeContext?: UserContext | null): Promise<Task[]> {
    return applyQuery(await this.loadAllTasks(), query, activeContext);
  }

  /**
   * Write a timestamped copy under the backup directory
   *
   * @returns the backed-up JSON text
   */
  async backup(): Promise<string> {
    this.requireInitialized('backup');
    const content = serializeTasks([...this.tasks.values()]);
    const backupPath = path.join(this.backupDir, `tasks_${backupTimestamp(new Date())}.json`);
    try {
      await fs.writeFile(backupPath, content, 'utf-8');
    } catch (error) {
      throw this.ioError(`Failed to write backup ${backupPath}`, 'backup', error);
    }
    logger.info('Backup written', { path: backupPath, tasks: this.tasks.size });
    return content;
  }

  async restore(data: string): Promise<void> {
    this.requireInitialized('restore');
    const tasks = this.parse(data, 'restore');
    await this.change('restore', (current) => {
      current.clear();
      for (const task of tasks) current.set(task.uuid, task);
    });
    logger.info('Backup restored', { tasks: tasks.length });
  }

  async close(): Promise<void> {
    this.initialized = false;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private parse(content: string, operation: string): Task[] {
    try {
      return parseTasks(content);
    } catch (error) {
      const detail = error instanceof ZodError
        ? error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        : error instanceof Error ? error.message : String(error);
      throw new StorageError(`Invalid task data: ${detail}`, {
        kind: 'serialization',
        operation,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Apply `mutate` to the task map and rewrite the file, after every earlier
   * change has finished. The map is put back as it was if either step throws.
   */
  private change(operation: string, mutate: (tasks: Map<TaskId, Task>) => void): Promise<void> {
    const run = this.writes.then(async () => {
      const previous = new Map(this.tasks);
      try {
        mutate(this.tasks);
        await this.writeAtomically(serializeTasks([...this.tasks.values()]));
      } catch (error) {
        this.tasks = previous;
        if (error instanceof TaskNotFoundError) throw error;
        throw this.ioError(`Failed to write ${this.filePath}`, operation, error);
      }
    });
    // The caller sees the failure through `run`; the queue moves on.
    this.writes = run.catch(() => undefined);
    return run;
  }

  private async writeAtomically(content: string): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, this.filePath);
  }

  private requireInitialized(operation: string): void {
    if (!this.initialized) {
      throw new StorageError('File backend is not initialized', { kind: 'io', operation });
    }
  }

  private ioError(message: string, operation: string, error: unknown): StorageError {
    return new StorageError(`${message}: ${error instanceof Error ? error.message : String(error)}`, {
      kind: 'io',
      operation,
      context: { path: this.filePath },
      cause: error instanceof Error ? error : undefined,
    });
  }
}
