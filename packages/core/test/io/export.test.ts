/**
 * @fileoverview Tests for task export formats
 */
import { describe, it, expect } from 'vitest';
import { exportTasks, formatTasks } from '../../src/io/export.js';
import { parseCsv, splitCsvLine } from '../../src/io/csv.js';
import { parseLegacy } from '../../src/io/legacy.js';
import { MemoryReplica } from '../../src/replica/memory-replica.js';
import { ReplicaStorageBackend } from '../../src/storage/replica-backend.js';
import { parseTasks } from '../../src/task/schema.js';
import { createTask } from '../../src/task/task.js';
import { TaskId } from '../../src/task/types.js';

const ID_A = TaskId('a7a7a7a7-0000-4000-8000-0000000000a7');
const ID_B = TaskId('b8b8b8b8-0000-4000-8000-0000000000b8');
const ENTRY = '2026-01-01T00:00:00.000Z';
const DUE = '2026-01-15T09:30:00.000Z';

const groceries = createTask('Buy milk, eggs', {
  uuid: ID_A,
  entry: ENTRY,
  project: 'Home',
  priority: 'H',
  due: DUE,
  tags: ['errand', 'shop'],
  annotations: [{ entry: ENTRY, description: 'ask for "organic"' }],
});
const report = createTask('Old report', { uuid: ID_B, entry: ENTRY, status: 'completed', end: DUE });

describe('formatTasks', () => {
  describe('csv', () => {
    it('should write a header and one quoted row per task', () => {
      expect(formatTasks([groceries, report], { format: 'csv' })).toBe(
        'uuid,description,status,project,priority,due,entry,modified,end,tags,annotations\n'
        + `${ID_A},"Buy milk, eggs",pending,Home,H,${DUE},${ENTRY},${ENTRY},,errand shop,"ask for ""organic"""\n`
        + `${ID_B},Old report,completed,,,,${ENTRY},${ENTRY},${DUE},,\n`
      );
    });

    it('should read back the exported columns', () => {
      const { tasks, errors } = parseCsv(formatTasks([groceries, report], { format: 'csv' }));

      expect(errors).toEqual([]);
      expect(tasks).toEqual([{ ...groceries, annotations: [] }, report]);
    });

    it('should split quoted fields', () => {
      expect(splitCsvLine('a,"b, c","say ""hi""",')).toEqual(['a', 'b, c', 'say "hi"', '']);
    });
  });

  describe('legacy', () => {
    it('should write one bracketed line per task', () => {
      expect(formatTasks([groceries], { format: 'legacy' })).toBe(
        `[description:"Buy milk, eggs" entry:"1767225600" status:"pending" uuid:"${ID_A}" project:"Home"`
        + ' priority:"H" due:"1768469400" modified:"1767225600" tags:"errand,shop"'
        + ' annotation_1767225600:"ask for \\"organic\\""]\n'
      );
    });

    it('should read back every field it writes', () => {
      const { tasks, errors } = parseLegacy(formatTasks([groceries, report], { format: 'legacy' }));

      expect(errors).toEqual([]);
      expect(tasks).toEqual([groceries, report]);
    });
  });

  describe('json', () => {
    it('should drop the fields left out', () => {
      expect(JSON.parse(formatTasks([report], { includeTags: false }))).toEqual([{
        uuid: ID_B,
        description: 'Old report',
        status: 'completed',
        entry: ENTRY,
        modified: ENTRY,
        end: DUE,
        annotations: [],
        depends: [],
        udas: {},
        active: false,
      }]);
    });
  });

  it('should leave out completed and deleted tasks on request', () => {
    const lines = formatTasks([groceries, report], { format: 'legacy', includeCompleted: false }).split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[description:"Buy milk, eggs" /);
    expect(lines[1]).toBe('');
  });
});

describe('exportTasks', () => {
  it('should export everything in the backend as JSON', async () => {
    const backend = new ReplicaStorageBackend('memory', new MemoryReplica(), { readPath: 'actor' });
    await backend.initialize();
    try {
      await backend.saveTask(groceries);
      await backend.saveTask(report);

      expect(parseTasks(await exportTasks(backend))).toEqual([groceries, report]);
    } finally {
      await backend.close();
    }
  });
});
