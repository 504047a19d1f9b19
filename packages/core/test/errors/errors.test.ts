/**
 * @fileoverview Tests for the error hierarchy and its cross-thread form
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  StorageError,
  TaskLedgerError,
  TaskNotFoundError,
  ValidationError,
  deserializeError,
  formatError,
  serializeError,
} from '../../src/errors/index.js';

describe('Errors', () => {
  describe('StorageError', () => {
    it('should derive code and severity from the kind', () => {
      const timeout = new StorageError('slow', { kind: 'timeout', operation: 'commit' });
      expect(timeout.code).toBe('REPLICA_TIMEOUT');
      expect(timeout.isRetryable).toBe(true);
      expect(timeout.isTerminal).toBe(false);
      expect(timeout.context).toEqual({ operation: 'commit' });

      const gone = new StorageError('gone', { kind: 'disconnected' });
      expect(gone.code).toBe('REPLICA_DISCONNECTED');
      expect(gone.severity).toBe('fatal');
      expect(gone.isTerminal).toBe(true);
    });

    it('should keep an explicit code', () => {
      expect(new StorageError('bad tag', { kind: 'serialization', code: 'REPLICA_MAPPING_ERROR' }).code)
        .toBe('REPLICA_MAPPING_ERROR');
    });
  });

  describe('serialization', () => {
    it('should carry a storage error across with its kind and code', () => {
      const original = new StorageError('disk full', {
        kind: 'io',
        operation: 'commit',
        context: { path: '/data/replica.sqlite3', dropped: undefined },
      });

      const payload = serializeError(original);
      expect(payload).toEqual({
        name: 'StorageError',
        code: 'STORAGE_IO_ERROR',
        message: 'disk full',
        kind: 'io',
        context: { operation: 'commit', path: '/data/replica.sqlite3' },
      });

      const rebuilt = deserializeError(payload, 'commit');
      expect(rebuilt).toBeInstanceOf(StorageError);
      expect(rebuilt).toMatchObject({ kind: 'io', code: 'STORAGE_IO_ERROR', operation: 'commit', message: 'disk full' });
    });

    it('should rebuild validation and lookup errors as their own classes', () => {
      const validation = deserializeError(serializeError(new ValidationError('bad', { field: 'tags' })));
      expect(validation).toBeInstanceOf(ValidationError);
      expect(validation).toMatchObject({ field: 'tags' });

      const notFound = deserializeError(serializeError(new TaskNotFoundError('abc')));
      expect(notFound).toBeInstanceOf(TaskNotFoundError);
      expect(notFound.message).toBe('Task not found: abc');

      const config = deserializeError(serializeError(new ConfigurationError('no path', { code: 'REPLICA_WRAPPER_MISSING' })));
      expect(config).toBeInstanceOf(ConfigurationError);
      expect(config.code).toBe('REPLICA_WRAPPER_MISSING');
    });

    it('should turn anything else into a database error', () => {
      const payload = serializeError(new TypeError('boom'));
      expect(payload).toEqual({ name: 'TypeError', code: 'UNKNOWN', message: 'boom', context: {} });

      const rebuilt = deserializeError(payload, 'read_task');
      expect(rebuilt).toBeInstanceOf(StorageError);
      expect(rebuilt).toMatchObject({ kind: 'database', code: 'STORAGE_DATABASE_ERROR', operation: 'read_task' });
      expect(serializeError('plain')).toEqual({ name: 'Error', code: 'UNKNOWN', message: 'plain', context: {} });
    });
  });

  describe('TaskLedgerError.from', () => {
    it('should wrap foreign errors and extend context', () => {
      const wrapped = TaskLedgerError.from(new Error('raw'), { step: 'load' });
      expect(wrapped.code).toBe('UNKNOWN');
      expect(wrapped.context).toEqual({ step: 'load' });

      const known = new TaskNotFoundError('abc');
      expect(TaskLedgerError.from(known)).toBe(known);
      expect(TaskLedgerError.from(known, { step: 'load' }).context).toEqual({ taskId: 'abc', step: 'load' });
    });
  });

  describe('formatError', () => {
    it('should append the code for known errors', () => {
      expect(formatError(new TaskNotFoundError('abc'))).toBe('Task not found: abc [TASK_NOT_FOUND]');
      expect(formatError(new Error('plain'))).toBe('plain');
      expect(formatError(42)).toBe('42');
    });
  });
});
