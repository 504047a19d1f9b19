/**
 * @fileoverview Error Class Hierarchy
 *
 * Every failure surfaced by taskledger is a TaskLedgerError subclass carrying
 * a machine-readable code, a category and a severity. Errors that cross the
 * replica worker boundary are flattened with serializeError() and rebuilt on
 * the caller side with deserializeError().
 */

// =============================================================================
// Error Types
// =============================================================================

export type ErrorCategory =
  | 'configuration'
  | 'storage'
  | 'not_found'
  | 'validation'
  | 'query'
  | 'sync'
  | 'unknown';

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'transient';

export type StorageErrorKind =
  | 'database'
  | 'io'
  | 'serialization'
  | 'not_supported'
  | 'timeout'
  | 'disconnected';

interface TaskLedgerErrorOptions {
  code: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: Error;
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class with structured context for debugging and logging.
 */
export class TaskLedgerError extends Error {
  /** Machine-readable error code (e.g., 'REPLICA_DISCONNECTED') */
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: Date;
  /** Structured context for debugging */
  readonly context: Record<string, unknown>;

  constructor(message: string, options: TaskLedgerErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'TaskLedgerError';
    this.code = options.code;
    this.category = options.category ?? 'unknown';
    this.severity = options.severity ?? 'error';
    this.timestamp = new Date();
    this.context = options.context ?? {};
  }

  get isRetryable(): boolean {
    return this.severity === 'transient';
  }

  /**
   * Convert to structured log format
   */
  toStructuredLog(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        category: this.category,
        severity: this.severity,
        stack: this.stack,
        cause: this.cause instanceof Error ? {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        } : undefined,
      },
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Create a TaskLedgerError from an unknown error value
   */
  static from(error: unknown, additionalContext?: Record<string, unknown>): TaskLedgerError {
    if (error instanceof TaskLedgerError) {
      if (additionalContext) {
        return new TaskLedgerError(error.message, {
          code: error.code,
          category: error.category,
          severity: error.severity,
          context: { ...error.context, ...additionalContext },
          cause: error.cause instanceof Error ? error.cause : undefined,
        });
      }
      return error;
    }

    return new TaskLedgerError(error instanceof Error ? error.message : String(error), {
      code: 'UNKNOWN',
      context: additionalContext,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

// =============================================================================
// Specific Errors
// =============================================================================

/**
 * A setup problem, such as a backend built without a write path.
 * Never retryable.
 */
export class ConfigurationError extends TaskLedgerError {
  constructor(message: string, options: { code?: string; context?: Record<string, unknown>; cause?: Error } = {}) {
    super(message, {
      code: options.code ?? 'CONFIGURATION_ERROR',
      category: 'configuration',
      severity: 'fatal',
      context: options.context,
      cause: options.cause,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Store, database and replica channel failures.
 */
export class StorageError extends TaskLedgerError {
  readonly kind: StorageErrorKind;
  /** Storage operation that failed (e.g. 'save_task', 'commit') */
  readonly operation: string | undefined;

  constructor(
    message: string,
    options: {
      kind: StorageErrorKind;
      operation?: string;
      code?: string;
      context?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, {
      code: options.code ?? defaultStorageCode(options.kind),
      category: 'storage',
      severity: storageSeverity(options.kind),
      context: {
        ...(options.operation ? { operation: options.operation } : {}),
        ...options.context,
      },
      cause: options.cause,
    });
    this.name = 'StorageError';
    this.kind = options.kind;
    this.operation = options.operation;
  }

  /** The actor that raised this can no longer serve requests. */
  get isTerminal(): boolean {
    return this.kind === 'disconnected';
  }
}

function defaultStorageCode(kind: StorageErrorKind): string {
  switch (kind) {
    case 'database': return 'STORAGE_DATABASE_ERROR';
    case 'io': return 'STORAGE_IO_ERROR';
    case 'serialization': return 'STORAGE_SERIALIZATION_ERROR';
    case 'not_supported': return 'STORAGE_NOT_SUPPORTED';
    case 'timeout': return 'REPLICA_TIMEOUT';
    case 'disconnected': return 'REPLICA_DISCONNECTED';
  }
}

function storageSeverity(kind: StorageErrorKind): ErrorSeverity {
  switch (kind) {
    case 'disconnected': return 'fatal';
    case 'not_supported': return 'error';
    case 'serialization': return 'error';
    default: return 'transient';
  }
}

export class TaskNotFoundError extends TaskLedgerError {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task not found: ${taskId}`, {
      code: 'TASK_NOT_FOUND',
      category: 'not_found',
      context: { taskId },
    });
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export class ValidationError extends TaskLedgerError {
  readonly field: string | undefined;
  readonly issues: string[];

  constructor(message: string, options: { field?: string; issues?: string[]; cause?: Error } = {}) {
    super(message, {
      code: 'VALIDATION_ERROR',
      category: 'validation',
      context: { field: options.field, issues: options.issues },
      cause: options.cause,
    });
    this.name = 'ValidationError';
    this.field = options.field;
    this.issues = options.issues ?? [];
  }
}

/**
 * A task hook refused the change
 */
export class HookBlockedError extends TaskLedgerError {
  readonly event: string;
  readonly reason: string;

  constructor(event: string, reason: string) {
    super(`Blocked by ${event} hook: ${reason}`, {
      code: 'HOOK_BLOCKED',
      category: 'validation',
      context: { event, reason },
    });
    this.name = 'HookBlockedError';
    this.event = event;
    this.reason = reason;
  }
}

export class QueryError extends TaskLedgerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'QUERY_ERROR', category: 'query', context });
    this.name = 'QueryError';
  }
}

export class SyncError extends TaskLedgerError {
  constructor(message: string, options: { context?: Record<string, unknown>; cause?: Error } = {}) {
    super(message, {
      code: 'SYNC_ERROR',
      category: 'sync',
      severity: 'transient',
      context: options.context,
      cause: options.cause,
    });
    this.name = 'SyncError';
  }
}

// =============================================================================
// Cross-thread Serialization
// =============================================================================

/**
 * Plain record an error is flattened into before it crosses a MessagePort.
 */
export interface SerializedError {
  name: string;
  code: string;
  message: string;
  kind?: StorageErrorKind;
  field?: string;
  context: Record<string, unknown>;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof StorageError) {
    return { name: error.name, code: error.code, message: error.message, kind: error.kind, context: safeContext(error.context) };
  }
  if (error instanceof ValidationError) {
    return { name: error.name, code: error.code, message: error.message, field: error.field, context: safeContext(error.context) };
  }
  if (error instanceof TaskLedgerError) {
    return { name: error.name, code: error.code, message: error.message, context: safeContext(error.context) };
  }
  if (error instanceof Error) {
    return { name: error.name, code: 'UNKNOWN', message: error.message, context: {} };
  }
  return { name: 'Error', code: 'UNKNOWN', message: String(error), context: {} };
}

/**
 * Rebuild a typed error from its serialized form. Anything that is not a
 * known subclass comes back as a database StorageError.
 */
export function deserializeError(payload: SerializedError, operation?: string): TaskLedgerError {
  switch (payload.name) {
    case 'ValidationError':
      return new ValidationError(payload.message, { field: payload.field });
    case 'ConfigurationError':
      return new ConfigurationError(payload.message, { code: payload.code, context: payload.context });
    case 'TaskNotFoundError':
      return new TaskNotFoundError(String(payload.context.taskId ?? 'unknown'));
    default:
      return new StorageError(payload.message, {
        kind: payload.kind ?? 'database',
        operation,
        code: payload.kind ? payload.code : undefined,
        context: payload.context,
      });
  }
}

// Context values must survive structured clone.
function safeContext(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined || typeof value === 'function' || typeof value === 'symbol') continue;
    result[key] = value instanceof Error ? value.message : value;
  }
  return result;
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Format an error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof TaskLedgerError) {
    return `${error.message} [${error.code}]`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
