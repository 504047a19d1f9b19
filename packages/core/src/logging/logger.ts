/**
 * @fileoverview Centralized logging for taskledger
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output under production and tests
 * - Pretty printing for interactive development
 * - Component child loggers
 */

import pino from 'pino';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  taskId?: string;
  replicaPath?: string;
  [key: string]: unknown;
}

// =============================================================================
// Logger Factory
// =============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const level = resolveLevel(options);
  const pretty = options.pretty
    ?? (process.env.NODE_ENV !== 'production' && process.env.VITEST === undefined);

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'taskledger',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(pinoOptions);
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class TaskLogger {
  private readonly pino: pino.Logger;

  constructor(options: LoggerOptions = {}, base?: pino.Logger) {
    this.pino = base ?? createPinoLogger(options);
  }

  /**
   * Create a child logger; `context` is bound to every line it writes
   */
  child(context: LogContext): TaskLogger {
    return new TaskLogger({}, this.pino.child(context));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  /**
   * Log at error level. An Error is logged under `err` so pino serializes its stack.
   */
  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  fatal(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.fatal({ err: error }, msg);
    } else {
      this.pino.fatal(error ?? {}, msg);
    }
  }

  /**
   * Start timing `label`. The returned function writes one debug line with
   * the elapsed milliseconds and any extra data.
   */
  startTimer(label: string): (data?: Record<string, unknown>) => void {
    const start = performance.now();
    return (data) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.pino.debug({ ...data, durationMs }, `${label} completed`);
    };
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: TaskLogger | null = null;

/**
 * Get the default logger instance. Options only apply on first call.
 */
export function getLogger(options?: LoggerOptions): TaskLogger {
  if (!defaultLogger) {
    defaultLogger = new TaskLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): TaskLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
