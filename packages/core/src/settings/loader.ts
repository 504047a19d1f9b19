/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from ~/.taskledger/settings.json, validates them and
 * merges them over the defaults, then applies environment overrides.
 * Provides a cached singleton for the rest of the library.
 */

import * as fs from 'fs';
import * as fsAsync from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import type { BackendKind, TaskLedgerSettings } from './types.js';

const logger = createLogger('settings');

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.taskledger';
const SETTINGS_FILE = 'settings.json';

// =============================================================================
// Schema
// =============================================================================

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const userSettingsSchema = z.object({
  dataDir: z.string().min(1).optional(),
  backend: z.enum(['replica', 'file']).optional(),
  replica: z.object({
    fileName: z.string().min(1),
    startupTimeoutMs: positiveInt,
    requestTimeoutMs: nonNegativeInt,
    transport: z.enum(['worker', 'inline']),
    busyTimeoutMs: nonNegativeInt,
    enableWAL: z.boolean(),
    readPath: z.enum(['direct', 'actor']),
  }).partial().optional(),
  file: z.object({
    fileName: z.string().min(1),
    backupDirName: z.string().min(1),
  }).partial().optional(),
  contexts: z.object({
    active: z.string().min(1),
    definitions: z.record(z.object({ read: z.string(), write: z.string().optional() })),
  }).partial().optional(),
  sync: z.object({
    command: z.string().min(1),
    args: z.array(z.string()),
    timeoutMs: positiveInt,
  }).partial().optional(),
});

export type UserSettings = z.infer<typeof userSettingsSchema>;

// =============================================================================
// Merge Utilities
// =============================================================================

/**
 * Merge user settings over a base, section by section. Arrays and context
 * definitions are replaced per key, not merged.
 */
export function mergeSettings(base: TaskLedgerSettings, user: UserSettings): TaskLedgerSettings {
  return {
    dataDir: user.dataDir ?? base.dataDir,
    backend: user.backend ?? base.backend,
    replica: { ...base.replica, ...user.replica },
    file: { ...base.file, ...user.file },
    contexts: {
      active: user.contexts?.active ?? base.contexts.active,
      definitions: { ...base.contexts.definitions, ...user.contexts?.definitions },
    },
    sync: { ...base.sync, ...user.sync },
  };
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath === '~') return homeDir;
  if (filePath.startsWith('~/')) return path.join(homeDir, filePath.slice(2));
  return filePath;
}

// =============================================================================
// Settings Loading
// =============================================================================

/**
 * Get the path to the settings file
 */
export function getSettingsPath(homeDir?: string): string {
  return path.join(getSettingsDir(homeDir), SETTINGS_FILE);
}

/**
 * Get the path to the settings directory
 */
export function getSettingsDir(homeDir?: string): string {
  const home = homeDir ?? os.homedir();
  return path.join(home, SETTINGS_DIR);
}

function parseUserSettings(content: string, filePath: string): UserSettings {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Settings file ${filePath} is not valid JSON`, {
      code: 'SETTINGS_PARSE_ERROR',
      context: { path: filePath },
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = userSettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid settings in ${filePath}: ${result.error.errors[0]?.message ?? 'unknown issue'}`, {
      code: 'SETTINGS_INVALID',
      context: {
        path: filePath,
        issues: result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      },
    });
  }
  return result.data;
}

/**
 * Load user settings from file
 * @returns User settings or null if the file doesn't exist
 * @throws ConfigurationError if the file cannot be parsed or validated
 */
export function loadUserSettings(settingsPath?: string): UserSettings | null {
  const filePath = settingsPath ?? getSettingsPath();
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return parseUserSettings(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Load user settings from file (async)
 * @returns User settings or null if the file doesn't exist
 */
export async function loadUserSettingsAsync(settingsPath?: string): Promise<UserSettings | null> {
  const filePath = settingsPath ?? getSettingsPath();
  let content: string;
  try {
    content = await fsAsync.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigurationError(`Failed to read settings from ${filePath}`, {
      code: 'SETTINGS_READ_ERROR',
      context: { path: filePath },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseUserSettings(content, filePath);
}

function finalize(user: UserSettings | null): TaskLedgerSettings {
  const settings = applyEnvOverrides(mergeSettings(DEFAULT_SETTINGS, user ?? {}));
  return { ...settings, dataDir: expandHome(settings.dataDir) };
}

/**
 * Load and merge settings with defaults and environment overrides
 */
export function loadSettings(settingsPath?: string): TaskLedgerSettings {
  return finalize(loadUserSettings(settingsPath));
}

/**
 * Load and merge settings with defaults and environment overrides (async)
 */
export async function loadSettingsAsync(settingsPath?: string): Promise<TaskLedgerSettings> {
  return finalize(await loadUserSettingsAsync(settingsPath));
}

// =============================================================================
// Singleton Settings Instance
// =============================================================================

let cachedSettings: TaskLedgerSettings | null = null;

/** Custom settings path (for testing) */
let customSettingsPath: string | undefined;

/**
 * Get the current settings (loads and caches on first call)
 */
export function getSettings(): TaskLedgerSettings {
  if (!cachedSettings) {
    cachedSettings = loadSettings(customSettingsPath);
    logger.debug('Settings loaded', { path: customSettingsPath ?? getSettingsPath() });
  }
  return cachedSettings;
}

/**
 * Reload settings from disk
 */
export function reloadSettings(): TaskLedgerSettings {
  cachedSettings = loadSettings(customSettingsPath);
  return cachedSettings;
}

/**
 * Set a custom settings path (mainly for testing)
 * Also clears the cache to force reload
 */
export function setSettingsPath(settingsPath: string | undefined): void {
  customSettingsPath = settingsPath;
  cachedSettings = null;
}

/**
 * Clear the settings cache (forces reload on next access)
 */
export function clearSettingsCache(): void {
  cachedSettings = null;
}

// =============================================================================
// Environment Variable Overrides
// =============================================================================

function parseIntegerEnv(name: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${value}"`, {
      code: 'SETTINGS_INVALID_ENV',
      context: { variable: name },
    });
  }
  return Number(value);
}

function parseBackendEnv(value: string): BackendKind {
  if (value === 'replica' || value === 'file') return value;
  throw new ConfigurationError(`TASKLEDGER_BACKEND must be "replica" or "file", got "${value}"`, {
    code: 'SETTINGS_INVALID_ENV',
    context: { variable: 'TASKLEDGER_BACKEND' },
  });
}

/**
 * Apply environment variable overrides to settings
 * Environment variables take precedence over file settings
 */
export function applyEnvOverrides(
  settings: TaskLedgerSettings,
  env: NodeJS.ProcessEnv = process.env
): TaskLedgerSettings {
  const result = { ...settings, replica: { ...settings.replica } };

  if (env.TASKLEDGER_DATA_DIR) {
    result.dataDir = env.TASKLEDGER_DATA_DIR;
  }
  if (env.TASKLEDGER_BACKEND) {
    result.backend = parseBackendEnv(env.TASKLEDGER_BACKEND);
  }
  if (env.TASKLEDGER_STARTUP_TIMEOUT_MS) {
    result.replica.startupTimeoutMs = parseIntegerEnv('TASKLEDGER_STARTUP_TIMEOUT_MS', env.TASKLEDGER_STARTUP_TIMEOUT_MS);
  }
  if (env.TASKLEDGER_REQUEST_TIMEOUT_MS) {
    result.replica.requestTimeoutMs = parseIntegerEnv('TASKLEDGER_REQUEST_TIMEOUT_MS', env.TASKLEDGER_REQUEST_TIMEOUT_MS);
  }

  return result;
}

// =============================================================================
// Path Resolution Utilities
// =============================================================================

/**
 * Resolve a file name against the data directory. Absolute names are
 * returned unchanged.
 */
export function resolveDataPath(settings: TaskLedgerSettings, fileName: string): string {
  if (path.isAbsolute(fileName)) {
    return fileName;
  }
  return path.join(expandHome(settings.dataDir), fileName);
}
