/**
 * @fileoverview Settings exports
 */

export type {
  BackendKind,
  ContextDefinition,
  ContextSettings,
  FileBackendSettings,
  ReplicaSettings,
  SyncSettings,
  TaskLedgerSettings,
} from './types.js';
export { DEFAULT_SETTINGS } from './defaults.js';
export {
  userSettingsSchema,
  mergeSettings,
  expandHome,
  getSettingsPath,
  getSettingsDir,
  loadUserSettings,
  loadUserSettingsAsync,
  loadSettings,
  loadSettingsAsync,
  getSettings,
  reloadSettings,
  setSettingsPath,
  clearSettingsCache,
  applyEnvOverrides,
  resolveDataPath,
  type UserSettings,
} from './loader.js';
