/**
 * @fileoverview Sync exports
 */

export { syncAndReload, type SyncTarget } from './sync.js';
export { SystemProcessRunner, type ProcessRunner, type ProcessResult } from './process-runner.js';
