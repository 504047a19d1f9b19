/**
 * @fileoverview Task manager exports
 */

export { TaskManager } from './task-manager.js';
export type { AddTaskOptions, TaskUpdate, TaskManagerOptions, ValidationReport } from './types.js';
