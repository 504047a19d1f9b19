/**
 * @fileoverview Task domain exports
 */

export * from './types.js';
export * from './task.js';
export {
  taskSchema,
  taskIdSchema,
  annotationSchema,
  udaValueSchema,
  recurrenceSchema,
  parseTasks,
  serializeTasks,
} from './schema.js';
export { validateTask, findTaskIssues, type TaskValidationIssue } from './validation.js';
