/**
 * @fileoverview Operation model and batch builder exports
 */

export * from './types.js';
export {
  jsonValueSchema,
  operationSchema,
  operationListSchema,
  serializeOperations,
  parseOperations,
} from './schema.js';
export {
  taskToData,
  createFromTask,
  computeUpdateOps,
  buildSaveBatch,
  buildDeleteBatch,
} from './batch-builder.js';
