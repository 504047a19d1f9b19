/**
 * @fileoverview Operation serialization
 *
 * Batches are written as a JSON array of operation objects and validated on
 * the way back in.
 */

import { z } from 'zod';
import { taskIdSchema } from '../task/schema.js';
import type { JsonValue, Operation } from './types.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const operationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('create'), uuid: taskIdSchema, data: z.record(jsonValueSchema) }),
  z.object({
    type: z.literal('update'),
    uuid: taskIdSchema,
    key: z.string().min(1),
    oldValue: jsonValueSchema,
    newValue: jsonValueSchema,
  }),
  z.object({ type: z.literal('set_field'), uuid: taskIdSchema, key: z.string().min(1), value: z.string() }),
  z.object({ type: z.literal('unset_field'), uuid: taskIdSchema, key: z.string().min(1) }),
  z.object({ type: z.literal('add_tag'), uuid: taskIdSchema, tag: z.string() }),
  z.object({ type: z.literal('remove_tag'), uuid: taskIdSchema, tag: z.string() }),
  z.object({
    type: z.literal('add_annotation'),
    uuid: taskIdSchema,
    entry: z.string(),
    description: z.string(),
  }),
  z.object({ type: z.literal('add_dependency'), uuid: taskIdSchema, dependsOn: taskIdSchema }),
  z.object({ type: z.literal('remove_dependency'), uuid: taskIdSchema, dependsOn: taskIdSchema }),
  z.object({ type: z.literal('delete'), uuid: taskIdSchema }),
  z.object({ type: z.literal('undo_point') }),
]);

export const operationListSchema = z.array(operationSchema);

export function serializeOperations(ops: readonly Operation[]): string {
  return JSON.stringify(ops);
}

/**
 * Parse a serialized batch, throwing a ZodError or SyntaxError on bad input
 */
export function parseOperations(json: string): Operation[] {
  const raw: unknown = JSON.parse(json);
  return operationListSchema.parse(raw);
}
