/**
 * @fileoverview Zod schemas for task persistence
 *
 * The file backend and its backups store tasks as a JSON array in this shape.
 */

import { z } from 'zod';
import { PRIORITIES, TASK_STATUSES, TaskId, isTaskId, type Task } from './types.js';

const isoTimestamp = z.string().datetime({ offset: true });

export const taskIdSchema = z.string().refine(isTaskId, { message: 'Invalid UUID' }).transform(TaskId);

export const annotationSchema = z.object({
  entry: isoTimestamp,
  description: z.string(),
});

export const udaValueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('string'), value: z.string() }),
  z.object({ type: z.literal('number'), value: z.number() }),
  z.object({ type: z.literal('date'), value: isoTimestamp }),
]);

// The stored form marks periodic patterns with a leading P.
export const recurrenceSchema = z.object({
  pattern: z.string().min(1),
  periodic: z.boolean(),
}).refine((recur) => recur.periodic || !recur.pattern.startsWith('P'), {
  message: 'a fixed recurrence pattern cannot start with "P"',
});

export const taskSchema = z.object({
  uuid: taskIdSchema,
  description: z.string(),
  status: z.enum(TASK_STATUSES),
  entry: isoTimestamp,
  modified: isoTimestamp.optional(),
  due: isoTimestamp.optional(),
  scheduled: isoTimestamp.optional(),
  wait: isoTimestamp.optional(),
  end: isoTimestamp.optional(),
  start: isoTimestamp.optional(),
  priority: z.enum(PRIORITIES).optional(),
  project: z.string().optional(),
  tags: z.array(z.string()).default([]),
  annotations: z.array(annotationSchema).default([]),
  depends: z.array(taskIdSchema).default([]),
  udas: z.record(udaValueSchema).default({}),
  recur: recurrenceSchema.optional(),
  parent: taskIdSchema.optional(),
  mask: z.string().optional(),
  active: z.boolean().default(false),
});

const taskListSchema = z.array(taskSchema);

/**
 * Parse a JSON task array, throwing a ZodError or SyntaxError on bad input
 */
export function parseTasks(json: string): Task[] {
  const raw: unknown = JSON.parse(json);
  return taskListSchema.parse(raw);
}

export function serializeTasks(tasks: readonly Task[]): string {
  return JSON.stringify(tasks, null, 2);
}
