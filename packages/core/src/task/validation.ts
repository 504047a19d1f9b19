/**
 * @fileoverview Task shape validation
 *
 * Runs in the task manager before anything reaches a storage backend.
 */

import { ValidationError } from '../errors/index.js';
import { isReservedField } from '../replica/fields.js';
import type { Task } from './types.js';

const WHITESPACE = /\s/;

export interface TaskValidationIssue {
  field: string;
  message: string;
}

/**
 * Collect every problem with a task without throwing
 */
export function findTaskIssues(task: Task): TaskValidationIssue[] {
  const issues: TaskValidationIssue[] = [];

  if (task.description.trim().length === 0) {
    issues.push({ field: 'description', message: 'description must not be empty' });
  }

  for (const tag of task.tags) {
    if (tag.length === 0 || WHITESPACE.test(tag)) {
      issues.push({ field: 'tags', message: `invalid tag "${tag}"` });
    }
  }

  if (task.project !== undefined && (task.project.length === 0 || WHITESPACE.test(task.project))) {
    issues.push({ field: 'project', message: `invalid project "${task.project}"` });
  }

  if (task.depends.includes(task.uuid)) {
    issues.push({ field: 'depends', message: 'task cannot depend on itself' });
  }

  if (task.recur && !task.recur.periodic && task.recur.pattern.startsWith('P')) {
    issues.push({ field: 'recur', message: 'a fixed recurrence pattern cannot start with "P"' });
  }

  if (task.end !== undefined && task.status !== 'completed' && task.status !== 'deleted') {
    issues.push({ field: 'end', message: `end date set on a ${task.status} task` });
  }

  for (const annotation of task.annotations) {
    if (annotation.description.trim().length === 0) {
      issues.push({ field: 'annotations', message: 'annotation description must not be empty' });
    } else if (annotation.description.includes('\n')) {
      issues.push({ field: 'annotations', message: 'annotation description must be a single line' });
    }
  }

  for (const name of Object.keys(task.udas)) {
    if (isReservedField(name) || WHITESPACE.test(name) || name.length === 0) {
      issues.push({ field: 'udas', message: `"${name}" cannot be used as an attribute name` });
    }
  }

  return issues;
}

/**
 * Throw a ValidationError naming the first offending field
 */
export function validateTask(task: Task): void {
  const issues = findTaskIssues(task);
  const first = issues[0];
  if (first) {
    throw new ValidationError(`Invalid task ${task.uuid}: ${first.message}`, {
      field: first.field,
      issues: issues.map((issue) => `${issue.field}: ${issue.message}`),
    });
  }
}
