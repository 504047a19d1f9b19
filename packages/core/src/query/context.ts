/**
 * @fileoverview User contexts
 *
 * A context is a named pair of filter expressions from settings. Only the
 * project term of a filter is understood here: it narrows reads to that
 * project and assigns it to tasks created while the context is active.
 */

import { ConfigurationError } from '../errors/index.js';
import type { TaskLedgerSettings } from '../settings/types.js';
import type { UserContext } from './types.js';

const QUOTES = /^["']+|["']+$/g;

/**
 * Extract the project named by the first `project:X`, `project=X` or
 * `project==X` term of a filter expression. Quotes around X are dropped.
 *
 * @returns null when no term names a project
 */
export function parseProjectFromFilter(filter: string): string | null {
  for (const token of filter.split(/\s+/)) {
    const match = /^project(?::|==?)(.*)$/.exec(token);
    if (!match) continue;
    const value = (match[1] ?? '').replace(QUOTES, '');
    if (value.length > 0) return value;
  }
  return null;
}

/**
 * Build contexts from settings, marking the active one.
 *
 * @throws ConfigurationError for an empty read filter, or a write filter
 *   that is not a simple project filter
 */
export function discoverContexts(settings: Pick<TaskLedgerSettings, 'contexts'>): UserContext[] {
  const { active, definitions } = settings.contexts;

  return Object.entries(definitions).map(([name, definition]) => {
    if (definition.read.trim().length === 0) {
      throw new ConfigurationError(`Context "${name}" has an empty read filter`, {
        code: 'CONTEXT_INVALID',
        context: { context: name },
      });
    }
    if (definition.write !== undefined && parseProjectFromFilter(definition.write) === null) {
      throw new ConfigurationError(
        `Context "${name}" write filter must be a simple project filter like project:Name`,
        { code: 'CONTEXT_INVALID', context: { context: name, write: definition.write } }
      );
    }

    const context: UserContext = { name, readFilter: definition.read, active: name === active };
    if (definition.write !== undefined) context.writeFilter = definition.write;
    return context;
  });
}

/**
 * The active context, or null when none is set
 *
 * @throws ConfigurationError when the active name has no definition
 */
export function getActiveContext(settings: Pick<TaskLedgerSettings, 'contexts'>): UserContext | null {
  const { active } = settings.contexts;
  if (active === undefined) return null;

  const context = discoverContexts(settings).find((c) => c.active);
  if (!context) {
    throw new ConfigurationError(`Active context "${active}" is not defined`, {
      code: 'CONTEXT_NOT_DEFINED',
      context: { context: active },
    });
  }
  return context;
}
