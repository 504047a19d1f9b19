/**
 * @fileoverview Live task snapshot with structured mutation helpers
 *
 * A snapshot wraps one task's committed field map. Its helpers enforce the
 * store's consistency rules (no duplicate tags or dependencies, sorted tags,
 * no self-dependency, append-only annotations), emit the primitives that
 * realize each change, and update the snapshot so that later operations in
 * the same batch see it. Fallback keys left by earlier snapshot-less writes
 * are folded into the canonical field whenever a helper touches that field.
 */

import { StorageError } from '../errors/index.js';
import { TaskId, isTaskId, type Annotation } from '../task/types.js';
import {
  ANNOTATION_PREFIX,
  DEPENDENCY_PREFIX,
  TAG_PREFIX,
  decodeAnnotations,
  decodeList,
  encodeAnnotations,
  encodeList,
  type TaskData,
} from './fields.js';
import type { ReplicaPrimitive } from './store.js';

export class ReplicaTaskSnapshot {
  constructor(
    readonly uuid: TaskId,
    private readonly data: TaskData,
    private readonly out: ReplicaPrimitive[]
  ) {}

  get(key: string): string | undefined {
    return this.data[key];
  }

  /**
   * Set (or with null, remove) a single field. No-op writes emit nothing.
   */
  setField(key: string, value: string | null): void {
    const current = this.data[key] ?? null;
    if (current === value) return;
    if (value === null) {
      delete this.data[key];
    } else {
      this.data[key] = value;
    }
    this.out.push({ kind: 'update', uuid: this.uuid, property: key, value });
  }

  // ---------------------------------------------------------------------------
  // Tags
  // ---------------------------------------------------------------------------

  tags(): string[] {
    return [...new Set([...decodeList(this.data.tags), ...this.fallbackSuffixes(TAG_PREFIX)])];
  }

  addTag(tag: string): void {
    this.writeTags([...this.tags(), tag]);
  }

  removeTag(tag: string): void {
    this.writeTags(this.tags().filter((t) => t !== tag));
  }

  private writeTags(tags: string[]): void {
    const sorted = [...new Set(tags)].sort();
    this.clearFallbacks(TAG_PREFIX);
    this.setField('tags', sorted.length > 0 ? encodeList(sorted) : null);
  }

  // ---------------------------------------------------------------------------
  // Dependencies
  // ---------------------------------------------------------------------------

  dependencies(): TaskId[] {
    const all = [...decodeList(this.data.depends), ...this.fallbackSuffixes(DEPENDENCY_PREFIX)];
    return [...new Set(all.filter(isTaskId))];
  }

  addDependency(dependsOn: TaskId): void {
    if (dependsOn === this.uuid) {
      throw new StorageError(`Task ${this.uuid} cannot depend on itself`, {
        kind: 'serialization',
        code: 'REPLICA_MAPPING_ERROR',
        context: { taskId: this.uuid },
      });
    }
    this.writeDependencies([...this.dependencies(), dependsOn]);
  }

  removeDependency(dependsOn: TaskId): void {
    this.writeDependencies(this.dependencies().filter((d) => d !== dependsOn));
  }

  private writeDependencies(depends: TaskId[]): void {
    const unique = [...new Set(depends)];
    this.clearFallbacks(DEPENDENCY_PREFIX);
    this.setField('depends', unique.length > 0 ? encodeList(unique) : null);
  }

  // ---------------------------------------------------------------------------
  // Annotations
  // ---------------------------------------------------------------------------

  annotations(): Annotation[] {
    return [...decodeAnnotations(this.data.annotations), ...this.fallbackAnnotations()];
  }

  addAnnotation(annotation: Annotation): void {
    const annotations = [...this.annotations(), annotation];
    this.clearFallbacks(ANNOTATION_PREFIX);
    this.setField('annotations', encodeAnnotations(annotations));
  }

  // ---------------------------------------------------------------------------
  // Fallback keys
  // ---------------------------------------------------------------------------

  private fallbackKeys(prefix: string): string[] {
    return Object.keys(this.data).filter((key) => key.startsWith(prefix)).sort();
  }

  private fallbackSuffixes(prefix: string): string[] {
    return this.fallbackKeys(prefix).map((key) => key.slice(prefix.length));
  }

  private fallbackAnnotations(): Annotation[] {
    return fallbackAnnotationEntries(this.data);
  }

  private clearFallbacks(prefix: string): void {
    for (const key of this.fallbackKeys(prefix)) {
      this.setField(key, null);
    }
  }
}

/**
 * annotation_<unix seconds> keys as annotations, oldest first
 */
export function fallbackAnnotationEntries(data: TaskData): Annotation[] {
  const entries: Array<{ seconds: number; description: string }> = [];
  for (const [key, description] of Object.entries(data)) {
    if (!key.startsWith(ANNOTATION_PREFIX)) continue;
    const seconds = Number(key.slice(ANNOTATION_PREFIX.length));
    if (!Number.isInteger(seconds)) continue;
    entries.push({ seconds, description });
  }
  return entries
    .sort((a, b) => a.seconds - b.seconds)
    .map(({ seconds, description }) => ({ entry: new Date(seconds * 1000).toISOString(), description }));
}
