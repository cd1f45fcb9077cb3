/**
 * Change Sets
 *
 * A change set has the shape of the task it was computed for, with every field
 * that matches live state left unset and every differing field holding the
 * desired value. Render targets clear the fields they apply; anything left
 * over afterwards had no update path.
 */

import type { Resource } from "./resources";
import { resourcesMatch } from "./resources";
import type { ResourceRef } from "./registry";

export type Changes<T> = { -readonly [K in keyof T]?: T[K] };

export type FieldComparator<V> = (actual: V, desired: V) => boolean | Promise<boolean>;

/**
 * One comparator per field. Every key is required, so a field added to the
 * task shape without a comparator does not compile.
 */
export type FieldComparators<T> = {
  readonly [K in keyof T]-?: FieldComparator<NonNullable<T[K]>>;
};

/**
 * Compare desired against actual, field by field.
 *
 * Unset desired fields are not managed and never reported. A field the live
 * resource lacks is reported whenever the desired task sets it.
 */
export async function buildChanges<T extends object>(
  actual: T | undefined,
  desired: T,
  comparators: FieldComparators<T>
): Promise<Changes<T>> {
  const changes: Changes<T> = {};
  for (const field in comparators) {
    await diffField(field, actual, desired, comparators[field], changes);
  }
  return changes;
}

async function diffField<T, K extends keyof T>(
  field: K,
  actual: T | undefined,
  desired: T,
  compare: FieldComparator<NonNullable<T[K]>>,
  changes: Changes<T>
): Promise<void> {
  const want = desired[field];
  if (want === undefined || want === null) return;

  const have = actual?.[field];
  if (have === undefined || have === null || !(await compare(have, want))) {
    changes[field] = want;
  }
}

export function isZero<T>(changes: Changes<T>): boolean {
  return changedFields(changes).length === 0;
}

export function changedFields<T>(changes: Changes<T>): Array<Extract<keyof T, string>> {
  const fields: Array<Extract<keyof T, string>> = [];
  for (const field in changes) {
    if (changes[field] !== undefined) fields.push(field);
  }
  return fields;
}

// ── Stock comparators ──────────────────────────────────────────────────

export function equalValues<V>(actual: V, desired: V): boolean {
  return actual === desired;
}

/** Ordered comparison */
export function equalLists(actual: readonly string[], desired: readonly string[]): boolean {
  return actual.length === desired.length && actual.every((v, i) => v === desired[i]);
}

/** Order-insensitive comparison; duplicates are ignored */
export function equalSets(actual: readonly string[], desired: readonly string[]): boolean {
  const a = new Set(actual);
  const d = new Set(desired);
  return a.size === d.size && [...a].every((v) => d.has(v));
}

export function equalRefs(actual: ResourceRef, desired: ResourceRef): boolean {
  return actual.kind === desired.kind && actual.name === desired.name;
}

export function equalRefMaps(
  actual: Readonly<Record<string, ResourceRef>>,
  desired: Readonly<Record<string, ResourceRef>>
): boolean {
  const keys = Object.keys(desired);
  if (keys.length !== Object.keys(actual).length) return false;
  return keys.every((key) => {
    const have = actual[key];
    const want = desired[key];
    return have !== undefined && want !== undefined && equalRefs(have, want);
  });
}

/** Compares rendered content, so lazily loaded sources are opened */
export async function equalResourceMaps(
  actual: Readonly<Record<string, Resource>>,
  desired: Readonly<Record<string, Resource>>
): Promise<boolean> {
  const keys = Object.keys(desired);
  if (keys.length !== Object.keys(actual).length) return false;

  for (const key of keys) {
    const have = actual[key];
    const want = desired[key];
    if (have === undefined || want === undefined) return false;
    if (!(await resourcesMatch(have, want))) return false;
  }
  return true;
}
