/**
 * Store path helpers.
 *
 * Segments may not be empty or contain the characters the hosted document
 * stores reserve (`. # $ [ ]`). Ids generated by `newId` always pass.
 */

import { InvalidArgumentError } from '../core/errors.js';
import { isStoreRecord, type StoreRecord, type StoreValue } from './record-store.js';

const INVALID_SEGMENT = /[.#$[\]]/;

export const COLLECTIONS = {
  groups: 'groups',
  safetyChecks: 'safetyChecks',
  sosAlerts: 'sosAlerts',
  userSOSTimes: 'userSOSTimes',
  invitations: 'invitations',
  users: 'users',
  pendingNotifications: 'pendingNotifications',
} as const;

export interface ParsedPath {
  collection: string;
  id: string | null;
  /** Field segments below the record */
  rest: string[];
}

export function isValidSegment(segment: string): boolean {
  return segment.trim().length > 0 && segment.trim() === segment && !INVALID_SEGMENT.test(segment);
}

export function splitPath(path: string): string[] {
  const segments = path.split('/').filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    throw new InvalidArgumentError(`Empty store path: "${path}"`);
  }
  for (const segment of segments) {
    if (!isValidSegment(segment)) {
      throw new InvalidArgumentError(`Invalid store path segment "${segment}" in "${path}"`);
    }
  }
  return segments;
}

export function parsePath(path: string): ParsedPath {
  const [collection, id, ...rest] = splitPath(path);
  return { collection, id: id ?? null, rest };
}

export function joinPath(...segments: string[]): string {
  return segments.join('/');
}

/** True when one path is equal to, an ancestor of, or a descendant of the other. */
export function pathsOverlap(a: readonly string[], b: readonly string[]): boolean {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function getIn(value: StoreValue | undefined, segments: readonly string[]): StoreValue | undefined {
  let current = value;
  for (const segment of segments) {
    if (!isStoreRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/**
 * Immutable write of `next` at `segments` below `root`. `null` removes the
 * value and prunes parents left empty; an empty result is `undefined`.
 */
export function setIn(
  root: StoreValue | undefined,
  segments: readonly string[],
  next: StoreValue,
): StoreValue | undefined {
  if (segments.length === 0) {
    return next === null ? undefined : pruneEmpty(next);
  }

  const [head, ...tail] = segments;
  const base: StoreRecord = isStoreRecord(root) ? { ...root } : {};
  const child = setIn(base[head], tail, next);

  if (child === undefined) {
    delete base[head];
  } else {
    base[head] = child;
  }

  return Object.keys(base).length > 0 ? base : undefined;
}

function pruneEmpty(value: StoreValue): StoreValue | undefined {
  if (!isStoreRecord(value)) return value;
  const out: StoreRecord = {};
  for (const [key, child] of Object.entries(value)) {
    if (child === null) continue;
    const pruned = pruneEmpty(child);
    if (pruned !== undefined) out[key] = pruned;
  }
  return Object.keys(out).length > 0 ? out : undefined;
}
