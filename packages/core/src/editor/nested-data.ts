/**
 * Dotted-path access into nested row data (`name.first` reads
 * `row.name.first`).
 */

import { DuplicatePropertyError, PropertyConflictError } from '../errors';

export type NestedData = Record<string, unknown>;

export function isNestedData(value: unknown): value is NestedData {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !Buffer.isBuffer(value)
  );
}

function child(value: unknown, segment: string): unknown {
  if (Array.isArray(value)) {
    const index = Number(segment);
    return Number.isInteger(index) ? value[index] : undefined;
  }
  return isNestedData(value) ? value[segment] : undefined;
}

/**
 * Read a value by dotted path. Missing segments give `undefined`.
 */
export function readProp(data: unknown, path: string): unknown {
  if (!path.includes('.')) {
    return child(data, path);
  }

  let inner: unknown = data;
  for (const segment of path.split('.')) {
    inner = child(inner, segment);
    if (inner === undefined) {
      return undefined;
    }
  }
  return inner;
}

/**
 * Whether every segment of the path exists, null leaves included
 */
export function propExists(data: unknown, path: string): boolean {
  let inner: unknown = data;

  for (const segment of path.split('.')) {
    if (Array.isArray(inner)) {
      const index = Number(segment);
      if (!Number.isInteger(index) || index < 0 || index >= inner.length) {
        return false;
      }
      inner = inner[index];
    } else if (isNestedData(inner) && Object.hasOwn(inner, segment)) {
      inner = inner[segment];
    } else {
      return false;
    }
  }
  return true;
}

/**
 * Write a value by dotted path, creating intermediate objects. Writing
 * through a non-object or onto an existing leaf is an error.
 */
export function writeProp(out: NestedData, path: string, value: unknown): void {
  if (!path.includes('.')) {
    out[path] = value;
    return;
  }

  const segments = path.split('.');
  const leaf = segments.pop() ?? path;
  let inner: NestedData = out;

  for (const segment of segments) {
    const next = inner[segment];

    if (next === undefined || next === null) {
      const created: NestedData = {};
      inner[segment] = created;
      inner = created;
    } else if (isNestedData(next)) {
      inner = next;
    } else {
      throw new PropertyConflictError(path);
    }
  }

  if (inner[leaf] !== undefined && inner[leaf] !== null) {
    throw new DuplicatePropertyError(path);
  }
  inner[leaf] = value;
}
