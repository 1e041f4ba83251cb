/**
 * Row identifiers
 *
 * A compound primary key travels to the client as one string: the column
 * values joined by a separator derived from the key's column names. The
 * hash makes the separator unlikely to appear in real values.
 */

import { createHash } from 'node:crypto';

import { CompoundKeyError, ValidationError } from '../errors';
import { scalarToString } from '../utils/scalar';
import { propExists, readProp, writeProp } from './nested-data';

import type { NestedData } from './nested-data';

export interface PkeyToArrayOptions {
  /** Prefix stripped from the identifier, e.g. `row_` */
  idPrefix?: string;
  /** Treat column names as flat keys rather than dotted paths */
  flat?: boolean;
  /** Columns to map the parts to, when they differ from the key columns */
  columns?: readonly string[];
}

export function pkeySeparator(pkey: readonly string[]): string {
  const hash = createHash('sha256').update(pkey.join(',')).digest('hex');
  return `_${hash.slice(0, 8)}_`;
}

/**
 * Encode the primary key values of a row into a single identifier
 */
export function pkeyToValue(row: NestedData, pkey: readonly string[], flat = false): string {
  const parts = pkey.map((column) => {
    const value = flat ? row[column] : readProp(row, column);

    if (value === null || value === undefined) {
      const exists = flat ? Object.hasOwn(row, column) : propExists(row, column);
      throw new ValidationError(
        exists ? 'Primary key value is null.' : 'Primary key element is not available in data set.',
        column,
      );
    }
    return scalarToString(value);
  });

  return parts.join(pkeySeparator(pkey));
}

/**
 * Decode an identifier into a column to value map
 */
export function pkeyToArray(
  value: string,
  pkey: readonly string[],
  options: PkeyToArrayOptions = {},
): NestedData {
  const { idPrefix = '', flat = false, columns = pkey } = options;
  const id = idPrefix ? value.split(idPrefix).join('') : value;
  const parts = id.split(pkeySeparator(pkey));

  if (parts.length !== columns.length) {
    throw new CompoundKeyError("Primary key data doesn't match submitted data");
  }

  const out: NestedData = {};
  columns.forEach((column, i) => {
    if (flat) {
      out[column] = parts[i];
    } else {
      writeProp(out, column, parts[i]);
    }
  });
  return out;
}
