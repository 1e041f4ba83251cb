/**
 * Named placeholder scanning
 *
 * Statements are composed with named `:placeholders`. Drivers that only
 * understand positional parameters rewrite them here. Quoted strings,
 * quoted identifiers and `::` casts are skipped; inside quotes a backslash
 * or a doubled quote character escapes the next character.
 *
 * @example
 * ```typescript
 * toPositional('SELECT * FROM t WHERE a = :a AND b = :b', values, 'dollar');
 * // { sql: 'SELECT * FROM t WHERE a = $1 AND b = $2', values: [...] }
 * ```
 */

import { QueryError } from '../errors';

import type { Scalar } from '../types';

export type PlaceholderStyle = 'question' | 'dollar';

export interface PlaceholderToken {
  name: string;
  start: number;
  end: number;
}

export interface PositionalStatement {
  sql: string;
  values: Scalar[];
}

const QUOTES = new Set(["'", '"', '`']);
const NAME_START = /[A-Za-z_]/;
const NAME_PART = /\w/;

export function scanPlaceholders(sql: string): PlaceholderToken[] {
  const tokens: PlaceholderToken[] = [];
  let quote: string | null = null;
  let i = 0;

  while (i < sql.length) {
    const char = sql.charAt(i);

    if (quote) {
      if (char === '\\' || (char === quote && sql.charAt(i + 1) === quote)) {
        i += 2;
        continue;
      }
      if (char === quote) {
        quote = null;
      }
      i++;
      continue;
    }

    if (QUOTES.has(char)) {
      quote = char;
      i++;
      continue;
    }

    if (char === ':') {
      if (sql.charAt(i + 1) === ':') {
        i += 2;
        continue;
      }

      if (NAME_START.test(sql.charAt(i + 1))) {
        let end = i + 2;
        while (end < sql.length && NAME_PART.test(sql.charAt(end))) {
          end++;
        }
        tokens.push({ name: sql.slice(i, end), start: i, end });
        i = end;
        continue;
      }
    }

    i++;
  }

  return tokens;
}

export function placeholderNames(sql: string): string[] {
  return scanPlaceholders(sql).map((token) => token.name);
}

export function toPositional(
  sql: string,
  values: ReadonlyMap<string, Scalar>,
  style: PlaceholderStyle,
): PositionalStatement {
  const tokens = scanPlaceholders(sql);
  const ordered: Scalar[] = [];
  const numbers = new Map<string, number>();
  let text = '';
  let cursor = 0;

  for (const token of tokens) {
    if (!values.has(token.name)) {
      throw new QueryError(`No value bound for placeholder ${token.name}`, sql);
    }
    const value = values.get(token.name) ?? null;

    let marker: string;
    if (style === 'question') {
      ordered.push(value);
      marker = '?';
    } else {
      let position = numbers.get(token.name);
      if (position === undefined) {
        ordered.push(value);
        position = ordered.length;
        numbers.set(token.name, position);
      }
      marker = `$${position}`;
    }

    text += sql.slice(cursor, token.start) + marker;
    cursor = token.end;
  }

  return { sql: text + sql.slice(cursor), values: ordered };
}
