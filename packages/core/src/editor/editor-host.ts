import type { Database } from '../database';
import type { Field } from './field';

/**
 * What joins and option lists need to know about the editor that owns them
 */
export interface EditorHost {
  readonly db: Database;
  /** Tables written to, the first one being the main table (may be aliased) */
  table(): string[];
  /** Tables read from, when reads use a view or a different table */
  readTable(): string[];
  pkey(): string[];
  /** Prefix put in front of row identifiers sent to the client */
  idPrefix(): string;
  fields(): Field[];
}

/**
 * Split `table as alias` into its name and alias
 */
export function splitTableAlias(table: string): { name: string; alias: string | null } {
  const parts = table.split(/ as /i);
  if (parts.length > 1) {
    return { name: (parts[0] ?? table).trim(), alias: (parts[1] ?? '').trim() || null };
  }
  return { name: table.trim(), alias: null };
}
