/**
 * PostgreSQL Dialect Implementation
 *
 * Handles PostgreSQL-specific SQL syntax:
 * - Double quote (") identifier quoting
 * - `RETURNING <pkey> as dt_pkey` on inserts, discovering the primary key
 *   from the catalog when the caller did not name one
 * - `::text ilike` for text search so non-text columns can be matched
 */

import { DEFAULT_PORTS, QUERY_DEFAULTS } from '../constants';
import { ReturningStrategy } from './key-return-strategy';
import { LimitOffsetStrategy } from './limit-strategy';
import { SQLDialect } from './sql-dialect';

import type { Credentials } from '../types';
import type { StatementRunner } from './key-return-strategy';
import type { DialectConfig } from './sql-dialect';

const PRIMARY_KEY_SQL =
  'SELECT a.attname ' +
  'FROM pg_index i ' +
  'JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY(i.indkey) ' +
  'WHERE i.indrelid = (:tableName)::regclass ' +
  'AND i.indisprimary';

export async function lookupPostgresPrimaryKey(table: string, run: StatementRunner): Promise<string | null> {
  const { rows } = await run(PRIMARY_KEY_SQL, [{ name: ':tableName', value: table }]);
  const name = rows[0]?.['attname'];
  return typeof name === 'string' ? name : null;
}

export class PostgreSQLDialect extends SQLDialect {
  readonly name = 'Postgres';

  readonly config: DialectConfig = {
    identifierQuote: { left: '"', right: '"' },
    fieldQuote: '"',
    supportsAsAlias: true,
    defaultPort: DEFAULT_PORTS.Postgres,
  };

  readonly limitStrategy = new LimitOffsetStrategy();

  readonly keyReturn = new ReturningStrategy({
    alias: QUERY_DEFAULTS.RETURNING_ALIAS,
    lookup: lookupPostgresPrimaryKey,
  });

  override textSearchFragment(column: string, placeholder: string): string {
    return `${column}::text ilike ${placeholder}`;
  }

  connectionString(credentials: Credentials): string {
    const port = this.port(credentials);
    return (
      `pgsql:host=${credentials.host ?? ''};` +
      (port ? `port=${port};` : '') +
      `dbname=${credentials.database ?? ''}` +
      this.dsnPostfix(credentials.extraDsnOptions)
    );
  }
}
