/**
 * Oracle Dialect Implementation
 *
 * Oracle differs from the other engines in three places:
 * - no `as` between a column and its alias
 * - no LIMIT fragment, the finished SELECT is wrapped in ROWNUM bounds
 * - the new key comes back through a `RETURNING ... INTO` output bind
 *
 * Its driver starts transactions implicitly, so `beginTransaction` does
 * nothing.
 */

import { DEFAULT_PORTS } from '../constants';
import { OutBindStrategy } from './key-return-strategy';
import { RownumWrapStrategy } from './limit-strategy';
import { SQLDialect } from './sql-dialect';

import type { DriverConnection } from '../driver/driver-connection';
import type { Credentials } from '../types';
import type { DialectConfig } from './sql-dialect';

export const ORACLE_SESSION_SETTINGS = [
  "ALTER SESSION SET NLS_DATE_FORMAT='YYYY-MM-DD HH24:MI:SS'",
  "ALTER SESSION SET NLS_TIMESTAMP_FORMAT='YYYY-MM-DD HH24:MI:SS'",
] as const;

export class OracleDialect extends SQLDialect {
  readonly name = 'Oracle';

  readonly config: DialectConfig = {
    identifierQuote: { left: '"', right: '"' },
    fieldQuote: '"',
    supportsAsAlias: false,
    defaultPort: DEFAULT_PORTS.Oracle,
  };

  readonly limitStrategy = new RownumWrapStrategy();

  readonly keyReturn = new OutBindStrategy();

  override async bootstrap(connection: DriverConnection): Promise<void> {
    for (const sql of ORACLE_SESSION_SETTINGS) {
      await connection.prepare(sql).execute();
    }
  }

  override async beginTransaction(): Promise<void> {
    // Oracle opens a transaction with the first statement
  }

  connectionString(credentials: Credentials): string {
    const port = this.port(credentials);
    return (
      `${credentials.host ?? ''}${port ? `:${port}` : ''}/${credentials.database ?? ''}` +
      this.dsnPostfix(credentials.extraDsnOptions)
    );
  }
}
