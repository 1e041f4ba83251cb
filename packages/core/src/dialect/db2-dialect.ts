/**
 * DB2 Dialect Implementation
 *
 * Identifiers are left bare: DB2 folds unquoted names to upper case and
 * quoting would make them case-sensitive. Display aliases use `"`.
 */

import { DEFAULT_PORTS } from '../constants';
import { LastInsertIdStrategy } from './key-return-strategy';
import { OffsetFetchStrategy } from './limit-strategy';
import { SQLDialect } from './sql-dialect';

import type { Credentials } from '../types';
import type { DialectConfig } from './sql-dialect';

export class Db2Dialect extends SQLDialect {
  readonly name = 'Db2';

  readonly config: DialectConfig = {
    identifierQuote: null,
    fieldQuote: '"',
    supportsAsAlias: true,
    defaultPort: DEFAULT_PORTS.Db2,
  };

  readonly limitStrategy = new OffsetFetchStrategy();

  readonly keyReturn = new LastInsertIdStrategy();

  connectionString(credentials: Credentials): string {
    return (
      `DATABASE=${credentials.database ?? ''};` +
      `HOSTNAME=${credentials.host ?? ''};` +
      `PORT=${this.port(credentials)};` +
      'PROTOCOL=TCPIP;' +
      `UID=${credentials.user ?? ''};` +
      `PWD=${credentials.pass ?? ''}` +
      this.dsnPostfix(credentials.extraDsnOptions)
    );
  }
}
