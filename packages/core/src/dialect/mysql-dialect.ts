/**
 * MySQL Dialect Implementation
 *
 * - Backtick (`) identifier quoting
 * - `LIMIT n OFFSET m`; an offset alone needs the maximum row count
 * - Generated keys read from the connection after the insert
 */

import { DEFAULT_PORTS } from '../constants';
import { LastInsertIdStrategy } from './key-return-strategy';
import { LimitOffsetStrategy } from './limit-strategy';
import { SQLDialect } from './sql-dialect';

import type { Credentials } from '../types';
import type { DialectConfig } from './sql-dialect';

export class MySQLDialect extends SQLDialect {
  readonly name = 'Mysql';

  readonly config: DialectConfig = {
    identifierQuote: { left: '`', right: '`' },
    fieldQuote: "'",
    supportsAsAlias: true,
    defaultPort: DEFAULT_PORTS.Mysql,
  };

  readonly limitStrategy = new LimitOffsetStrategy('18446744073709551615');

  readonly keyReturn = new LastInsertIdStrategy();

  connectionString(credentials: Credentials): string {
    const port = this.port(credentials);
    return (
      `mysql:host=${credentials.host ?? ''};` +
      (port ? `port=${port};` : '') +
      `dbname=${credentials.database ?? ''}` +
      this.dsnPostfix(credentials.extraDsnOptions)
    );
  }
}
