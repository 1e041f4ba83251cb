/**
 * Firebird Dialect Implementation
 *
 * Double quote identifiers, no `as` before aliases, `RETURNING "pkey"` on
 * inserts and `OFFSET/FETCH` paging (Firebird 3+).
 */

import { DEFAULT_PORTS } from '../constants';
import { ReturningStrategy } from './key-return-strategy';
import { OffsetFetchStrategy } from './limit-strategy';
import { SQLDialect } from './sql-dialect';

import type { Credentials } from '../types';
import type { DialectConfig } from './sql-dialect';

export class FirebirdDialect extends SQLDialect {
  readonly name = 'Firebird';

  readonly config: DialectConfig = {
    identifierQuote: { left: '"', right: '"' },
    fieldQuote: '"',
    supportsAsAlias: false,
    defaultPort: DEFAULT_PORTS.Firebird,
  };

  readonly limitStrategy = new OffsetFetchStrategy();

  readonly keyReturn = new ReturningStrategy();

  connectionString(credentials: Credentials): string {
    const port = this.port(credentials);
    const host = credentials.host ? `${credentials.host}${port ? `/${port}` : ''};` : '';
    return `firebird:${host}dbname=${credentials.database ?? ''}` + this.dsnPostfix(credentials.extraDsnOptions);
  }
}
