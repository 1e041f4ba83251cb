/**
 * SQLite Dialect Implementation
 *
 * Backtick quoting like MySQL; `LIMIT -1` stands for "no limit" when only
 * an offset is requested.
 */

import { DEFAULT_PORTS } from '../constants';
import { LastInsertIdStrategy } from './key-return-strategy';
import { LimitOffsetStrategy } from './limit-strategy';
import { SQLDialect } from './sql-dialect';

import type { Credentials } from '../types';
import type { DialectConfig } from './sql-dialect';

export class SQLiteDialect extends SQLDialect {
  readonly name = 'Sqlite';

  readonly config: DialectConfig = {
    identifierQuote: { left: '`', right: '`' },
    fieldQuote: "'",
    supportsAsAlias: true,
    defaultPort: DEFAULT_PORTS.Sqlite,
  };

  readonly limitStrategy = new LimitOffsetStrategy('-1');

  readonly keyReturn = new LastInsertIdStrategy();

  connectionString(credentials: Credentials): string {
    return `sqlite:${credentials.database ?? ':memory:'}` + this.dsnPostfix(credentials.extraDsnOptions);
  }
}
