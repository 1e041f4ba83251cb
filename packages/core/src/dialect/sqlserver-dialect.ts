/**
 * SQL Server Dialect Implementation
 *
 * - Square bracket identifier quoting
 * - `OFFSET m ROWS FETCH NEXT n ROWS ONLY` (SQL Server 2012+)
 */

import { DEFAULT_PORTS } from '../constants';
import { LastInsertIdStrategy } from './key-return-strategy';
import { OffsetFetchStrategy } from './limit-strategy';
import { SQLDialect } from './sql-dialect';

import type { Credentials } from '../types';
import type { DialectConfig } from './sql-dialect';

export class SqlServerDialect extends SQLDialect {
  readonly name = 'Sqlserver';

  readonly config: DialectConfig = {
    identifierQuote: { left: '[', right: ']' },
    fieldQuote: "'",
    supportsAsAlias: true,
    defaultPort: DEFAULT_PORTS.Sqlserver,
  };

  readonly limitStrategy = new OffsetFetchStrategy();

  readonly keyReturn = new LastInsertIdStrategy();

  connectionString(credentials: Credentials): string {
    const port = this.port(credentials);
    return (
      `sqlsrv:Server=${credentials.host ?? ''}${port ? `,${port}` : ''};` +
      `Database=${credentials.database ?? ''}` +
      this.dsnPostfix(credentials.extraDsnOptions)
    );
  }
}
