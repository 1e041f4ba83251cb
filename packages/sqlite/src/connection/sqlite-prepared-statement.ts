import { BasePreparedStatement } from '@sqlgrid/core';

import type { Row, Scalar, StatementOutcome } from '@sqlgrid/core';
import type BetterSqlite3 from 'better-sqlite3';

import type { SQLiteConnection } from './sqlite-connection';

type SqliteValue = string | number | bigint | Buffer | null;

export class SQLitePreparedStatement extends BasePreparedStatement {
  constructor(
    private readonly owner: SQLiteConnection,
    private readonly db: BetterSqlite3.Database,
    sql: string,
  ) {
    super(sql);
  }

  async execute(): Promise<StatementOutcome> {
    const { sql, values } = this.positional('question');
    const statement = this.db.prepare(sql);
    const params = values.map(toSqliteValue);

    if (statement.reader) {
      const rows = statement.all(...params).filter(isRow);
      return { rows, rowCount: rows.length };
    }

    const info = statement.run(...params);
    this.owner.recordInsertId(info.lastInsertRowid);
    return { rows: [], rowCount: info.changes };
  }
}

/**
 * better-sqlite3 binds neither booleans nor dates
 */
function toSqliteValue(value: Scalar): SqliteValue {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
