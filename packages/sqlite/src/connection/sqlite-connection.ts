/**
 * SQLite connection over better-sqlite3
 *
 * better-sqlite3 is synchronous; statements still resolve through promises
 * so the engine treats every driver alike.
 */

import { quoteLiteral } from '@sqlgrid/core';

import { SQLitePreparedStatement } from './sqlite-prepared-statement';

import type { DriverConnection, PreparedStatement, Scalar } from '@sqlgrid/core';
import type BetterSqlite3 from 'better-sqlite3';

export class SQLiteConnection implements DriverConnection {
  private insertId: Scalar = null;

  constructor(private readonly db: BetterSqlite3.Database) {}

  prepare(sql: string): PreparedStatement {
    return new SQLitePreparedStatement(this, this.db, sql);
  }

  recordInsertId(id: number | bigint): void {
    this.insertId = typeof id === 'bigint' && id <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(id) : id;
  }

  lastInsertId(): Scalar {
    return this.insertId;
  }

  quote(value: Scalar): string {
    return quoteLiteral(value);
  }

  async beginTransaction(): Promise<void> {
    this.db.exec('BEGIN');
  }

  async commit(): Promise<void> {
    this.db.exec('COMMIT');
  }

  async rollBack(): Promise<void> {
    this.db.exec('ROLLBACK');
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
