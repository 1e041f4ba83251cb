/**
 * MySQL / MariaDB connection over mysql2
 *
 * Named placeholders are rewritten to `?` markers before the statement is
 * sent. The generated key of the last insert is kept for `lastInsertId`.
 */

import { quoteLiteral } from '@sqlgrid/core';

import { MySQLPreparedStatement } from './mysql-prepared-statement';

import type { DriverConnection, PreparedStatement, Scalar } from '@sqlgrid/core';
import type * as mysql from 'mysql2/promise';

export class MySQLConnection implements DriverConnection {
  private insertId: Scalar = null;

  constructor(private readonly connection: mysql.Connection) {}

  prepare(sql: string): PreparedStatement {
    return new MySQLPreparedStatement(this, this.connection, sql);
  }

  /**
   * Called by statements after an insert. mysql2 reports 0 when no key was
   * generated.
   */
  recordInsertId(id: number): void {
    this.insertId = id === 0 ? null : id;
  }

  lastInsertId(): Scalar {
    return this.insertId;
  }

  quote(value: Scalar): string {
    return typeof value === 'string' ? this.connection.escape(value) : quoteLiteral(value);
  }

  async beginTransaction(): Promise<void> {
    await this.connection.beginTransaction();
  }

  async commit(): Promise<void> {
    await this.connection.commit();
  }

  async rollBack(): Promise<void> {
    await this.connection.rollback();
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}
