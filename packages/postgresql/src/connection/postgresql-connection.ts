/**
 * PostgreSQL connection over a single pg client
 *
 * Named placeholders become `$n` markers; a name used twice keeps one
 * number. Inserted keys come back through `RETURNING`, so there is no
 * last insert id to track.
 */

import { quoteLiteral } from '@sqlgrid/core';

import { PostgreSQLPreparedStatement } from './postgresql-prepared-statement';

import type { DriverConnection, PreparedStatement, Scalar } from '@sqlgrid/core';
import type { Client } from 'pg';

export class PostgreSQLConnection implements DriverConnection {
  constructor(private readonly client: Client) {}

  prepare(sql: string): PreparedStatement {
    return new PostgreSQLPreparedStatement(this.client, sql);
  }

  lastInsertId(): Scalar {
    return null;
  }

  quote(value: Scalar): string {
    return typeof value === 'string' ? this.client.escapeLiteral(value) : quoteLiteral(value);
  }

  async beginTransaction(): Promise<void> {
    await this.client.query('BEGIN');
  }

  async commit(): Promise<void> {
    await this.client.query('COMMIT');
  }

  async rollBack(): Promise<void> {
    await this.client.query('ROLLBACK');
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}
