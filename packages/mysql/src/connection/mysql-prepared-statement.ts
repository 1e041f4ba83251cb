import { BasePreparedStatement } from '@sqlgrid/core';

import type { StatementOutcome } from '@sqlgrid/core';
import type * as mysql from 'mysql2/promise';

import type { MySQLConnection } from './mysql-connection';

export class MySQLPreparedStatement extends BasePreparedStatement {
  constructor(
    private readonly owner: MySQLConnection,
    private readonly connection: mysql.Connection,
    sql: string,
  ) {
    super(sql);
  }

  async execute(): Promise<StatementOutcome> {
    const { sql, values } = this.positional('question');
    const [result] = await this.connection.query<mysql.RowDataPacket[] | mysql.ResultSetHeader>(
      sql,
      values,
    );

    if (Array.isArray(result)) {
      return { rows: result, rowCount: result.length };
    }

    this.owner.recordInsertId(result.insertId);
    return { rows: [], rowCount: result.affectedRows };
  }
}
