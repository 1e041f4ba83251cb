import { BasePreparedStatement } from '@sqlgrid/core';

import type { Row, StatementOutcome } from '@sqlgrid/core';
import type { Client } from 'pg';

export class PostgreSQLPreparedStatement extends BasePreparedStatement {
  constructor(
    private readonly client: Client,
    sql: string,
  ) {
    super(sql);
  }

  async execute(): Promise<StatementOutcome> {
    const { sql, values } = this.positional('dollar');
    const result = await this.client.query<Row>({ text: sql, values });

    return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
  }
}
