/**
 * Query Context
 *
 * Everything a query needs to run: the dialect, the open connection and
 * the observers (debug sink, logger, event hooks). Running a statement is
 * always prepare, bind, execute; driver failures come back as QueryError
 * with the driver's message kept.
 */

import { QueryError, toError } from '../errors';
import { formatBindings, truncateSql } from '../utils/logging';
import { validateSQL } from '../utils/validation';

import type { SQLDialect } from '../dialect/sql-dialect';
import type { OutputBinding } from '../dialect/key-return-strategy';
import type { DriverConnection, StatementOutcome } from '../driver/driver-connection';
import type { Binding, DebugSink, Logger, QueryErrorEvent, QueryEvent } from '../types';

export interface QueryObserver {
  onQuery?(event: QueryEvent): void;
  onQueryError?(event: QueryErrorEvent): void;
}

export interface QueryContextOptions {
  logger?: Logger;
  debug?: DebugSink;
  observer?: QueryObserver;
}

export class QueryContext {
  constructor(
    public readonly dialect: SQLDialect,
    public readonly connection: DriverConnection,
    private readonly options: QueryContextOptions = {},
  ) {}

  async execute(
    sql: string,
    bindings: Binding[],
    outputs: OutputBinding[] = [],
  ): Promise<StatementOutcome> {
    validateSQL(sql);

    this.options.debug?.({ query: sql, bindings });
    this.options.logger?.debug(`Executing: ${truncateSql(sql)}`, formatBindings(bindings));

    const startTime = Date.now();

    try {
      const statement = this.connection.prepare(sql);

      for (const binding of bindings) {
        statement.bindValue(binding.name, binding.value, binding.type);
      }

      for (const output of outputs) {
        if (!statement.bindOutput) {
          throw new QueryError(
            `The ${this.dialect.name} connection does not support output parameters`,
            sql,
            bindings,
          );
        }
        statement.bindOutput(output.name, output.length);
      }

      const outcome = await statement.execute();
      this.options.observer?.onQuery?.({ sql, bindings, duration: Date.now() - startTime });
      return outcome;
    } catch (error) {
      const cause = toError(error);
      this.options.logger?.error(`Query failed: ${cause.message}`, { sql: truncateSql(sql) });
      this.options.observer?.onQueryError?.({ sql, bindings, error: cause });
      throw new QueryError(`An SQL error occurred: ${cause.message}`, sql, bindings, cause);
    }
  }
}
