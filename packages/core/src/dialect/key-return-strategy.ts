/**
 * Key Return Strategies
 *
 * How an INSERT reports the key it generated: ask the connection after
 * execution, read a RETURNING row, or receive an output bind.
 */

import { QUERY_DEFAULTS } from '../constants';
import { toScalar } from '../utils/scalar';

import type { DriverConnection, StatementOutcome } from '../driver/driver-connection';
import type { Binding, Scalar } from '../types';

/**
 * Runs a helper statement through the query's context, so it is traced,
 * logged and has its failures wrapped like any other statement
 */
export type StatementRunner = (sql: string, bindings: Binding[]) => Promise<StatementOutcome>;

export interface InsertTarget {
  /** Quoted table name, alias removed */
  table: string;
  pkey: string[] | null;
  run: StatementRunner;
  quote(identifier: string): string;
}

export interface OutputBinding {
  name: string;
  length: number;
}

export interface InsertPlan {
  sql: string;
  outputs: OutputBinding[];
}

export interface KeyReturnStrategy {
  planInsert(sql: string, target: InsertTarget): Promise<InsertPlan>;
  insertId(outcome: StatementOutcome, connection: DriverConnection): Scalar;
}

/**
 * Finds the primary key column of a table when none was given
 */
export type PrimaryKeyLookup = (table: string, run: StatementRunner) => Promise<string | null>;

export class LastInsertIdStrategy implements KeyReturnStrategy {
  async planInsert(sql: string): Promise<InsertPlan> {
    return { sql, outputs: [] };
  }

  insertId(_outcome: StatementOutcome, connection: DriverConnection): Scalar {
    return connection.lastInsertId();
  }
}

export interface ReturningOptions {
  /** Alias for the returned column, or null to return it under its own name */
  alias?: string | null;
  lookup?: PrimaryKeyLookup;
}

/**
 * Appends `RETURNING <pkey>` and reads the value from the first row
 */
export class ReturningStrategy implements KeyReturnStrategy {
  private readonly alias: string | null;
  private readonly lookup: PrimaryKeyLookup | undefined;

  constructor(options: ReturningOptions = {}) {
    this.alias = options.alias ?? null;
    this.lookup = options.lookup;
  }

  async planInsert(sql: string, target: InsertTarget): Promise<InsertPlan> {
    const column = target.pkey?.[0] ?? (this.lookup ? await this.lookup(target.table, target.run) : null);

    if (!column) {
      return { sql, outputs: [] };
    }

    const returning = this.alias
      ? `${target.quote(column)} as ${this.alias}`
      : target.quote(column);

    return { sql: `${sql} RETURNING ${returning}`, outputs: [] };
  }

  insertId(outcome: StatementOutcome): Scalar {
    const row = outcome.rows[0];
    if (!row) {
      return null;
    }
    if (this.alias) {
      return toScalar(row[this.alias]);
    }
    return toScalar(Object.values(row)[0]);
  }
}

/**
 * Appends `RETURNING <pkey> INTO :bind` and reads the output bind
 */
export class OutBindStrategy implements KeyReturnStrategy {
  constructor(
    private readonly bindName: string = QUERY_DEFAULTS.PKEY_OUT_BIND,
    private readonly length: number = QUERY_DEFAULTS.PKEY_OUT_LENGTH,
  ) {}

  async planInsert(sql: string, target: InsertTarget): Promise<InsertPlan> {
    const column = target.pkey?.[0];

    if (!column) {
      return { sql, outputs: [] };
    }

    return {
      sql: `${sql} RETURNING ${target.quote(column)} INTO ${this.bindName}`,
      outputs: [{ name: this.bindName, length: this.length }],
    };
  }

  insertId(outcome: StatementOutcome): Scalar {
    return outcome.outBinds?.[this.bindName] ?? null;
  }
}
