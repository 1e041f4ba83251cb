/**
 * Driver Connection
 *
 * The narrow surface the query engine needs from a database driver.
 * Each connector package (mysql2, pg, better-sqlite3) implements it;
 * engines without a bundled connector are plugged in through
 * `registerConnector`.
 */

import { placeholderFor } from '../query/binding-sanitizer';
import { toPositional } from '../query/placeholders';

import type { PlaceholderStyle, PositionalStatement } from '../query/placeholders';
import type { ParameterType, Row, Scalar } from '../types';

export interface StatementOutcome {
  rows: Row[];
  /** Rows affected or returned, when the driver reports it */
  rowCount?: number;
  /** Values written by the driver into output binds */
  outBinds?: Record<string, Scalar>;
}

export interface PreparedStatement {
  bindValue(name: string, value: Scalar, type?: ParameterType): void;
  /** Register an output parameter, for drivers that support them */
  bindOutput?(name: string, maxLength: number): void;
  execute(): Promise<StatementOutcome>;
}

export interface DriverConnection {
  prepare(sql: string): PreparedStatement;
  /** Key generated by the last insert executed on this connection */
  lastInsertId(): Scalar;
  quote(value: Scalar, type?: ParameterType): string;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollBack(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Collects named bindings so drivers only implement `execute`
 */
export abstract class BasePreparedStatement implements PreparedStatement {
  protected readonly values = new Map<string, Scalar>();
  protected readonly types = new Map<string, ParameterType>();
  protected readonly outputs = new Map<string, number>();

  constructor(protected readonly sql: string) {}

  bindValue(name: string, value: Scalar, type?: ParameterType): void {
    const placeholder = placeholderFor(name);
    this.values.set(placeholder, value);
    if (type !== undefined) {
      this.types.set(placeholder, type);
    }
  }

  bindOutput(name: string, maxLength: number): void {
    this.outputs.set(placeholderFor(name), maxLength);
  }

  abstract execute(): Promise<StatementOutcome>;

  protected positional(style: PlaceholderStyle): PositionalStatement {
    return toPositional(this.sql, this.values, style);
  }
}

/**
 * Quote a value as a SQL literal using doubled single quotes
 */
export function quoteLiteral(value: Scalar): string {
  if (value === null) {
    return 'NULL';
  }
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) {
    return `'${value.toISOString().slice(0, 19).replace('T', ' ')}'`;
  }
  if (Buffer.isBuffer(value)) {
    return `X'${value.toString('hex')}'`;
  }
  return `'${value.replace(/'/g, "''")}'`;
}
