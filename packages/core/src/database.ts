/**
 * Database
 *
 * Facade over one open connection: builds queries for its dialect, runs the
 * common statements in one call and drives transactions. Emits `query`,
 * `queryError`, `connect` and `close` events.
 *
 * @example
 * ```typescript
 * import { Database } from '@sqlgrid/core';
 * import '@sqlgrid/mysql';
 *
 * const db = await Database.connect({
 *   credentials: { type: 'Mysql', host: 'localhost', user: 'app', pass: 'test-secret', database: 'crm' },
 * });
 *
 * const id = (await db.insert('users', { name: 'Ada' }, 'id')).insertId();
 * const staff = await db.count('users', 'id', { site: 2 });
 * ```
 */

import { EventEmitter } from 'eventemitter3';

import { DialectFactory } from './dialect/dialect-factory';
import { getConnector } from './driver/connector-registry';
import { ConnectionError, TransactionError, toError } from './errors';
import { Query } from './query/query';
import { QueryContext } from './query/query-context';
import { consoleLogger } from './utils/logging';
import { validateCredentials } from './utils/validation';

import type { SQLDialect } from './dialect/sql-dialect';
import type { DriverConnection } from './driver/driver-connection';
import type { ConnectionFailurePayload } from './errors';
import type { WhereCallback, WhereMap } from './query/query';
import type { Result } from './result/result';
import type {
  Binding,
  ConnectOptions,
  DatabaseOptions,
  DebugSink,
  DialectName,
  Logger,
  ParameterType,
  QueryErrorEvent,
  QueryEvent,
  Scalar,
} from './types';

export type WhereInput = WhereMap | WhereCallback | null;
export type FieldList = string | readonly string[];

export interface DatabaseEvents {
  connect: (info: { dialect: DialectName }) => void;
  query: (event: QueryEvent) => void;
  queryError: (event: QueryErrorEvent) => void;
  transaction: (action: 'begin' | 'commit' | 'rollback') => void;
  close: () => void;
}

export class Database extends EventEmitter<DatabaseEvents> {
  private readonly logger: Logger | undefined;
  private debugSink: DebugSink | undefined;
  private inTransaction = false;

  constructor(
    public readonly connection: DriverConnection,
    public readonly dialect: SQLDialect,
    options: DatabaseOptions = {},
  ) {
    super();
    this.logger = options.logger === true ? consoleLogger : options.logger || undefined;
    this.debugSink = options.debug;
  }

  /**
   * Open a connection through the connector registered for the dialect.
   *
   * A connection that cannot be opened makes every request unserviceable,
   * so by default the process writes a JSON error payload and exits. Pass
   * `abortOnConnectionFailure: false` to get a ConnectionError instead.
   */
  static async connect(options: ConnectOptions): Promise<Database> {
    const { credentials, abortOnConnectionFailure = true, ...databaseOptions } = options;

    validateCredentials(credentials);
    const dialect = DialectFactory.getDialect(credentials.type);

    try {
      const connector = getConnector(dialect.name);
      const connection = await connector(credentials, dialect);

      try {
        await dialect.bootstrap(connection);
      } catch (error) {
        await connection.close();
        throw error;
      }

      const db = new Database(connection, dialect, databaseOptions);
      db.logger?.info(`Connected to ${dialect.name} database`, { database: credentials.database });
      db.emit('connect', { dialect: dialect.name });
      return db;
    } catch (error) {
      const cause = toError(error);
      const payload: ConnectionFailurePayload = {
        error:
          `An error occurred while connecting to the database '${credentials.database ?? ''}'. ` +
          `The error reported by the server was: ${cause.message}`,
      };

      if (abortOnConnectionFailure) {
        process.stdout.write(JSON.stringify(payload));
        process.exit(1);
      }

      throw new ConnectionError(payload.error, payload, cause);
    }
  }

  get type(): DialectName {
    return this.dialect.name;
  }

  // ============ Query Building ============

  /**
   * Start a query of the given kind: select, insert, update, delete, count
   * or raw
   */
  query(kind: string, table?: string | readonly string[]): Query {
    return new Query(this.createContext(), kind, table);
  }

  raw(): Query {
    return this.query('raw');
  }

  /**
   * Run SQL text as is
   */
  async sql(sql: string): Promise<Result> {
    return this.raw().exec(sql);
  }

  // ============ Shortcuts ============

  async select(
    table: FieldList,
    field: FieldList = '*',
    where: WhereInput = null,
    orderBy: FieldList | null = null,
  ): Promise<Result> {
    return this.query('select').table(table).get(field).where(where).order(orderBy).exec();
  }

  async selectDistinct(
    table: FieldList,
    field: FieldList = '*',
    where: WhereInput = null,
    orderBy: FieldList | null = null,
  ): Promise<Result> {
    return this.query('select')
      .table(table)
      .distinct(true)
      .get(field)
      .where(where)
      .order(orderBy)
      .exec();
  }

  async insert(
    table: FieldList,
    set: Record<string, Scalar>,
    pkey: FieldList | null = null,
  ): Promise<Result> {
    return this.query('insert').pkey(pkey).table(table).set(set).exec();
  }

  async update(
    table: FieldList,
    set: Record<string, Scalar> | null = null,
    where: WhereInput = null,
  ): Promise<Result> {
    const query = this.query('update').table(table);
    if (set) {
      query.set(set);
    }
    return query.where(where).exec();
  }

  async delete(table: FieldList, where: WhereInput = null): Promise<Result> {
    return this.query('delete').table(table).where(where).exec();
  }

  /**
   * Update the rows matching `where`, or insert a row (with the `where`
   * values added to `set`) when none match
   */
  async push(
    table: string,
    set: Record<string, Scalar>,
    where: Record<string, Scalar> = {},
    pkey: FieldList | null = null,
  ): Promise<Result> {
    const selectColumn = pkey === null ? '*' : typeof pkey === 'string' ? pkey : (pkey[0] ?? '*');

    const existing = await this.select(table, selectColumn, where);
    if (existing.count() > 0) {
      return this.update(table, set, where);
    }

    const values: Record<string, Scalar> = { ...set };
    for (const [key, value] of Object.entries(where)) {
      if (!Object.hasOwn(values, key)) {
        values[key] = value;
      }
    }

    return this.insert(table, values, pkey);
  }

  async count(table: FieldList, field = 'id', where: WhereInput = null): Promise<number> {
    const result = await this.query('count').table(table).get(field).where(where).exec();
    const row = result.fetch();
    return Number(row?.['cnt'] ?? 0);
  }

  async any(table: FieldList, where: WhereInput = null): Promise<boolean> {
    const result = await this.query('select').table(table).get('*').where(where).limit(1).exec();
    return result.count() > 0;
  }

  quote(value: Scalar, type?: ParameterType): string {
    return this.connection.quote(value, type);
  }

  // ============ Transactions ============

  get isTransactionActive(): boolean {
    return this.inTransaction;
  }

  async transaction(): Promise<this> {
    if (this.inTransaction) {
      throw new TransactionError('A transaction is already active; nested transactions are not supported');
    }

    try {
      await this.dialect.beginTransaction(this.connection);
    } catch (error) {
      throw new TransactionError('Failed to begin transaction', toError(error));
    }

    this.inTransaction = true;
    this.logger?.debug('Transaction started');
    this.emit('transaction', 'begin');
    return this;
  }

  async commit(): Promise<this> {
    this.ensureTransaction('commit');

    try {
      await this.dialect.commit(this.connection);
    } catch (error) {
      throw new TransactionError('Failed to commit transaction', toError(error));
    } finally {
      this.inTransaction = false;
    }

    this.logger?.debug('Transaction committed');
    this.emit('transaction', 'commit');
    return this;
  }

  async rollback(): Promise<this> {
    this.ensureTransaction('rollback');

    try {
      await this.dialect.rollback(this.connection);
    } catch (error) {
      throw new TransactionError('Failed to rollback transaction', toError(error));
    } finally {
      this.inTransaction = false;
    }

    this.logger?.debug('Transaction rolled back');
    this.emit('transaction', 'rollback');
    return this;
  }

  /**
   * Run `work` inside a transaction: commit when it resolves, roll back
   * and rethrow when it rejects
   */
  async transactional<T>(work: (db: this) => Promise<T>): Promise<T> {
    await this.transaction();

    try {
      const result = await work(this);
      await this.commit();
      return result;
    } catch (error) {
      if (this.inTransaction) {
        try {
          await this.rollback();
        } catch (rollbackError) {
          this.logger?.error('Rollback failed', toError(rollbackError).message);
        }
      }
      throw error;
    }
  }

  // ============ Debugging ============

  /**
   * Without an argument, whether a debug sink is set. With one, set the
   * sink, or remove it with `false`.
   */
  debug(): boolean;
  debug(sink: DebugSink | false): this;
  debug(sink?: DebugSink | false): boolean | this {
    if (sink === undefined) {
      return this.debugSink !== undefined;
    }
    this.debugSink = sink === false ? undefined : sink;
    return this;
  }

  debugInfo(query: string, bindings: Binding[]): this {
    this.debugSink?.({ query, bindings });
    return this;
  }

  async close(): Promise<void> {
    await this.connection.close();
    this.emit('close');
    this.removeAllListeners();
  }

  private ensureTransaction(action: string): void {
    if (!this.inTransaction) {
      throw new TransactionError(`Cannot ${action}: no transaction is active`);
    }
  }

  private createContext(): QueryContext {
    return new QueryContext(this.dialect, this.connection, {
      logger: this.logger,
      debug: (info) => this.debugInfo(info.query, info.bindings),
      observer: {
        onQuery: (event) => this.emit('query', event),
        onQueryError: (event) => this.emit('queryError', event),
      },
    });
  }
}
